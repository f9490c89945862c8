/**
 * Custom Vitest assertions for Result types
 *
 * These matchers make it easy to assert on Result<T, E> types
 * that follow the { ok: true, value: T } | { ok: false, error: E } pattern.
 */

import { expect } from "vitest"

interface OkResult<T> {
	ok: true
	value: T
}

interface ErrResult<E> {
	ok: false
	error: E
}

type Result<T, E> = OkResult<T> | ErrResult<E>

function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
	return result.ok === true
}

function describeError(error: unknown): string {
	return typeof error === "object" && error !== null
		? JSON.stringify(error, null, 2)
		: String(error)
}

function errorType(error: unknown): unknown {
	return typeof error === "object" && error !== null && "type" in error
		? error.type
		: undefined
}

expect.extend({
	/**
	 * Assert that a result is an error.
	 *
	 * @example
	 * expect(parseToolSpec("just")).toBeErr()
	 */
	toBeErr(received: Result<unknown, unknown>) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected result to be an error, but got ok with value: ${JSON.stringify(received.value)}`,
				pass: false,
			}
		}

		return {
			message: () =>
				`expected result not to be an error, but got: ${describeError(received.error)}`,
			pass: true,
		}
	},

	/**
	 * Assert that a result is an error with the given `type` tag.
	 *
	 * @example
	 * expect(await fetchVerified(entry, layout, options)).toBeErrOfType("integrity")
	 */
	toBeErrOfType(received: Result<unknown, unknown>, type: string) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected a ${type} error, but got ok with value: ${JSON.stringify(received.value)}`,
				pass: false,
			}
		}

		const actual = errorType(received.error)
		return {
			message: () =>
				actual === type
					? `expected error not to be of type ${type}`
					: `expected a ${type} error, but got:\n${describeError(received.error)}`,
			pass: actual === type,
		}
	},

	/**
	 * Assert that a result is Ok.
	 *
	 * @example
	 * expect(parseManifest(input)).toBeOk()
	 */
	toBeOk(received: Result<unknown, unknown>) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected result not to be ok, but got value: ${JSON.stringify(received.value)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be ok, but got error:\n${describeError(received.error)}`,
			pass: false,
		}
	},
})

// Extend Vitest's expect types
declare module "vitest" {
	// biome-ignore lint/suspicious/noExplicitAny: matches Vitest's Assertion default.
	interface Assertion<T = any> {
		toBeOk(): void
		toBeErr(): void
		toBeErrOfType(type: string): void
	}

	interface AsymmetricMatchersContaining {
		toBeOk(): void
		toBeErr(): void
	}
}
