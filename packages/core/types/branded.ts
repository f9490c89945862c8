/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const ToolNameBrand: unique symbol
declare const VersionRequirementBrand: unique symbol
declare const ExactVersionBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const ChecksumBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type ToolName = Brand<string, typeof ToolNameBrand>
export type VersionRequirement = Brand<string, typeof VersionRequirementBrand>
export type ExactVersion = Brand<string, typeof ExactVersionBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/** Lowercase hex SHA-256 digest, always written with the `sha256:` prefix. */
export type Checksum = Brand<string, typeof ChecksumBrand>
