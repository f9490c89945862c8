import type { CacheIoError, Result } from "@frate/core"

export type { CacheIoError } from "@frate/core"

export type IoResult<T> = Result<T, CacheIoError>
