/** The subset of the global `fetch` frate relies on; tests pass a fake. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>
