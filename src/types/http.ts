/** The slice of the global `fetch` the HTTP clients use; tests pass a stub. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = ms => new Promise(r => setTimeout(r, ms));
