import type { Paper, FetchParams } from "../types/paper";

export interface PaperSource {
  name: string;
  /**
   * Resolves to the papers in the requested window; an empty array means
   * nothing was published. Rejects with {@link SearchError} when the index
   * could not be queried.
   */
  fetch(params: FetchParams): Promise<Paper[]>;
}

export class SearchError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "SearchError";
  }
}
