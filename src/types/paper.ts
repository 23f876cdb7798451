/** Outcome of the relevance check for one paper. */
export type FilterVerdict =
  | "match"     // the model judged the paper relevant
  | "reject"    // the model judged the paper irrelevant
  | "unparsed"  // the reply could not be mapped to a yes/no for this paper
  | "error";    // the LLM call for the paper's batch failed

export interface GeneratedSummary {
  kind: "generated";
  motivation: string;
  method: string;
}

export interface UnavailableSummary {
  kind: "unavailable";
  reason: string;
}

export type PaperSummary = GeneratedSummary | UnavailableSummary;

export interface Paper {
  id: string;               // e.g. "2406.01234v1"
  title: string;
  authors: string[];
  abstract: string;
  categories: string[];
  primaryCategory: string;
  published: string;        // ISO
  updated: string;          // ISO
  links: { abs: string; pdf: string };

  // computed fields
  verdict?: FilterVerdict;
  summary?: PaperSummary;
}

export interface FetchParams {
  keyword: string;
  categories: string[];
  /** YYYY-MM-DD, UTC */
  targetDate: string;
  /** Days before targetDate included in the window */
  lookbackDays: number;
  maxResults: number;
  /** Keep papers whose primary category is outside `categories` */
  crossLists?: boolean;
}
