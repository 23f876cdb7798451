export interface LLMConfig {
  provider: "openai_compatible" | "anthropic";
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /** Extra attempts after a transient failure */
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface PromptConfig {
  filter: string;
  summary: string;
}

export interface DigestSettings {
  // arXiv search
  searchKeyword: string;
  categories: string[];
  /** How many days before the target date the search window opens (default 1) */
  lookbackDays: number;
  maxResults: number;
  /** false = keep only papers whose primary category is one of `categories` */
  crossLists: boolean;

  // Filter + summarize
  filterStatement: string;
  batchSize: number;
  /** Pause between consecutive LLM calls */
  requestDelayMs: number;

  // LLM
  llm: LLMConfig;
  prompts: PromptConfig;

  // Output
  reportDir: string;
  includeAbstract: boolean;

  // Backfill
  backfillMaxDays: number;
}
