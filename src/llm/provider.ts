export interface LLMInput {
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  /** Identifies what the call is about (e.g. the paper ids of a batch) in logs and errors */
  correlationId?: string;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMOutput {
  text: string;
  usage?: LLMUsage;
  raw?: unknown;
}

export interface LLMProvider {
  generate(input: LLMInput): Promise<LLMOutput>;
}

function withCorrelation(message: string, correlationId?: string): string {
  return correlationId ? `${message} [${correlationId}]` : message;
}

/** The endpoint rejected the credentials. No later call can succeed. */
export class LLMAuthError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "LLMAuthError";
  }
}

/** Timeout, connection failure, 408, 429 or 5xx. Worth retrying. */
export class LLMTransientError extends Error {
  constructor(message: string, readonly status?: number, correlationId?: string) {
    super(withCorrelation(message, correlationId));
    this.name = "LLMTransientError";
  }
}

/** The endpoint answered but not with a usable completion. */
export class LLMResponseError extends Error {
  constructor(message: string, readonly status?: number, correlationId?: string) {
    super(withCorrelation(message, correlationId));
    this.name = "LLMResponseError";
  }
}

/** Maps an HTTP status of a failed call to the matching error class. */
export function errorForStatus(status: number, detail: string, correlationId?: string): Error {
  if (status === 401 || status === 403) {
    return new LLMAuthError(`LLM authentication failed (HTTP ${status}): ${detail}`, status);
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new LLMTransientError(`LLM request failed (HTTP ${status}): ${detail}`, status, correlationId);
  }
  return new LLMResponseError(`LLM request rejected (HTTP ${status}): ${detail}`, status, correlationId);
}
