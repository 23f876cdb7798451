import type { FetchFn } from "../types/http";
import { isRecord } from "../utils/guards";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";
import { errorForStatus, LLMResponseError, LLMTransientError } from "./provider";

function tokenCount(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

/** Timeouts and aborts (the signal also covers reading the body) or a dropped connection. */
function isInterrupted(err: unknown): boolean {
  return err instanceof TypeError
    || (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError"));
}

export interface OpenAICompatibleOptions {
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

export class OpenAICompatibleProvider implements LLMProvider {
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(
    private baseUrl: string,
    private apiKey: string,
    private model: string,
    options: OpenAICompatibleOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async generate(input: LLMInput): Promise<LLMOutput> {
    const messages: Array<{ role: string; content: string }> = [];

    if (input.system) {
      messages.push({ role: "system", content: input.system });
    }
    messages.push({ role: "user", content: input.prompt });

    const body = {
      model: this.model,
      messages,
      temperature: input.temperature ?? 0.3,
      max_tokens: input.maxTokens ?? 4096
    };

    const url = this.baseUrl.replace(/\/$/, "") + "/chat/completions";

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      // timeouts surface here as TimeoutError, connection failures as TypeError
      throw new LLMTransientError(`LLM request failed: ${String(err)}`, undefined, input.correlationId);
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => "")).slice(0, 300) || response.statusText;
      throw errorForStatus(response.status, detail, input.correlationId);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      if (isInterrupted(err)) {
        throw new LLMTransientError(`LLM response was interrupted: ${String(err)}`, response.status, input.correlationId);
      }
      throw new LLMResponseError(`LLM response is not JSON: ${String(err)}`, response.status, input.correlationId);
    }
    if (!isRecord(json)) {
      throw new LLMResponseError("LLM response is not an object", response.status, input.correlationId);
    }

    const choice = Array.isArray(json.choices) ? json.choices[0] : undefined;
    const message = isRecord(choice) ? choice.message : undefined;
    const text = isRecord(message) ? message.content : undefined;
    if (typeof text !== "string") {
      throw new LLMResponseError("LLM response has no message content", response.status, input.correlationId);
    }
    const usage = isRecord(json.usage) ? {
      inputTokens: tokenCount(json.usage.prompt_tokens),
      outputTokens: tokenCount(json.usage.completion_tokens)
    } : undefined;

    return { text, usage, raw: json };
  }
}
