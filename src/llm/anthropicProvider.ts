import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";
import { errorForStatus, LLMResponseError, LLMTransientError } from "./provider";

interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system?: string;
  messages: Array<{ role: "user"; content: string }>;
}

interface MessageReply {
  content: Array<{ type: string; text?: string }>;
  usage?: { input_tokens: number; output_tokens: number };
}

/** The part of the SDK client the provider calls; `client.messages` fits it. */
export interface AnthropicMessages {
  create(request: MessageRequest): PromiseLike<MessageReply>;
}

export interface AnthropicProviderOptions {
  timeoutMs?: number;
  messages?: AnthropicMessages;
}

export class AnthropicProvider implements LLMProvider {
  private messages: AnthropicMessages;

  constructor(apiKey: string, private model: string, options: AnthropicProviderOptions = {}) {
    // retries are handled by withRetry so every attempt is logged in one place
    this.messages = options.messages
      ?? new Anthropic({ apiKey, timeout: options.timeoutMs ?? 60_000, maxRetries: 0 }).messages;
  }

  async generate(input: LLMInput): Promise<LLMOutput> {
    let response: MessageReply;
    try {
      response = await this.messages.create({
        model: this.model,
        max_tokens: input.maxTokens ?? 4096,
        temperature: input.temperature ?? 0.3,
        system: input.system,
        messages: [{ role: "user", content: input.prompt }]
      });
    } catch (err) {
      throw toLLMError(err, input.correlationId);
    }

    const text = response.content.find(b => b.type === "text")?.text;
    if (typeof text !== "string") {
      throw new LLMResponseError("Anthropic response has no text block", undefined, input.correlationId);
    }
    const usage = {
      inputTokens: response.usage?.input_tokens ?? 0,
      outputTokens: response.usage?.output_tokens ?? 0
    };

    return { text, usage, raw: response };
  }
}

function toLLMError(err: unknown, correlationId?: string): Error {
  // APIConnectionError (and its timeout subclass) carries no status
  if (err instanceof Anthropic.APIConnectionError) {
    return new LLMTransientError(`Anthropic request failed: ${err.message}`, undefined, correlationId);
  }
  if (err instanceof Anthropic.APIError && typeof err.status === "number") {
    return errorForStatus(err.status, err.message, correlationId);
  }
  return new LLMResponseError(`Anthropic request failed: ${String(err)}`, undefined, correlationId);
}
