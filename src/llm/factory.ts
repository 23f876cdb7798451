import type { DigestSettings } from "../types/config";
import { AnthropicProvider } from "./anthropicProvider";
import { OpenAICompatibleProvider } from "./openaiCompatible";
import type { LLMProvider } from "./provider";

export function buildLLMProvider(settings: DigestSettings): LLMProvider {
  const { llm } = settings;
  if (llm.provider === "anthropic") {
    return new AnthropicProvider(llm.apiKey, llm.model, { timeoutMs: llm.timeoutMs });
  }
  return new OpenAICompatibleProvider(llm.baseUrl, llm.apiKey, llm.model, { timeoutMs: llm.timeoutMs });
}
