import type { DigestSettings } from "../types/config";
import { sleep as defaultSleep, type SleepFn } from "../types/http";
import type { Paper } from "../types/paper";
import type { LLMInput, LLMOutput, LLMProvider, LLMUsage } from "../llm/provider";
import { withRetry } from "../llm/retry";
import type { RunLogger } from "../utils/logger";

/** Spaces out LLM calls by a fixed delay. The first call goes out at once. */
export class CallPacer {
  private called = false;

  constructor(private delayMs: number, private sleep: SleepFn = defaultSleep) {}

  async wait(): Promise<void> {
    if (this.called && this.delayMs > 0) {
      await this.sleep(this.delayMs);
    }
    this.called = true;
  }
}

export interface StageDeps {
  logger: RunLogger;
  sleep?: SleepFn;
  /** Shared across stages so the delay also applies between them */
  pacer?: CallPacer;
  onUsage?: (label: string, usage: LLMUsage) => void;
}

export function formatPapers(papers: Paper[]): string {
  return papers
    .map((p, i) => `Paper ${i + 1}\nTitle: ${p.title}\nAbstract:\n${p.abstract}`)
    .join("\n\n");
}

export function batchIds(batch: Paper[]): string {
  return batch.map(p => p.id).join(", ");
}

/** Gives the deps a pacer of their own unless the caller shares one. */
export function withPacer(deps: StageDeps, settings: DigestSettings): StageDeps {
  return deps.pacer ? deps : { ...deps, pacer: new CallPacer(settings.requestDelayMs, deps.sleep) };
}

/** One paced LLM call with transient-failure retries and usage reporting. */
export async function callWithRetry(
  llm: LLMProvider,
  input: LLMInput,
  settings: DigestSettings,
  deps: StageDeps,
  label: string
): Promise<LLMOutput> {
  const sleep = deps.sleep ?? defaultSleep;
  await deps.pacer?.wait();

  const result = await withRetry(
    () => llm.generate(input),
    {
      maxRetries: settings.llm.maxRetries,
      baseDelayMs: settings.llm.retryBaseDelayMs,
      sleep,
      onRetry: (err, attempt, waitMs) =>
        deps.logger.warn(`${label}: ${err.message}, retry ${attempt}/${settings.llm.maxRetries} in ${waitMs}ms`)
    }
  );
  if (result.usage) deps.onUsage?.(label, result.usage);
  return result;
}

/**
 * Like {@link callWithRetry}, but asks again while `parse` rejects the reply
 * (returns null), up to `max_retries` extra times. Resolves to null when no
 * reply could be parsed.
 */
export async function askUntilParsed<T>(
  llm: LLMProvider,
  input: LLMInput,
  settings: DigestSettings,
  deps: StageDeps,
  label: string,
  parse: (text: string) => T | null
): Promise<T | null> {
  const maxRetries = settings.llm.maxRetries;
  for (let attempt = 0; ; attempt++) {
    const result = await callWithRetry(llm, input, settings, deps, label);
    const parsed = parse(result.text);
    if (parsed !== null || attempt >= maxRetries) return parsed;
    deps.logger.warn(`${label}: reply could not be parsed, asking again (${attempt + 1}/${maxRetries})`);
  }
}
