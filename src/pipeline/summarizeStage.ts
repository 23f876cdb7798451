import type { DigestSettings } from "../types/config";
import type { GeneratedSummary, Paper } from "../types/paper";
import { LLMResponseError, LLMTransientError, type LLMProvider } from "../llm/provider";
import { isRecord } from "../utils/guards";
import { fillTemplate } from "../utils/template";
import { createBalancedBatches } from "./batching";
import { parseFirstJsonBlock } from "./jsonBlock";
import { askUntilParsed, batchIds, formatPapers, withPacer, type StageDeps } from "./stage";

export function buildSummaryPrompt(batch: Paper[], settings: DigestSettings): string {
  return fillTemplate(settings.prompts.summary, {
    papers: formatPapers(batch),
    count: String(batch.length)
  });
}

function toSummary(item: unknown): GeneratedSummary | null {
  if (!isRecord(item)) return null;
  const { motivation, method } = item;
  if (typeof motivation !== "string" || typeof method !== "string") return null;
  if (!motivation.trim() || !method.trim()) return null;
  return { kind: "generated", motivation: motivation.trim(), method: method.trim() };
}

/**
 * One entry per paper: the parsed summary, or null when the reply had no
 * usable summary for that paper. A reply that is not an array of `count`
 * elements yields all nulls.
 */
export function parseSummaries(text: string, count: number): (GeneratedSummary | null)[] {
  return readSummaryArray(text, count) ?? Array.from({ length: count }, () => null);
}

/** Per-paper summaries when the reply is an array of `count` elements, else null. */
function readSummaryArray(text: string, count: number): (GeneratedSummary | null)[] | null {
  const data = parseFirstJsonBlock(text);
  return Array.isArray(data) && data.length === count ? data.map(toSummary) : null;
}

/**
 * Sets `summary` on every paper. Papers whose summary could not be produced
 * get an "unavailable" summary with the reason and stay in the output.
 */
export async function runSummarizeStage(
  papers: Paper[],
  settings: DigestSettings,
  llm: LLMProvider,
  stageDeps: StageDeps
): Promise<Paper[]> {
  const deps = withPacer(stageDeps, settings);
  const { logger } = deps;
  const batches = createBalancedBatches(papers, settings.batchSize);

  for (let i = 0; i < batches.length; i++) {
    const batch = batches[i];
    const label = `summary batch ${i + 1}/${batches.length}`;

    let summaries: (GeneratedSummary | null)[];
    let missingReason: string;
    try {
      const parsed = await askUntilParsed(llm, {
        prompt: buildSummaryPrompt(batch, settings),
        temperature: settings.llm.temperature,
        maxTokens: settings.llm.maxTokens,
        correlationId: batchIds(batch)
      }, settings, deps, label, text => readSummaryArray(text, batch.length));
      summaries = parsed ?? batch.map(() => null);
      missingReason = "the model reply contained no usable summary for this paper";
    } catch (err) {
      if (!(err instanceof LLMTransientError || err instanceof LLMResponseError)) throw err;
      logger.warn(`${label} ERROR: ${err.message} (using placeholders for ${batch.length} papers)`);
      summaries = batch.map(() => null);
      missingReason = `summary request failed: ${err.message}`;
    }

    batch.forEach((p, j) => {
      p.summary = summaries[j] ?? { kind: "unavailable", reason: missingReason };
    });

    const generated = summaries.filter(s => s !== null).length;
    logger.info(`${label}: ${generated}/${batch.length} summarized`);
  }

  return papers;
}
