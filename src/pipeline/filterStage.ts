import type { DigestSettings } from "../types/config";
import type { FilterVerdict, Paper } from "../types/paper";
import { LLMResponseError, LLMTransientError, type LLMProvider } from "../llm/provider";
import { fillTemplate } from "../utils/template";
import { createBalancedBatches } from "./batching";
import { parseFirstJsonBlock } from "./jsonBlock";
import { askUntilParsed, batchIds, formatPapers, withPacer, type StageDeps } from "./stage";

export function buildFilterPrompt(batch: Paper[], settings: DigestSettings): string {
  return fillTemplate(settings.prompts.filter, {
    filter_statement: settings.filterStatement,
    papers: formatPapers(batch),
    count: String(batch.length)
  });
}

function toVerdict(value: unknown): FilterVerdict {
  if (value === true) return "match";
  if (value === false) return "reject";
  if (typeof value === "string") {
    const v = value.trim().toLowerCase();
    if (v === "yes" || v === "true") return "match";
    if (v === "no" || v === "false") return "reject";
  }
  return "unparsed";
}

/** The reply's JSON array when it has exactly `count` elements, else null. */
function readAnswerArray(text: string, count: number): unknown[] | null {
  const data = parseFirstJsonBlock(text);
  return Array.isArray(data) && data.length === count ? data : null;
}

function allUnparsed(count: number): FilterVerdict[] {
  return Array.from({ length: count }, (): FilterVerdict => "unparsed");
}

/**
 * Maps a reply to one verdict per paper. Fails closed: without a JSON array
 * of exactly `count` elements every paper is "unparsed", and so is any
 * element that is not a clear yes/no.
 */
export function parseFilterVerdicts(text: string, count: number): FilterVerdict[] {
  return readAnswerArray(text, count)?.map(toVerdict) ?? allUnparsed(count);
}

/**
 * Sets `verdict` on every paper and returns the ones judged relevant, in
 * input order. A batch whose reply cannot be parsed is asked again before it
 * is excluded. Only an authentication failure aborts the stage.
 */
export async function runFilterStage(
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
    const label = `filter batch ${i + 1}/${batches.length}`;
    let verdicts: FilterVerdict[];

    try {
      const answers = await askUntilParsed(llm, {
        prompt: buildFilterPrompt(batch, settings),
        temperature: 0,
        maxTokens: settings.llm.maxTokens,
        correlationId: batchIds(batch)
      }, settings, deps, label, text => readAnswerArray(text, batch.length));
      verdicts = answers?.map(toVerdict) ?? allUnparsed(batch.length);
    } catch (err) {
      if (!(err instanceof LLMTransientError || err instanceof LLMResponseError)) throw err;
      logger.warn(`${label} ERROR: ${err.message} (excluding ${batch.length} papers)`);
      verdicts = batch.map((): FilterVerdict => "error");
    }

    batch.forEach((p, j) => { p.verdict = verdicts[j]; });

    const matched = verdicts.filter(v => v === "match").length;
    const unparsed = verdicts.filter(v => v === "unparsed").length;
    logger.info(`${label}: ${matched}/${batch.length} matched${unparsed > 0 ? `, ${unparsed} unparsed (excluded)` : ""}`);
  }

  return papers.filter(p => p.verdict === "match");
}
