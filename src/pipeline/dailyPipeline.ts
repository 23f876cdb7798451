import path from "node:path";
import type { DigestSettings } from "../types/config";
import type { SleepFn } from "../types/http";
import type { Paper } from "../types/paper";
import type { PaperSource } from "../sources/source";
import type { LLMProvider } from "../llm/provider";
import type { ReportWriter } from "../storage/reportWriter";
import { appendDailyReport } from "../report/markdown";
import { getISODate } from "../utils/dates";
import { RunLogger } from "../utils/logger";
import { runFilterStage } from "./filterStage";
import { runSummarizeStage } from "./summarizeStage";
import { CallPacer, type StageDeps } from "./stage";

export const RUN_LOG_FILE = ".runs.log";
export const RUN_LOG_MAX_BYTES = 512 * 1024;

export interface PipelineDeps {
  source: PaperSource;
  llm: LLMProvider;
  writer: ReportWriter;
  logger?: RunLogger;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface DailyPipelineOptions {
  /** YYYY-MM-DD; defaults to today (UTC) */
  targetDate?: string;
  /** Called at each major pipeline step with a human-readable status message */
  onProgress?: (msg: string) => void;
}

export interface DailyRunResult {
  date: string;
  searched: number;
  matched: number;
  summarized: number;
  placeholders: number;
  reportPath: string;
  usage: { inputTokens: number; outputTokens: number };
}

export async function runDailyPipeline(
  settings: DigestSettings,
  deps: PipelineDeps,
  options: DailyPipelineOptions = {}
): Promise<DailyRunResult> {
  const logger = deps.logger ?? new RunLogger();
  const now = deps.now ? deps.now() : new Date();
  const date = options.targetDate ?? getISODate(now);
  const logPath = path.join(settings.reportDir, RUN_LOG_FILE);
  const progress = options.onProgress ?? (() => {});
  const firstLine = logger.lines().length;

  // Token usage accumulator
  let totalInputTokens = 0;
  let totalOutputTokens = 0;
  const stageDeps: StageDeps = {
    logger,
    sleep: deps.sleep,
    pacer: new CallPacer(settings.requestDelayMs, deps.sleep),
    onUsage: (label, usage) => {
      totalInputTokens += usage.inputTokens;
      totalOutputTokens += usage.outputTokens;
      logger.info(`${label} tokens: input=${usage.inputTokens} output=${usage.outputTokens}`);
    }
  };

  const flushLog = async () => {
    try {
      await deps.writer.appendLogWithRotation(logPath, logger.lines().slice(firstLine).join("\n") + "\n", RUN_LOG_MAX_BYTES);
    } catch (err) {
      // the report itself is written already (or the run failed for another reason)
      console.error(`[ArxivDigest] Failed to write run log: ${String(err)}`);
    }
  };

  logger.info(`=== Daily pipeline START date=${date} ===`);
  logger.info(`Settings: keyword="${settings.searchKeyword}" categories=[${settings.categories.join(",")}] batchSize=${settings.batchSize} model=${settings.llm.model}`);

  try {
    // ── Step 1: Search ────────────────────────────────────────────
    progress(`[1/4] Searching arXiv for "${settings.searchKeyword}"...`);
    let papers: Paper[];
    try {
      papers = await deps.source.fetch({
        keyword: settings.searchKeyword,
        categories: settings.categories,
        targetDate: date,
        lookbackDays: settings.lookbackDays,
        maxResults: settings.maxResults,
        crossLists: settings.crossLists
      });
    } catch (err) {
      logger.error(`Step 1 SEARCH ERROR: ${String(err)}`);
      throw err;
    }
    logger.info(`Step 1 SEARCH: got ${papers.length} papers`);
    if (papers.length > 0) {
      logger.info(`Step 1 SEARCH: first="${papers[0].title.slice(0, 80)}" published=${papers[0].published.slice(0, 10)}`);
    }

    // ── Step 2: Filter ────────────────────────────────────────────
    let matched: Paper[] = [];
    if (papers.length > 0) {
      progress(`[2/4] Filtering ${papers.length} papers...`);
      matched = await runFilterStage(papers, settings, deps.llm, stageDeps);
      logger.info(`Step 2 FILTER: ${matched.length}/${papers.length} papers matched`);
    } else {
      logger.info(`Step 2 FILTER: skipped (0 papers)`);
    }

    // ── Step 3: Summarize ─────────────────────────────────────────
    if (matched.length > 0) {
      progress(`[3/4] Summarizing ${matched.length} papers...`);
      await runSummarizeStage(matched, settings, deps.llm, stageDeps);
    } else {
      logger.info(`Step 3 SUMMARIZE: skipped (0 papers)`);
    }
    const placeholders = matched.filter(p => p.summary?.kind !== "generated").length;
    if (matched.length > 0) {
      logger.info(`Step 3 SUMMARIZE: ${matched.length - placeholders}/${matched.length} summarized, ${placeholders} placeholders`);
    }

    // ── Step 4: Write report ──────────────────────────────────────
    progress(`[4/4] Writing report...`);
    let reportPath: string;
    try {
      reportPath = await appendDailyReport(deps.writer, settings.reportDir, {
        date,
        runAt: now,
        keyword: settings.searchKeyword,
        categories: settings.categories,
        searched: papers.length,
        papers: matched,
        includeAbstract: settings.includeAbstract
      });
    } catch (err) {
      logger.error(`Step 4 WRITE ERROR: ${String(err)}`);
      throw err;
    }
    logger.info(`Step 4 WRITE: appended ${matched.length} entries to ${reportPath}`);

    const tokenSummary = totalInputTokens > 0
      ? ` | tokens: ${totalInputTokens.toLocaleString("en-US")}→${totalOutputTokens.toLocaleString("en-US")}`
      : "";
    logger.info(`=== Daily pipeline END date=${date} papers=${matched.length}${tokenSummary} ===`);
    progress(`Done: ${matched.length} papers${tokenSummary}`);

    return {
      date,
      searched: papers.length,
      matched: matched.length,
      summarized: matched.length - placeholders,
      placeholders,
      reportPath,
      usage: { inputTokens: totalInputTokens, outputTokens: totalOutputTokens }
    };
  } finally {
    await flushLog();
  }
}
