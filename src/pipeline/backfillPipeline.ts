import type { DigestSettings } from "../types/config";
import { LLMAuthError } from "../llm/provider";
import { ReportWriteError } from "../storage/reportWriter";
import { dateRange, parseDateYMD } from "../utils/dates";
import { runDailyPipeline, type DailyRunResult, type PipelineDeps } from "./dailyPipeline";

export interface BackfillOptions {
  startDate: string; // YYYY-MM-DD
  endDate: string;   // YYYY-MM-DD
  onProgress?: (date: string, index: number, total: number) => void;
}

export interface BackfillResult {
  processed: DailyRunResult[];
  errors: Record<string, string>;
}

/**
 * Runs the daily pipeline once per date of an inclusive range. A failed date
 * is recorded and the next one is tried; credential and report-write
 * failures stop the backfill since every later date would fail the same way.
 */
export async function runBackfillPipeline(
  settings: DigestSettings,
  deps: PipelineDeps,
  options: BackfillOptions
): Promise<BackfillResult> {
  const start = parseDateYMD(options.startDate);
  const end = parseDateYMD(options.endDate);

  // Validate range
  const diffDays = Math.floor((end.getTime() - start.getTime()) / (1000 * 60 * 60 * 24)) + 1;
  if (diffDays < 1) {
    throw new RangeError(`Invalid date range: startDate must be <= endDate`);
  }
  if (diffDays > settings.backfillMaxDays) {
    throw new RangeError(`Backfill range (${diffDays} days) exceeds backfill_max_days (${settings.backfillMaxDays})`);
  }

  const dates = dateRange(options.startDate, options.endDate);
  const processed: DailyRunResult[] = [];
  const errors: Record<string, string> = {};

  for (let i = 0; i < dates.length; i++) {
    const date = dates[i];
    options.onProgress?.(date, i + 1, dates.length);

    try {
      processed.push(await runDailyPipeline(settings, deps, { targetDate: date }));
    } catch (err) {
      if (err instanceof LLMAuthError || err instanceof ReportWriteError) throw err;
      errors[date] = String(err);
    }
  }

  return { processed, errors };
}
