import { ConfigError, loadSettings } from "./settings";
import { ArxivSource } from "./sources/arxivSource";
import { SearchError } from "./sources/source";
import { buildLLMProvider } from "./llm/factory";
import { LLMAuthError } from "./llm/provider";
import { ReportWriter, ReportWriteError } from "./storage/reportWriter";
import { runDailyPipeline, type PipelineDeps } from "./pipeline/dailyPipeline";
import { runBackfillPipeline } from "./pipeline/backfillPipeline";
import { isValidDateStr } from "./utils/dates";
import { RunLogger } from "./utils/logger";

export const USAGE = `arxiv-digest - search arXiv, keep the papers matching your interest, summarize them into a monthly report.

Usage:
  arxiv-digest [options]

Options:
  --config=PATH      Settings file (default: config.json)
  --date=YYYY-MM-DD  Run for this date instead of today (UTC)
  --from=YYYY-MM-DD  Backfill from this date (requires --to)
  --to=YYYY-MM-DD    Backfill up to and including this date
  --help             Show this help

Environment:
  LLM_API_KEY        API key for the LLM endpoint; overrides "api_key" in the settings file`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  configPath: string;
  date?: string;
  from?: string;
  to?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configPath: "config.json", help: false };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }
    const match = arg.match(/^--(config|date|from|to)=(.*)$/);
    if (!match) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    const [, key, value] = match;
    if (!value) throw new UsageError(`--${key} needs a value`);
    if (key === "config") {
      args.configPath = value;
      continue;
    }
    if (!isValidDateStr(value)) {
      throw new UsageError(`--${key} expects YYYY-MM-DD, got "${value}"`);
    }
    if (key === "date") args.date = value;
    else if (key === "from") args.from = value;
    else args.to = value;
  }

  if ((args.from === undefined) !== (args.to === undefined)) {
    throw new UsageError("--from and --to must be given together");
  }
  if (args.date && args.from) {
    throw new UsageError("--date cannot be combined with --from/--to");
  }
  return args;
}

/** Errors that end a run with a one-line message instead of a stack trace. */
function isOperatorError(err: unknown): err is Error {
  return err instanceof ConfigError
    || err instanceof SearchError
    || err instanceof LLMAuthError
    || err instanceof ReportWriteError
    || err instanceof UsageError
    || err instanceof RangeError;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

/**
 * Runs the CLI and resolves to the process exit code: 0 when the run
 * completed (also with zero matching papers), 1 on a fatal error.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = consoleIO,
  makeDeps?: (logger: RunLogger) => Omit<PipelineDeps, "logger">
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.out(USAGE);
      return 0;
    }

    const settings = await loadSettings(args.configPath, env);
    const logger = new RunLogger();
    const deps: PipelineDeps = {
      ...(makeDeps
        ? makeDeps(logger)
        : {
            source: new ArxivSource({ onRetry: msg => logger.warn(msg) }),
            llm: buildLLMProvider(settings),
            writer: new ReportWriter()
          }),
      logger
    };

    if (args.from && args.to) {
      const result = await runBackfillPipeline(settings, deps, {
        startDate: args.from,
        endDate: args.to,
        onProgress: (date, index, total) => io.out(`Processing ${date} (${index}/${total})...`)
      });
      const failed = Object.entries(result.errors);
      for (const [date, message] of failed) {
        io.err(`${date}: ${message}`);
      }
      io.out(`Backfill done: ${result.processed.length} succeeded, ${failed.length} failed.`);
      return failed.length > 0 ? 1 : 0;
    }

    const result = await runDailyPipeline(settings, deps, {
      targetDate: args.date,
      onProgress: msg => io.out(msg)
    });
    io.out(`Report: ${result.reportPath} (${result.matched} of ${result.searched} papers matched)`);
    return 0;
  } catch (err) {
    if (isOperatorError(err)) {
      io.err(`Error: ${err.message}`);
      if (err instanceof UsageError) io.err("Run with --help for usage.");
    } else {
      io.err(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    }
    return 1;
  }
}
