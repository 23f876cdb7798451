export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

export interface RunLoggerOptions {
  /** Console prefix, e.g. "[ArxivDigest]" */
  prefix?: string;
  /** Keep entries but write nothing to the console */
  quiet?: boolean;
  now?: () => Date;
}

/**
 * Collects the log of one run. Entries go to the console as they happen and
 * are kept so the pipeline can flush them to the run log at the end.
 */
export class RunLogger {
  private entries: LogEntry[] = [];
  private readonly prefix: string;
  private readonly quiet: boolean;
  private readonly now: () => Date;

  constructor(options: RunLoggerOptions = {}) {
    this.prefix = options.prefix ?? "[ArxivDigest]";
    this.quiet = options.quiet ?? false;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string): void {
    this.record("info", message);
  }

  warn(message: string): void {
    this.record("warn", message);
  }

  error(message: string): void {
    this.record("error", message);
  }

  /** Lines as written to the run log: `[ISO] LEVEL message` */
  lines(): string[] {
    return this.entries.map(e =>
      `[${new Date(e.timestamp).toISOString()}] ${e.level.toUpperCase()} ${e.message}`
    );
  }

  private record(level: LogLevel, message: string): void {
    const entry: LogEntry = { timestamp: this.now().getTime(), level, message };
    this.entries.push(entry);
    if (this.quiet) return;
    const line = `${this.prefix} ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }
}
