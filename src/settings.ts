import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { DigestSettings } from "./types/config";

export const API_KEY_ENV = "LLM_API_KEY";

export const DEFAULT_FILTER_PROMPT = `You are screening new arXiv papers for a researcher.

Selection criterion:
{{filter_statement}}

Papers:
{{papers}}

For each paper, in the order given, decide whether it satisfies the selection criterion.
Answer with a JSON array of exactly {{count}} booleans and nothing else, for example [true, false].`;

export const DEFAULT_SUMMARY_PROMPT = `You are summarizing new arXiv papers for a researcher.

Papers:
{{papers}}

For each paper, in the order given, write:
- "motivation": the problem the paper addresses and why it matters, in at most three sentences;
- "method": how the paper approaches the problem, in at most three sentences.

Answer with a JSON array of exactly {{count}} objects of the form {"motivation": "...", "method": "..."} and nothing else.`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const templateWith = (...vars: string[]) =>
  z.string().min(1).refine(
    tpl => vars.every(v => tpl.includes(`{{${v}}}`)),
    { message: `template must contain ${vars.map(v => `{{${v}}}`).join(" and ")}` }
  );

const llmSchema = z.object({
  provider: z.enum(["openai_compatible", "anthropic"]).default("openai_compatible"),
  base_url: z.string().url().default("https://api.openai.com/v1"),
  model: z.string().min(1).default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0.2),
  max_tokens: z.number().int().positive().default(4096),
  timeout_ms: z.number().int().positive().default(60_000),
  max_retries: z.number().int().min(0).max(10).default(2),
  retry_base_delay_ms: z.number().int().min(0).default(2000)
}).default({});

const settingsFileSchema = z.object({
  batch_size: z.number().int().positive().default(10),
  search_keyword: z.string().trim().min(1, "search_keyword must not be empty"),
  categories: z.array(z.string().trim().min(1)).default([]),
  filter_statement: z.string().trim().min(1, "filter_statement must not be empty"),
  api_key: z.string().optional(),
  report_dir: z.string().min(1).default("reports"),
  lookback_days: z.number().int().min(0).default(1),
  max_results: z.number().int().positive().max(2000).default(100),
  cross_lists: z.boolean().default(false),
  include_abstract: z.boolean().default(true),
  request_delay_ms: z.number().int().min(0).default(1000),
  backfill_max_days: z.number().int().positive().default(14),
  llm: llmSchema,
  prompts: z.object({
    filter: templateWith("filter_statement", "papers").optional(),
    summary: templateWith("papers").optional()
  }).default({})
});

export type SettingsFile = z.input<typeof settingsFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export interface ParseSettingsOptions {
  /** Directory that a relative report_dir is resolved against */
  baseDir: string;
  env?: NodeJS.ProcessEnv;
  /** Label used in error messages, usually the config path */
  source?: string;
}

/**
 * Validates a raw settings object and converts it to {@link DigestSettings}.
 * The API key from the environment wins over the one in the file.
 */
export function parseSettings(raw: unknown, options: ParseSettingsOptions): DigestSettings {
  const source = options.source ?? "settings";
  const parsed = settingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }
  const file = parsed.data;

  const envKey = options.env?.[API_KEY_ENV]?.trim();
  const apiKey = envKey || file.api_key?.trim() || "";
  if (!apiKey) {
    throw new ConfigError(`No LLM API key: set ${API_KEY_ENV} or "api_key" in ${source}`);
  }

  return {
    searchKeyword: file.search_keyword,
    categories: [...new Set(file.categories)],
    lookbackDays: file.lookback_days,
    maxResults: file.max_results,
    crossLists: file.cross_lists,
    filterStatement: file.filter_statement,
    batchSize: file.batch_size,
    requestDelayMs: file.request_delay_ms,
    llm: {
      provider: file.llm.provider,
      baseUrl: file.llm.base_url,
      apiKey,
      model: file.llm.model,
      temperature: file.llm.temperature,
      maxTokens: file.llm.max_tokens,
      timeoutMs: file.llm.timeout_ms,
      maxRetries: file.llm.max_retries,
      retryBaseDelayMs: file.llm.retry_base_delay_ms
    },
    prompts: {
      filter: file.prompts.filter ?? DEFAULT_FILTER_PROMPT,
      summary: file.prompts.summary ?? DEFAULT_SUMMARY_PROMPT
    },
    reportDir: path.resolve(options.baseDir, file.report_dir),
    includeAbstract: file.include_abstract,
    backfillMaxDays: file.backfill_max_days
  };
}

export async function loadSettings(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<DigestSettings> {
  const resolved = path.resolve(configPath);
  let content: string;
  try {
    content = await readFile(resolved, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${resolved} is not valid JSON: ${String(err)}`);
  }

  return parseSettings(raw, { baseDir: path.dirname(resolved), env, source: resolved });
}
