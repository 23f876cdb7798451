import { access, mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LLMAuthError, LLMTransientError } from "../llm/provider";
import { SearchError, type PaperSource } from "../sources/source";
import { ReportWriter } from "../storage/reportWriter";
import { makePaper, makeSettings, noSleep, quietLogger, StubLLM } from "../testing/stubs";
import type { FetchParams, Paper } from "../types/paper";
import { runDailyPipeline, type PipelineDeps } from "./dailyPipeline";

class StubSource implements PaperSource {
  name = "stub";
  readonly requests: FetchParams[] = [];

  constructor(private result: Paper[] | Error) {}

  async fetch(params: FetchParams): Promise<Paper[]> {
    this.requests.push(params);
    if (this.result instanceof Error) throw this.result;
    return this.result.map(p => ({ ...p }));
  }
}

const videoDiffusion = makePaper("2406.00001v1", "VideoDiff: Video Diffusion Models");
const textToImage = makePaper("2406.00002v1", "Text-to-Image Diffusion at Scale");
const videoSurvey = makePaper("2406.00003v1", "A Survey of Video Diffusion");

const summaries = JSON.stringify([
  { motivation: "Video generation lacks temporal coherence.", method: "A diffusion model with temporal attention." },
  { motivation: "The field of video diffusion grows quickly.", method: "A taxonomy of recent methods." }
]);

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

describe("runDailyPipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "arxiv-digest-pipeline-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function deps(source: PaperSource, llm: StubLLM): PipelineDeps {
    return {
      source,
      llm,
      writer: new ReportWriter(),
      logger: quietLogger(),
      sleep: noSleep,
      now: () => new Date("2024-06-12T08:30:00Z")
    };
  }

  it("searches, filters, summarizes and appends the day's entries", async () => {
    const settings = makeSettings({ batchSize: 2, reportDir: path.join(dir, "reports") });
    const source = new StubSource([videoDiffusion, textToImage, videoSurvey]);
    const llm = new StubLLM(["[true, false]", "[true]", summaries]);

    const result = await runDailyPipeline(settings, deps(source, llm));

    expect(source.requests).toEqual([{
      keyword: "diffusion",
      categories: ["cs.CV"],
      targetDate: "2024-06-12",
      lookbackDays: 1,
      maxResults: 100,
      crossLists: false
    }]);
    expect(result).toEqual({
      date: "2024-06-12",
      searched: 3,
      matched: 2,
      summarized: 2,
      placeholders: 0,
      reportPath: path.join(dir, "reports", "2024-06.md"),
      usage: { inputTokens: 300, outputTokens: 30 }
    });

    const content = await readFile(result.reportPath, "utf-8");
    expect(content.startsWith("# 2024-06\n\n## 2024-06-12\n\n_Run 08:30 UTC · \"diffusion\" in cs.CV · 3 searched, 2 matched_\n")).toBe(true);
    expect(content.match(/^### /gm)).toHaveLength(2);
    expect(content).toContain("### [VideoDiff: Video Diffusion Models](https://arxiv.org/abs/2406.00001v1)");
    expect(content).toContain("### [A Survey of Video Diffusion](https://arxiv.org/abs/2406.00003v1)");
    expect(content).not.toContain("Text-to-Image");
    expect(content).toContain("**Method:** A taxonomy of recent methods.");
  });

  it("keeps papers that passed the filter when their summary fails", async () => {
    const settings = makeSettings({ batchSize: 2, reportDir: path.join(dir, "reports") });
    const source = new StubSource([videoDiffusion, videoSurvey]);
    const failure = () => new LLMTransientError("HTTP 503");
    const llm = new StubLLM(["[true, true]", failure(), failure(), failure()]);

    const result = await runDailyPipeline(settings, deps(source, llm));

    expect(result.matched).toBe(2);
    expect(result.placeholders).toBe(2);
    const content = await readFile(result.reportPath, "utf-8");
    expect(content.match(/^### /gm)).toHaveLength(2);
    expect(content.match(/^> _Summary unavailable: summary request failed: HTTP 503_$/gm)).toHaveLength(2);
  });

  it("records a day without search results", async () => {
    const settings = makeSettings({ reportDir: path.join(dir, "reports") });
    const llm = new StubLLM([]);

    const result = await runDailyPipeline(settings, deps(new StubSource([]), llm), { targetDate: "2024-06-10" });

    expect(llm.calls).toHaveLength(0);
    expect(result.searched).toBe(0);
    const content = await readFile(result.reportPath, "utf-8");
    expect(content).toBe("# 2024-06\n\n## 2024-06-10\n\n_Run 08:30 UTC · \"diffusion\" in cs.CV · 0 searched, 0 matched_\n\n_No papers found._\n");
  });

  it("appends rather than overwrites when run twice on a day", async () => {
    const settings = makeSettings({ batchSize: 3, reportDir: path.join(dir, "reports") });
    const papers = [videoDiffusion, textToImage, videoSurvey];

    const first = await runDailyPipeline(settings, deps(new StubSource(papers), new StubLLM(["[true, false, true]", summaries])));
    const afterFirst = await readFile(first.reportPath, "utf-8");
    await runDailyPipeline(settings, deps(new StubSource(papers), new StubLLM(["[true, false, true]", summaries])));
    const afterSecond = await readFile(first.reportPath, "utf-8");

    expect(afterSecond.startsWith(afterFirst)).toBe(true);
    expect(afterSecond.slice(afterFirst.length)).toBe(`\n${afterFirst.slice("# 2024-06\n\n".length)}`);
  });

  it("fails on a search error without touching the report", async () => {
    const settings = makeSettings({ reportDir: path.join(dir, "reports") });
    const source = new StubSource(new SearchError("arXiv returned HTTP 503", 503));

    await expect(runDailyPipeline(settings, deps(source, new StubLLM([])))).rejects.toBeInstanceOf(SearchError);

    expect(await exists(path.join(dir, "reports", "2024-06.md"))).toBe(false);
    const log = await readFile(path.join(dir, "reports", ".runs.log"), "utf-8");
    expect(log).toContain("ERROR Step 1 SEARCH ERROR: SearchError: arXiv returned HTTP 503");
  });

  it("aborts on an authentication failure before writing the report", async () => {
    const settings = makeSettings({ reportDir: path.join(dir, "reports") });
    const llm = new StubLLM([new LLMAuthError("LLM authentication failed (HTTP 401): invalid key")]);

    await expect(runDailyPipeline(settings, deps(new StubSource([videoDiffusion]), llm))).rejects.toBeInstanceOf(LLMAuthError);
    expect(await exists(path.join(dir, "reports", "2024-06.md"))).toBe(false);
  });

  it("writes the run's log lines to the run log", async () => {
    const settings = makeSettings({ reportDir: path.join(dir, "reports") });
    await runDailyPipeline(settings, deps(new StubSource([]), new StubLLM([])));

    const log = await readFile(path.join(dir, "reports", ".runs.log"), "utf-8");
    const lines = log.trimEnd().split("\n");
    expect(lines[0]).toMatch(/^\[.+\] INFO === Daily pipeline START date=2024-06-12 ===$/);
    expect(lines[lines.length - 1]).toMatch(/INFO === Daily pipeline END date=2024-06-12 papers=0 ===$/);
  });
});
