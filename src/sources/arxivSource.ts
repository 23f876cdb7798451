import * as cheerio from "cheerio";
import type { Paper, FetchParams } from "../types/paper";
import { sleep as defaultSleep, type FetchFn, type SleepFn } from "../types/http";
import { addDays, parseDateYMD } from "../utils/dates";
import { SearchError, type PaperSource } from "./source";

const ARXIV_API = "https://export.arxiv.org/api/query";

export interface ArxivSourceOptions {
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  /** Waits before each retry after an HTTP 429 */
  retryDelays?: number[];
  timeoutMs?: number;
  /** Logs retry notices */
  onRetry?: (msg: string) => void;
}

export interface SearchWindow {
  start: Date;
  end: Date;
}

/** arXiv's submittedDate format: YYYYMMDDHHMM */
function toArxivStamp(d: Date): string {
  return d.toISOString().slice(0, 16).replace(/[-T:]/g, "");
}

export class ArxivSource implements PaperSource {
  name = "arxiv";

  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly retryDelays: number[];
  private readonly timeoutMs: number;
  private readonly onRetry: (msg: string) => void;

  constructor(options: ArxivSourceOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.retryDelays = options.retryDelays ?? [5000, 15000, 30000];
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.onRetry = options.onRetry ?? (() => {});
  }

  /** Whole UTC days from `lookbackDays` before the target date through the target date. */
  searchWindow(targetDate: string, lookbackDays: number): SearchWindow {
    const day = parseDateYMD(targetDate);
    return {
      start: addDays(day, -lookbackDays),
      end: new Date(day.getTime() + 24 * 3600 * 1000 - 60 * 1000)
    };
  }

  buildQuery(keyword: string, categories: string[], window: SearchWindow): string {
    const kwClause = `abs:"${keyword.replace(/"/g, "").trim()}"`;
    const catParts = categories.map(c => `cat:${c}`);
    const catClause = catParts.length > 0 ? ` AND (${catParts.join(" OR ")})` : "";
    const dateClause = ` AND submittedDate:[${toArxivStamp(window.start)} TO ${toArxivStamp(window.end)}]`;
    return `${kwClause}${catClause}${dateClause}`;
  }

  buildUrl(params: FetchParams): string {
    const window = this.searchWindow(params.targetDate, params.lookbackDays);
    const query = this.buildQuery(params.keyword, params.categories, window);
    const encoded = encodeURIComponent(query);
    return `${ARXIV_API}?search_query=${encoded}&start=0&max_results=${params.maxResults}&sortBy=submittedDate&sortOrder=descending`;
  }

  /** Parses an Atom feed from the arXiv API. Throws {@link SearchError} on API error feeds. */
  parseFeed(xml: string): Paper[] {
    const $ = cheerio.load(xml, { xml: true });
    if ($("feed").length === 0) {
      throw new SearchError("arXiv response is not an Atom feed");
    }

    const papers: Paper[] = [];
    $("feed > entry").each((_, el) => {
      const entry = $(el);
      const getText = (tag: string): string => entry.children(tag).first().text().trim();

      const rawId = getText("id");
      if (rawId.includes("/api/errors")) {
        throw new SearchError(`arXiv API error: ${getText("summary") || rawId}`);
      }
      // http://arxiv.org/abs/2406.01234v1 -> 2406.01234v1
      const idMatch = rawId.match(/arxiv\.org\/abs\/(.+)$/i);
      if (!idMatch) return;
      const id = idMatch[1];

      const authors: string[] = [];
      entry.children("author").each((_, a) => {
        const name = $(a).children("name").text().trim();
        if (name) authors.push(name);
      });

      const categories: string[] = [];
      entry.children("category").each((_, c) => {
        const term = $(c).attr("term");
        if (term) categories.push(term);
      });

      const primary = entry.children()
        .filter((_, child) => child.tagName === "arxiv:primary_category")
        .first()
        .attr("term");

      papers.push({
        id,
        title: getText("title").replace(/\s+/g, " "),
        abstract: getText("summary").replace(/\s+/g, " "),
        authors,
        categories,
        primaryCategory: primary ?? categories[0] ?? "",
        published: getText("published"),
        updated: getText("updated"),
        links: {
          abs: `https://arxiv.org/abs/${id}`,
          pdf: `https://arxiv.org/pdf/${id}`
        }
      });
    });
    return papers;
  }

  filterByWindow(papers: Paper[], window: SearchWindow): Paper[] {
    const windowEnd = new Date(window.end.getTime() + 60 * 1000);
    return papers.filter(p => {
      // published is the first-version date; updated moves with revisions
      const dateStr = p.published || p.updated;
      if (!dateStr) return false;
      const d = new Date(dateStr);
      return d >= window.start && d < windowEnd;
    });
  }

  filterByPrimaryCategory(papers: Paper[], categories: string[]): Paper[] {
    if (categories.length === 0) return papers;
    const wanted = new Set(categories);
    return papers.filter(p => wanted.has(p.primaryCategory));
  }

  async fetch(params: FetchParams): Promise<Paper[]> {
    if (!params.keyword.trim()) {
      throw new SearchError("Search keyword is empty");
    }
    const url = this.buildUrl(params);
    const xmlText = await this.request(url);
    const window = this.searchWindow(params.targetDate, params.lookbackDays);
    const inWindow = this.filterByWindow(this.parseFeed(xmlText), window);
    return params.crossLists ? inWindow : this.filterByPrimaryCategory(inWindow, params.categories);
  }

  private async request(url: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchFn(url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (err) {
        throw new SearchError(`arXiv request failed: ${String(err)}`);
      }

      if (response.status === 429 && attempt < this.retryDelays.length) {
        const wait = this.retryDelays[attempt];
        this.onRetry(`arXiv 429, retrying in ${wait / 1000}s (attempt ${attempt + 1}/${this.retryDelays.length})`);
        await this.sleep(wait);
        continue;
      }
      if (!response.ok) {
        throw new SearchError(`arXiv returned HTTP ${response.status}`, response.status);
      }
      try {
        return await response.text();
      } catch (err) {
        throw new SearchError(`arXiv response could not be read: ${String(err)}`);
      }
    }
  }
}
