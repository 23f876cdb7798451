import path from "node:path";
import type { Paper } from "../types/paper";
import type { ReportWriter } from "../storage/reportWriter";
import { monthKey } from "../utils/dates";

export interface DayReport {
  /** YYYY-MM-DD */
  date: string;
  runAt: Date;
  keyword: string;
  categories: string[];
  /** Papers returned by the search, before filtering */
  searched: number;
  /** Filtered and summarized papers */
  papers: Paper[];
  includeAbstract: boolean;
}

function escapeLinkText(s: string): string {
  return s.replace(/([[\]\\])/g, "\\$1");
}

/** Model-written text stays on one line so it cannot open headings or blocks. */
function oneLine(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function renderEntry(p: Paper, includeAbstract: boolean): string[] {
  const blocks: string[] = [
    `### [${escapeLinkText(p.title)}](${p.links.abs})`,
    [
      `- **Authors:** ${p.authors.length > 0 ? p.authors.join(", ") : "Unknown"}`,
      `- **Categories:** ${p.categories.join(", ") || p.primaryCategory || "-"}`,
      `- **PDF:** ${p.links.pdf}`
    ].join("\n")
  ];

  const summary = p.summary;
  if (summary?.kind === "generated") {
    blocks.push(`**Motivation:** ${oneLine(summary.motivation)}`, `**Method:** ${oneLine(summary.method)}`);
  } else {
    const reason = summary?.reason ?? "no summary was requested";
    blocks.push(`> _Summary unavailable: ${oneLine(reason)}_`);
  }

  if (includeAbstract && p.abstract) {
    blocks.push(`<details><summary>Abstract</summary>\n\n${p.abstract}\n\n</details>`);
  }
  return blocks;
}

/** One day section: heading, run line, then an entry per paper or a note when there are none. */
export function renderDaySection(report: DayReport): string {
  const time = report.runAt.toISOString().slice(11, 16);
  const scope = report.categories.length > 0 ? report.categories.join(", ") : "all categories";
  const blocks: string[] = [
    `## ${report.date}`,
    `_Run ${time} UTC · "${report.keyword}" in ${scope} · ${report.searched} searched, ${report.papers.length} matched_`
  ];

  if (report.papers.length === 0) {
    blocks.push(report.searched === 0 ? "_No papers found._" : "_No papers matched the filter._");
  } else {
    for (const p of report.papers) {
      blocks.push(...renderEntry(p, report.includeAbstract));
    }
  }
  return blocks.join("\n\n") + "\n";
}

export function reportPathFor(reportDir: string, date: string): string {
  return path.join(reportDir, `${monthKey(date)}.md`);
}

/**
 * Appends the day section to the month's report, creating the file with a
 * `# YYYY-MM` header first. Existing content is left untouched.
 */
export async function appendDailyReport(writer: ReportWriter, reportDir: string, report: DayReport): Promise<string> {
  const reportPath = reportPathFor(reportDir, report.date);
  const section = renderDaySection(report);
  const exists = await writer.fileExists(reportPath);
  const content = exists ? `\n${section}` : `# ${monthKey(report.date)}\n\n${section}`;
  await writer.appendToNote(reportPath, content);
  return reportPath;
}
