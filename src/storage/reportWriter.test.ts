import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReportWriter, ReportWriteError } from "./reportWriter";

const lines = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, i) => `line-${String(from + i).padStart(2, "0")}\n`).join("");

describe("ReportWriter", () => {
  let dir: string;
  const writer = new ReportWriter();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "arxiv-digest-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing folders when appending", async () => {
    const file = path.join(dir, "a", "b", "2024-06.md");
    await writer.appendToNote(file, "one\n");
    await writer.appendToNote(file, "two\n");
    expect(await readFile(file, "utf-8")).toBe("one\ntwo\n");
  });

  it("reads a missing note as null", async () => {
    expect(await writer.readNote(path.join(dir, "none.md"))).toBeNull();
    expect(await writer.fileExists(path.join(dir, "none.md"))).toBe(false);
  });

  it("keeps the log as is below the limit", async () => {
    const log = path.join(dir, ".runs.log");
    await writer.appendLogWithRotation(log, lines(1, 2), 100);
    await writer.appendLogWithRotation(log, lines(3, 3), 100);
    expect(await readFile(log, "utf-8")).toBe(lines(1, 3));
  });

  it("drops the oldest half of the log past the limit", async () => {
    const log = path.join(dir, ".runs.log");
    await writeFile(log, lines(1, 12));

    await writer.appendLogWithRotation(log, lines(13, 13), 100);

    const [marker, ...rest] = (await readFile(log, "utf-8")).split("\n");
    expect(marker).toMatch(/^\[LOG ROTATED \d{4}-\d{2}-\d{2}T[\d:.]+Z, kept last ~0KB\]$/);
    expect(rest.join("\n")).toBe(lines(8, 13));
  });

  it("counts multi-byte characters by their UTF-8 size", async () => {
    const log = path.join(dir, ".runs.log");
    const umlautLines = (from: number, to: number) => lines(from, to).replace(/line/g, "\u00fc-line");
    // ten lines of 10 characters and 11 bytes each
    await writeFile(log, umlautLines(1, 9));

    await writer.appendLogWithRotation(log, umlautLines(10, 10), 100);

    const [marker, ...rest] = (await readFile(log, "utf-8")).split("\n");
    expect(marker).toMatch(/^\[LOG ROTATED .+, kept last ~0KB\]$/);
    expect(rest.join("\n")).toBe(umlautLines(7, 10));
  });

  it("wraps write failures", async () => {
    const blocker = path.join(dir, "reports");
    await writeFile(blocker, "a file where the report folder should be");

    const err = await writer.appendToNote(path.join(blocker, "2024-06.md"), "x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReportWriteError);
    expect(err).toMatchObject({ filePath: path.join(blocker, "2024-06.md") });
  });

  it("wraps a failed existence check", async () => {
    const blocker = path.join(dir, "reports");
    await writeFile(blocker, "not a folder");
    await expect(writer.fileExists(path.join(blocker, "2024-06.md"))).rejects.toBeInstanceOf(ReportWriteError);
  });
});
