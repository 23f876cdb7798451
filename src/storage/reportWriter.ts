import { appendFile, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";

/** The report or run log could not be written. Fatal: a lost day defeats the report. */
export class ReportWriteError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Cannot write ${filePath}: ${String(cause)}`);
    this.name = "ReportWriteError";
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** File access for reports. Content is only ever appended, never rewritten. */
export class ReportWriter {
  async ensureFolder(folderPath: string): Promise<void> {
    await mkdir(folderPath, { recursive: true });
  }

  async ensureFolderForFile(filePath: string): Promise<void> {
    await this.ensureFolder(path.dirname(filePath));
  }

  async readNote(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new ReportWriteError(filePath, err);
    }
  }

  async appendToNote(filePath: string, content: string): Promise<void> {
    try {
      await this.ensureFolderForFile(filePath);
      await appendFile(filePath, content, "utf-8");
    } catch (err) {
      throw new ReportWriteError(filePath, err);
    }
  }

  /**
   * Appends to the run log. Past `maxBytes` (UTF-8) the older part is cut at a
   * line boundary so about `maxBytes / 2` remain, behind a rotation marker.
   */
  async appendLogWithRotation(filePath: string, content: string, maxBytes: number): Promise<void> {
    try {
      await this.ensureFolderForFile(filePath);
      const current = (await this.readNote(filePath)) ?? "";
      let next = current + content;

      const bytes = Buffer.from(next, "utf-8");
      if (bytes.length > maxBytes) {
        const keepFrom = bytes.length - Math.floor(maxBytes / 2);
        const newlineIdx = bytes.indexOf(0x0a, keepFrom);
        const tail = bytes.subarray(newlineIdx !== -1 ? newlineIdx + 1 : keepFrom);
        const keptKB = Math.round(tail.length / 1024);
        next = `[LOG ROTATED ${new Date().toISOString()}, kept last ~${keptKB}KB]\n` + tail.toString("utf-8");
      }

      await writeFile(filePath, next, "utf-8");
    } catch (err) {
      throw new ReportWriteError(filePath, err);
    }
  }
}
