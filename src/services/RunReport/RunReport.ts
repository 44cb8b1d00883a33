import { writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { RUN_LOG_FILE_NAME } from "@/constants";
import { errorMessage } from "@/utils/helper";

export type SkipReason = "unreadable" | "mkdir failed" | "copy failed";

export type ReportFlushError = {
  type: "ALREADY_FLUSHED" | "WRITE_FAILED";
  message: string;
};

/**
 * 單次執行的紀錄：計數與逐檔 log，結束時寫成 log.txt。
 */
export class RunReport {
  readonly sourceRoot: string;
  readonly destinationRoot: string;
  readonly dryRun: boolean;

  copiedCount = 0;
  duplicateCount = 0;
  skippedCount = 0;
  cancelled = false;
  generatedAt?: Date;

  private readonly entries: string[] = [];
  private readonly now: () => Date;

  constructor(init: {
    sourceRoot: string;
    destinationRoot: string;
    dryRun: boolean;
    now?: () => Date;
  }) {
    this.sourceRoot = init.sourceRoot;
    this.destinationRoot = init.destinationRoot;
    this.dryRun = init.dryRun;
    this.now = init.now ?? (() => new Date());
  }

  get lines(): readonly string[] {
    return this.entries;
  }

  recordCopy(name: string, relativeTarget: string) {
    this.entries.push(`COPY: ${name} -> ${relativeTarget}`);
    this.copiedCount++;
  }

  recordRename(originalName: string, relativeTarget: string) {
    this.entries.push(`RENAME: ${originalName} -> ${relativeTarget}`);
    this.copiedCount++;
  }

  recordDuplicate(sourcePath: string, relativeTarget: string) {
    this.entries.push(`DUPLICATE: ${sourcePath} -> ${relativeTarget}`);
    this.duplicateCount++;
  }

  recordSkip(reason: SkipReason, sourcePath: string) {
    this.entries.push(`SKIP (${reason}): ${sourcePath}`);
    this.skippedCount++;
  }

  recordCancelled(processed: number, total: number) {
    this.entries.push(`CANCELLED: ${processed}/${total}`);
    this.cancelled = true;
  }

  toText(generatedAt: Date = this.generatedAt ?? this.now()): string {
    return [
      `Run log at: ${generatedAt.toISOString()}`,
      `Source folder: ${this.sourceRoot}`,
      `Destination folder: ${this.destinationRoot}`,
      `Dry run: ${this.dryRun}`,
      "",
      ...this.entries,
      "",
      `Files processed: ${this.copiedCount}`,
      `Duplicates renamed: ${this.duplicateCount}`,
      "",
    ].join("\n");
  }

  /** 寫入 destinationRoot/log.txt，每份紀錄只能寫一次 */
  async flush(
    destinationRoot: string = this.destinationRoot
  ): Promise<Result<string, ReportFlushError>> {
    if (this.generatedAt) {
      return err({
        type: "ALREADY_FLUSHED",
        message: `log 已於 ${this.generatedAt.toISOString()} 寫出`,
      });
    }
    const generatedAt = this.now();
    const logPath = path.join(destinationRoot, RUN_LOG_FILE_NAME);
    try {
      await writeFile(logPath, this.toText(generatedAt), "utf8");
    } catch (e) {
      return err({
        type: "WRITE_FAILED",
        message: `無法寫入 ${logPath}: ${errorMessage(e)}`,
      });
    }
    this.generatedAt = generatedAt;
    return ok(logPath);
  }
}
