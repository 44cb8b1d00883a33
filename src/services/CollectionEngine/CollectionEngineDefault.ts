import {
  access,
  constants,
  copyFile,
  mkdir,
  rm,
  stat,
  utimes,
} from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { DUPLICATE_SUFFIX, MAX_PLACE_ATTEMPTS } from "@/constants";
import { classify } from "@/services/Classifier";
import type { DateKeyExtractor } from "@/services/DateKeyExtractor/DateKeyExtractor";
import type { Hasher } from "@/services/Hasher/Hasher";
import type { NameAllocator } from "@/services/NameAllocator/NameAllocator";
import { RunReport } from "@/services/RunReport";
import type {
  CandidateFile,
  ContentDigest,
  DestinationLayout,
} from "@/types";
import { errorMessage, isErrnoCode } from "@/utils/helper";

import type {
  CollectError,
  CollectObserver,
  CollectOptions,
  CollectionEngine,
} from "./CollectionEngine";

type CopyError = { type: "COPY_FAILED"; message: string };

type RunState = {
  root: string;
  dryRun: boolean;
  layout: DestinationLayout;
  report: RunReport;
  /** digest → 第一次出現時使用的檔名 */
  seen: Map<ContentDigest, string>;
  /** 本次已配置的路徑，dry run 不會真的建立檔案，靠這裡避免重複配置 */
  reserved: Set<string>;
  logger: Logger;
};

const silentObserver: CollectObserver = {
  onProgress: () => {},
  onStatus: () => {},
};

export class CollectionEngineDefault implements CollectionEngine {
  private readonly hasher: Hasher;
  private readonly dateKeyExtractor: DateKeyExtractor;
  private readonly nameAllocator: NameAllocator;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(deps: {
    hasher: Hasher;
    dateKeyExtractor: DateKeyExtractor;
    nameAllocator: NameAllocator;
    logger: Logger;
    clock?: () => number;
  }) {
    this.hasher = deps.hasher;
    this.dateKeyExtractor = deps.dateKeyExtractor;
    this.nameAllocator = deps.nameAllocator;
    this.logger = deps.logger.extend("CollectionEngineDefault");
    this.clock = deps.clock ?? Date.now;
  }

  async collect(
    candidates: readonly CandidateFile[],
    options: CollectOptions,
    observer: CollectObserver = silentObserver
  ): Promise<Result<RunReport, CollectError>> {
    const root = path.resolve(options.destinationRoot);
    const logger = this.logger.extend("collect", { dryRun: options.dryRun });

    // log.txt 一定要寫得出來，所以 dry run 也會建立根目錄
    const prepared = await prepareRoot(root);
    if (isErr(prepared)) {
      logger.error({ error: prepared.error })`目標資料夾無法寫入: ${root}`;
      return prepared;
    }

    const state: RunState = {
      root,
      dryRun: options.dryRun,
      layout: options.layout ?? "category-date",
      report: new RunReport({
        sourceRoot: options.sourceRoot,
        destinationRoot: root,
        dryRun: options.dryRun,
      }),
      seen: new Map(),
      reserved: new Set(),
      logger,
    };

    const total = candidates.length;
    logger.info({ event: "start", total })`開始處理 ${total} 個檔案`;
    const startedAt = this.clock();

    for (const [index, candidate] of candidates.entries()) {
      if (options.signal?.aborted) {
        state.report.recordCancelled(index, total);
        logger.warn({ event: "cancelled" })`已取消，處理了 ${index}/${total} 個檔案`;
        break;
      }

      const status = `Copying ${path.basename(candidate.path)} (${index + 1}/${total}) - ETA: ${formatEta(
        estimateRemaining(this.clock() - startedAt, index, total)
      )}`;
      this.notify(logger, () => observer.onStatus(status));

      await this.process(candidate, state);

      const percent = Math.floor(((index + 1) / Math.max(total, 1)) * 100);
      this.notify(logger, () => observer.onProgress(percent));
    }

    const flushed = await state.report.flush(root);
    if (isErr(flushed)) {
      logger.error({ error: flushed.error })`無法寫出執行紀錄`;
      return err({
        type: "REPORT_WRITE_FAILED",
        message: flushed.error.message,
      });
    }

    logger.info({
      event: "done",
      copied: state.report.copiedCount,
      duplicates: state.report.duplicateCount,
      skipped: state.report.skippedCount,
    })`完成，複製 ${state.report.copiedCount} 個、重複 ${state.report.duplicateCount} 個，紀錄寫入 ${flushed.value}`;
    return ok(state.report);
  }

  private async process(candidate: CandidateFile, state: RunState) {
    const { report, logger } = state;
    const source = candidate.path;

    const digest = await this.hasher.hash(source);
    if (isErr(digest)) {
      report.recordSkip("unreadable", source);
      logger.warn({ event: "skip", error: digest.error })`無法讀取，略過 ${source}`;
      return;
    }

    const category = candidate.category ?? classify(source);
    const dateKey =
      candidate.dateKey ??
      (await this.dateKeyExtractor.dateKey(source, category));
    const subDir = path.join(
      state.root,
      state.layout === "date" ? dateKey : `${category}_${dateKey}`
    );

    if (!state.dryRun) {
      try {
        await mkdir(subDir, { recursive: true });
      } catch (error) {
        report.recordSkip("mkdir failed", source);
        logger.warn({ event: "skip", error })`無法建立 ${subDir}，略過 ${source}`;
        return;
      }
    }

    const isDuplicate = state.seen.has(digest.value);
    const placed = await this.place(
      source,
      subDir,
      isDuplicate ? DUPLICATE_SUFFIX : "",
      state
    );
    if (isErr(placed)) {
      report.recordSkip("copy failed", source);
      logger.warn({ event: "skip", error: placed.error })`複製失敗，略過 ${source}`;
      return;
    }

    const target = placed.value;
    const relativeTarget = path.relative(state.root, target);
    const originalName = path.basename(source);
    if (isDuplicate) {
      report.recordDuplicate(source, relativeTarget);
      logger.debug({ event: "duplicate" })`${source} → ${relativeTarget}`;
      return;
    }

    if (path.basename(target) !== originalName) {
      report.recordRename(originalName, relativeTarget);
    } else {
      report.recordCopy(originalName, relativeTarget);
    }
    state.seen.set(digest.value, path.basename(target));
    logger.debug({ event: "copied" })`${source} → ${relativeTarget}`;
  }

  /**
   * 配置檔名並以 COPYFILE_EXCL 寫入；配置後若名稱被其他寫入者搶走，換下一個名稱重試。
   */
  private async place(
    source: string,
    dir: string,
    suffix: string,
    state: RunState
  ): Promise<Result<string, CopyError>> {
    const name = path.basename(source);
    let target = await this.nameAllocator.allocate(
      dir,
      name,
      suffix,
      state.reserved
    );
    if (state.dryRun) {
      state.reserved.add(target);
      return ok(target);
    }

    for (let attempt = 1; ; attempt++) {
      try {
        await copyFile(source, target, constants.COPYFILE_EXCL);
      } catch (error) {
        if (isErrnoCode(error, "EEXIST") && attempt < MAX_PLACE_ATTEMPTS) {
          state.logger.debug({ attempt })`${target} 已被佔用，重新配置檔名`;
          target = await this.nameAllocator.allocate(
            dir,
            name,
            suffix,
            state.reserved
          );
          continue;
        }
        if (!isErrnoCode(error, "EEXIST")) {
          await rm(target, { force: true }).catch((cleanupError: unknown) => {
            state.logger.warn({ error: cleanupError })`無法清除未完成的 ${target}`;
          });
        }
        return err({ type: "COPY_FAILED", message: errorMessage(error) });
      }
      state.reserved.add(target);
      await preserveTimes(source, target, state.logger);
      return ok(target);
    }
  }

  /** 回呼可能是 async 函式，回傳的 Promise 失敗也要接住 */
  private notify(logger: Logger, call: () => unknown) {
    const warn = (error: unknown) => {
      logger.warn({ event: "observer-failed", error })`進度回呼失敗，繼續處理`;
    };
    try {
      const returned = call();
      if (returned instanceof Promise) returned.catch(warn);
    } catch (error) {
      warn(error);
    }
  }
}

async function prepareRoot(root: string): Promise<Result<void, CollectError>> {
  try {
    await mkdir(root, { recursive: true });
    await access(root, constants.W_OK);
    return ok();
  } catch (e) {
    return err({
      type: "DESTINATION_UNWRITABLE",
      message: `${root}: ${errorMessage(e)}`,
    });
  }
}

async function preserveTimes(source: string, target: string, logger: Logger) {
  try {
    const stats = await stat(source);
    await utimes(target, stats.atime, stats.mtime);
  } catch (error) {
    logger.warn({ error })`無法保留 ${target} 的時間戳記`;
  }
}

/** 以目前為止的平均速度估算剩餘秒數 */
export function estimateRemaining(
  elapsedMs: number,
  index: number,
  total: number
) {
  const average = elapsedMs / (index + 1);
  return Math.max(0, (average * (total - index - 1)) / 1000);
}

export function formatEta(seconds: number) {
  const whole = Math.round(seconds);
  const minutes = String(Math.floor(whole / 60)).padStart(2, "0");
  const rest = String(whole % 60).padStart(2, "0");
  return `${minutes}m ${rest}s`;
}
