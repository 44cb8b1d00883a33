import type { CAC } from "cac";
import { format } from "date-fns";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { COLLECTED_DIR_PREFIX } from "@/constants";
import { parseCategorySelection } from "@/services/Classifier";
import {
  type CollectObserver,
  CollectionEngineDefault,
} from "@/services/CollectionEngine";
import { createDefaultDateKeyExtractor } from "@/services/DateKeyExtractor";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { HasherSha256 } from "@/services/Hasher";
import { NameAllocatorDefault } from "@/services/NameAllocator";
import { confirm, expandHome, isInside } from "@/utils/helper";

type CollectCommandOptions = {
  target: string;
  types: string | string[];
  dryRun: boolean;
  byDateOnly: boolean;
  direct: boolean;
  yes: boolean;
};

export function registerCollect(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "collect <source>",
      "掃描來源資料夾，去除重複內容後依類別與日期複製到目標資料夾"
    )
    .option("--target <path>", "目標資料夾，預設 ~/Desktop", {
      default: "~/Desktop",
    })
    .option(
      "--types <list>",
      "要收集的類別，逗號分隔：Images,Documents,Videos,Audio,Archives,OTHER 或 All",
      { default: "All" }
    )
    .option("--dry-run", "只產生計畫與 log.txt，不複製檔案", { default: false })
    .option("--by-date-only", "只依日期分資料夾，不加類別前綴", {
      default: false,
    })
    .option("--direct", "直接寫入目標資料夾，不另建 COLLECTED_FILES_<時間>", {
      default: false,
    })
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (source: string, options: CollectCommandOptions) => {
      const logger = baseLogger.extend("collect", { emoji: "📦" });

      const selection = parseCategorySelection(options.types);
      if (isErr(selection)) {
        logger.error({ error: selection.error })`${selection.error.message}`;
        process.exitCode = 1;
        return;
      }

      const sourceRoot = path.resolve(expandHome(source));
      const targetBase = path.resolve(expandHome(options.target));
      const destinationRoot = options.direct
        ? targetBase
        : path.join(
            targetBase,
            `${COLLECTED_DIR_PREFIX}${format(new Date(), "yyyy-MM-dd_HH-mm-ss")}`
          );
      logger.info({
        emoji: "📁",
        types: selection.value,
        dryRun: options.dryRun,
      })`來源: ${sourceRoot} → 目標: ${destinationRoot}`;

      // 1) 掃描
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(sourceRoot, selection.value, {
        excludeDirs: excludedDirsFor(sourceRoot, destinationRoot),
      });
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描來源目錄失敗`;
        process.exitCode = 1;
        return;
      }
      const { candidates, skipped } = scanRes.value;
      for (const skip of skipped) {
        logger.warn({ event: "skip" })`掃描略過 ${skip.path}: ${skip.reason}`;
      }
      if (candidates.length === 0) {
        logger.warn("沒有符合所選類別的檔案");
        return;
      }
      logger.info({
        emoji: "🔎",
        count: candidates.length,
      })`掃描完成，共 ${candidates.length} 個檔案`;

      // 2) 確認
      const proceed =
        options.yes ||
        options.dryRun ||
        (await confirm(
          `即將複製 ${candidates.length} 個檔案到 ${destinationRoot}，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      // 3) 複製
      const abort = new AbortController();
      const onSigint = () => {
        logger.warn({ emoji: "⏹️" })`收到中斷訊號，處理完目前檔案後停止`;
        abort.abort();
      };
      process.once("SIGINT", onSigint);

      const exifService = new ExifServiceExifTool();
      try {
        const engine = new CollectionEngineDefault({
          hasher: new HasherSha256(),
          dateKeyExtractor: createDefaultDateKeyExtractor({
            exifService,
            logger,
          }),
          nameAllocator: new NameAllocatorDefault(),
          logger,
        });
        const result = await engine.collect(
          candidates,
          {
            sourceRoot,
            destinationRoot,
            dryRun: options.dryRun,
            layout: options.byDateOnly ? "date" : "category-date",
            signal: abort.signal,
          },
          createLoggerObserver(logger)
        );
        if (isErr(result)) {
          logger.error({ error: result.error })`收集失敗: ${result.error.message}`;
          process.exitCode = 1;
          return;
        }

        const report = result.value;
        logger.info({
          event: "done",
        })`${options.dryRun ? "（Dry run，未複製任何檔案）" : ""}不重複檔案 ${report.copiedCount} 個，重複 ${report.duplicateCount} 個，略過 ${report.skippedCount} 個`;
      } finally {
        process.off("SIGINT", onSigint);
        await dispose(exifService);
      }
    });
}

/** 只排除本次寫入的資料夾；目標資料夾裡的其他檔案照常收集 */
export function excludedDirsFor(
  sourceRoot: string,
  destinationRoot: string
) {
  return isInside(sourceRoot, destinationRoot) ? [destinationRoot] : [];
}

/** 把進度轉成 log：狀態以 debug 輸出，百分比每跨過 10% 輸出一次 */
export function createLoggerObserver(logger: Logger): CollectObserver {
  let lastBucket = -1;
  return {
    onStatus(message) {
      logger.debug({ emoji: "⏳" }, message);
    },
    onProgress(percent) {
      const bucket = Math.floor(percent / 10);
      if (bucket === lastBucket) return;
      lastBucket = bucket;
      logger.info({ emoji: "⏳", percent })`進度 ${percent}%`;
    },
  };
}
