import type { Result } from "~shared/utils/Result";

import type { RunReport } from "@/services/RunReport";
import type { CandidateFile, DestinationLayout } from "@/types";

/** 呈現層（終端機、GUI…）接收進度的介面 */
export interface CollectObserver {
  /** 0..100，每個檔案處理完呼叫一次 */
  onProgress(percent: number): void;
  /** 目前動作與預估剩餘時間 */
  onStatus(message: string): void;
}

export type CollectOptions = {
  sourceRoot: string;
  destinationRoot: string;
  dryRun: boolean;
  layout?: DestinationLayout;
  /** 只在檔案之間檢查，不會中斷正在複製的檔案 */
  signal?: AbortSignal;
};

export type CollectError = {
  type: "DESTINATION_UNWRITABLE" | "REPORT_WRITE_FAILED";
  message: string;
};

export interface CollectionEngine {
  /**
   * 依輸入順序處理每個候選檔：雜湊、分日期、判斷重複、配置檔名並複製。
   * 單檔失敗只會記錄並略過；只有目標根目錄不可寫或 log 寫不出來才回傳錯誤。
   */
  collect(
    candidates: readonly CandidateFile[],
    options: CollectOptions,
    observer?: CollectObserver
  ): Promise<Result<RunReport, CollectError>>;
}
