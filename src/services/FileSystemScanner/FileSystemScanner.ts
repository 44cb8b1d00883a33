import type { Result } from "~shared/utils/Result";

import type { CandidateFile, CategorySelector } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

/** 掃描時略過的項目（無權限的子資料夾、指向資料夾的 symlink 等） */
export type ScanSkip = {
  path: string;
  reason: string;
};

export type ScanResult = {
  candidates: CandidateFile[];
  skipped: ScanSkip[];
};

export type ScanOptions = {
  /** 不進入的資料夾，會記在 skipped；例如位在來源內、本次要寫入的資料夾 */
  excludeDirs?: readonly string[];
};

export interface FileSystemScanner {
  /**
   * 遞迴列出 rootPath 下的一般檔案，依類別篩選。
   * 同一層依名稱排序，先列檔案再進入子資料夾。只有根目錄無法讀取時才回傳錯誤。
   */
  scan(
    rootPath: string,
    selection: readonly CategorySelector[],
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>>;
}
