import type { CategoryLabel } from "@/types";

export interface DateKeyExtractor {
  /**
   * 取得分組用的日期 YYYY-MM-DD。
   * 依序嘗試該類別的內嵌 metadata → 檔案修改時間 → "no_dates"，不會丟出錯誤。
   */
  dateKey(filePath: string, category: CategoryLabel): Promise<string>;
}

/**
 * 單一日期來源。取不到時回傳 undefined；實作可以丟錯，呼叫端會當作沒有資料。
 */
export interface DateKeySource {
  readonly name: string;
  readDateKey(filePath: string): Promise<string | undefined>;
}
