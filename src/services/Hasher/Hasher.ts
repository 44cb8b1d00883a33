import type { Result } from "~shared/utils/Result";

import type { ContentDigest } from "@/types";

export type HashError = {
  type: "UNREADABLE";
  message: string;
};

export interface Hasher {
  /**
   * 串流讀取整個檔案並計算內容摘要。
   * 權限不足、檔案不存在或讀取中途失敗時回傳 UNREADABLE。
   */
  hash(filePath: string): Promise<Result<ContentDigest, HashError>>;
}
