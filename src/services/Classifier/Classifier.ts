import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  ALL_SELECTOR,
  type CategoryName,
  OTHER_CATEGORY,
  categoryExtensions,
  categoryNames,
} from "@/constants";
import type { CategoryLabel, CategorySelector } from "@/types";

const categoryByExtension = new Map<string, CategoryName>(
  categoryNames.flatMap((category) =>
    categoryExtensions[category].map((ext) => [ext, category] as const)
  )
);

/** 依副檔名（不分大小寫）分類，查無對應時為 OTHER */
export function classify(filePath: string): CategoryLabel {
  const ext = path.extname(filePath).toLowerCase();
  return categoryByExtension.get(ext) ?? OTHER_CATEGORY;
}

export type SelectionError = {
  type: "UNKNOWN_CATEGORY" | "EMPTY_SELECTION";
  message: string;
};

/**
 * 解析 "Images,Documents" 這類輸入。大小寫不敏感，回傳正式名稱。
 */
export function parseCategorySelection(
  raw: string | readonly string[]
): Result<CategorySelector[], SelectionError> {
  const tokens = (typeof raw === "string" ? [raw] : raw)
    .flatMap((part) => part.split(","))
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return err({ type: "EMPTY_SELECTION", message: "至少要選擇一個類別" });
  }

  const known: CategorySelector[] = [
    ALL_SELECTOR,
    OTHER_CATEGORY,
    ...categoryNames,
  ];
  const selection: CategorySelector[] = [];
  for (const token of tokens) {
    const match = known.find((k) => k.toLowerCase() === token.toLowerCase());
    if (!match) {
      return err({
        type: "UNKNOWN_CATEGORY",
        message: `未知的類別: ${token}（可用: ${known.join(", ")}）`,
      });
    }
    if (!selection.includes(match)) selection.push(match);
  }
  return ok(selection);
}
