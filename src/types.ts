import type { ALL_SELECTOR, CategoryName, OTHER_CATEGORY } from "@/constants";

export type CategoryLabel = CategoryName | typeof OTHER_CATEGORY;

export type CategorySelector = CategoryLabel | typeof ALL_SELECTOR;

/** sha256 hex */
export type ContentDigest = string;

export type CandidateFile = {
  readonly path: string;
  /** 未標記時由 engine 依副檔名分類 */
  readonly category?: CategoryLabel;
  /** 預先算好的 YYYY-MM-DD */
  readonly dateKey?: string;
};

/**
 * category-date: {Category}_{YYYY-MM-DD}/file
 * date: {YYYY-MM-DD}/file
 */
export type DestinationLayout = "category-date" | "date";
