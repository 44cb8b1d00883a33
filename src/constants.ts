export const categoryNames = [
  "Images",
  "Documents",
  "Videos",
  "Audio",
  "Archives",
] as const;

export type CategoryName = (typeof categoryNames)[number];

export const categoryExtensions: Record<CategoryName, readonly string[]> = {
  Images: [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".tiff", ".webp"],
  Documents: [".pdf", ".docx", ".txt", ".xlsx", ".csv", ".pptx"],
  Videos: [".mp4", ".mov", ".avi", ".mkv", ".3gp", ".wmv", ".m4v"],
  Audio: [".mp3", ".wav", ".m4a", ".ogg", ".flac", ".aac"],
  Archives: [".zip", ".rar", ".7z", ".tar", ".gz", ".iso"],
};

export const OTHER_CATEGORY = "OTHER";
export const ALL_SELECTOR = "All";

/** 取不到任何日期時使用的資料夾名稱 */
export const NO_DATE_KEY = "no_dates";

export const HASH_CHUNK_SIZE = 8192;
export const DUPLICATE_SUFFIX = "_dup";
export const RUN_LOG_FILE_NAME = "log.txt";
export const COLLECTED_DIR_PREFIX = "COLLECTED_FILES_";

/** 寫入時發現目標已被佔用，最多重新配置檔名的次數 */
export const MAX_PLACE_ATTEMPTS = 5;
