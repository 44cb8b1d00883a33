import { ExifDate, ExifDateTime } from "exiftool-vendored";

const RAW_DATE_RE = /^(\d{4})[:-](\d{2})[:-](\d{2})/;

/**
 * 將 EXIF 日期欄位轉成 YYYY-MM-DD。
 * 直接取 EXIF 記錄的年月日，不做時區換算（拍攝當地的日期才是分組依據）。
 * 無效或全為 0 的日期（例如 "0000:00:00 00:00:00"）回傳 undefined。
 */
export function toDateKey(value: unknown): string | undefined {
  if (value instanceof ExifDateTime || value instanceof ExifDate) {
    return formatParts(value.year, value.month, value.day);
  }
  if (typeof value === "string") {
    const m = RAW_DATE_RE.exec(value.trim());
    if (!m) return undefined;
    return formatParts(Number(m[1]), Number(m[2]), Number(m[3]));
  }
  return undefined;
}

function formatParts(year: number, month: number, day: number) {
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > 31) {
    return undefined;
  }
  return [
    String(year).padStart(4, "0"),
    String(month).padStart(2, "0"),
    String(day).padStart(2, "0"),
  ].join("-");
}
