/** 日期取自哪個 EXIF 欄位 */
export type CaptureDateTag = "DateTimeOriginal" | "CreateDate";

export type CaptureInfo = {
  filePath: string;
  /** YYYY-MM-DD，照拍攝當地的日曆日，不做時區換算 */
  captureDate: string;
  dateTag: CaptureDateTag;
};

export type ExifReadError = {
  type: "FILE_NOT_FOUND" | "READ_FAILED" | "NO_CAPTURE_DATE";
  message: string;
};
