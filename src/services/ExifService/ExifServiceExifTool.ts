import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage, isErrnoCode } from "@/utils/helper";

import type { CaptureDateTag, CaptureInfo, ExifReadError } from "./Exif";
import { toDateKey } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

const dateTags: readonly CaptureDateTag[] = ["DateTimeOriginal", "CreateDate"];

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  async readCaptureInfo(
    filePath: string
  ): Promise<Result<CaptureInfo, ExifReadError>> {
    try {
      const tags = await exiftool.read(filePath);
      for (const dateTag of dateTags) {
        const captureDate = toDateKey(tags[dateTag]);
        if (captureDate) {
          return ok({ filePath, captureDate, dateTag });
        }
      }
      return err({
        type: "NO_CAPTURE_DATE",
        message: `無拍攝日期: ${filePath}`,
      });
    } catch (e) {
      if (isErrnoCode(e, "ENOENT")) {
        return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
      }
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${errorMessage(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
