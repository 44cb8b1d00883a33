import type { Result } from "~shared/utils/Result";

import type { CaptureInfo, ExifReadError } from "./Exif";

export interface ExifService {
  /** 依序查 DateTimeOriginal、CreateDate，兩者都沒有時回傳 NO_CAPTURE_DATE */
  readCaptureInfo(
    filePath: string
  ): Promise<Result<CaptureInfo, ExifReadError>>;
}
