import { isOk } from "~shared/utils/Result";

import type { ExifService } from "@/services/ExifService/ExifService";

import type { DateKeySource } from "./DateKeyExtractor";

export class ExifDateKeySource implements DateKeySource {
  readonly name = "exif";
  private readonly exifService: ExifService;

  constructor(exifService: ExifService) {
    this.exifService = exifService;
  }

  async readDateKey(filePath: string) {
    const result = await this.exifService.readCaptureInfo(filePath);
    return isOk(result) ? result.value.captureDate : undefined;
  }
}
