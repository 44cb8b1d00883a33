import { format } from "date-fns";
import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";

import { NO_DATE_KEY } from "@/constants";
import type { ExifService } from "@/services/ExifService/ExifService";
import type { CategoryLabel } from "@/types";

import { DocumentDateKeySource } from "./DocumentDateKeySource";
import type { DateKeyExtractor, DateKeySource } from "./DateKeyExtractor";
import { ExifDateKeySource } from "./ExifDateKeySource";

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

export type DateKeySourceMap = Partial<
  Record<CategoryLabel, readonly DateKeySource[]>
>;

export class DateKeyExtractorDefault implements DateKeyExtractor {
  private readonly sources: DateKeySourceMap;
  private readonly logger: Logger;

  constructor(deps: { sources?: DateKeySourceMap; logger: Logger }) {
    this.sources = deps.sources ?? {};
    this.logger = deps.logger.extend("DateKeyExtractorDefault");
  }

  async dateKey(filePath: string, category: CategoryLabel): Promise<string> {
    for (const source of this.sources[category] ?? []) {
      try {
        const key = await source.readDateKey(filePath);
        if (key && DATE_KEY_RE.test(key)) return key;
      } catch (error) {
        this.logger.debug({
          source: source.name,
          error,
        })`${filePath} 讀取 metadata 日期失敗，改用下一個來源`;
      }
    }

    try {
      const stats = await stat(filePath);
      return format(stats.mtime, "yyyy-MM-dd");
    } catch (error) {
      this.logger.warn({ error })`無法取得 ${filePath} 的修改時間`;
      return NO_DATE_KEY;
    }
  }
}

/** 圖片讀 EXIF，文件讀 PDF/DOCX 建立日期，其餘只看修改時間 */
export function createDefaultDateKeyExtractor(deps: {
  exifService: ExifService;
  logger: Logger;
}) {
  return new DateKeyExtractorDefault({
    logger: deps.logger,
    sources: {
      Images: [new ExifDateKeySource(deps.exifService)],
      Documents: [new DocumentDateKeySource()],
    },
  });
}
