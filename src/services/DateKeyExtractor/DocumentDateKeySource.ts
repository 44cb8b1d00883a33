import { isMatch } from "date-fns";
import JSZip from "jszip";
import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFString,
} from "pdf-lib";

import type { DateKeySource } from "./DateKeyExtractor";

const PDF_DATE_RE = /^(?:D:)?(\d{4})(\d{2})(\d{2})/;
const CORE_CREATED_RE =
  /<dcterms:created\b[^>]*>\s*(\d{4}-\d{2}-\d{2})/;

/**
 * 文件建立日期：
 * - PDF 取 Info dictionary 的 /CreationDate（取字串中的年月日，不換算時區）
 * - DOCX 取 docProps/core.xml 的 dcterms:created（直接取日期字面值）
 */
export class DocumentDateKeySource implements DateKeySource {
  readonly name = "document";

  async readDateKey(filePath: string) {
    switch (path.extname(filePath).toLowerCase()) {
      case ".pdf":
        return this.readPdf(filePath);
      case ".docx":
        return this.readDocx(filePath);
      default:
        return undefined;
    }
  }

  private async readPdf(filePath: string) {
    const doc = await PDFDocument.load(await readFile(filePath), {
      updateMetadata: false,
      ignoreEncryption: true,
    });
    const { context } = doc;
    const info = context.lookupMaybe(context.trailerInfo.Info, PDFDict);
    const raw = info?.lookup(PDFName.of("CreationDate"));
    if (!(raw instanceof PDFString || raw instanceof PDFHexString)) {
      return undefined;
    }
    const m = PDF_DATE_RE.exec(raw.decodeText().trim());
    if (!m) return undefined;
    const dateKey = `${m[1]}-${m[2]}-${m[3]}`;
    return isMatch(dateKey, "yyyy-MM-dd") ? dateKey : undefined;
  }

  private async readDocx(filePath: string) {
    const zip = await JSZip.loadAsync(await readFile(filePath));
    const core = await zip.file("docProps/core.xml")?.async("string");
    if (!core) return undefined;
    return CORE_CREATED_RE.exec(core)?.[1];
  }
}
