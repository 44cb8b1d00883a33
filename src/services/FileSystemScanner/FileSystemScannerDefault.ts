import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { ALL_SELECTOR } from "@/constants";
import { classify } from "@/services/Classifier";
import type { CategorySelector } from "@/types";
import { errorMessage } from "@/utils/helper";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
  ScanResult,
} from "./FileSystemScanner";

type WalkState = {
  includeAll: boolean;
  selected: ReadonlySet<CategorySelector>;
  excluded: ReadonlySet<string>;
  result: ScanResult;
};

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    selection: readonly CategorySelector[],
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>> {
    const root = path.resolve(rootPath);
    let entries: Dirent[];
    try {
      entries = await readdir(root, { withFileTypes: true });
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: `無法讀取來源目錄 ${root}: ${errorMessage(e)}`,
      });
    }

    const state: WalkState = {
      includeAll: selection.includes(ALL_SELECTOR),
      selected: new Set(selection),
      excluded: new Set((options?.excludeDirs ?? []).map((d) => path.resolve(d))),
      result: { candidates: [], skipped: [] },
    };
    await this.walk(root, entries, state);
    return ok(state.result);
  }

  private async walk(dir: string, entries: Dirent[], state: WalkState) {
    const sorted = [...entries].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
    const subDirs: string[] = [];

    for (const entry of sorted) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (state.excluded.has(fullPath)) {
          state.result.skipped.push({ path: fullPath, reason: "排除的資料夾" });
        } else {
          subDirs.push(fullPath);
        }
        continue;
      }
      if (entry.isSymbolicLink()) {
        // 不跟隨指向資料夾的連結，避免循環
        const reason = await nonFileLinkReason(fullPath);
        if (reason) {
          state.result.skipped.push({ path: fullPath, reason });
          continue;
        }
      } else if (!entry.isFile()) {
        continue;
      }

      const category = classify(fullPath);
      if (state.includeAll || state.selected.has(category)) {
        state.result.candidates.push({ path: fullPath, category });
      }
    }

    for (const subDir of subDirs) {
      let subEntries: Dirent[];
      try {
        subEntries = await readdir(subDir, { withFileTypes: true });
      } catch (e) {
        state.result.skipped.push({ path: subDir, reason: errorMessage(e) });
        continue;
      }
      await this.walk(subDir, subEntries, state);
    }
  }
}

async function nonFileLinkReason(linkPath: string) {
  try {
    const target = await stat(linkPath);
    return target.isFile() ? undefined : "不跟隨非檔案的符號連結";
  } catch (e) {
    return `無法解析連結: ${errorMessage(e)}`;
  }
}
