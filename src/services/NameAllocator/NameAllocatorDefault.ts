import path from "node:path";

import { exists } from "@/utils/helper";

import type { NameAllocator } from "./NameAllocator";

export class NameAllocatorDefault implements NameAllocator {
  async allocate(
    destinationDir: string,
    desiredName: string,
    suffix = "",
    reserved?: ReadonlySet<string>
  ): Promise<string> {
    const ext = path.extname(desiredName);
    const stem = path.basename(desiredName, ext);
    const isTaken = async (candidate: string) =>
      (reserved?.has(candidate) ?? false) || (await exists(candidate));

    let candidate = path.join(destinationDir, `${stem}${suffix}${ext}`);
    let counter = 1;
    while (await isTaken(candidate)) {
      candidate = path.join(destinationDir, `${stem}${suffix}_${counter}${ext}`);
      counter++;
    }
    return candidate;
  }
}
