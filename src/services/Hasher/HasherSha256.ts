import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import { type Result, err, ok } from "~shared/utils/Result";

import { HASH_CHUNK_SIZE } from "@/constants";
import type { ContentDigest } from "@/types";
import { errorMessage } from "@/utils/helper";

import type { HashError, Hasher } from "./Hasher";

export class HasherSha256 implements Hasher {
  private readonly chunkSize: number;

  constructor(options?: { chunkSize?: number }) {
    this.chunkSize = options?.chunkSize ?? HASH_CHUNK_SIZE;
  }

  async hash(filePath: string): Promise<Result<ContentDigest, HashError>> {
    try {
      const hasher = createHash("sha256");
      const stream = createReadStream(filePath, {
        highWaterMark: this.chunkSize,
      });
      for await (const chunk of stream) {
        hasher.update(chunk);
      }
      return ok(hasher.digest("hex"));
    } catch (e) {
      return err({
        type: "UNREADABLE",
        message: `無法讀取 ${filePath}: ${errorMessage(e)}`,
      });
    }
  }
}
