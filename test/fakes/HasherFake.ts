import { type Result, err, ok } from "~shared/utils/Result";

import type { HashError, Hasher } from "@/services/Hasher/Hasher";
import { HasherSha256 } from "@/services/Hasher/HasherSha256";
import type { ContentDigest } from "@/types";

/** 預設使用真正的 sha256，可針對特定路徑指定結果 */
export class HasherFake implements Hasher {
  private readonly inner: Hasher;
  private readonly overrides = new Map<
    string,
    Result<ContentDigest, HashError>
  >();
  readonly calls: string[] = [];

  constructor(inner: Hasher = new HasherSha256()) {
    this.inner = inner;
  }

  async hash(filePath: string): Promise<Result<ContentDigest, HashError>> {
    this.calls.push(filePath);
    return this.overrides.get(filePath) ?? this.inner.hash(filePath);
  }

  setDigest(filePath: string, digest: ContentDigest) {
    this.overrides.set(filePath, ok(digest));
  }

  setUnreadable(filePath: string) {
    this.overrides.set(
      filePath,
      err({ type: "UNREADABLE", message: `Permission denied: ${filePath}` })
    );
  }
}
