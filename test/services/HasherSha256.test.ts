import { createHash } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { HasherSha256 } from "@/services/Hasher";

const tmpDir = "test/tmp/hasher";

describe("HasherSha256", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  test("計算出標準 sha256 hex", async () => {
    await writeFile(join(tmpDir, "abc.txt"), "abc");
    const result = await new HasherSha256().hash(join(tmpDir, "abc.txt"));
    expectOk(result);
    expect(result.value).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  test("空檔案也有摘要", async () => {
    await writeFile(join(tmpDir, "empty.bin"), "");
    const result = await new HasherSha256().hash(join(tmpDir, "empty.bin"));
    expectOk(result);
    expect(result.value).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });

  test("內容相同、檔名與位置不同時摘要相同", async () => {
    await mkdir(join(tmpDir, "sub"), { recursive: true });
    await writeFile(join(tmpDir, "a.txt"), "same content");
    await writeFile(join(tmpDir, "sub", "b.dat"), "same content");
    const hasher = new HasherSha256();
    const a = await hasher.hash(join(tmpDir, "a.txt"));
    const b = await hasher.hash(join(tmpDir, "sub", "b.dat"));
    expectOk(a);
    expectOk(b);
    expect(a.value).toBe(b.value);
  });

  test("跨多個 chunk 的檔案與一次性雜湊結果一致", async () => {
    const content = Buffer.alloc(20_000 + 123, 7);
    content.write("head", 0);
    await writeFile(join(tmpDir, "big.bin"), content);
    const result = await new HasherSha256({ chunkSize: 1024 }).hash(
      join(tmpDir, "big.bin")
    );
    expectOk(result);
    expect(result.value).toBe(
      createHash("sha256").update(content).digest("hex")
    );
  });

  test("檔案不存在時回傳 UNREADABLE", async () => {
    const result = await new HasherSha256().hash(join(tmpDir, "missing.txt"));
    expectErr(result);
    expect(result.error.type).toBe("UNREADABLE");
  });

  test("路徑是資料夾時回傳 UNREADABLE", async () => {
    const result = await new HasherSha256().hash(tmpDir);
    expectErr(result);
    expect(result.error.type).toBe("UNREADABLE");
  });
});
