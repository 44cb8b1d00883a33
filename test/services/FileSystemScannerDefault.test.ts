import { mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { beforeEach, describe, expect, test, vi } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

const tmpDir = resolve("test/tmp/scanner");

const deniedDirs = vi.hoisted(() => new Set<string>());

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const target = String(args[0]);
      if (deniedDirs.has(target)) {
        throw Object.assign(
          new Error(`EACCES: permission denied, scandir '${target}'`),
          { code: "EACCES" }
        );
      }
      return actual.readdir(...args);
    },
  };
});

async function seedTree() {
  await mkdir(join(tmpDir, "sub", "deeper"), { recursive: true });
  await mkdir(join(tmpDir, "albums"), { recursive: true });
  await writeFile(join(tmpDir, "b.txt"), "b");
  await writeFile(join(tmpDir, "a.JPG"), "a");
  await writeFile(join(tmpDir, "notes.zzz"), "z");
  await writeFile(join(tmpDir, "albums", "c.png"), "c");
  await writeFile(join(tmpDir, "sub", "d.mp3"), "d");
  await writeFile(join(tmpDir, "sub", "deeper", "e.pdf"), "e");
}

describe("FileSystemScannerDefault", () => {
  beforeEach(async () => {
    deniedDirs.clear();
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  test("All 會遞迴列出所有檔案並附上類別", async () => {
    await seedTree();
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["All"]);

    expectOk(result);
    expect(result.value.candidates).toEqual([
      { path: join(tmpDir, "a.JPG"), category: "Images" },
      { path: join(tmpDir, "b.txt"), category: "Documents" },
      { path: join(tmpDir, "notes.zzz"), category: "OTHER" },
      { path: join(tmpDir, "albums", "c.png"), category: "Images" },
      { path: join(tmpDir, "sub", "d.mp3"), category: "Audio" },
      { path: join(tmpDir, "sub", "deeper", "e.pdf"), category: "Documents" },
    ]);
    expect(result.value.skipped).toEqual([]);
  });

  test("只回傳所選類別的檔案", async () => {
    await seedTree();
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["Images"]);

    expectOk(result);
    expect(result.value.candidates.map((c) => c.path)).toEqual([
      join(tmpDir, "a.JPG"),
      join(tmpDir, "albums", "c.png"),
    ]);
  });

  test("可同時選多個類別，包含 OTHER", async () => {
    await seedTree();
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["Documents", "OTHER"]);

    expectOk(result);
    expect(result.value.candidates.map((c) => c.path)).toEqual([
      join(tmpDir, "b.txt"),
      join(tmpDir, "notes.zzz"),
      join(tmpDir, "sub", "deeper", "e.pdf"),
    ]);
  });

  test("每次掃描都反映目前磁碟狀態", async () => {
    await writeFile(join(tmpDir, "first.txt"), "1");
    const scanner = new FileSystemScannerDefault();
    const before = await scanner.scan(tmpDir, ["All"]);
    await writeFile(join(tmpDir, "second.txt"), "2");
    const after = await scanner.scan(tmpDir, ["All"]);

    expectOk(before);
    expectOk(after);
    expect(before.value.candidates).toHaveLength(1);
    expect(after.value.candidates).toHaveLength(2);
  });

  test("不進入 excludeDirs", async () => {
    await seedTree();
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["All"], {
      excludeDirs: [join(tmpDir, "sub")],
    });

    expectOk(result);
    expect(result.value.candidates.map((c) => c.path)).toEqual([
      join(tmpDir, "a.JPG"),
      join(tmpDir, "b.txt"),
      join(tmpDir, "notes.zzz"),
      join(tmpDir, "albums", "c.png"),
    ]);
    expect(result.value.skipped).toEqual([
      { path: join(tmpDir, "sub"), reason: "排除的資料夾" },
    ]);
  });

  test("無法讀取的子資料夾記入 skipped，其餘照常掃描", async () => {
    await seedTree();
    deniedDirs.add(join(tmpDir, "sub"));
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["All"]);

    expectOk(result);
    expect(result.value.candidates.map((c) => c.path)).toEqual([
      join(tmpDir, "a.JPG"),
      join(tmpDir, "b.txt"),
      join(tmpDir, "notes.zzz"),
      join(tmpDir, "albums", "c.png"),
    ]);
    expect(result.value.skipped).toEqual([
      {
        path: join(tmpDir, "sub"),
        reason: `EACCES: permission denied, scandir '${join(tmpDir, "sub")}'`,
      },
    ]);
  });

  test("不跟隨指向資料夾的連結，循環連結不會卡住", async () => {
    await mkdir(join(tmpDir, "loop"), { recursive: true });
    await writeFile(join(tmpDir, "loop", "x.txt"), "x");
    await symlink(tmpDir, join(tmpDir, "loop", "back"));
    await symlink(join(tmpDir, "loop", "x.txt"), join(tmpDir, "link.txt"));
    await symlink(join(tmpDir, "gone.txt"), join(tmpDir, "broken.txt"));

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, ["All"]);

    expectOk(result);
    expect(result.value.candidates.map((c) => c.path)).toEqual([
      join(tmpDir, "link.txt"),
      join(tmpDir, "loop", "x.txt"),
    ]);
    expect(result.value.skipped.map((s) => s.path)).toEqual([
      join(tmpDir, "broken.txt"),
      join(tmpDir, "loop", "back"),
    ]);
  });

  test("來源不存在時回傳 SCAN_FAILED", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(join(tmpDir, "no_such_path"), ["All"]);
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });
});
