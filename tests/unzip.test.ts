/**
 * Unit tests for zip extraction.
 */
import { describe, test, expect } from "vitest";
import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { extractZip } from "../src/archive/unzip.js";
import { ExtractionFailedException, FileOperationError } from "../src/core/exceptions.js";
import { buildZip, makeTmpDir } from "./fixtures.js";

// Deterministic incompressible bytes (xorshift32)
function noise(size: number): Uint8Array {
  const out = new Uint8Array(size);
  let x = 0x2545f491;
  for (let i = 0; i < size; i++) {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    out[i] = x & 0xff;
  }
  return out;
}

describe("extractZip", () => {
  test("writes every file under the destination", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "export.zip");
    writeFileSync(
      zipPath,
      buildZip({
        "Takeout/notes.txt": "hello",
        "Takeout/Photos/a.jpg": new Uint8Array([0xff, 0xd8, 0xff]),
      }),
    );
    const dest = join(dir, "temp");

    const written = await extractZip(zipPath, dest);

    expect(written.sort()).toEqual(
      [join(dest, "Takeout", "Photos", "a.jpg"), join(dest, "Takeout", "notes.txt")].sort(),
    );
    expect(readFileSync(join(dest, "Takeout", "notes.txt"), "utf8")).toBe("hello");
    expect([...readFileSync(join(dest, "Takeout", "Photos", "a.jpg"))]).toEqual([0xff, 0xd8, 0xff]);
  });

  test("streams entries spanning many read chunks", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "export.zip");
    const big = noise(3 * 1024 * 1024);
    writeFileSync(zipPath, buildZip({ "Takeout/big.bin": big, "Takeout/small.txt": "tail" }));
    const dest = join(dir, "temp");

    await extractZip(zipPath, dest);

    expect(readFileSync(join(dest, "Takeout", "big.bin")).equals(big)).toBe(true);
    expect(readFileSync(join(dest, "Takeout", "small.txt"), "utf8")).toBe("tail");
  });

  test("creates empty files and directory entries", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "export.zip");
    writeFileSync(zipPath, buildZip({ "Takeout/empty.txt": "", "Takeout/Albums/": "" }));
    const dest = join(dir, "temp");

    await extractZip(zipPath, dest);

    expect(readFileSync(join(dest, "Takeout", "empty.txt"), "utf8")).toBe("");
    expect(statSync(join(dest, "Takeout", "Albums")).isDirectory()).toBe(true);
  });

  test("truncated archive fails and leaves nothing behind", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "cut.zip");
    const whole = buildZip({ "Takeout/big.bin": noise(200_000) });
    writeFileSync(zipPath, whole.subarray(0, 100_000));
    const dest = join(dir, "temp");

    await expect(extractZip(zipPath, dest)).rejects.toThrow(ExtractionFailedException);
    expect(existsSync(dest)).toBe(false);
  });

  test("corrupt archive", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "bad.zip");
    writeFileSync(zipPath, "not a zip file");
    await expect(extractZip(zipPath, join(dir, "temp"))).rejects.toThrow(ExtractionFailedException);
  });

  test("missing archive", async () => {
    const dir = makeTmpDir();
    await expect(extractZip(join(dir, "none.zip"), join(dir, "temp"))).rejects.toThrow(
      FileOperationError,
    );
  });

  test("rejects entries escaping the destination", async () => {
    const dir = makeTmpDir();
    const zipPath = join(dir, "evil.zip");
    writeFileSync(zipPath, buildZip({ "Takeout/ok.txt": "fine", "../escaped.txt": "nope" }));
    const dest = join(dir, "sub", "temp");

    await expect(extractZip(zipPath, dest)).rejects.toThrow(
      "entry escapes the extraction folder: ../escaped.txt",
    );
    expect(existsSync(join(dir, "sub", "escaped.txt"))).toBe(false);
    expect(existsSync(dest)).toBe(false);
  });
});
