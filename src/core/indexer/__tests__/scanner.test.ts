/**
 * DirectoryScanner Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { DirectoryScanner } from "../scanner.js";
import { ErrorCode, InvalidArgumentError } from "../../errors.js";

describe("DirectoryScanner", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "scanner-test-"));

    await fs.mkdir(path.join(tempDir, "src"), { recursive: true });
    await fs.mkdir(path.join(tempDir, "node_modules", "dep"), { recursive: true });

    await fs.writeFile(path.join(tempDir, "a.py"), "def f(): pass");
    await fs.writeFile(path.join(tempDir, "src", "b.py"), "def g(): pass");
    await fs.writeFile(path.join(tempDir, "src", "index.ts"), "export const x = 1;\n");
    await fs.writeFile(path.join(tempDir, "Makefile"), "all:\n\techo hi\n");
    await fs.writeFile(path.join(tempDir, "big.txt"), "x".repeat(2048));
    await fs.writeFile(path.join(tempDir, ".env"), "SECRET=test-secret\n");
    await fs.writeFile(path.join(tempDir, "node_modules", "dep", "index.js"), "module.exports = 1;\n");
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("reads eligible files with relative paths and languages", async () => {
    const scanner = new DirectoryScanner({ maxFileSize: 1024 });
    const result = await scanner.scan(tempDir);

    expect(result.files.map((file) => [file.relativePath, file.language])).toEqual([
      ["Makefile", "unknown"],
      ["a.py", "python"],
      ["src/b.py", "python"],
      ["src/index.ts", "typescript"],
    ]);
    expect(new TextDecoder().decode(result.files[1]?.content)).toBe("def f(): pass");
    expect(result.byLanguage.get("python")).toBe(2);
  });

  it("skips files over the size limit", async () => {
    const scanner = new DirectoryScanner({ maxFileSize: 1024 });
    const result = await scanner.scan(tempDir);

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]?.filePath).toBe("big.txt");
    expect(result.skipped[0]?.code).toBe(ErrorCode.FILE_TOO_LARGE);
  });

  it("applies exclude patterns", async () => {
    const scanner = new DirectoryScanner({ exclude: ["**/*.py", "**/*.txt"] });
    const result = await scanner.scan(tempDir);

    expect(result.files.map((file) => file.relativePath)).toEqual(["Makefile", "src/index.ts"]);
  });

  it("reports progress for every file", async () => {
    const seen: number[] = [];
    await new DirectoryScanner({ concurrency: 1 }).scan(tempDir, (progress) => seen.push(progress.current));
    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it("rejects a missing directory", async () => {
    const scanner = new DirectoryScanner();
    await expect(scanner.scan(path.join(tempDir, "missing"))).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("rejects a file given as the directory", async () => {
    const scanner = new DirectoryScanner();
    await expect(scanner.scan(path.join(tempDir, "a.py"))).rejects.toThrow(
      "Directory not found or not readable"
    );
  });
});
