/**
 * Chunker Tests
 */

import { describe, it, expect } from "vitest";
import { Chunker, decodeSourceFile, splitText } from "../chunker.js";
import { getSeparators } from "../languages.js";
import { ConfigurationError, DecodeError } from "../../errors.js";
import type { Language, SourceFile } from "../../../types/index.js";

const GENERIC = getSeparators("unknown");

function sourceFile(relativePath: string, text: string, language: Language): SourceFile {
  return {
    absolutePath: `/project/${relativePath}`,
    relativePath,
    content: new TextEncoder().encode(text),
    language,
  };
}

function rawFile(relativePath: string, bytes: number[]): SourceFile {
  return {
    absolutePath: `/project/${relativePath}`,
    relativePath,
    content: Uint8Array.from(bytes),
    language: "unknown",
  };
}

describe("splitText", () => {
  it("returns text that fits as a single chunk", () => {
    expect(splitText("def f(): pass", getSeparators("python"), 1000)).toEqual(["def f(): pass"]);
  });

  it("cuts text without separators at the size limit", () => {
    expect(splitText("abcdefghij", GENERIC, 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("keeps surrogate pairs together when cutting", () => {
    expect(splitText("ab\u{1F600}cd", GENERIC, 3)).toEqual(["ab", "\u{1F600}c", "d"]);
  });

  it("prefers line boundaries over hard cuts", () => {
    expect(splitText("aaa\nbbb\nccc", GENERIC, 8)).toEqual(["aaa\nbbb", "\nccc"]);
  });

  it("splits python on top-level definitions", () => {
    const text = "import os\n\ndef a():\n    return 1\n\ndef b():\n    return 2\n";
    expect(splitText(text, getSeparators("python"), 30)).toEqual([
      "import os\n",
      "\ndef a():\n    return 1\n",
      "\ndef b():\n    return 2\n",
    ]);
  });

  it("carries overlapping pieces into the next chunk", () => {
    expect(splitText("aa bb cc dd", GENERIC, 7, 3)).toEqual(["aa bb", " bb cc", " cc dd"]);
  });

  it("drops chunks that are only whitespace", () => {
    expect(splitText("abc\n\n\n\n\n\ndef", GENERIC, 4)).toEqual(["abc", "\ndef"]);
  });

  it("never exceeds the size limit", () => {
    const lines = Array.from({ length: 200 }, (_, i) => `line ${i} ${"x".repeat(i % 37)}`);
    const text = lines.join("\n");

    for (const [maxSize, overlap] of [
      [16, 0],
      [50, 10],
      [120, 40],
      [333, 0],
    ] as const) {
      const chunks = splitText(text, GENERIC, maxSize, overlap);
      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(maxSize);
      }
    }
  });
});

describe("decodeSourceFile", () => {
  it("decodes UTF-8 text", () => {
    const result = decodeSourceFile(sourceFile("a.txt", "héllo", "unknown"));
    expect(result).toEqual({ ok: true, value: "héllo" });
  });

  it("rejects files containing NUL bytes", () => {
    const result = decodeSourceFile(rawFile("image.bin", [0x66, 0x00, 0x67]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.message).toBe("File contains NUL bytes and looks binary");
      expect(result.error.filePath).toBe("image.bin");
    }
  });

  it("rejects invalid UTF-8", () => {
    const result = decodeSourceFile(rawFile("latin1.txt", [0x63, 0x61, 0x66, 0xe9]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("File is not valid UTF-8 text");
    }
  });
});

describe("Chunker", () => {
  it("rejects an overlap as large as the chunk size", () => {
    expect(() => new Chunker({ maxSize: 100, overlap: 100 })).toThrow(ConfigurationError);
  });

  it("rejects a non-positive chunk size", () => {
    expect(() => new Chunker({ maxSize: 0 })).toThrow(ConfigurationError);
  });

  it("keys chunks by relative path and index, named by basename", () => {
    const chunker = new Chunker({ maxSize: 8 });
    const result = chunker.chunkFile(sourceFile("src/notes.txt", "aaa\nbbb\nccc", "unknown"));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([
        {
          id: "src/notes.txt#0",
          path: "src/notes.txt",
          name: "notes.txt",
          chunkIndex: 0,
          content: "aaa\nbbb",
          language: "unknown",
        },
        {
          id: "src/notes.txt#1",
          path: "src/notes.txt",
          name: "notes.txt",
          chunkIndex: 1,
          content: "\nccc",
          language: "unknown",
        },
      ]);
    }
  });

  it("gives files sharing a basename distinct ids", () => {
    const chunker = new Chunker();
    const { chunks } = chunker.chunk([
      sourceFile("app/main.py", "print('app')", "python"),
      sourceFile("tools/main.py", "print('tools')", "python"),
    ]);

    expect(chunks.map((chunk) => chunk.id)).toEqual(["app/main.py#0", "tools/main.py#0"]);
    expect(chunks.map((chunk) => chunk.name)).toEqual(["main.py", "main.py"]);
  });

  it("chunks files of unknown language", () => {
    const { chunks } = new Chunker().chunk([sourceFile("Makefile", "all:\n\techo hi\n", "unknown")]);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.language).toBe("unknown");
  });

  it("skips undecodable files and keeps going", () => {
    const { chunks, diagnostics } = new Chunker().chunk([
      rawFile("blob.bin", [0x00, 0x01]),
      sourceFile("a.py", "def f(): pass", "python"),
    ]);

    expect(chunks.map((chunk) => chunk.id)).toEqual(["a.py#0"]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.filePath).toBe("blob.bin");
  });
});
