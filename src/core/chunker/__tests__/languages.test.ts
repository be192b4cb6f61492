import { describe, it, expect } from "vitest";
import { detectLanguage, getSeparators } from "../languages.js";
import { LANGUAGES } from "../../../types/index.js";

describe("detectLanguage", () => {
  it.each([
    ["src/app.py", "python"],
    ["web/index.js", "javascript"],
    ["web/App.tsx", "typescript"],
    ["cmd/main.go", "go"],
    ["Main.java", "java"],
    ["lib.rs", "rust"],
    ["README.md", "markdown"],
    ["docs/page.HTML", "html"],
  ])("detects %s as %s", (filePath, language) => {
    expect(detectLanguage(filePath)).toBe(language);
  });

  it("tags unrecognized and missing extensions as unknown", () => {
    expect(detectLanguage("Makefile")).toBe("unknown");
    expect(detectLanguage("data.csv")).toBe("unknown");
  });
});

describe("getSeparators", () => {
  it("ends every list with the line-bounded fallback", () => {
    for (const language of LANGUAGES) {
      expect(getSeparators(language).slice(-4)).toEqual(["\n\n", "\n", " ", ""]);
    }
  });

  it("starts python with class and function boundaries", () => {
    expect(getSeparators("python").slice(0, 2)).toEqual(["\nclass ", "\ndef "]);
  });
});
