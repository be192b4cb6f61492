/**
 * Language detection and split points per language.
 *
 * @module
 */

import * as path from "node:path";
import type { Language } from "../../types/index.js";

const EXTENSION_LANGUAGES: Readonly<Record<string, Language>> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".go": "go",
  ".java": "java",
  ".rs": "rust",
  ".md": "markdown",
  ".markdown": "markdown",
  ".html": "html",
  ".htm": "html",
};

/**
 * Detect a file's language from its extension.
 * Unrecognized or missing extensions map to "unknown".
 */
export function detectLanguage(filePath: string): Language {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_LANGUAGES[ext] ?? "unknown";
}

/** Line-bounded fallback, also the tail of every other list */
const GENERIC_SEPARATORS = ["\n\n", "\n", " ", ""] as const;

/**
 * Ordered split points, coarsest first. "" means "cut anywhere".
 */
const LANGUAGE_SEPARATORS: Readonly<Record<Language, readonly string[]>> = {
  python: ["\nclass ", "\ndef ", "\n\tdef ", "\n    def ", ...GENERIC_SEPARATORS],
  javascript: [
    "\nfunction ",
    "\nconst ",
    "\nlet ",
    "\nvar ",
    "\nclass ",
    "\nif ",
    "\nfor ",
    "\nwhile ",
    "\nswitch ",
    ...GENERIC_SEPARATORS,
  ],
  typescript: [
    "\nenum ",
    "\ninterface ",
    "\nnamespace ",
    "\ntype ",
    "\nclass ",
    "\nfunction ",
    "\nexport ",
    "\nconst ",
    "\nlet ",
    "\nif ",
    "\nfor ",
    ...GENERIC_SEPARATORS,
  ],
  go: ["\nfunc ", "\nvar ", "\nconst ", "\ntype ", "\nif ", "\nfor ", "\nswitch ", ...GENERIC_SEPARATORS],
  java: [
    "\nclass ",
    "\npublic ",
    "\nprotected ",
    "\nprivate ",
    "\nstatic ",
    "\nif ",
    "\nfor ",
    "\nwhile ",
    ...GENERIC_SEPARATORS,
  ],
  rust: ["\nfn ", "\nimpl ", "\nstruct ", "\nenum ", "\nconst ", "\nlet ", "\nmatch ", ...GENERIC_SEPARATORS],
  markdown: ["\n# ", "\n## ", "\n### ", "\n#### ", "\n```", "\n---\n", ...GENERIC_SEPARATORS],
  html: ["<body", "<div", "<section", "<p", "<li", "<h1", "<h2", "<h3", "<table", "<tr", "<script", "<style", ...GENERIC_SEPARATORS],
  unknown: GENERIC_SEPARATORS,
};

export function getSeparators(language: Language): readonly string[] {
  return LANGUAGE_SEPARATORS[language];
}
