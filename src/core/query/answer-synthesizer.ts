/**
 * Answer Synthesizer
 *
 * Renders query rows as a bounded answer. Absence of data is an answer
 * kind, not an error.
 *
 * @module
 */

import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import type { Row } from "../../types/index.js";
import { splitsSurrogatePair } from "../../utils/index.js";

// =============================================================================
// Types
// =============================================================================

export const EMPTY_ANSWER_TEXT = "No matching data found for this query.";
export const NO_CONTENT_ANSWER_TEXT = "The matched nodes carried no usable content.";
export const TRUNCATION_MARKER = "...";

export type Answer =
  | {
      kind: "found";
      /** Full content of the first row */
      content: string;
      truncated: boolean;
      rowCount: number;
      /** Set when the text is a model-written summary */
      summarized?: boolean;
      text: string;
    }
  | { kind: "empty"; text: string }
  | { kind: "no_content"; rowCount: number; text: string }
  | { kind: "malformed"; detail: string; text: string };

export type AnswerKind = Answer["kind"];

export interface SynthesisOptions {
  /** Column the query projected content into */
  contentColumn?: string;
  signal?: AbortSignal;
}

export interface IAnswerSynthesizer {
  synthesize(rows: readonly Row[] | null, question: string, options?: SynthesisOptions): Answer | Promise<Answer>;
}

/**
 * Cut text to `limit` characters, appending the marker when cut. A cut
 * inside a surrogate pair moves before it.
 */
export function truncate(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) return { text, truncated: false };
  const end = splitsSurrogatePair(text, limit) ? limit - 1 : limit;
  return { text: text.slice(0, end) + TRUNCATION_MARKER, truncated: true };
}

/**
 * Find the content column of a row: the query's own, then `content`, then
 * the first column ending in `.content`.
 */
export function resolveContentColumn(row: Row, contentColumn?: string): string | undefined {
  if (contentColumn !== undefined && contentColumn in row) return contentColumn;
  if ("content" in row) return "content";
  return Object.keys(row).find((key) => key.endsWith(".content"));
}

function malformed(row: Row): Answer {
  const detail = `Unexpected result shape: columns [${Object.keys(row).join(", ")}]`;
  return { kind: "malformed", detail, text: detail };
}

// =============================================================================
// Deterministic Synthesizer
// =============================================================================

/**
 * Answers with the first row's content, bounded by `displayLimit`.
 *
 * @example
 * ```typescript
 * const synthesizer = new AnswerSynthesizer({ displayLimit: 10 });
 * synthesizer.synthesize([{ content: "hello world, this is a test" }], "q").text;
 * // "hello worl..."
 * ```
 */
export class AnswerSynthesizer implements IAnswerSynthesizer {
  readonly displayLimit: number;

  constructor(options: { displayLimit?: number } = {}) {
    this.displayLimit = options.displayLimit ?? 1000;
  }

  synthesize(rows: readonly Row[] | null, _question: string, options: SynthesisOptions = {}): Answer {
    const first = rows?.[0];
    if (!rows || !first) {
      return { kind: "empty", text: EMPTY_ANSWER_TEXT };
    }

    const column = resolveContentColumn(first, options.contentColumn);
    if (column === undefined) return malformed(first);

    const value = first[column];
    if (value === null || value === undefined || (typeof value === "string" && value.trim() === "")) {
      return { kind: "no_content", rowCount: rows.length, text: NO_CONTENT_ANSWER_TEXT };
    }
    if (typeof value !== "string") return malformed(first);

    const bounded = truncate(value, this.displayLimit);
    return {
      kind: "found",
      content: value,
      truncated: bounded.truncated,
      rowCount: rows.length,
      text: bounded.text,
    };
  }
}

// =============================================================================
// Generative Synthesizer
// =============================================================================

/** Rows of content handed to the model */
const MAX_CONTEXT_ROWS = 5;

/**
 * Summarizes found content with the language model. Other answer kinds pass
 * through unchanged; model errors propagate.
 */
export class GenerativeAnswerSynthesizer implements IAnswerSynthesizer {
  private base: AnswerSynthesizer;
  private llm: ILLMService;

  constructor(llm: ILLMService, base: AnswerSynthesizer = new AnswerSynthesizer()) {
    this.llm = llm;
    this.base = base;
  }

  buildPrompt(question: string, excerpts: readonly string[]): string {
    const context = excerpts.map((excerpt, index) => `[${index + 1}]\n${excerpt}`).join("\n\n");
    return [
      "Answer the question using only the code excerpts below.",
      "If the excerpts do not contain the answer, say so.",
      "",
      "Excerpts:",
      context,
      "",
      `Question: ${question}`,
      "Answer:",
    ].join("\n");
  }

  async synthesize(
    rows: readonly Row[] | null,
    question: string,
    options: SynthesisOptions = {}
  ): Promise<Answer> {
    const answer = this.base.synthesize(rows, question, options);
    if (answer.kind !== "found" || !rows) return answer;

    const excerpts: string[] = [];
    for (const row of rows.slice(0, MAX_CONTEXT_ROWS)) {
      const column = resolveContentColumn(row, options.contentColumn);
      const value = column === undefined ? undefined : row[column];
      if (typeof value === "string" && value.trim() !== "") excerpts.push(value);
    }

    const result = await this.llm.complete(this.buildPrompt(question, excerpts), {
      signal: options.signal,
    });
    const bounded = truncate(result.text.trim(), this.base.displayLimit);
    return { ...answer, summarized: true, truncated: bounded.truncated, text: bounded.text };
  }
}
