/**
 * Query Translator
 *
 * Turns a natural-language question into a validated read-only Cypher
 * query, grounded in the graph's current schema.
 *
 * @module
 */

import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import { parseCypherQuery, type StructuredQuery } from "./cypher-parser.js";
import {
  InvalidArgumentError,
  ModelTimeoutError,
  TranslationInvalidError,
} from "../errors.js";
import { throwIfAborted } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("query-translator");

// =============================================================================
// Prompt
// =============================================================================

const SYSTEM_PROMPT = "You translate questions about a codebase into Neo4j Cypher queries.";

const INSTRUCTIONS = [
  "Task: Generate a Cypher statement to query a graph database.",
  "Instructions:",
  "Use only the node labels, relationship types and properties provided in the schema.",
  "Each CodeChunk node holds one chunk of a source file: name is the file name, path the relative file path, chunkIndex the position of the chunk in its file, content the chunk text and language the detected language.",
  "SAME_LANGUAGE relationships connect chunks written in the same language, in both directions.",
  "For partial or case-insensitive matches use CONTAINS or =~ with a (?i) pattern.",
  "Always return the chunk text as content, for example RETURN c.content AS content.",
  "Only read from the graph. Never use CREATE, MERGE, SET, DELETE, REMOVE, DROP or CALL.",
  'Answer with the Cypher query only: no explanations, no markdown fences, no "cypher" prefix.',
].join("\n");

export interface TranslationFeedback {
  /** Why the previous output was rejected */
  detail: string;
  /** The rejected output */
  output: string;
}

/**
 * Build the translation prompt. Identical inputs give identical prompts.
 */
export function buildTranslationPrompt(
  question: string,
  schema: string,
  feedback?: TranslationFeedback
): string {
  const lines = [INSTRUCTIONS, "Schema:", schema, ""];
  if (feedback) {
    lines.push(
      `The previous output failed to parse: ${feedback.detail}`,
      "Previous output:",
      feedback.output,
      ""
    );
  }
  lines.push(`Question: ${question}`, "Cypher query:");
  return lines.join("\n");
}

/**
 * Strip markdown fences, a leading "cypher" tag and a trailing semicolon
 */
export function sanitizeQuery(output: string): string {
  let text = output.trim();

  const fenced = /```[A-Za-z]*[ \t]*\n?([\s\S]*?)```/.exec(text);
  if (fenced?.[1] !== undefined) {
    text = fenced[1];
  } else {
    text = text.replace(/^```[A-Za-z]*/, "").replace(/```$/, "");
  }

  return text
    .trim()
    .replace(/^cypher\b:?\s*/i, "")
    .replace(/;\s*$/, "")
    .trim();
}

// =============================================================================
// Query Translator
// =============================================================================

export interface QueryTranslatorOptions {
  /** Model calls per question, the first included (default: 2) */
  maxAttempts?: number;
}

/**
 * @example
 * ```typescript
 * const translator = new QueryTranslator(llm);
 * const query = await translator.translate("What does a.py print?", schema.text);
 * console.log(query.statement);
 * ```
 */
export class QueryTranslator {
  private llm: ILLMService;
  private maxAttempts: number;

  constructor(llm: ILLMService, options: QueryTranslatorOptions = {}) {
    this.llm = llm;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
  }

  /**
   * Translate a question into a structured query.
   *
   * A parse failure or a model timeout is retried once (by default); a
   * parse failure's detail is fed back to the model.
   *
   * @throws InvalidArgumentError for an empty question
   * @throws TranslationInvalidError when no attempt parsed
   * @throws ModelTimeoutError when the last attempt timed out
   * @throws ModelUnavailableError on the first transport failure
   */
  async translate(
    question: string,
    schema: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<StructuredQuery> {
    const trimmed = question.trim();
    if (trimmed === "") {
      throw new InvalidArgumentError("Question must not be empty");
    }

    let feedback: TranslationFeedback | undefined;
    let lastError: TranslationInvalidError | ModelTimeoutError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      throwIfAborted(options.signal);
      const prompt = buildTranslationPrompt(trimmed, schema, feedback);

      let output: string;
      try {
        const result = await this.llm.complete(prompt, {
          systemPrompt: SYSTEM_PROMPT,
          signal: options.signal,
        });
        output = result.text;
      } catch (error) {
        if (!(error instanceof ModelTimeoutError)) throw error;
        logger.warn({ attempt }, "Translation timed out");
        lastError = error;
        feedback = undefined;
        continue;
      }

      const parsed = parseCypherQuery(sanitizeQuery(output));
      if (parsed.ok) {
        logger.debug({ attempt, statement: parsed.value.statement }, "Question translated");
        return parsed.value;
      }

      logger.warn({ attempt, detail: parsed.error.message }, "Generated query rejected");
      lastError = parsed.error;
      feedback = { detail: parsed.error.message, output };
    }

    throw lastError ?? new TranslationInvalidError("No translation was attempted");
  }
}

export function createQueryTranslator(
  llm: ILLMService,
  options: QueryTranslatorOptions = {}
): QueryTranslator {
  return new QueryTranslator(llm, options);
}
