/**
 * Cypher Surface Parser
 *
 * Validates generated Cypher before it reaches the store. This is not a full
 * grammar: it tokenizes, checks bracket balance, splits top-level clauses,
 * enforces read-only clause order and extracts the RETURN projections.
 *
 * @module
 */

import { TranslationInvalidError } from "../errors.js";
import { ok, err, type Result } from "../../types/result.js";

// =============================================================================
// Types
// =============================================================================

export type ClauseKeyword =
  | "MATCH"
  | "OPTIONAL MATCH"
  | "WHERE"
  | "WITH"
  | "UNWIND"
  | "RETURN"
  | "ORDER BY"
  | "SKIP"
  | "LIMIT"
  | "UNION"
  | "UNION ALL"
  | WriteKeyword;

export type WriteKeyword =
  | "CREATE"
  | "MERGE"
  | "SET"
  | "DELETE"
  | "DETACH DELETE"
  | "REMOVE"
  | "DROP"
  | "LOAD CSV"
  | "FOREACH"
  | "CALL"
  | "USE";

export interface Clause {
  keyword: ClauseKeyword;
  /** Clause text after the keyword, trimmed */
  body: string;
}

export interface Projection {
  /** Projected expression as written */
  expression: string;
  /** Output column name */
  column: string;
}

/**
 * A generated query that passed validation
 */
export interface StructuredQuery {
  /** Query text as it will be executed */
  statement: string;
  /** Top-level clauses in order */
  clauses: Clause[];
  /** Items of the final RETURN */
  projections: Projection[];
  /** Output column carrying chunk content */
  contentColumn: string;
  /** Whether the final RETURN carries its own LIMIT */
  limited: boolean;
  /** Whether the query combines parts with UNION */
  union: boolean;
}

type TokenKind = "word" | "string" | "number" | "parameter" | "identifier" | "symbol";

interface Token {
  kind: TokenKind;
  text: string;
  /** Upper-cased text for words, raw text otherwise */
  upper: string;
  start: number;
  end: number;
  /** Bracket depth the token sits at */
  depth: number;
}

interface LocatedClause extends Clause {
  tokens: Token[];
}

class ParseFailure extends Error {}

// =============================================================================
// Tokenizer
// =============================================================================

const TWO_CHAR_SYMBOLS = new Set(["<>", "<=", ">=", "=~", "->", "<-", "..", "+="]);
const OPENERS: Readonly<Record<string, string>> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

function isWordStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isWordChar(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, start: number, end: number): void => {
    const raw = text.slice(start, end);
    tokens.push({ kind, text: raw, upper: kind === "word" ? raw.toUpperCase() : raw, start, end, depth: 0 });
  };

  while (i < text.length) {
    const char = text.charAt(i);
    const next = text.charAt(i + 1);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === "/" && next === "/") {
      const newline = text.indexOf("\n", i);
      i = newline === -1 ? text.length : newline + 1;
      continue;
    }

    if (char === "/" && next === "*") {
      const close = text.indexOf("*/", i + 2);
      if (close === -1) throw new ParseFailure(`Unterminated comment at offset ${i}`);
      i = close + 2;
      continue;
    }

    if (char === "'" || char === '"') {
      const start = i;
      i++;
      while (i < text.length && text.charAt(i) !== char) {
        i += text.charAt(i) === "\\" ? 2 : 1;
      }
      if (i >= text.length) throw new ParseFailure(`Unterminated string literal at offset ${start}`);
      i++;
      push("string", start, i);
      continue;
    }

    if (char === "`") {
      const start = i;
      i = readBacktick(text, i);
      push("identifier", start, i);
      continue;
    }

    if (char === "$" && (isWordChar(next) || next === "`")) {
      const start = i;
      i++;
      if (text.charAt(i) === "`") {
        i = readBacktick(text, i);
      } else {
        while (i < text.length && isWordChar(text.charAt(i))) i++;
      }
      push("parameter", start, i);
      continue;
    }

    if (isDigit(char)) {
      const start = i;
      while (i < text.length) {
        const current = text.charAt(i);
        if (isWordChar(current)) {
          i++;
        } else if (current === "." && isDigit(text.charAt(i + 1))) {
          i++;
        } else {
          break;
        }
      }
      push("number", start, i);
      continue;
    }

    if (isWordStart(char)) {
      const start = i;
      while (i < text.length && isWordChar(text.charAt(i))) i++;
      push("word", start, i);
      continue;
    }

    const pair = char + next;
    const width = TWO_CHAR_SYMBOLS.has(pair) ? 2 : 1;
    push("symbol", i, i + width);
    i += width;
  }

  return tokens;
}

function readBacktick(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text.charAt(i) === "`") {
      // Doubled backtick is an escaped backtick
      if (text.charAt(i + 1) === "`") {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  throw new ParseFailure(`Unterminated backtick identifier at offset ${start}`);
}

/**
 * Record each token's bracket depth and reject unbalanced brackets
 */
function assignDepths(tokens: Token[]): void {
  const stack: Token[] = [];

  for (const token of tokens) {
    if (token.kind !== "symbol") {
      token.depth = stack.length;
      continue;
    }

    if (OPENERS[token.text] !== undefined) {
      token.depth = stack.length;
      stack.push(token);
    } else if (CLOSERS.has(token.text)) {
      const opener = stack.pop();
      if (!opener || OPENERS[opener.text] !== token.text) {
        throw new ParseFailure(`Unexpected "${token.text}" at offset ${token.start}`);
      }
      token.depth = stack.length;
    } else {
      token.depth = stack.length;
    }
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new ParseFailure(`Unbalanced "${unclosed.text}" opened at offset ${unclosed.start}`);
  }
}

// =============================================================================
// Clauses
// =============================================================================

const SINGLE_KEYWORDS: ReadonlySet<string> = new Set([
  "MATCH",
  "WHERE",
  "WITH",
  "UNWIND",
  "RETURN",
  "SKIP",
  "LIMIT",
  "UNION",
  "CREATE",
  "MERGE",
  "SET",
  "DELETE",
  "REMOVE",
  "DROP",
  "FOREACH",
  "CALL",
  "USE",
]);

const PAIRED_KEYWORDS: Readonly<Record<string, { second: string; keyword: ClauseKeyword }>> = {
  OPTIONAL: { second: "MATCH", keyword: "OPTIONAL MATCH" },
  ORDER: { second: "BY", keyword: "ORDER BY" },
  DETACH: { second: "DELETE", keyword: "DETACH DELETE" },
  LOAD: { second: "CSV", keyword: "LOAD CSV" },
};

const WRITE_KEYWORDS: ReadonlySet<string> = new Set<WriteKeyword>([
  "CREATE",
  "MERGE",
  "SET",
  "DELETE",
  "DETACH DELETE",
  "REMOVE",
  "DROP",
  "LOAD CSV",
  "FOREACH",
  "CALL",
  "USE",
]);

/** Words that write wherever they appear, subqueries included */
const NESTED_WRITE_WORDS: ReadonlySet<string> = new Set([
  "CREATE",
  "MERGE",
  "SET",
  "DELETE",
  "DETACH",
  "REMOVE",
  "DROP",
  "FOREACH",
]);

function isClauseKeyword(value: string): value is ClauseKeyword {
  return SINGLE_KEYWORDS.has(value);
}

/**
 * Whether a word token stands where a keyword can: not a property key,
 * label, alias or map key.
 */
function inKeywordPosition(tokens: readonly Token[], index: number): boolean {
  const previous = tokens[index - 1];
  const next = tokens[index + 1];
  if (previous?.kind === "symbol" && (previous.text === "." || previous.text === ":")) return false;
  if (previous?.kind === "word" && previous.upper === "AS") return false;
  if (next?.kind === "symbol" && next.text === ":" && (tokens[index]?.depth ?? 0) > 0) return false;
  return true;
}

/**
 * Match a clause keyword at `index`. Returns the keyword and how many
 * tokens it spans.
 */
function keywordAt(
  tokens: readonly Token[],
  index: number
): { keyword: ClauseKeyword; width: number } | undefined {
  const token = tokens[index];
  if (!token || token.kind !== "word" || token.depth !== 0 || !inKeywordPosition(tokens, index)) {
    return undefined;
  }

  const paired = PAIRED_KEYWORDS[token.upper];
  if (paired) {
    const second = tokens[index + 1];
    return second?.kind === "word" && second.upper === paired.second
      ? { keyword: paired.keyword, width: 2 }
      : undefined;
  }

  if (token.upper === "WITH") {
    const previous = tokens[index - 1];
    // STARTS WITH / ENDS WITH are string operators
    if (previous?.kind === "word" && (previous.upper === "STARTS" || previous.upper === "ENDS")) {
      return undefined;
    }
  }

  if (token.upper === "UNION") {
    const second = tokens[index + 1];
    return second?.kind === "word" && second.upper === "ALL"
      ? { keyword: "UNION ALL", width: 2 }
      : { keyword: "UNION", width: 1 };
  }

  return isClauseKeyword(token.upper) ? { keyword: token.upper, width: 1 } : undefined;
}

function sliceText(text: string, tokens: readonly Token[]): string {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  if (!first || !last) return "";
  return text.slice(first.start, last.end).trim();
}

function splitClauses(text: string, tokens: readonly Token[]): LocatedClause[] {
  const clauses: LocatedClause[] = [];
  let current: { keyword: ClauseKeyword; tokens: Token[] } | undefined;

  for (let index = 0; index < tokens.length; ) {
    const token = tokens[index];
    if (!token) break;

    if (token.kind === "symbol" && token.text === ";") {
      if (index < tokens.length - 1) {
        throw new ParseFailure("Multiple statements are not allowed");
      }
      break;
    }

    const match = keywordAt(tokens, index);
    if (match) {
      if (current) clauses.push({ ...current, body: sliceText(text, current.tokens) });
      current = { keyword: match.keyword, tokens: [] };
      index += match.width;
      continue;
    }

    if (!current) {
      throw new ParseFailure(`Query must start with a clause keyword, found "${token.text}"`);
    }
    current.tokens.push(token);
    index++;
  }

  if (current) clauses.push({ ...current, body: sliceText(text, current.tokens) });
  return clauses;
}

function rejectWrites(tokens: readonly Token[], clauses: readonly LocatedClause[]): void {
  for (const clause of clauses) {
    if (WRITE_KEYWORDS.has(clause.keyword)) {
      throw new ParseFailure(`${clause.keyword} is not allowed in a read-only query`);
    }
  }

  tokens.forEach((token, index) => {
    if (
      token.kind === "word" &&
      token.depth > 0 &&
      NESTED_WRITE_WORDS.has(token.upper) &&
      inKeywordPosition(tokens, index)
    ) {
      throw new ParseFailure(`${token.upper} is not allowed in a read-only query`);
    }
  });
}

// =============================================================================
// Clause Order
// =============================================================================

const READING: ReadonlySet<ClauseKeyword> = new Set<ClauseKeyword>(["MATCH", "OPTIONAL MATCH", "UNWIND"]);

function splitParts(clauses: readonly LocatedClause[]): LocatedClause[][] {
  const parts: LocatedClause[][] = [[]];
  for (const clause of clauses) {
    if (clause.keyword === "UNION" || clause.keyword === "UNION ALL") {
      if (clause.body !== "") {
        throw new ParseFailure(`Unexpected text after ${clause.keyword}: "${clause.body}"`);
      }
      parts.push([]);
    } else {
      parts[parts.length - 1]?.push(clause);
    }
  }
  return parts;
}

/**
 * Check one UNION part: reading clauses, then projections, ending in RETURN
 */
function validatePart(part: readonly LocatedClause[]): void {
  if (part.length === 0) {
    throw new ParseFailure("UNION must join two complete queries");
  }

  let previous: ClauseKeyword | undefined;
  let tail: "WITH" | "RETURN" | undefined;

  for (const clause of part) {
    const { keyword } = clause;
    if (clause.body === "") {
      throw new ParseFailure(`${keyword} clause is empty`);
    }
    if (tail === "RETURN" && !["ORDER BY", "SKIP", "LIMIT"].includes(keyword)) {
      throw new ParseFailure(`${keyword} cannot follow RETURN`);
    }

    if (READING.has(keyword)) {
      tail = undefined;
    } else if (keyword === "WITH" || keyword === "RETURN") {
      tail = keyword;
    } else if (keyword === "WHERE") {
      const afterMatch = previous === "MATCH" || previous === "OPTIONAL MATCH";
      if (previous === "WHERE" || (!afterMatch && tail !== "WITH")) {
        throw new ParseFailure("WHERE must follow MATCH, OPTIONAL MATCH or WITH");
      }
      tail = undefined;
    } else if (keyword === "ORDER BY") {
      if (previous !== "WITH" && previous !== "RETURN") {
        throw new ParseFailure("ORDER BY must follow RETURN or WITH");
      }
    } else if (keyword === "SKIP") {
      if (!tail || !(previous === "WITH" || previous === "RETURN" || previous === "ORDER BY")) {
        throw new ParseFailure("SKIP must follow RETURN, WITH or ORDER BY");
      }
    } else if (keyword === "LIMIT") {
      const afterProjection =
        previous === "WITH" || previous === "RETURN" || previous === "ORDER BY" || previous === "SKIP";
      if (!tail || !afterProjection) {
        throw new ParseFailure("LIMIT must follow RETURN, WITH, ORDER BY or SKIP");
      }
    }

    previous = keyword;
  }

  if (tail !== "RETURN") {
    throw new ParseFailure("Query must end with a RETURN clause");
  }
}

// =============================================================================
// Projections
// =============================================================================

function unquoteIdentifier(name: string): string {
  return name.startsWith("`") && name.endsWith("`") && name.length >= 2
    ? name.slice(1, -1).replace(/``/g, "`")
    : name;
}

function parseProjections(text: string, returnClause: LocatedClause): Projection[] {
  let tokens = returnClause.tokens;
  if (tokens[0]?.kind === "word" && tokens[0].upper === "DISTINCT") {
    tokens = tokens.slice(1);
  }

  // Split on commas outside brackets
  const items: Token[][] = [[]];
  for (const token of tokens) {
    if (token.kind === "symbol" && token.text === "," && token.depth === 0) {
      items.push([]);
    } else {
      items[items.length - 1]?.push(token);
    }
  }

  return items.map((item) => {
    if (item.length === 0) {
      throw new ParseFailure("RETURN has an empty projection item");
    }

    let asIndex = -1;
    item.forEach((token, index) => {
      if (token.kind === "word" && token.upper === "AS" && token.depth === 0) asIndex = index;
    });

    if (asIndex === -1) {
      const expression = sliceText(text, item);
      return { expression, column: expression };
    }

    const alias = item.slice(asIndex + 1);
    const aliasToken = alias[0];
    if (alias.length !== 1 || !aliasToken || (aliasToken.kind !== "word" && aliasToken.kind !== "identifier")) {
      throw new ParseFailure(`Invalid alias in RETURN item "${sliceText(text, item)}"`);
    }
    const expression = sliceText(text, item.slice(0, asIndex));
    if (expression === "") {
      throw new ParseFailure("RETURN item is missing an expression before AS");
    }
    return { expression, column: unquoteIdentifier(aliasToken.text) };
  });
}

/**
 * Pick the projection carrying chunk content: a column named `content`,
 * else an expression or column ending in `.content`.
 */
export function findContentColumn(projections: readonly Projection[]): string | undefined {
  const named = projections.find((projection) => projection.column === "content");
  if (named) return named.column;

  const property = projections.find(
    (projection) => projection.expression.endsWith(".content") || projection.column.endsWith(".content")
  );
  return property?.column;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse and validate a generated read-only Cypher query.
 *
 * @example
 * ```typescript
 * const parsed = parseCypherQuery(
 *   "MATCH (c:CodeChunk) WHERE c.name = 'a.py' RETURN c.content AS content"
 * );
 * if (parsed.ok) console.log(parsed.value.contentColumn); // "content"
 * ```
 */
export function parseCypherQuery(text: string): Result<StructuredQuery, TranslationInvalidError> {
  const statement = text.trim();

  try {
    if (statement === "") throw new ParseFailure("Query is empty");

    const tokens = tokenize(statement);
    assignDepths(tokens);

    const located = splitClauses(statement, tokens);
    if (located.length === 0) throw new ParseFailure("Query is empty");
    rejectWrites(tokens, located);

    const parts = splitParts(located);
    parts.forEach(validatePart);

    const finalPart = parts[parts.length - 1] ?? [];
    const returnClause = finalPart.find((clause) => clause.keyword === "RETURN");
    if (!returnClause) throw new ParseFailure("Query must end with a RETURN clause");

    const projections = parseProjections(statement, returnClause);
    const contentColumn = findContentColumn(projections);
    if (contentColumn === undefined) {
      throw new ParseFailure(
        "Query must return chunk content, e.g. RETURN c.content AS content"
      );
    }

    // Cut at a trailing `;` so a comment after it is not sent either
    const last = tokens[tokens.length - 1];
    const end = last?.kind === "symbol" && last.text === ";" ? last.start : statement.length;

    const returnIndex = finalPart.indexOf(returnClause);
    return ok({
      statement: statement.slice(0, end).trimEnd(),
      clauses: located.map(({ keyword, body }) => ({ keyword, body })),
      projections,
      contentColumn,
      limited: finalPart.slice(returnIndex + 1).some((clause) => clause.keyword === "LIMIT"),
      union: parts.length > 1,
    });
  } catch (error) {
    if (error instanceof ParseFailure) {
      return err(new TranslationInvalidError(error.message, { output: text }));
    }
    throw error;
  }
}
