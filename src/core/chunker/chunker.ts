/**
 * Chunker
 *
 * Splits source files into bounded, language-tagged chunks. Splitting walks
 * each language's separator list from coarse (declarations) to fine (lines,
 * words, characters) and merges the pieces back up to the size limit.
 *
 * @module
 */

import * as path from "node:path";
import type { Chunk, SourceFile } from "../../types/index.js";
import { ConfigurationError, DecodeError } from "../errors.js";
import { ok, err, type Result } from "../../types/result.js";
import { getSeparators } from "./languages.js";
import { splitsSurrogatePair } from "../../utils/index.js";

// =============================================================================
// Types
// =============================================================================

export interface ChunkerOptions {
  /** Maximum chunk length in characters (default: 1000) */
  maxSize?: number;
  /** Characters shared by consecutive chunks (default: 0) */
  overlap?: number;
}

export interface ChunkingResult {
  chunks: Chunk[];
  /** Files that were skipped */
  diagnostics: DecodeError[];
}

export const DEFAULT_MAX_CHUNK_SIZE = 1000;

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode a file's bytes as strict UTF-8. NUL bytes mark the file as binary.
 */
export function decodeSourceFile(file: SourceFile): Result<string, DecodeError> {
  if (file.content.includes(0)) {
    return err(
      new DecodeError("File contains NUL bytes and looks binary", { filePath: file.relativePath })
    );
  }

  try {
    return ok(new TextDecoder("utf-8", { fatal: true }).decode(file.content));
  } catch {
    return err(new DecodeError("File is not valid UTF-8 text", { filePath: file.relativePath }));
  }
}

// =============================================================================
// Splitting
// =============================================================================

/**
 * Split on `separator`, keeping it at the start of the following piece,
 * so the pieces concatenate back to `text`.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  const [first = "", ...rest] = text.split(separator);
  return [first, ...rest.map((segment) => separator + segment)].filter((piece) => piece.length > 0);
}

function hardSplit(text: string, maxSize: number): string[] {
  const pieces: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxSize, text.length);
    // Keep surrogate pairs whole unless the pair alone exceeds maxSize
    if (end - 1 > start && splitsSurrogatePair(text, end)) end--;
    pieces.push(text.slice(start, end));
    start = end;
  }
  return pieces;
}

/**
 * Break text into pieces no longer than maxSize
 */
function splitPieces(text: string, separators: readonly string[], maxSize: number): string[] {
  if (text.length <= maxSize) return [text];

  const index = separators.findIndex((separator) => separator === "" || text.includes(separator));
  const separator = separators[index];
  if (separator === undefined || separator === "") {
    return hardSplit(text, maxSize);
  }

  const finer = separators.slice(index + 1);
  const pieces: string[] = [];
  for (const part of splitKeepingSeparator(text, separator)) {
    if (part.length <= maxSize) {
      pieces.push(part);
    } else {
      pieces.push(...splitPieces(part, finer, maxSize));
    }
  }
  return pieces;
}

/**
 * Greedily pack pieces into chunks, carrying up to `overlap` characters of
 * trailing pieces into the next chunk.
 */
function mergePieces(pieces: readonly string[], maxSize: number, overlap: number): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    if (current.length > 0 && total + piece.length > maxSize) {
      chunks.push(current.join(""));
      while (current.length > 0 && (total > overlap || total + piece.length > maxSize)) {
        total -= current.shift()?.length ?? 0;
      }
    }
    current.push(piece);
    total += piece.length;
  }

  if (current.length > 0) {
    chunks.push(current.join(""));
  }
  return chunks;
}

/**
 * Split text into chunks of at most maxSize characters.
 * Text that already fits is returned as a single chunk, even when empty.
 */
export function splitText(
  text: string,
  separators: readonly string[],
  maxSize: number,
  overlap = 0
): string[] {
  if (text.length <= maxSize) return [text];

  return mergePieces(splitPieces(text, separators, maxSize), maxSize, overlap).filter(
    (chunk) => chunk.trim().length > 0
  );
}

// =============================================================================
// Chunker
// =============================================================================

/**
 * Turns source files into chunks.
 *
 * @example
 * ```typescript
 * const chunker = new Chunker({ maxSize: 1000 });
 * const { chunks, diagnostics } = chunker.chunk(files);
 * ```
 */
export class Chunker {
  readonly maxSize: number;
  readonly overlap: number;

  constructor(options: ChunkerOptions = {}) {
    const maxSize = options.maxSize ?? DEFAULT_MAX_CHUNK_SIZE;
    const overlap = options.overlap ?? 0;

    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new ConfigurationError(`maxSize must be a positive integer, got ${maxSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
      throw new ConfigurationError(
        `overlap must be an integer in [0, maxSize), got ${overlap} with maxSize ${maxSize}`
      );
    }

    this.maxSize = maxSize;
    this.overlap = overlap;
  }

  /**
   * Chunk every file. Undecodable files are reported, not thrown.
   */
  chunk(files: readonly SourceFile[]): ChunkingResult {
    const chunks: Chunk[] = [];
    const diagnostics: DecodeError[] = [];

    for (const file of files) {
      const result = this.chunkFile(file);
      if (result.ok) {
        chunks.push(...result.value);
      } else {
        diagnostics.push(result.error);
      }
    }

    return { chunks, diagnostics };
  }

  /**
   * Chunk a single file
   */
  chunkFile(file: SourceFile): Result<Chunk[], DecodeError> {
    const decoded = decodeSourceFile(file);
    if (!decoded.ok) return decoded;

    const name = path.posix.basename(file.relativePath);
    const pieces = splitText(decoded.value, getSeparators(file.language), this.maxSize, this.overlap);

    return ok(
      pieces.map((content, chunkIndex) => ({
        id: `${file.relativePath}#${chunkIndex}`,
        path: file.relativePath,
        name,
        chunkIndex,
        content,
        language: file.language,
      }))
    );
  }
}

/**
 * Create a chunker
 */
export function createChunker(options: ChunkerOptions = {}): Chunker {
  return new Chunker(options);
}
