/**
 * Shared types for chunkgraph
 */

// =============================================================================
// Languages
// =============================================================================

export const LANGUAGES = [
  "python",
  "javascript",
  "typescript",
  "go",
  "java",
  "rust",
  "markdown",
  "html",
  "unknown",
] as const;

/**
 * Language tag carried by source files, chunks and graph nodes
 */
export type Language = (typeof LANGUAGES)[number];

// =============================================================================
// Ingestion Entities
// =============================================================================

/**
 * A file read from the ingested directory. Discarded after chunking.
 */
export interface SourceFile {
  /** Absolute path on disk */
  absolutePath: string;
  /** Path relative to the ingested directory, forward slashes */
  relativePath: string;
  /** Raw bytes as read */
  content: Uint8Array;
  /** Detected from the file extension */
  language: Language;
}

/**
 * A bounded slice of one source file's text
 */
export interface Chunk {
  /** Unique key: `<relativePath>#<chunkIndex>` */
  id: string;
  /** Relative path of the source file */
  path: string;
  /** File basename, for display only */
  name: string;
  /** Position within the file, from 0 */
  chunkIndex: number;
  content: string;
  language: Language;
}

// =============================================================================
// Query Rows
// =============================================================================

/**
 * One result row from the graph store, keyed by output column
 */
export type Row = Record<string, unknown>;
