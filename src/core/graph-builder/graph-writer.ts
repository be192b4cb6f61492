/**
 * Graph Writer
 *
 * Persists chunks as CodeChunk nodes and derives SAME_LANGUAGE
 * relationships between them. Node writes and relationship derivation are
 * separate phases; the caller runs derivation only after every write has
 * settled.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { Chunk } from "../../types/index.js";
import {
  COUNT_CHUNKS,
  COUNT_SAME_LANGUAGE_EDGES,
  CREATE_CHUNK_ID_CONSTRAINT,
  DELETE_ALL_FOREIGN_LANGUAGE_EDGES,
  DELETE_FOREIGN_LANGUAGE_EDGES,
  LINK_ALL_SAME_LANGUAGE,
  LINK_SAME_LANGUAGE,
  PRUNE_MISSING_FILES,
  PRUNE_STALE_CHUNKS,
  UPSERT_CHUNK,
} from "../graph/cypher.js";
import { errorMessage } from "../errors.js";
import { mapConcurrent } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("graph-writer");

// =============================================================================
// Types
// =============================================================================

/**
 * A single item that could not be written.
 */
export interface ItemFailure {
  /** Chunk id, or the file path for file-level steps */
  id: string;
  error: string;
}

/**
 * Result of writing a batch of chunks.
 */
export interface WriteReport {
  /** Whether every chunk and every prune succeeded */
  success: boolean;
  nodesUpserted: number;
  /** Upserts that found identical content and language already stored */
  nodesUnchanged: number;
  /** Stale tail chunks removed after files shrank */
  nodesPruned: number;
  /** Ids of chunks that are new or whose content or language changed */
  changedChunkIds: string[];
  failures: ItemFailure[];
  durationMs: number;
}

/**
 * Result of deriving SAME_LANGUAGE relationships.
 */
export interface DerivationReport {
  success: boolean;
  /** Chunks whose relationships were re-evaluated (0 for a full pass) */
  chunksProcessed: number;
  /** Directed relationships created */
  edgesDerived: number;
  /** Directed relationships removed after a language change */
  edgesRemoved: number;
  failures: ItemFailure[];
  durationMs: number;
}

export interface GraphWriterOptions {
  /** Files written in parallel (default: 4) */
  concurrency?: number;
}

export interface WriteProgress {
  filesWritten: number;
  totalFiles: number;
  path: string;
}

interface FileWriteOutcome {
  upserted: number;
  unchanged: number;
  pruned: number;
  changedChunkIds: string[];
  failures: ItemFailure[];
}

function readCount(row: Record<string, unknown> | undefined, column: string): number {
  const value = row?.[column];
  if (typeof value === "number") return value;
  if (typeof value === "string") return Number(value);
  return 0;
}

// =============================================================================
// GraphWriter Implementation
// =============================================================================

/**
 * Writes chunks to the graph database.
 *
 * @example
 * ```typescript
 * const writer = new GraphWriter(store, { concurrency: 4 });
 * await writer.prepare();
 *
 * const report = await writer.write(chunks);
 * await writer.deriveRelationships(report.changedChunkIds);
 * ```
 */
export class GraphWriter {
  private store: IGraphStore;
  private concurrency: number;

  constructor(store: IGraphStore, options: GraphWriterOptions = {}) {
    this.store = store;
    this.concurrency = options.concurrency ?? 4;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Create the uniqueness constraint on chunk ids. Safe to call repeatedly.
   */
  async prepare(): Promise<void> {
    await this.store.query(CREATE_CHUNK_ID_CONSTRAINT);
  }

  /**
   * Upsert every chunk. Files are written in parallel, chunks of one file in
   * order. A failed chunk is recorded and the batch continues.
   */
  async write(
    chunks: readonly Chunk[],
    onProgress?: (progress: WriteProgress) => void
  ): Promise<WriteReport> {
    const startTime = Date.now();
    const files = this.groupByPath(chunks);

    let filesWritten = 0;
    const outcomes = await mapConcurrent(
      files,
      async ([path, fileChunks]) => {
        const outcome = await this.writeFile(path, fileChunks);
        filesWritten++;
        onProgress?.({ filesWritten, totalFiles: files.length, path });
        return outcome;
      },
      this.concurrency
    );

    const report: WriteReport = {
      success: true,
      nodesUpserted: 0,
      nodesUnchanged: 0,
      nodesPruned: 0,
      changedChunkIds: [],
      failures: [],
      durationMs: 0,
    };
    for (const outcome of outcomes) {
      report.nodesUpserted += outcome.upserted;
      report.nodesUnchanged += outcome.unchanged;
      report.nodesPruned += outcome.pruned;
      report.changedChunkIds.push(...outcome.changedChunkIds);
      report.failures.push(...outcome.failures);
    }
    report.success = report.failures.length === 0;
    report.durationMs = Date.now() - startTime;

    logger.debug(
      {
        files: files.length,
        upserted: report.nodesUpserted,
        changed: report.changedChunkIds.length,
        failures: report.failures.length,
      },
      "Chunks written"
    );
    return report;
  }

  /**
   * Delete every chunk whose file is not in `paths`, with its relationships.
   *
   * @returns Nodes deleted
   */
  async pruneMissingFiles(paths: readonly string[]): Promise<number> {
    const result = await this.store.query(PRUNE_MISSING_FILES, { paths: [...paths] });
    if (result.stats.nodesDeleted > 0) {
      logger.debug({ nodesDeleted: result.stats.nodesDeleted }, "Removed chunks of missing files");
    }
    return result.stats.nodesDeleted;
  }

  /**
   * Ensure SAME_LANGUAGE relationships in both directions between chunks of
   * equal language.
   *
   * With ids, only those chunks are re-evaluated: edges to chunks of another
   * language are removed, then edges to every peer are merged. Without ids,
   * every pair in the graph is evaluated.
   */
  async deriveRelationships(chunkIds?: readonly string[]): Promise<DerivationReport> {
    const startTime = Date.now();
    const report: DerivationReport = {
      success: true,
      chunksProcessed: 0,
      edgesDerived: 0,
      edgesRemoved: 0,
      failures: [],
      durationMs: 0,
    };

    if (chunkIds === undefined) {
      try {
        const removed = await this.store.query(DELETE_ALL_FOREIGN_LANGUAGE_EDGES);
        const linked = await this.store.query(LINK_ALL_SAME_LANGUAGE);
        report.edgesRemoved = removed.stats.relationshipsDeleted;
        report.edgesDerived = linked.stats.relationshipsCreated;
      } catch (error) {
        report.failures.push({ id: "*", error: errorMessage(error) });
      }
    } else {
      // One statement at a time: concurrent MERGEs on the same pair would race
      for (const id of chunkIds) {
        try {
          const removed = await this.store.query(DELETE_FOREIGN_LANGUAGE_EDGES, { id });
          const linked = await this.store.query(LINK_SAME_LANGUAGE, { id });
          report.edgesRemoved += removed.stats.relationshipsDeleted;
          report.edgesDerived += linked.stats.relationshipsCreated;
          report.chunksProcessed++;
        } catch (error) {
          logger.warn({ err: error, chunkId: id }, "Relationship derivation failed");
          report.failures.push({ id, error: errorMessage(error) });
        }
      }
    }

    report.success = report.failures.length === 0;
    report.durationMs = Date.now() - startTime;
    return report;
  }

  /**
   * Number of CodeChunk nodes
   */
  async countNodes(): Promise<number> {
    const result = await this.store.query(COUNT_CHUNKS, {}, { accessMode: "read" });
    return readCount(result.rows[0], "total");
  }

  /**
   * Number of directed SAME_LANGUAGE relationships
   */
  async countEdges(): Promise<number> {
    const result = await this.store.query(COUNT_SAME_LANGUAGE_EDGES, {}, { accessMode: "read" });
    return readCount(result.rows[0], "total");
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private groupByPath(chunks: readonly Chunk[]): Array<[string, Chunk[]]> {
    const files = new Map<string, Chunk[]>();
    for (const chunk of chunks) {
      const existing = files.get(chunk.path);
      if (existing) {
        existing.push(chunk);
      } else {
        files.set(chunk.path, [chunk]);
      }
    }
    return [...files.entries()];
  }

  private async writeFile(path: string, chunks: readonly Chunk[]): Promise<FileWriteOutcome> {
    const outcome: FileWriteOutcome = {
      upserted: 0,
      unchanged: 0,
      pruned: 0,
      changedChunkIds: [],
      failures: [],
    };

    for (const chunk of chunks) {
      try {
        const result = await this.store.query(UPSERT_CHUNK, {
          id: chunk.id,
          name: chunk.name,
          path: chunk.path,
          chunkIndex: chunk.chunkIndex,
          content: chunk.content,
          language: chunk.language,
        });
        outcome.upserted++;
        if (result.rows[0]?.unchanged === true) {
          outcome.unchanged++;
        } else {
          outcome.changedChunkIds.push(chunk.id);
        }
      } catch (error) {
        logger.warn({ err: error, chunkId: chunk.id }, "Chunk upsert failed");
        outcome.failures.push({ id: chunk.id, error: errorMessage(error) });
      }
    }

    // Prune only once every chunk of the file is written
    if (outcome.failures.length > 0) return outcome;

    try {
      const result = await this.store.query(PRUNE_STALE_CHUNKS, {
        path,
        chunkCount: chunks.length,
      });
      outcome.pruned = result.stats.nodesDeleted;
    } catch (error) {
      logger.warn({ err: error, path }, "Pruning stale chunks failed");
      outcome.failures.push({ id: path, error: errorMessage(error) });
    }
    return outcome;
  }
}

/**
 * Create a graph writer
 */
export function createGraphWriter(store: IGraphStore, options: GraphWriterOptions = {}): GraphWriter {
  return new GraphWriter(store, options);
}
