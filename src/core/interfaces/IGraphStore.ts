/**
 * IGraphStore - Abstract graph database interface
 *
 * The pipeline talks to the graph only through Cypher statements. Adapters
 * convert driver values to plain JSON values before returning rows.
 *
 * @module
 */

import type { Row } from "../../types/index.js";

/**
 * Update counters reported by the store for a write statement.
 */
export interface UpdateCounters {
  nodesCreated: number;
  nodesDeleted: number;
  relationshipsCreated: number;
  relationshipsDeleted: number;
  propertiesSet: number;
}

/**
 * Query result from the graph store.
 */
export interface QueryResult {
  /** Result rows, keyed by output column */
  rows: Row[];
  /** Output columns in projection order */
  columns: string[];
  /** Query execution statistics */
  stats: UpdateCounters & {
    rowsAffected: number;
    executionTimeMs: number;
  };
}

export type AccessMode = "read" | "write";

export interface QueryOptions {
  /** Routing and permission hint (default: "write") */
  accessMode?: AccessMode;
  /** Stops waiting for the result; rejects with QueryCancelledError */
  signal?: AbortSignal;
}

/**
 * Graph store interface - abstracts over the Neo4j implementation.
 *
 * @example
 * ```typescript
 * const store = createGraphStore(config.neo4j);
 * await store.initialize();
 *
 * const result = await store.query(
 *   "MATCH (c:CodeChunk) RETURN count(c) AS total",
 *   {},
 *   { accessMode: "read" }
 * );
 *
 * await store.close();
 * ```
 */
export interface IGraphStore {
  /**
   * Connect and verify connectivity
   *
   * @throws StoreUnavailableError when the server cannot be reached
   */
  initialize(): Promise<void>;

  /**
   * Run one Cypher statement in its own session
   *
   * @throws StoreUnavailableError on connection failures
   * @throws StoreQueryRejectedError when the server refuses the statement
   * @throws QueryCancelledError when `options.signal` fires first
   */
  query(
    statement: string,
    params?: Record<string, unknown>,
    options?: QueryOptions
  ): Promise<QueryResult>;

  /**
   * Close all connections
   */
  close(): Promise<void>;

  /**
   * Whether the store is initialized and ready
   */
  readonly isReady: boolean;
}

/**
 * Zeroed statistics, for stores that report no counters
 */
export function emptyStats(executionTimeMs = 0): QueryResult["stats"] {
  return {
    rowsAffected: 0,
    executionTimeMs,
    nodesCreated: 0,
    nodesDeleted: 0,
    relationshipsCreated: 0,
    relationshipsDeleted: 0,
    propertiesSet: 0,
  };
}
