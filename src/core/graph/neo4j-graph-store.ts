/**
 * Neo4j Graph Store Adapter
 *
 * Implements the IGraphStore interface over the official neo4j-driver.
 * Every statement runs in its own session; driver values are converted to
 * plain JSON values before rows leave the adapter.
 *
 * @module
 */

import neo4j, { Integer, Node, Path, Relationship, type Driver } from "neo4j-driver";
import type {
  IGraphStore,
  QueryOptions,
  QueryResult,
} from "../interfaces/IGraphStore.js";
import type { Row } from "../../types/index.js";
import type { Neo4jConfig } from "../../utils/validation.js";
import {
  ConfigurationError,
  StoreQueryRejectedError,
  StoreUnavailableError,
  errorMessage,
  isChunkGraphError,
} from "../errors.js";
import { abortable, throwIfAborted } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("neo4j-graph-store");

/** Driver error codes that mean the server could not be used at all */
const UNAVAILABLE_CODES = new Set(["ServiceUnavailable", "SessionExpired"]);

// =============================================================================
// Value Conversion
// =============================================================================

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a driver value to a plain JSON value.
 *
 * Integers become numbers, or decimal strings outside the safe range.
 * Nodes become their property maps. Temporal and spatial values become
 * their ISO string form.
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value !== "object") return value;

  if (value instanceof Integer) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (value instanceof Node) {
    return toPlainValue(value.properties);
  }
  if (value instanceof Relationship) {
    return { type: value.type, properties: toPlainValue(value.properties) };
  }
  if (value instanceof Path) {
    return {
      nodes: [value.start, ...value.segments.map((segment) => segment.end)].map(toPlainValue),
      relationships: value.segments.map((segment) => toPlainValue(segment.relationship)),
    };
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toPlainValue(entry);
    }
    return result;
  }
  return String(value);
}

// =============================================================================
// Error Classification
// =============================================================================

function storeErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a driver failure onto the pipeline's error taxonomy.
 * Connection failures are "unavailable"; everything else is a rejection.
 */
export function classifyStoreError(
  error: unknown,
  statement?: string
): StoreUnavailableError | StoreQueryRejectedError {
  if (error instanceof StoreUnavailableError || error instanceof StoreQueryRejectedError) {
    return error;
  }

  const storeCode = storeErrorCode(error);
  const message = errorMessage(error);

  if (storeCode !== undefined && UNAVAILABLE_CODES.has(storeCode)) {
    return new StoreUnavailableError(message, { storeCode });
  }
  return new StoreQueryRejectedError(message, { statement, storeCode });
}

// =============================================================================
// Neo4jGraphStore Implementation
// =============================================================================

/**
 * Neo4j implementation of IGraphStore.
 *
 * @example
 * ```typescript
 * const store = new Neo4jGraphStore({
 *   uri: "bolt://localhost:7687",
 *   username: "neo4j",
 *   password: process.env.NEO4J_PASSWORD,
 * });
 * await store.initialize();
 *
 * const { rows } = await store.query("MATCH (c:CodeChunk) RETURN c.name AS name");
 *
 * await store.close();
 * ```
 */
export class Neo4jGraphStore implements IGraphStore {
  private driver: Driver;
  private database?: string;
  private initialized = false;

  constructor(config: Neo4jConfig) {
    if (!config.password) {
      throw new ConfigurationError(
        "Neo4j password is not set. Provide NEO4J_PASSWORD or neo4j.password in the config file."
      );
    }

    this.database = config.database;
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
      maxConnectionPoolSize: config.maxConnectionPoolSize,
      connectionTimeout: config.connectionTimeoutMs,
    });
  }

  get isReady(): boolean {
    return this.initialized;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await this.driver.verifyConnectivity({ database: this.database });
    } catch (error) {
      throw new StoreUnavailableError(`Cannot connect to Neo4j: ${errorMessage(error)}`, {
        storeCode: storeErrorCode(error),
      });
    }

    this.initialized = true;
    logger.debug({ database: this.database ?? "(default)" }, "Connected to Neo4j");
  }

  async close(): Promise<void> {
    await this.driver.close();
    this.initialized = false;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async query(
    statement: string,
    params: Record<string, unknown> = {},
    options: QueryOptions = {}
  ): Promise<QueryResult> {
    const { accessMode = "write", signal } = options;
    throwIfAborted(signal);

    const startTime = Date.now();
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: accessMode === "read" ? neo4j.session.READ : neo4j.session.WRITE,
    });

    try {
      const result = await abortable(session.run(statement, params), signal);
      const updates = result.summary.counters.updates();
      const columns = result.records[0]?.keys.map(String) ?? [];
      const rows = result.records.map((record) => {
        const row: Row = {};
        for (const key of record.keys) {
          row[String(key)] = toPlainValue(record.get(key));
        }
        return row;
      });

      const executionTimeMs = Date.now() - startTime;
      logger.debug({ rows: rows.length, executionTimeMs }, "Statement completed");

      return {
        rows,
        columns,
        stats: {
          rowsAffected: rows.length,
          executionTimeMs,
          nodesCreated: updates.nodesCreated ?? 0,
          nodesDeleted: updates.nodesDeleted ?? 0,
          relationshipsCreated: updates.relationshipsCreated ?? 0,
          relationshipsDeleted: updates.relationshipsDeleted ?? 0,
          propertiesSet: updates.propertiesSet ?? 0,
        },
      };
    } catch (error) {
      if (isChunkGraphError(error)) throw error;
      throw classifyStoreError(error, statement);
    } finally {
      const closing = session.close();
      if (signal?.aborted) {
        // The server finishes the statement on its own; don't hold the caller
        closing.catch((error: unknown) => {
          logger.debug({ err: error }, "Session close after cancel failed");
        });
      } else {
        await closing;
      }
    }
  }
}

/**
 * Create a graph store from configuration.
 *
 * @throws ConfigurationError when no password is configured
 */
export function createGraphStore(config: Neo4jConfig): IGraphStore {
  return new Neo4jGraphStore(config);
}
