/**
 * Query Executor
 *
 * Runs a validated query against the graph store in read mode.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { Row } from "../../types/index.js";
import type { StructuredQuery } from "./cypher-parser.js";
import {
  QueryCancelledError,
  StoreQueryRejectedError,
  StoreUnavailableError,
  errorMessage,
} from "../errors.js";
import { ok, err, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("query-executor");

export type ExecutionError = StoreQueryRejectedError | StoreUnavailableError | QueryCancelledError;

export interface QueryExecutorOptions {
  /** Row cap appended to queries without their own LIMIT (default: 100) */
  maxRows?: number;
}

export class QueryExecutor {
  private store: IGraphStore;
  private maxRows: number;

  constructor(store: IGraphStore, options: QueryExecutorOptions = {}) {
    this.store = store;
    this.maxRows = options.maxRows ?? 100;
  }

  /**
   * The statement as sent: a LIMIT is appended when the query has none
   */
  boundedStatement(query: StructuredQuery): string {
    if (query.limited || query.union) return query.statement;
    return `${query.statement}\nLIMIT ${this.maxRows}`;
  }

  /**
   * Execute once. An empty row list is a valid outcome, not an error.
   */
  async execute(
    query: StructuredQuery,
    options: { signal?: AbortSignal } = {}
  ): Promise<Result<Row[], ExecutionError>> {
    const statement = this.boundedStatement(query);

    try {
      const result = await this.store.query(statement, {}, {
        accessMode: "read",
        signal: options.signal,
      });
      logger.debug(
        { rows: result.rows.length, executionTimeMs: result.stats.executionTimeMs },
        "Query executed"
      );
      return ok(result.rows);
    } catch (error) {
      if (
        error instanceof StoreQueryRejectedError ||
        error instanceof StoreUnavailableError ||
        error instanceof QueryCancelledError
      ) {
        return err(error);
      }
      return err(new StoreQueryRejectedError(errorMessage(error), { statement }));
    }
  }
}

export function createQueryExecutor(
  store: IGraphStore,
  options: QueryExecutorOptions = {}
): QueryExecutor {
  return new QueryExecutor(store, options);
}
