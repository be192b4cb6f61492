/**
 * Graph Database Module
 *
 * Neo4j-backed storage for code chunks and their relationships.
 *
 * @module
 */

export type {
  IGraphStore,
  QueryResult,
  QueryOptions,
  AccessMode,
  UpdateCounters,
} from "../interfaces/IGraphStore.js";
export { emptyStats } from "../interfaces/IGraphStore.js";

export {
  Neo4jGraphStore,
  createGraphStore,
  toPlainValue,
  classifyStoreError,
} from "./neo4j-graph-store.js";

export * from "./cypher.js";
