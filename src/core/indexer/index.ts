/**
 * Indexer Module
 *
 * Discovers and reads the files of an ingested directory.
 *
 * @module
 */

export * from "./scanner.js";
