/**
 * Graph Builder Module
 *
 * Chunk writes and relationship derivation.
 *
 * @module
 */

export {
  GraphWriter,
  createGraphWriter,
  type WriteReport,
  type DerivationReport,
  type ItemFailure,
  type WriteProgress,
  type GraphWriterOptions,
} from "./graph-writer.js";
