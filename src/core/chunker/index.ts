/**
 * Chunker Module
 *
 * @module
 */

export {
  Chunker,
  createChunker,
  decodeSourceFile,
  splitText,
  DEFAULT_MAX_CHUNK_SIZE,
  type ChunkerOptions,
  type ChunkingResult,
} from "./chunker.js";
export { detectLanguage, getSeparators } from "./languages.js";
