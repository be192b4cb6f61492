/**
 * Cypher statements used by the writer and the schema introspector.
 *
 * @module
 */

export const CHUNK_LABEL = "CodeChunk";
export const SAME_LANGUAGE = "SAME_LANGUAGE";

// =============================================================================
// Schema
// =============================================================================

export const CREATE_CHUNK_ID_CONSTRAINT = `CREATE CONSTRAINT code_chunk_id IF NOT EXISTS
FOR (c:CodeChunk) REQUIRE c.id IS UNIQUE`;

// =============================================================================
// Chunk Writes
// =============================================================================

/**
 * Merge one chunk by id. `unchanged` holds only when content and language
 * were already stored as given and the chunk is linked both ways to every
 * same-language peer; anything else sends it through derivation again.
 */
export const UPSERT_CHUNK = `OPTIONAL MATCH (existing:CodeChunk {id: $id})
WITH coalesce(
  existing.content = $content
    AND existing.language = $language
    AND NOT EXISTS {
      MATCH (peer:CodeChunk {language: $language})
      WHERE peer.id <> $id
        AND NOT ((existing)-[:SAME_LANGUAGE]->(peer) AND (peer)-[:SAME_LANGUAGE]->(existing))
    },
  false
) AS unchanged
MERGE (c:CodeChunk {id: $id})
SET c.name = $name,
    c.path = $path,
    c.chunkIndex = toInteger($chunkIndex),
    c.content = $content,
    c.language = $language
RETURN unchanged`;

/** Drop chunks a shrunken file no longer produces */
export const PRUNE_STALE_CHUNKS = `MATCH (c:CodeChunk {path: $path})
WHERE c.chunkIndex >= $chunkCount
DETACH DELETE c`;

/** Drop chunks of files the latest scan no longer returns */
export const PRUNE_MISSING_FILES = `MATCH (c:CodeChunk)
WHERE NOT c.path IN $paths
DETACH DELETE c`;

// =============================================================================
// Relationship Derivation
// =============================================================================

export const DELETE_FOREIGN_LANGUAGE_EDGES = `MATCH (c:CodeChunk {id: $id})-[r:SAME_LANGUAGE]-(other:CodeChunk)
WHERE other.language <> c.language
DELETE r`;

export const LINK_SAME_LANGUAGE = `MATCH (c:CodeChunk {id: $id})
MATCH (peer:CodeChunk {language: c.language})
WHERE peer.id <> c.id
MERGE (c)-[:SAME_LANGUAGE]->(peer)
MERGE (peer)-[:SAME_LANGUAGE]->(c)`;

export const DELETE_ALL_FOREIGN_LANGUAGE_EDGES = `MATCH (a:CodeChunk)-[r:SAME_LANGUAGE]->(b:CodeChunk)
WHERE a.language <> b.language
DELETE r`;

export const LINK_ALL_SAME_LANGUAGE = `MATCH (a:CodeChunk), (b:CodeChunk)
WHERE a.language = b.language AND a.id <> b.id
MERGE (a)-[:SAME_LANGUAGE]->(b)`;

// =============================================================================
// Statistics
// =============================================================================

export const COUNT_CHUNKS = `MATCH (c:CodeChunk) RETURN count(c) AS total`;

export const COUNT_SAME_LANGUAGE_EDGES = `MATCH (:CodeChunk)-[r:SAME_LANGUAGE]->(:CodeChunk)
RETURN count(r) AS total`;

// =============================================================================
// Introspection
// =============================================================================

export const NODE_TYPE_PROPERTIES = `CALL db.schema.nodeTypeProperties()
YIELD nodeLabels, propertyName, propertyTypes
RETURN nodeLabels, propertyName, propertyTypes`;

export const REL_TYPE_PROPERTIES = `CALL db.schema.relTypeProperties()
YIELD relType, propertyName, propertyTypes
RETURN relType, propertyName, propertyTypes`;

export const RELATIONSHIP_PATTERNS = `MATCH (a)-[r]->(b)
WITH DISTINCT labels(a) AS source, type(r) AS relType, labels(b) AS target
RETURN source, relType, target`;
