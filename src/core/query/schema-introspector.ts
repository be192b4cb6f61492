/**
 * Schema Introspector
 *
 * Reads the graph's current labels, relationship types and property types
 * and renders them as the text block the query translator grounds on.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { Row } from "../../types/index.js";
import {
  NODE_TYPE_PROPERTIES,
  REL_TYPE_PROPERTIES,
  RELATIONSHIP_PATTERNS,
} from "../graph/cypher.js";
import { SchemaUnavailableError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Property shape of one node label or relationship type
 */
export interface TypeProperties {
  name: string;
  /** Property name -> rendered type, sorted by property name */
  properties: Array<{ name: string; type: string }>;
}

export interface RelationshipPattern {
  source: string;
  type: string;
  target: string;
}

/**
 * Structured schema plus its rendered text
 */
export interface GraphSchema {
  nodes: TypeProperties[];
  relationships: TypeProperties[];
  patterns: RelationshipPattern[];
  text: string;
}

const TYPE_NAMES: Readonly<Record<string, string>> = {
  Long: "INTEGER",
  Double: "FLOAT",
};

function byKey<T>([a]: [string, T], [b]: [string, T]): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function renderType(propertyTypes: unknown): string {
  if (!isStringArray(propertyTypes) || propertyTypes.length === 0) return "ANY";
  return propertyTypes.map((type) => TYPE_NAMES[type] ?? type.toUpperCase()).join(" | ");
}

/**
 * ":`SAME_LANGUAGE`" -> "SAME_LANGUAGE"
 */
export function stripRelType(relType: string): string {
  return relType.replace(/^:/, "").replace(/^`(.*)`$/, "$1");
}

function collectProperties(
  rows: readonly Row[],
  nameOf: (row: Row) => string | undefined
): TypeProperties[] {
  const byName = new Map<string, Map<string, string>>();

  for (const row of rows) {
    const name = nameOf(row);
    const propertyName = row.propertyName;
    if (name === undefined || typeof propertyName !== "string") continue;

    const properties = byName.get(name) ?? new Map<string, string>();
    properties.set(propertyName, renderType(row.propertyTypes));
    byName.set(name, properties);
  }

  return [...byName.entries()]
    .sort(byKey)
    .map(([name, properties]) => ({
      name,
      properties: [...properties.entries()]
        .sort(byKey)
        .map(([propertyName, type]) => ({ name: propertyName, type })),
    }));
}

function renderProperties(types: readonly TypeProperties[]): string[] {
  if (types.length === 0) return ["(none)"];
  return types.map(
    (type) =>
      `${type.name} {${type.properties.map((property) => `${property.name}: ${property.type}`).join(", ")}}`
  );
}

/**
 * Render a schema as the translator's grounding text
 */
export function renderSchema(
  nodes: readonly TypeProperties[],
  relationships: readonly TypeProperties[],
  patterns: readonly RelationshipPattern[]
): string {
  const patternLines =
    patterns.length === 0
      ? ["(none)"]
      : patterns.map((pattern) => `(:${pattern.source})-[:${pattern.type}]->(:${pattern.target})`);

  return [
    "Node properties:",
    ...renderProperties(nodes),
    "Relationship properties:",
    ...renderProperties(relationships),
    "The relationships:",
    ...patternLines,
  ].join("\n");
}

// =============================================================================
// Schema Introspector
// =============================================================================

export class SchemaIntrospector {
  private store: IGraphStore;

  constructor(store: IGraphStore) {
    this.store = store;
  }

  /**
   * Describe the graph as it is now
   *
   * @throws SchemaUnavailableError when no label carries any property
   */
  async describeSchema(options: { signal?: AbortSignal } = {}): Promise<GraphSchema> {
    const queryOptions = { accessMode: "read" as const, signal: options.signal };

    const nodeRows = await this.store.query(NODE_TYPE_PROPERTIES, {}, queryOptions);
    const nodes = collectProperties(nodeRows.rows, (row) =>
      isStringArray(row.nodeLabels) && row.nodeLabels.length > 0
        ? row.nodeLabels.join(":")
        : undefined
    );
    if (nodes.length === 0) {
      throw new SchemaUnavailableError();
    }

    const relRows = await this.store.query(REL_TYPE_PROPERTIES, {}, queryOptions);
    const relationships = collectProperties(relRows.rows, (row) =>
      typeof row.relType === "string" ? stripRelType(row.relType) : undefined
    );

    const patternRows = await this.store.query(RELATIONSHIP_PATTERNS, {}, queryOptions);
    const patterns = this.collectPatterns(patternRows.rows);

    return {
      nodes,
      relationships,
      patterns,
      text: renderSchema(nodes, relationships, patterns),
    };
  }

  private collectPatterns(rows: readonly Row[]): RelationshipPattern[] {
    const seen = new Map<string, RelationshipPattern>();
    for (const row of rows) {
      const { source, relType, target } = row;
      if (!isStringArray(source) || !isStringArray(target) || typeof relType !== "string") continue;

      const pattern = { source: source.join(":"), type: relType, target: target.join(":") };
      seen.set(`${pattern.source}|${pattern.type}|${pattern.target}`, pattern);
    }
    return [...seen.entries()]
      .sort(byKey)
      .map(([, pattern]) => pattern);
  }
}

export function createSchemaIntrospector(store: IGraphStore): SchemaIntrospector {
  return new SchemaIntrospector(store);
}
