import { describe, it, expect, beforeEach } from "vitest";
import { SchemaIntrospector, renderSchema, stripRelType } from "../schema-introspector.js";
import { InMemoryGraphStore } from "../../__tests__/helpers/in-memory-graph-store.js";
import { NODE_TYPE_PROPERTIES, REL_TYPE_PROPERTIES } from "../../graph/cypher.js";
import { SchemaUnavailableError } from "../../errors.js";
import { emptyStats, type IGraphStore } from "../../interfaces/IGraphStore.js";

describe("stripRelType", () => {
  it("removes the colon and backticks", () => {
    expect(stripRelType(":`SAME_LANGUAGE`")).toBe("SAME_LANGUAGE");
    expect(stripRelType("CALLS")).toBe("CALLS");
  });
});

describe("renderSchema", () => {
  it("marks empty sections", () => {
    expect(renderSchema([{ name: "Doc", properties: [{ name: "title", type: "STRING" }] }], [], [])).toBe(
      ["Node properties:", "Doc {title: STRING}", "Relationship properties:", "(none)", "The relationships:", "(none)"].join(
        "\n"
      )
    );
  });
});

describe("SchemaIntrospector", () => {
  let store: InMemoryGraphStore;
  let introspector: SchemaIntrospector;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    await store.initialize();
    introspector = new SchemaIntrospector(store);
  });

  it("fails on an empty graph before reading relationships", async () => {
    await expect(introspector.describeSchema()).rejects.toBeInstanceOf(SchemaUnavailableError);
    expect(store.statementsMatching(REL_TYPE_PROPERTIES)).toHaveLength(0);
  });

  it("renders chunk nodes and same-language relationships", async () => {
    store.seed({ id: "a.py#0", name: "a.py", path: "a.py", chunkIndex: 0, content: "a", language: "python" });
    store.seed({ id: "b.py#0", name: "b.py", path: "b.py", chunkIndex: 0, content: "b", language: "python" });
    store.edges.add("a.py#0->b.py#0");
    store.edges.add("b.py#0->a.py#0");

    const schema = await introspector.describeSchema();

    expect(schema.text).toBe(
      [
        "Node properties:",
        "CodeChunk {chunkIndex: INTEGER, content: STRING, id: STRING, language: STRING, name: STRING, path: STRING}",
        "Relationship properties:",
        "(none)",
        "The relationships:",
        "(:CodeChunk)-[:SAME_LANGUAGE]->(:CodeChunk)",
      ].join("\n")
    );
    expect(schema.patterns).toEqual([{ source: "CodeChunk", type: "SAME_LANGUAGE", target: "CodeChunk" }]);
  });

  it("reads in read mode", async () => {
    store.seed({ id: "a.py#0", name: "a.py", path: "a.py", chunkIndex: 0, content: "a", language: "python" });
    await introspector.describeSchema();

    expect(store.statementsMatching(NODE_TYPE_PROPERTIES)[0]?.options.accessMode).toBe("read");
  });

  it("merges property types and sorts labels", async () => {
    const rows = [
      { nodeLabels: ["Module"], propertyName: "size", propertyTypes: ["Long", "Double"] },
      { nodeLabels: ["File"], propertyName: "path", propertyTypes: ["String"] },
      { nodeLabels: ["File"], propertyName: "flags", propertyTypes: [] },
    ];
    const stub: IGraphStore = {
      isReady: true,
      initialize: async () => undefined,
      close: async () => undefined,
      query: async (statement) => ({
        rows: statement === NODE_TYPE_PROPERTIES ? rows : [],
        columns: [],
        stats: emptyStats(),
      }),
    };
    const introspectorOverRows = new SchemaIntrospector(stub);

    const schema = await introspectorOverRows.describeSchema();

    expect(schema.nodes).toEqual([
      {
        name: "File",
        properties: [
          { name: "flags", type: "ANY" },
          { name: "path", type: "STRING" },
        ],
      },
      { name: "Module", properties: [{ name: "size", type: "INTEGER | FLOAT" }] },
    ]);
  });
});
