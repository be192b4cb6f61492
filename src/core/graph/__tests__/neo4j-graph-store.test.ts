/**
 * Neo4j adapter tests that need no server: value conversion, error
 * classification and configuration checks.
 */

import { describe, it, expect } from "vitest";
import neo4j, { Node } from "neo4j-driver";
import { Neo4jGraphStore, classifyStoreError, toPlainValue } from "../neo4j-graph-store.js";
import {
  ConfigurationError,
  StoreQueryRejectedError,
  StoreUnavailableError,
} from "../../errors.js";

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("toPlainValue", () => {
  it("converts integers in the safe range to numbers", () => {
    expect(toPlainValue(neo4j.int(42))).toBe(42);
  });

  it("keeps unsafe integers as decimal strings", () => {
    expect(toPlainValue(neo4j.int("9007199254740993"))).toBe("9007199254740993");
  });

  it("flattens nodes to their properties", () => {
    const node = new Node(neo4j.int(7), ["CodeChunk"], {
      name: "a.py",
      chunkIndex: neo4j.int(0),
    });
    expect(toPlainValue(node)).toEqual({ name: "a.py", chunkIndex: 0 });
  });

  it("converts nested lists and maps", () => {
    expect(toPlainValue({ counts: [neo4j.int(1), neo4j.int(2)], label: "x", missing: null })).toEqual({
      counts: [1, 2],
      label: "x",
      missing: null,
    });
  });

  it("passes primitives through", () => {
    expect(toPlainValue("text")).toBe("text");
    expect(toPlainValue(true)).toBe(true);
    expect(toPlainValue(undefined)).toBeNull();
  });
});

describe("classifyStoreError", () => {
  it("treats connection failures as unavailable", () => {
    const error = classifyStoreError(driverError("Could not perform discovery", "ServiceUnavailable"));
    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error.message).toBe("Could not perform discovery");
  });

  it("treats statement failures as rejections", () => {
    const error = classifyStoreError(
      driverError("Invalid input 'RETRN'", "Neo.ClientError.Statement.SyntaxError"),
      "MATCH (c) RETRN c"
    );
    expect(error).toBeInstanceOf(StoreQueryRejectedError);
    if (error instanceof StoreQueryRejectedError) {
      expect(error.statement).toBe("MATCH (c) RETRN c");
      expect(error.storeCode).toBe("Neo.ClientError.Statement.SyntaxError");
    }
  });

  it("keeps errors that are already classified", () => {
    const original = new StoreUnavailableError("down");
    expect(classifyStoreError(original)).toBe(original);
  });
});

describe("Neo4jGraphStore", () => {
  it("requires a password", () => {
    expect(
      () =>
        new Neo4jGraphStore({
          uri: "bolt://localhost:7687",
          username: "neo4j",
          maxConnectionPoolSize: 1,
          connectionTimeoutMs: 1000,
        })
    ).toThrow(ConfigurationError);
  });
});
