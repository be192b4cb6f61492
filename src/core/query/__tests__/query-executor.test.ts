import { describe, it, expect, beforeEach } from "vitest";
import { QueryExecutor } from "../query-executor.js";
import { parseCypherQuery, type StructuredQuery } from "../cypher-parser.js";
import { unwrap } from "../../../types/result.js";
import { InMemoryGraphStore } from "../../__tests__/helpers/in-memory-graph-store.js";
import {
  QueryCancelledError,
  StoreQueryRejectedError,
  StoreUnavailableError,
} from "../../errors.js";

function structured(text: string): StructuredQuery {
  return unwrap(parseCypherQuery(text));
}

describe("QueryExecutor", () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    await store.initialize();
  });

  it("appends a row cap to unbounded queries", () => {
    const executor = new QueryExecutor(store, { maxRows: 25 });
    expect(executor.boundedStatement(structured("MATCH (c:CodeChunk) RETURN c.content AS content"))).toBe(
      "MATCH (c:CodeChunk) RETURN c.content AS content\nLIMIT 25"
    );
  });

  it("keeps a query's own LIMIT", () => {
    const executor = new QueryExecutor(store);
    const query = structured("MATCH (c:CodeChunk) RETURN c.content AS content LIMIT 3");
    expect(executor.boundedStatement(query)).toBe(query.statement);
  });

  it("leaves UNION queries alone", () => {
    const executor = new QueryExecutor(store);
    const query = structured(
      "MATCH (c:CodeChunk) RETURN c.content AS content UNION MATCH (d:CodeChunk) RETURN d.content AS content"
    );
    expect(executor.boundedStatement(query)).toBe(query.statement);
  });

  it("returns rows in read mode", async () => {
    store.fallback = () => [{ content: "def f(): pass" }];
    const executor = new QueryExecutor(store);

    const result = await executor.execute(structured("MATCH (c:CodeChunk) RETURN c.content AS content"));

    expect(result).toEqual({ ok: true, value: [{ content: "def f(): pass" }] });
    expect(store.statements[0]?.options.accessMode).toBe("read");
    expect(store.statements[0]?.statement).toBe("MATCH (c:CodeChunk) RETURN c.content AS content\nLIMIT 100");
  });

  it("treats no rows as a result, not an error", async () => {
    store.fallback = () => [];
    const result = await new QueryExecutor(store).execute(structured("MATCH (c:CodeChunk) RETURN c.content AS content"));
    expect(result).toEqual({ ok: true, value: [] });
  });

  it("returns store rejections as errors", async () => {
    const result = await new QueryExecutor(store).execute(structured("MATCH (c:Missing) RETURN c.content AS content"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StoreQueryRejectedError);
    }
  });

  it("returns connection failures as errors", async () => {
    store.failWhen(() => true, new StoreUnavailableError("connection refused"));
    const result = await new QueryExecutor(store).execute(structured("MATCH (c) RETURN c.content AS content"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StoreUnavailableError);
      expect(result.error.message).toBe("connection refused");
    }
  });

  it("wraps unexpected failures as rejections", async () => {
    store.failWhen(() => true, new Error("bad input"));
    const result = await new QueryExecutor(store).execute(structured("MATCH (c) RETURN c.content AS content"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StoreQueryRejectedError);
      expect(result.error.message).toBe("bad input");
    }
  });

  it("returns cancellation as an error", async () => {
    store.fallback = () => new Promise(() => undefined);
    const controller = new AbortController();
    const pending = new QueryExecutor(store).execute(structured("MATCH (c) RETURN c.content AS content"), {
      signal: controller.signal,
    });
    controller.abort();

    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(QueryCancelledError);
    }
  });
});
