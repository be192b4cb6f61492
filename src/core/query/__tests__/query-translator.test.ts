/**
 * QueryTranslator Tests
 */

import { describe, it, expect } from "vitest";
import { QueryTranslator, buildTranslationPrompt, sanitizeQuery } from "../query-translator.js";
import { ScriptedLLMService } from "../../__tests__/helpers/scripted-llm-service.js";
import {
  InvalidArgumentError,
  ModelTimeoutError,
  ModelUnavailableError,
  QueryCancelledError,
  TranslationInvalidError,
} from "../../errors.js";

const SCHEMA = [
  "Node properties:",
  "CodeChunk {chunkIndex: INTEGER, content: STRING, id: STRING, language: STRING, name: STRING, path: STRING}",
  "Relationship properties:",
  "(none)",
  "The relationships:",
  "(:CodeChunk)-[:SAME_LANGUAGE]->(:CodeChunk)",
].join("\n");

const VALID = "MATCH (c:CodeChunk) WHERE c.name = 'a.py' RETURN c.content AS content";

describe("sanitizeQuery", () => {
  it("unwraps markdown fences", () => {
    expect(sanitizeQuery("```cypher\nMATCH (c) RETURN c.content AS content\n```")).toBe(
      "MATCH (c) RETURN c.content AS content"
    );
  });

  it("unwraps fences surrounded by prose", () => {
    expect(sanitizeQuery("Sure:\n```\nMATCH (c) RETURN c.content AS content\n```\nDone.")).toBe(
      "MATCH (c) RETURN c.content AS content"
    );
  });

  it("drops a cypher prefix and a trailing semicolon", () => {
    expect(sanitizeQuery("Cypher: MATCH (c) RETURN c.content AS content;")).toBe(
      "MATCH (c) RETURN c.content AS content"
    );
  });
});

describe("buildTranslationPrompt", () => {
  it("is deterministic", () => {
    expect(buildTranslationPrompt("What does a.py do?", SCHEMA)).toBe(
      buildTranslationPrompt("What does a.py do?", SCHEMA)
    );
  });

  it("ends with the schema and the question", () => {
    const prompt = buildTranslationPrompt("What does a.py do?", SCHEMA);
    expect(prompt.endsWith(`Schema:\n${SCHEMA}\n\nQuestion: What does a.py do?\nCypher query:`)).toBe(true);
  });

  it("includes feedback about a rejected output", () => {
    const prompt = buildTranslationPrompt("q", SCHEMA, { detail: "Query is empty", output: "" });
    expect(prompt).toContain("The previous output failed to parse: Query is empty\nPrevious output:\n\n\nQuestion: q");
  });
});

describe("QueryTranslator", () => {
  it("returns the parsed query", async () => {
    const llm = new ScriptedLLMService([`\`\`\`cypher\n${VALID}\n\`\`\``]);
    const query = await new QueryTranslator(llm).translate("What does a.py do?", SCHEMA);

    expect(query.statement).toBe(VALID);
    expect(query.contentColumn).toBe("content");
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]?.prompt).toBe(buildTranslationPrompt("What does a.py do?", SCHEMA));
    expect(llm.calls[0]?.options.systemPrompt).toBe(
      "You translate questions about a codebase into Neo4j Cypher queries."
    );
  });

  it("retries once with parse feedback", async () => {
    const llm = new ScriptedLLMService(["Here you go", VALID]);
    const query = await new QueryTranslator(llm).translate("What does a.py do?", SCHEMA);

    expect(query.statement).toBe(VALID);
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1]?.prompt).toBe(
      buildTranslationPrompt("What does a.py do?", SCHEMA, {
        detail: 'Query must start with a clause keyword, found "Here"',
        output: "Here you go",
      })
    );
  });

  it("gives up after the second invalid output", async () => {
    const llm = new ScriptedLLMService(["not cypher", "MATCH (c) DELETE c", VALID]);
    const translator = new QueryTranslator(llm);

    await expect(translator.translate("q", SCHEMA)).rejects.toThrow(
      new TranslationInvalidError("DELETE is not allowed in a read-only query")
    );
    expect(llm.calls).toHaveLength(2);
  });

  it("retries a timeout without feedback", async () => {
    const llm = new ScriptedLLMService([new ModelTimeoutError("No response"), VALID]);
    await new QueryTranslator(llm).translate("q", SCHEMA);

    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1]?.prompt).toBe(llm.calls[0]?.prompt);
  });

  it("surfaces a second timeout", async () => {
    const llm = new ScriptedLLMService([new ModelTimeoutError("No response"), new ModelTimeoutError("No response")]);
    await expect(new QueryTranslator(llm).translate("q", SCHEMA)).rejects.toBeInstanceOf(ModelTimeoutError);
  });

  it("surfaces an unavailable model immediately", async () => {
    const llm = new ScriptedLLMService([new ModelUnavailableError("connection refused"), VALID]);
    await expect(new QueryTranslator(llm).translate("q", SCHEMA)).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(llm.calls).toHaveLength(1);
  });

  it("honours a configured attempt count", async () => {
    const llm = new ScriptedLLMService(["x", "y", "z", VALID]);
    const translator = new QueryTranslator(llm, { maxAttempts: 3 });

    await expect(translator.translate("q", SCHEMA)).rejects.toBeInstanceOf(TranslationInvalidError);
    expect(llm.calls).toHaveLength(3);
  });

  it("rejects an empty question without calling the model", async () => {
    const llm = new ScriptedLLMService([VALID]);
    await expect(new QueryTranslator(llm).translate("   ", SCHEMA)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(llm.calls).toHaveLength(0);
  });

  it("stops when cancelled", async () => {
    const llm = new ScriptedLLMService([VALID]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new QueryTranslator(llm).translate("q", SCHEMA, { signal: controller.signal })
    ).rejects.toBeInstanceOf(QueryCancelledError);
    expect(llm.calls).toHaveLength(0);
  });
});
