/**
 * API LLM Service Tests
 *
 * Covers configuration and error mapping; no request leaves the process.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import Anthropic from "@anthropic-ai/sdk";
import { APIConnectionTimeoutError, APIUserAbortError } from "openai";
import { APILLMService, DEFAULT_MODELS, toModelError } from "../api-llm-service.js";
import {
  ConfigurationError,
  ModelTimeoutError,
  ModelUnavailableError,
  QueryCancelledError,
  SchemaUnavailableError,
} from "../../errors.js";

const CONTEXT = { model: "gpt-4o-mini", timeoutMs: 500 };

describe("toModelError", () => {
  it("maps SDK timeouts", () => {
    const mapped = toModelError(new APIConnectionTimeoutError(), CONTEXT);

    expect(mapped).toBeInstanceOf(ModelTimeoutError);
    expect(mapped.message).toBe("No response from gpt-4o-mini within 500ms");
  });

  it("maps Anthropic timeouts", () => {
    expect(toModelError(new Anthropic.APIConnectionTimeoutError(), CONTEXT)).toBeInstanceOf(ModelTimeoutError);
  });

  it("maps aborts to cancellation", () => {
    expect(toModelError(new APIUserAbortError(), CONTEXT)).toBeInstanceOf(QueryCancelledError);
  });

  it("maps anything else to an unavailable model", () => {
    const mapped = toModelError(new Error("401 invalid api key"), CONTEXT);

    expect(mapped).toBeInstanceOf(ModelUnavailableError);
    expect(mapped.message).toBe("401 invalid api key");
  });

  it("keeps errors that are already mapped", () => {
    const error = new SchemaUnavailableError();
    expect(toModelError(error, CONTEXT)).toBe(error);
  });
});

describe("APILLMService", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the key from the environment", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");

    const service = new APILLMService({ provider: "anthropic" });

    expect(service.modelId).toBe(DEFAULT_MODELS.anthropic);
    expect(service.isReady).toBe(false);
  });

  it("requires a key", () => {
    vi.stubEnv("OPENAI_API_KEY", "");

    expect(() => new APILLMService({ provider: "openai" })).toThrow(ConfigurationError);
  });

  it("uses the configured model", () => {
    const service = new APILLMService({ provider: "openai", apiKey: "test-secret", modelId: "gpt-4o" });
    expect(service.modelId).toBe("gpt-4o");
  });

  it("refuses to complete before initialize", async () => {
    const service = new APILLMService({ provider: "openai", apiKey: "test-secret" });

    await expect(service.complete("prompt")).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it("checks the signal before calling out", async () => {
    const service = new APILLMService({ provider: "openai", apiKey: "test-secret" });
    await service.initialize();
    const controller = new AbortController();
    controller.abort();

    await expect(service.complete("prompt", { signal: controller.signal })).rejects.toBeInstanceOf(
      QueryCancelledError
    );
    expect(service.getStats().totalCalls).toBe(0);

    await service.shutdown();
    expect(service.isReady).toBe(false);
  });
});
