/**
 * API-based LLM Service
 *
 * Provides text completion through external APIs (OpenAI, Anthropic).
 * Every call carries a deadline and an optional abort signal; provider
 * failures are mapped onto the pipeline's model errors.
 *
 * @module
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from "openai";
import { createLogger } from "../../utils/logger.js";
import { abortable, throwIfAborted, timeout } from "../../utils/async.js";
import {
  ConfigurationError,
  ModelTimeoutError,
  ModelUnavailableError,
  QueryCancelledError,
  errorMessage,
  isChunkGraphError,
  type ChunkGraphError,
} from "../errors.js";
import type { LLMProvider } from "../../utils/validation.js";
import type {
  ILLMService,
  CompletionOptions,
  CompletionResult,
  LLMStats,
} from "./interfaces/ILLMService.js";

const logger = createLogger("api-llm-service");

// =============================================================================
// Types
// =============================================================================

export type APIProvider = LLMProvider;

export interface APILLMServiceConfig {
  /** API provider */
  provider: APIProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  /** Model ID to use */
  modelId?: string;
  /** SDK retries on transport errors */
  maxRetries?: number;
  /** Deadline per call in milliseconds */
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

// Default models per provider
export const DEFAULT_MODELS: Record<APIProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
};

const API_KEY_ENV: Record<APIProvider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

// =============================================================================
// Error Mapping
// =============================================================================

/**
 * Map a provider failure onto ModelTimeoutError, QueryCancelledError or
 * ModelUnavailableError.
 */
export function toModelError(
  error: unknown,
  context: { model: string; timeoutMs: number }
): ChunkGraphError {
  if (isChunkGraphError(error)) return error;

  if (error instanceof APIUserAbortError || error instanceof Anthropic.APIUserAbortError) {
    return new QueryCancelledError();
  }
  if (
    error instanceof APIConnectionTimeoutError ||
    error instanceof Anthropic.APIConnectionTimeoutError
  ) {
    return new ModelTimeoutError(`No response from ${context.model} within ${context.timeoutMs}ms`, context);
  }
  return new ModelUnavailableError(errorMessage(error), { model: context.model });
}

// =============================================================================
// API LLM Service
// =============================================================================

/**
 * API-based LLM Service using external providers.
 *
 * @example
 * ```typescript
 * const llm = createAPILLMService({ provider: "openai", timeoutMs: 30000 });
 * await llm.initialize();
 *
 * const { text } = await llm.complete("Question: ...\nCypher query:");
 * ```
 */
export class APILLMService implements ILLMService {
  private config: Required<Omit<APILLMServiceConfig, "apiKey">> & { apiKey: string };
  private anthropicClient: Anthropic | null = null;
  private openaiClient: OpenAI | null = null;
  private ready = false;

  // Stats
  private stats = {
    totalCalls: 0,
    cacheHits: 0,
    cacheMisses: 0,
    failures: 0,
    totalTokens: 0,
    totalDurationMs: 0,
  };

  // LRU: Map iteration order is insertion order, hits are re-inserted
  private cache = new Map<string, CompletionResult>();
  private static readonly MAX_CACHE_SIZE = 1000;

  constructor(config: APILLMServiceConfig) {
    this.config = {
      provider: config.provider,
      apiKey: config.apiKey || this.getApiKeyFromEnv(config.provider),
      modelId: config.modelId || DEFAULT_MODELS[config.provider],
      maxRetries: config.maxRetries ?? 2,
      timeoutMs: config.timeoutMs ?? 30000,
      temperature: config.temperature ?? 0,
      maxTokens: config.maxTokens ?? 1024,
    };
  }

  get isReady(): boolean {
    return this.ready;
  }

  get modelId(): string {
    return this.config.modelId;
  }

  /**
   * Get API key from environment variables
   */
  private getApiKeyFromEnv(provider: APIProvider): string {
    const key = process.env[API_KEY_ENV[provider]];
    if (!key) {
      throw new ConfigurationError(
        `API key not found. Set ${API_KEY_ENV[provider]} environment variable or provide apiKey in config.`
      );
    }
    return key;
  }

  /**
   * Initialize the service
   */
  async initialize(): Promise<void> {
    if (this.ready) return;

    logger.debug(
      { provider: this.config.provider, model: this.config.modelId },
      "Initializing API LLM service"
    );

    switch (this.config.provider) {
      case "anthropic":
        this.anthropicClient = new Anthropic({
          apiKey: this.config.apiKey,
          maxRetries: this.config.maxRetries,
          timeout: this.config.timeoutMs,
        });
        break;

      case "openai":
        this.openaiClient = new OpenAI({
          apiKey: this.config.apiKey,
          maxRetries: this.config.maxRetries,
          timeout: this.config.timeoutMs,
        });
        break;
    }

    this.ready = true;
  }

  /**
   * Complete the given prompt
   *
   * @throws ModelTimeoutError when the deadline passes
   * @throws ModelUnavailableError on transport or API errors
   * @throws QueryCancelledError when `options.signal` fires
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<CompletionResult> {
    if (!this.ready) {
      throw new ModelUnavailableError("Service not initialized. Call initialize() first.", {
        model: this.config.modelId,
      });
    }
    throwIfAborted(options.signal);

    const startTime = Date.now();
    this.stats.totalCalls++;

    // Check cache
    const cacheKey = this.getCacheKey(prompt, options);
    if (!options.skipCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.stats.cacheHits++;
        this.cache.delete(cacheKey);
        this.cache.set(cacheKey, cached);
        return { ...cached, fromCache: true };
      }
    }
    this.stats.cacheMisses++;

    const context = { model: this.config.modelId, timeoutMs: this.config.timeoutMs };
    let result: CompletionResult;
    try {
      const request =
        this.config.provider === "anthropic"
          ? this.completeAnthropic(prompt, options)
          : this.completeOpenAI(prompt, options);

      // SDK retries can outlast a single request timeout; bound the whole call
      result = await abortable(
        timeout(request, this.config.timeoutMs, () =>
          new ModelTimeoutError(`No response from ${context.model} within ${context.timeoutMs}ms`, context)
        ),
        options.signal
      );
    } catch (error) {
      this.stats.failures++;
      const mapped = toModelError(error, context);
      logger.warn({ err: mapped, model: context.model }, "Completion failed");
      throw mapped;
    }

    // Update stats
    const durationMs = Date.now() - startTime;
    this.stats.totalTokens += result.tokensGenerated;
    this.stats.totalDurationMs += durationMs;

    this.cacheResult(cacheKey, result);
    return result;
  }

  /**
   * Run completion using the Anthropic Messages API
   */
  private async completeAnthropic(
    prompt: string,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    if (!this.anthropicClient) {
      throw new ModelUnavailableError("Anthropic client not initialized");
    }

    const startTime = Date.now();
    const response = await this.anthropicClient.messages.create(
      {
        model: this.config.modelId,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        temperature: options.temperature ?? this.config.temperature,
        system: options.systemPrompt,
        messages: [{ role: "user", content: prompt }],
        stop_sequences: options.stopSequences,
      },
      { signal: options.signal }
    );

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") text += block.text;
    }

    const durationMs = Date.now() - startTime;
    logger.debug(
      { outputTokens: response.usage.output_tokens, textLength: text.length, durationMs },
      "Anthropic request complete"
    );

    return {
      text,
      fromCache: false,
      tokensGenerated: response.usage.output_tokens || Math.ceil(text.length / 4),
      durationMs,
    };
  }

  /**
   * Run completion using the OpenAI Chat Completions API
   */
  private async completeOpenAI(
    prompt: string,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    if (!this.openaiClient) {
      throw new ModelUnavailableError("OpenAI client not initialized");
    }

    const startTime = Date.now();
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const response = await this.openaiClient.chat.completions.create(
      {
        model: this.config.modelId,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        temperature: options.temperature ?? this.config.temperature,
        messages,
        stop: options.stopSequences,
      },
      { signal: options.signal }
    );

    const text = response.choices[0]?.message?.content ?? "";
    const durationMs = Date.now() - startTime;
    logger.debug({ textLength: text.length, durationMs }, "OpenAI request complete");

    return {
      text,
      fromCache: false,
      tokensGenerated: response.usage?.completion_tokens ?? Math.ceil(text.length / 4),
      durationMs,
    };
  }

  /**
   * Get cache key for a request
   */
  private getCacheKey(prompt: string, options: CompletionOptions): string {
    const { systemPrompt, maxTokens, temperature, stopSequences } = options;
    return `${this.config.modelId}:${JSON.stringify({ systemPrompt, maxTokens, temperature, stopSequences })}:${prompt}`;
  }

  /**
   * Cache a result with LRU eviction
   */
  private cacheResult(key: string, result: CompletionResult): void {
    if (this.cache.size >= APILLMService.MAX_CACHE_SIZE) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) this.cache.delete(oldestKey);
    }
    this.cache.set(key, result);
  }

  /**
   * Get service statistics
   */
  getStats(): LLMStats {
    return {
      totalCalls: this.stats.totalCalls,
      cacheHits: this.stats.cacheHits,
      cacheMisses: this.stats.cacheMisses,
      failures: this.stats.failures,
      totalTokens: this.stats.totalTokens,
      avgDurationMs:
        this.stats.totalCalls > 0 ? this.stats.totalDurationMs / this.stats.totalCalls : 0,
    };
  }

  /**
   * Clear the completion cache
   */
  clearCache(): void {
    this.cache.clear();
    this.stats.cacheHits = 0;
    this.stats.cacheMisses = 0;
  }

  /**
   * Shutdown the service
   */
  async shutdown(): Promise<void> {
    this.ready = false;
    this.anthropicClient = null;
    this.openaiClient = null;
    this.cache.clear();
    logger.debug("API LLM service shut down");
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an API LLM service
 *
 * @throws ConfigurationError when no API key is available
 */
export function createAPILLMService(config: APILLMServiceConfig): APILLMService {
  return new APILLMService(config);
}
