/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Graph Store Configuration
// =============================================================================

export const Neo4jConfigSchema = z.object({
  /** Bolt or neo4j:// URI */
  uri: z.string().min(1).default("bolt://localhost:7687"),
  username: z.string().min(1).default("neo4j"),
  /** Required before a store is created; usually supplied by NEO4J_PASSWORD */
  password: z.string().optional(),
  /** Database name, server default when omitted */
  database: z.string().min(1).optional(),
  maxConnectionPoolSize: z.number().int().positive().default(10),
  connectionTimeoutMs: z.number().int().positive().default(10000),
});

export type Neo4jConfig = z.infer<typeof Neo4jConfigSchema>;

// =============================================================================
// Language Model Configuration
// =============================================================================

export const LLMProviderSchema = z.enum(["openai", "anthropic"]);

export type LLMProvider = z.infer<typeof LLMProviderSchema>;

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema.default("openai"),
  /** Model ID, provider default when omitted */
  model: z.string().min(1).optional(),
  /** Per-call deadline in milliseconds */
  timeoutMs: z.number().int().positive().default(30000),
  temperature: z.number().min(0).max(2).default(0),
  maxTokens: z.number().int().positive().default(1024),
  /** SDK-level retries on transport errors */
  maxRetries: z.number().int().nonnegative().default(2),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// =============================================================================
// Ingestion Configuration
// =============================================================================

export const IngestionConfigSchema = z
  .object({
    /** Maximum chunk length in characters */
    maxChunkSize: z.number().int().positive().default(1000),
    /** Characters repeated between consecutive chunks */
    chunkOverlap: z.number().int().nonnegative().default(0),
    /** Files processed in parallel */
    concurrency: z.number().int().positive().default(4),
    /** Files larger than this many bytes are skipped */
    maxFileSize: z.number().int().positive().default(1024 * 1024),
    /** Glob patterns for files to ingest */
    include: z.array(z.string().min(1)).default(["**/*"]),
    /** Glob patterns to exclude, on top of the scanner defaults */
    exclude: z
      .array(z.string().min(1))
      .default([
        "**/README.md",
        "**/system.md",
        "**/LICENSE",
        "**/go.sum",
        "**/package-lock.json",
        "**/yarn.lock",
        "**/*.lock",
        "patterns/**",
      ]),
  })
  .refine((data) => data.chunkOverlap < data.maxChunkSize, {
    message: "chunkOverlap must be smaller than maxChunkSize",
    path: ["chunkOverlap"],
  });

export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;

// =============================================================================
// Query Configuration
// =============================================================================

export const QueryConfigSchema = z.object({
  /** Characters of content shown before truncation */
  displayLimit: z.number().int().positive().default(1000),
  /** Row cap applied to generated queries without a LIMIT */
  maxRows: z.number().int().positive().default(100),
  /** Summarize found content with the language model */
  summarize: z.boolean().default(false),
  /** Translation attempts, the first included */
  maxTranslationAttempts: z.number().int().min(1).max(5).default(2),
});

export type QueryConfig = z.infer<typeof QueryConfigSchema>;

// =============================================================================
// Application Configuration
// =============================================================================

export const AppConfigSchema = z.object({
  neo4j: Neo4jConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  ingestion: IngestionConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
