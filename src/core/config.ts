/**
 * Configuration loading
 *
 * Merges the optional `.chunkgraph/config.json` file with environment
 * overrides and validates the result.
 *
 * @module
 */

import { getConfigPath, readJson, fileExistsSync } from "../utils/index.js";
import { AppConfigSchema, formatZodError, safeValidate, type AppConfig } from "../utils/validation.js";
import { ConfigurationError, errorMessage } from "./errors.js";

export type { AppConfig } from "../utils/validation.js";

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory holding `.chunkgraph/` (default: process.cwd()) */
  cwd?: string;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(root: JsonObject, key: string): JsonObject {
  const existing = root[key];
  if (isJsonObject(existing)) return { ...existing };
  return {};
}

function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function readConfigFile(options: LoadConfigOptions): JsonObject {
  const explicit = options.configPath !== undefined;
  const filePath = options.configPath ?? getConfigPath(options.cwd);

  if (!fileExistsSync(filePath)) {
    if (explicit) {
      throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = readJson(filePath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }

  if (!isJsonObject(raw)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`, { filePath });
  }
  return raw;
}

/**
 * Apply environment overrides on top of file values
 */
function applyEnv(raw: JsonObject, env: NodeJS.ProcessEnv): JsonObject {
  const neo4j = section(raw, "neo4j");
  const llm = section(raw, "llm");
  const ingestion = section(raw, "ingestion");

  if (env.NEO4J_URI) neo4j.uri = env.NEO4J_URI;
  if (env.NEO4J_USERNAME) neo4j.username = env.NEO4J_USERNAME;
  if (env.NEO4J_PASSWORD) neo4j.password = env.NEO4J_PASSWORD;
  if (env.NEO4J_DATABASE) neo4j.database = env.NEO4J_DATABASE;

  if (env.LLM_PROVIDER) llm.provider = env.LLM_PROVIDER.toLowerCase();
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;
  const timeoutMs = parseIntegerEnv("LLM_TIMEOUT_MS", env.LLM_TIMEOUT_MS);
  if (timeoutMs !== undefined) llm.timeoutMs = timeoutMs;

  const maxChunkSize = parseIntegerEnv("CHUNKGRAPH_MAX_CHUNK_SIZE", env.CHUNKGRAPH_MAX_CHUNK_SIZE);
  if (maxChunkSize !== undefined) ingestion.maxChunkSize = maxChunkSize;
  const concurrency = parseIntegerEnv("CHUNKGRAPH_CONCURRENCY", env.CHUNKGRAPH_CONCURRENCY);
  if (concurrency !== undefined) ingestion.concurrency = concurrency;

  return { ...raw, neo4j, llm, ingestion };
}

/**
 * Load and validate the application configuration
 *
 * @throws ConfigurationError when the file is unreadable or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const merged = applyEnv(readConfigFile(options), env);

  const result = safeValidate(AppConfigSchema, merged);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
