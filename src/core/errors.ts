/**
 * Error Classes for chunkgraph
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Ingestion errors (2xxx)
  DECODE_FAILED = "E2000",
  FILE_TOO_LARGE = "E2001",

  // Graph store errors (3xxx)
  STORE_UNAVAILABLE = "E3000",
  STORE_QUERY_REJECTED = "E3001",
  SCHEMA_UNAVAILABLE = "E3002",

  // Translation errors (5xxx)
  TRANSLATION_INVALID = "E5000",

  // Language model errors (6xxx)
  MODEL_UNAVAILABLE = "E6000",
  MODEL_TIMEOUT = "E6001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
  CANCELLED = "E9004",
}

/**
 * Base error class for all chunkgraph errors
 */
export class ChunkGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ChunkGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A file could not be read as text. Ingestion skips the file and continues.
 */
export class DecodeError extends ChunkGraphError {
  public readonly filePath: string;

  constructor(
    message: string,
    context: Record<string, unknown> & { filePath: string },
    code: ErrorCode = ErrorCode.DECODE_FAILED
  ) {
    super(message, code, context);
    this.name = "DecodeError";
    this.filePath = context.filePath;
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message} at ${this.filePath}`;
  }
}

/**
 * The graph store could not be reached
 */
export class StoreUnavailableError extends ChunkGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.STORE_UNAVAILABLE, context);
    this.name = "StoreUnavailableError";
  }
}

/**
 * The graph store refused a statement (syntax, semantics, permissions)
 */
export class StoreQueryRejectedError extends ChunkGraphError {
  public readonly statement?: string;
  public readonly storeCode?: string;

  constructor(
    message: string,
    context?: Record<string, unknown> & { statement?: string; storeCode?: string }
  ) {
    super(message, ErrorCode.STORE_QUERY_REJECTED, context);
    this.name = "StoreQueryRejectedError";
    this.statement = context?.statement;
    this.storeCode = context?.storeCode;
  }
}

/**
 * The graph holds no labels or properties, so questions cannot be grounded
 */
export class SchemaUnavailableError extends ChunkGraphError {
  constructor(
    message = "Graph schema is empty. Ingest a directory before asking questions.",
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCode.SCHEMA_UNAVAILABLE, context);
    this.name = "SchemaUnavailableError";
  }
}

/**
 * The model produced text that is not a usable read-only Cypher query
 */
export class TranslationInvalidError extends ChunkGraphError {
  public readonly output?: string;

  constructor(message: string, context?: Record<string, unknown> & { output?: string }) {
    super(message, ErrorCode.TRANSLATION_INVALID, context);
    this.name = "TranslationInvalidError";
    this.output = context?.output;
  }
}

/**
 * Language model transport or API failure
 */
export class ModelUnavailableError extends ChunkGraphError {
  public readonly model?: string;

  constructor(message: string, context?: Record<string, unknown> & { model?: string }) {
    super(message, ErrorCode.MODEL_UNAVAILABLE, context);
    this.name = "ModelUnavailableError";
    this.model = context?.model;
  }
}

/**
 * Language model call exceeded its deadline
 */
export class ModelTimeoutError extends ChunkGraphError {
  public readonly timeoutMs?: number;

  constructor(message: string, context?: Record<string, unknown> & { timeoutMs?: number }) {
    super(message, ErrorCode.MODEL_TIMEOUT, context);
    this.name = "ModelTimeoutError";
    this.timeoutMs = context?.timeoutMs;
  }
}

/**
 * The caller abandoned the operation
 */
export class QueryCancelledError extends ChunkGraphError {
  constructor(message = "Operation cancelled", context?: Record<string, unknown>) {
    super(message, ErrorCode.CANCELLED, context);
    this.name = "QueryCancelledError";
  }
}

export class ConfigurationError extends ChunkGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

export class InvalidArgumentError extends ChunkGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_ARGUMENT, context);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Check if an error is a ChunkGraphError
 */
export function isChunkGraphError(error: unknown): error is ChunkGraphError {
  return error instanceof ChunkGraphError;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null) {
    return JSON.stringify(error);
  }
  return String(error);
}

/**
 * Wrap an unknown error in a ChunkGraphError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): ChunkGraphError {
  if (isChunkGraphError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ChunkGraphError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new ChunkGraphError(typeof error === "string" ? error : defaultMessage, code);
}

/**
 * Render an error as the single line shown to a CLI user
 */
export function formatUserError(error: unknown): string {
  const wrapped = wrapError(error);
  switch (wrapped.code) {
    case ErrorCode.SCHEMA_UNAVAILABLE:
      return `Graph not ready: ${wrapped.message}`;
    case ErrorCode.STORE_UNAVAILABLE:
      return `Graph store unavailable: ${wrapped.message}`;
    case ErrorCode.STORE_QUERY_REJECTED:
      return `The graph store rejected the generated query: ${wrapped.message}`;
    case ErrorCode.TRANSLATION_INVALID:
      return `Could not translate the question into a valid query: ${wrapped.message}`;
    case ErrorCode.MODEL_UNAVAILABLE:
      return `Language model unavailable: ${wrapped.message}`;
    case ErrorCode.MODEL_TIMEOUT:
      return `Language model timed out: ${wrapped.message}`;
    case ErrorCode.CANCELLED:
      return "Question cancelled.";
    default:
      return `An error occurred while processing your query: ${wrapped.message}`;
  }
}
