/**
 * Pipeline Orchestrator
 *
 * Wires ingestion (Scan → Chunk → Write → Link) and question answering
 * (Schema → Translate → Execute → Answer) around an injected graph store
 * and language model.
 *
 * @module
 */

import type { z } from "zod";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import { DirectoryScanner } from "../indexer/scanner.js";
import { Chunker } from "../chunker/chunker.js";
import { GraphWriter } from "../graph-builder/graph-writer.js";
import { SchemaIntrospector } from "../query/schema-introspector.js";
import { QueryTranslator } from "../query/query-translator.js";
import { QueryExecutor } from "../query/query-executor.js";
import {
  AnswerSynthesizer,
  GenerativeAnswerSynthesizer,
  type Answer,
  type IAnswerSynthesizer,
} from "../query/answer-synthesizer.js";
import type { StructuredQuery } from "../query/cypher-parser.js";
import {
  ConfigurationError,
  InvalidArgumentError,
  ModelUnavailableError,
  SchemaUnavailableError,
  errorMessage,
  formatUserError,
  wrapError,
  type ChunkGraphError,
} from "../errors.js";
import {
  IngestionConfigSchema,
  QueryConfigSchema,
  formatZodError,
  safeValidate,
  type IngestionConfig,
  type QueryConfig,
} from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("pipeline");

// =============================================================================
// Types
// =============================================================================

/**
 * Ingestion phases
 */
export type IngestionPhase = "scanning" | "chunking" | "writing" | "linking" | "complete";

/**
 * Progress event for ingestion
 */
export interface IngestionProgressEvent {
  phase: IngestionPhase;
  /** Items processed in the current phase */
  processed: number;
  /** Total items in the current phase */
  total: number;
  /** Current file, where one applies */
  currentFile?: string;
  message: string;
}

/**
 * A non-fatal failure during ingestion
 */
export interface IngestionError {
  /** File path or chunk id */
  id: string;
  phase: IngestionPhase;
  error: string;
}

/**
 * Result of an ingestion run
 */
export interface IngestionReport {
  /** Whether every file, chunk and link succeeded */
  success: boolean;
  filesScanned: number;
  /** Files that were found but not chunked */
  filesSkipped: number;
  chunks: number;
  nodesUpserted: number;
  nodesUnchanged: number;
  nodesPruned: number;
  /** Directed SAME_LANGUAGE relationships created */
  edgesDerived: number;
  /** Directed SAME_LANGUAGE relationships removed */
  edgesRemoved: number;
  durationMs: number;
  errors: IngestionError[];
}

/**
 * Outcome of one question. `text` is what the user sees either way.
 */
export type QuestionOutcome =
  | { ok: true; answer: Answer; query: StructuredQuery; text: string }
  | { ok: false; error: ChunkGraphError; text: string };

export interface PipelineStatus {
  chunks: number;
  /** Unordered chunk pairs linked by SAME_LANGUAGE */
  edgePairs: number;
  /** Rendered schema, or null while the graph is empty */
  schema: string | null;
}

export interface PipelineOrchestratorOptions {
  store: IGraphStore;
  /** Needed by `ask`; ingestion and status run without one */
  llm?: ILLMService;
  config?: {
    ingestion?: Partial<IngestionConfig>;
    query?: Partial<QueryConfig>;
  };
}

function validated<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  section: string
): T {
  const result = safeValidate(schema, data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${section} configuration: ${formatZodError(result.error).join("; ")}`);
  }
  return result.data;
}

// =============================================================================
// Pipeline Orchestrator
// =============================================================================

/**
 * @example
 * ```typescript
 * const pipeline = new PipelineOrchestrator({ store, llm });
 * await pipeline.prepare();
 *
 * const report = await pipeline.ingest("./my-project");
 * console.log(`${report.chunks} chunks`);
 *
 * const outcome = await pipeline.ask("What does main.py do?");
 * console.log(outcome.text);
 * ```
 */
export class PipelineOrchestrator {
  private scanner: DirectoryScanner;
  private chunker: Chunker;
  private writer: GraphWriter;
  private introspector: SchemaIntrospector;
  private translator?: QueryTranslator;
  private executor: QueryExecutor;
  private synthesizer: IAnswerSynthesizer;
  private prepared = false;

  constructor(options: PipelineOrchestratorOptions) {
    const ingestion = validated(IngestionConfigSchema, options.config?.ingestion ?? {}, "ingestion");
    const query = validated(QueryConfigSchema, options.config?.query ?? {}, "query");

    this.scanner = new DirectoryScanner({
      include: ingestion.include,
      exclude: ingestion.exclude,
      maxFileSize: ingestion.maxFileSize,
      concurrency: ingestion.concurrency,
    });
    this.chunker = new Chunker({ maxSize: ingestion.maxChunkSize, overlap: ingestion.chunkOverlap });
    this.writer = new GraphWriter(options.store, { concurrency: ingestion.concurrency });

    this.introspector = new SchemaIntrospector(options.store);
    this.executor = new QueryExecutor(options.store, { maxRows: query.maxRows });

    const base = new AnswerSynthesizer({ displayLimit: query.displayLimit });
    this.synthesizer = base;
    if (options.llm) {
      this.translator = new QueryTranslator(options.llm, { maxAttempts: query.maxTranslationAttempts });
      if (query.summarize) this.synthesizer = new GenerativeAnswerSynthesizer(options.llm, base);
    }
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Create store constraints. Safe to call repeatedly.
   */
  async prepare(): Promise<void> {
    await this.writer.prepare();
    this.prepared = true;
  }

  /**
   * Ingest every eligible file under `directory`.
   *
   * Per-file and per-chunk failures are collected in the report.
   *
   * @throws InvalidArgumentError if the directory is missing or unreadable
   */
  async ingest(
    directory: string,
    options: { onProgress?: (event: IngestionProgressEvent) => void } = {}
  ): Promise<IngestionReport> {
    const startTime = Date.now();
    const emit = options.onProgress ?? (() => undefined);

    emit({ phase: "scanning", processed: 0, total: 0, message: `Scanning ${directory}` });
    const scan = await this.scanner.scan(directory, (progress) =>
      emit({
        phase: "scanning",
        processed: progress.current,
        total: progress.total,
        currentFile: progress.file,
        message: `Reading files (${progress.current}/${progress.total})`,
      })
    );

    if (!this.prepared) await this.prepare();

    emit({ phase: "chunking", processed: 0, total: scan.files.length, message: "Chunking files" });
    const { chunks, diagnostics } = this.chunker.chunk(scan.files);

    const errors: IngestionError[] = [
      ...scan.skipped.map((skipped) => ({
        id: skipped.filePath,
        phase: "scanning" as const,
        error: skipped.message,
      })),
      ...diagnostics.map((diagnostic) => ({
        id: diagnostic.filePath,
        phase: "chunking" as const,
        error: diagnostic.message,
      })),
    ];
    for (const diagnostic of diagnostics) {
      logger.info({ file: diagnostic.filePath, reason: diagnostic.message }, "Skipping file");
    }

    const write = await this.writer.write(chunks, (progress) =>
      emit({
        phase: "writing",
        processed: progress.filesWritten,
        total: progress.totalFiles,
        currentFile: progress.path,
        message: `Writing chunks (${progress.filesWritten}/${progress.totalFiles} files)`,
      })
    );
    errors.push(...write.failures.map((failure) => ({ ...failure, phase: "writing" as const })));

    let nodesPruned = write.nodesPruned;
    try {
      nodesPruned += await this.writer.pruneMissingFiles([...new Set(chunks.map((chunk) => chunk.path))]);
    } catch (error) {
      logger.warn({ err: error }, "Removing chunks of missing files failed");
      errors.push({ id: "*", phase: "writing", error: errorMessage(error) });
    }

    // Every upsert has settled: pairings now see the whole run
    emit({
      phase: "linking",
      processed: 0,
      total: write.changedChunkIds.length,
      message: "Linking chunks of the same language",
    });
    const derivation = await this.writer.deriveRelationships(write.changedChunkIds);
    errors.push(...derivation.failures.map((failure) => ({ ...failure, phase: "linking" as const })));

    const report: IngestionReport = {
      success: errors.length === 0,
      filesScanned: scan.files.length + scan.skipped.length,
      filesSkipped: scan.skipped.length + diagnostics.length,
      chunks: chunks.length,
      nodesUpserted: write.nodesUpserted,
      nodesUnchanged: write.nodesUnchanged,
      nodesPruned,
      edgesDerived: derivation.edgesDerived,
      edgesRemoved: derivation.edgesRemoved,
      durationMs: Date.now() - startTime,
      errors,
    };

    emit({ phase: "complete", processed: chunks.length, total: chunks.length, message: "Ingestion complete" });
    logger.info(
      {
        files: report.filesScanned,
        chunks: report.chunks,
        edgesDerived: report.edgesDerived,
        errors: errors.length,
        durationMs: report.durationMs,
      },
      "Ingestion finished"
    );
    return report;
  }

  // ===========================================================================
  // Questions
  // ===========================================================================

  /**
   * Answer one question. Never throws: failures come back as
   * `{ ok: false }` with the message to show.
   */
  async ask(question: string, options: { signal?: AbortSignal } = {}): Promise<QuestionOutcome> {
    const { signal } = options;

    try {
      if (question.trim() === "") {
        throw new InvalidArgumentError("Question must not be empty");
      }

      // An empty graph fails here, before any model call
      const schema = await this.introspector.describeSchema({ signal });
      if (!this.translator) {
        throw new ModelUnavailableError("No language model configured");
      }
      const query = await this.translator.translate(question, schema.text, { signal });

      const rows = await this.executor.execute(query, { signal });
      if (!rows.ok) throw rows.error;

      const answer = await this.synthesizer.synthesize(rows.value, question, {
        contentColumn: query.contentColumn,
        signal,
      });
      logger.debug({ kind: answer.kind, rows: rows.value.length }, "Question answered");
      return { ok: true, answer, query, text: answer.text };
    } catch (error) {
      const wrapped = wrapError(error);
      logger.warn({ err: wrapped, code: wrapped.code }, "Question failed");
      return { ok: false, error: wrapped, text: formatUserError(wrapped) };
    }
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  async status(): Promise<PipelineStatus> {
    const chunks = await this.writer.countNodes();
    const edges = await this.writer.countEdges();

    let schema: string | null = null;
    try {
      schema = (await this.introspector.describeSchema()).text;
    } catch (error) {
      if (!(error instanceof SchemaUnavailableError)) throw error;
    }

    return { chunks, edgePairs: Math.floor(edges / 2), schema };
  }
}

export function createPipelineOrchestrator(options: PipelineOrchestratorOptions): PipelineOrchestrator {
  return new PipelineOrchestrator(options);
}
