/**
 * ingest command - Chunk a directory into the graph
 */

import * as path from "node:path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { createLogger, isReadableDirectory } from "../../utils/index.js";
import type {
  IngestionProgressEvent,
  IngestionReport,
  PipelineOrchestrator,
} from "../../core/pipeline/index.js";
import { createRuntime } from "../runtime.js";

const logger = createLogger("ingest");

/** Errors listed before the rest are summarized */
const MAX_LISTED_ERRORS = 10;

export type IngestOptions = {
  config?: string;
};

/**
 * Format duration in human readable format
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}

/**
 * Resolve a directory argument, or print why it cannot be used.
 * Returns null after setting a failing exit code.
 */
export async function resolveDirectory(directory: string): Promise<string | null> {
  const resolved = path.resolve(directory);
  if (!(await isReadableDirectory(resolved))) {
    console.error(chalk.red(`Directory not found or not readable: ${resolved}`));
    process.exitCode = 1;
    return null;
  }
  return resolved;
}

function updateSpinner(spinner: Ora, event: IngestionProgressEvent): void {
  spinner.text = event.currentFile ? `${event.message} ${chalk.dim(event.currentFile)}` : event.message;
}

function printReport(report: IngestionReport): void {
  console.log();
  console.log(chalk.white.bold("Results"));
  console.log(`  Files scanned:     ${report.filesScanned}`);
  console.log(`  Files skipped:     ${report.filesSkipped}`);
  console.log(`  Chunks:            ${report.chunks}`);
  console.log(`  Nodes written:     ${report.nodesUpserted} (${report.nodesUnchanged} unchanged)`);
  console.log(`  Nodes pruned:      ${report.nodesPruned}`);
  console.log(`  Edges derived:     ${report.edgesDerived}`);
  console.log(`  Edges removed:     ${report.edgesRemoved}`);
  console.log(`  Duration:          ${formatDuration(report.durationMs)}`);

  if (report.errors.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Errors (${report.errors.length})`));
    for (const error of report.errors.slice(0, MAX_LISTED_ERRORS)) {
      console.log(chalk.yellow(`  [${error.phase}] ${error.id}: ${error.error}`));
    }
    if (report.errors.length > MAX_LISTED_ERRORS) {
      console.log(chalk.dim(`  ... and ${report.errors.length - MAX_LISTED_ERRORS} more`));
    }
  }
}

/**
 * Ingest with a progress spinner and print the report
 */
export async function ingestWithProgress(
  pipeline: PipelineOrchestrator,
  directory: string
): Promise<IngestionReport> {
  const spinner = ora(`Ingesting ${directory}...`).start();

  try {
    const report = await pipeline.ingest(directory, {
      onProgress: (event) => updateSpinner(spinner, event),
    });

    if (report.success) {
      spinner.succeed(chalk.green(`Loaded ${report.chunks} code chunks into the graph.`));
    } else {
      spinner.warn(chalk.yellow(`Loaded ${report.chunks} code chunks into the graph, with errors.`));
    }
    printReport(report);
    return report;
  } catch (error) {
    spinner.fail(chalk.red("Ingestion failed"));
    throw error;
  }
}

/**
 * Ingest a directory and print the report
 */
export async function ingestCommand(directory: string, options: IngestOptions): Promise<void> {
  logger.info({ directory, options }, "Starting ingestion");

  const resolved = await resolveDirectory(directory);
  if (!resolved) return;

  console.log();
  console.log(chalk.cyan.bold("Ingesting Directory"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const runtime = await createRuntime({ configPath: options.config });
  try {
    const report = await ingestWithProgress(runtime.pipeline, resolved);
    if (!report.success) process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}
