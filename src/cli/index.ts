#!/usr/bin/env node

/**
 * chunkgraph CLI
 * Ingest a codebase into Neo4j and ask questions about it
 */

import { Command } from "commander";
import chalk from "chalk";
import { chatCommand, type ChatOptions } from "./commands/chat.js";
import { ingestCommand, type IngestOptions } from "./commands/ingest.js";
import { askCommand, type AskOptions } from "./commands/ask.js";
import { statusCommand, type StatusOptions } from "./commands/status.js";
import { formatUserError, isChunkGraphError } from "../core/errors.js";
import { createLogger, setLogLevel } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("chunkgraph")
  .description("Ask natural-language questions about a codebase stored as a Neo4j graph")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to a config file (default: .chunkgraph/config.json)")
  .option("-d, --debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts<{ debug?: boolean }>().debug) {
      setLogLevel("debug");
    }
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("chat", { isDefault: true })
  .description("Ingest a directory, then answer questions interactively")
  .argument("[directory]", "Directory containing the source code", ".")
  .option("--skip-ingest", "Ask about what the graph already holds")
  .option("--show-query", "Print the generated Cypher query before each answer")
  .option("--summarize", "Summarize matched code with the language model")
  .action((directory: string, _options: ChatOptions, command: Command) =>
    chatCommand(directory, command.optsWithGlobals<ChatOptions>())
  );

program
  .command("ingest")
  .description("Chunk a directory into the graph")
  .argument("<directory>", "Directory containing the source code")
  .action((directory: string, _options: IngestOptions, command: Command) =>
    ingestCommand(directory, command.optsWithGlobals<IngestOptions>())
  );

program
  .command("ask")
  .description("Answer a single question")
  .argument("<question...>", "The question to ask")
  .option("--show-query", "Print the generated Cypher query before the answer")
  .option("--summarize", "Summarize matched code with the language model")
  .action((question: string[], _options: AskOptions, command: Command) =>
    askCommand(question, command.optsWithGlobals<AskOptions>())
  );

program
  .command("status")
  .description("Show chunk and relationship counts and the graph schema")
  .action((_options: StatusOptions, command: Command) =>
    statusCommand(command.optsWithGlobals<StatusOptions>())
  );

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  if (isChunkGraphError(error)) {
    logger.error({ err: error, code: error.code }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${formatUserError(error)}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// Handle SIGTERM (kill command); Ctrl+C is handled per command
process.on("SIGTERM", () => {
  logger.info({ signal: "SIGTERM" }, "Received shutdown signal");
  console.log(chalk.dim("\nReceived SIGTERM, shutting down..."));
  process.exit(0);
});

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
