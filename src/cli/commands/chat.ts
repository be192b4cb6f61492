/**
 * chat command - Ingest a directory, then answer questions until exit
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { createRuntime } from "../runtime.js";
import { createTerminalIO, runQuestionLoop } from "../interactive.js";
import { ingestWithProgress, resolveDirectory } from "./ingest.js";

const logger = createLogger("chat");

export type ChatOptions = {
  config?: string;
  skipIngest?: boolean;
  showQuery?: boolean;
  summarize?: boolean;
};

export async function chatCommand(directory: string, options: ChatOptions): Promise<void> {
  logger.info({ directory, options }, "Starting chat");

  let resolved: string | null = null;
  if (!options.skipIngest) {
    resolved = await resolveDirectory(directory);
    if (!resolved) return;
  }

  const runtime = await createRuntime({
    configPath: options.config,
    withModel: true,
    summarize: options.summarize,
  });

  try {
    if (resolved) {
      console.log(chalk.dim(`Loading source code from: ${resolved}`));
      await ingestWithProgress(runtime.pipeline, resolved);
    }

    const status = await runtime.pipeline.status();
    console.log();
    console.log(chalk.cyan(`Graph holds ${status.chunks} code chunks.`));
    console.log(chalk.dim("Ctrl+C cancels a running question; press it again at the prompt to leave."));
    console.log();

    const io = createTerminalIO();
    try {
      const summary = await runQuestionLoop(runtime.pipeline, io, { showQuery: options.showQuery });
      logger.info({ ...summary }, "Chat ended");
    } finally {
      io.close();
    }
  } finally {
    await runtime.close();
  }
}
