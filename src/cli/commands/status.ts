/**
 * status command - Show what the graph currently holds
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { createRuntime } from "../runtime.js";

const logger = createLogger("status");

export type StatusOptions = {
  config?: string;
};

export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");

  const runtime = await createRuntime({ configPath: options.config });
  try {
    const status = await runtime.pipeline.status();

    console.log();
    console.log(chalk.cyan.bold("chunkgraph Status"));
    console.log(chalk.dim("─".repeat(40)));

    console.log();
    console.log(chalk.white.bold("Graph Store"));
    console.log(`  URI:          ${chalk.dim(runtime.config.neo4j.uri)}`);
    console.log(`  Chunks:       ${status.chunks}`);
    console.log(`  Edge pairs:   ${status.edgePairs}`);

    console.log();
    console.log(chalk.white.bold("Schema"));
    if (status.schema === null) {
      console.log(chalk.yellow("  Not ingested yet"));
      console.log(chalk.dim("  Run"), chalk.white("chunkgraph ingest <directory>"), chalk.dim("to load code"));
    } else {
      for (const line of status.schema.split("\n")) {
        console.log(`  ${line}`);
      }
    }
    console.log();
  } finally {
    await runtime.close();
  }
}
