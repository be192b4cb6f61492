/**
 * ask command - Answer a single question
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import { createRuntime } from "../runtime.js";

const logger = createLogger("ask");

export type AskOptions = {
  config?: string;
  showQuery?: boolean;
  summarize?: boolean;
};

export async function askCommand(words: string[], options: AskOptions): Promise<void> {
  const question = words.join(" ");
  logger.info({ question }, "Asking question");

  const runtime = await createRuntime({
    configPath: options.config,
    withModel: true,
    summarize: options.summarize,
  });

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const spinner = ora("Thinking...").start();
  try {
    const outcome = await runtime.pipeline.ask(question, { signal: controller.signal });

    if (!outcome.ok) {
      spinner.fail(chalk.red(outcome.text));
      process.exitCode = 1;
      return;
    }

    spinner.stop();
    if (options.showQuery) {
      console.log(chalk.dim("Generated Cypher query:"));
      console.log(chalk.dim(outcome.query.statement));
      console.log();
    }
    console.log(`Answer: ${outcome.text}`);
  } finally {
    process.off("SIGINT", onInterrupt);
    await runtime.close();
  }
}
