import * as readline from "node:readline";
import { formatUserError, wrapError } from "../core/errors.js";
import type { QuestionOutcome } from "../core/pipeline/index.js";

export const QUESTION_PROMPT = "Ask a question about the code (or type 'exit' to quit): ";

const EXIT_SENTINELS = new Set(["exit", "quit"]);

/**
 * Anything that answers one question at a time
 */
export interface QuestionAsker {
  ask(question: string, options: { signal?: AbortSignal }): Promise<QuestionOutcome>;
}

/**
 * Line-oriented input and output for the question loop
 */
export interface LoopIO {
  /** Resolves with the next line, or null at end of input */
  readLine(prompt: string): Promise<string | null>;
  write(text: string): void;
  /** Register a Ctrl+C handler; returns the unsubscribe function */
  onInterrupt(handler: () => void): () => void;
  close(): void;
}

export interface QuestionLoopOptions {
  /** Print the generated query before each answer */
  showQuery?: boolean;
}

export interface QuestionLoopSummary {
  asked: number;
  failed: number;
}

/**
 * Create a readline-backed LoopIO on stdin and stdout
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LoopIO {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pending: ((line: string | null) => void) | undefined;

  rl.on("close", () => {
    closed = true;
    pending?.(null);
    pending = undefined;
  });

  return {
    readLine(prompt) {
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        pending = resolve;
        rl.question(prompt, (answer) => {
          pending = undefined;
          resolve(answer);
        });
      });
    },
    write(text) {
      output.write(`${text}\n`);
    },
    onInterrupt(handler) {
      rl.on("SIGINT", handler);
      return () => {
        rl.off("SIGINT", handler);
      };
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Read one question per line until an exit sentinel or end of input.
 *
 * A failed question prints its error and the loop continues. Ctrl+C
 * cancels the question in flight, or ends the loop while waiting for input.
 */
export async function runQuestionLoop(
  asker: QuestionAsker,
  io: LoopIO,
  options: QuestionLoopOptions = {}
): Promise<QuestionLoopSummary> {
  const summary: QuestionLoopSummary = { asked: 0, failed: 0 };
  let inFlight: AbortController | undefined;

  const unsubscribe = io.onInterrupt(() => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    io.close();
  });

  try {
    while (true) {
      const line = await io.readLine(QUESTION_PROMPT);
      if (line === null) break;

      const question = line.trim();
      if (question === "") continue;
      if (EXIT_SENTINELS.has(question.toLowerCase())) break;

      const controller = new AbortController();
      inFlight = controller;
      let outcome: QuestionOutcome;
      try {
        outcome = await asker.ask(question, { signal: controller.signal });
      } catch (error) {
        outcome = { ok: false, error: wrapError(error), text: formatUserError(error) };
      } finally {
        inFlight = undefined;
      }

      summary.asked++;
      if (outcome.ok) {
        if (options.showQuery) {
          io.write("Generated Cypher query:");
          io.write(outcome.query.statement);
        }
        io.write(`Answer: ${outcome.text}`);
      } else {
        summary.failed++;
        io.write(outcome.text);
      }
      io.write("");
    }
  } finally {
    unsubscribe();
  }

  return summary;
}
