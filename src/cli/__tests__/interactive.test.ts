import { describe, it, expect } from "vitest";
import { QUESTION_PROMPT, runQuestionLoop, type LoopIO, type QuestionAsker } from "../interactive.js";
import type { QuestionOutcome } from "../../core/pipeline/index.js";
import { parseCypherQuery, type StructuredQuery } from "../../core/query/cypher-parser.js";
import { unwrap } from "../../types/result.js";
import { QueryCancelledError, StoreUnavailableError, formatUserError } from "../../core/errors.js";

const STATEMENT = "MATCH (c:CodeChunk) RETURN c.content AS content";

function parsedQuery(): StructuredQuery {
  return unwrap(parseCypherQuery(STATEMENT));
}

function answered(text: string): QuestionOutcome {
  return {
    ok: true,
    answer: { kind: "found", content: text, truncated: false, rowCount: 1, text },
    query: parsedQuery(),
    text,
  };
}

/**
 * Scripted terminal: replays lines, records prompts and output
 */
class FakeIO implements LoopIO {
  readonly prompts: string[] = [];
  readonly output: string[] = [];
  closed = false;
  interrupt?: () => void;
  private lines: Array<string | null>;

  constructor(lines: Array<string | null>) {
    this.lines = [...lines];
  }

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    if (this.closed) return null;
    const next = this.lines.shift();
    return next === undefined ? null : next;
  }

  write(text: string): void {
    this.output.push(text);
  }

  onInterrupt(handler: () => void): () => void {
    this.interrupt = handler;
    return () => {
      this.interrupt = undefined;
    };
  }

  close(): void {
    this.closed = true;
  }
}

class RecordingAsker implements QuestionAsker {
  readonly questions: string[] = [];

  constructor(private respond: (question: string, signal?: AbortSignal) => Promise<QuestionOutcome>) {}

  ask(question: string, options: { signal?: AbortSignal }): Promise<QuestionOutcome> {
    this.questions.push(question);
    return this.respond(question, options.signal);
  }
}

describe("runQuestionLoop", () => {
  it("prints one answer per question and stops at exit", async () => {
    const asker = new RecordingAsker(async (question) => answered(`about ${question}`));
    const io = new FakeIO(["What does a.py do?", "exit", "never asked"]);

    const summary = await runQuestionLoop(asker, io);

    expect(summary).toEqual({ asked: 1, failed: 0 });
    expect(asker.questions).toEqual(["What does a.py do?"]);
    expect(io.output).toEqual(["Answer: about What does a.py do?", ""]);
    expect(io.prompts).toEqual([QUESTION_PROMPT, QUESTION_PROMPT]);
  });

  it("accepts quit in any case and skips blank lines", async () => {
    const asker = new RecordingAsker(async () => answered("x"));
    const io = new FakeIO(["", "   ", "QUIT"]);

    const summary = await runQuestionLoop(asker, io);

    expect(summary).toEqual({ asked: 0, failed: 0 });
    expect(io.output).toEqual([]);
  });

  it("ends at end of input", async () => {
    const asker = new RecordingAsker(async () => answered("x"));
    const io = new FakeIO(["  first  ", null]);

    const summary = await runQuestionLoop(asker, io);

    expect(summary.asked).toBe(1);
    expect(asker.questions).toEqual(["first"]);
  });

  it("prints failures and keeps going", async () => {
    const failure = new StoreUnavailableError("connection refused");
    const asker = new RecordingAsker(async (question) =>
      question === "bad" ? { ok: false, error: failure, text: formatUserError(failure) } : answered("fine")
    );
    const io = new FakeIO(["bad", "good", "exit"]);

    const summary = await runQuestionLoop(asker, io);

    expect(summary).toEqual({ asked: 2, failed: 1 });
    expect(io.output).toEqual(["Graph store unavailable: connection refused", "", "Answer: fine", ""]);
  });

  it("turns a thrown error into a printed failure", async () => {
    const asker = new RecordingAsker(async () => {
      throw new Error("boom");
    });
    const io = new FakeIO(["q", "exit"]);

    const summary = await runQuestionLoop(asker, io);

    expect(summary.failed).toBe(1);
    expect(io.output[0]).toBe("An error occurred while processing your query: boom");
  });

  it("shows the generated query when asked", async () => {
    const asker = new RecordingAsker(async () => answered("def f(): pass"));
    const io = new FakeIO(["q", "exit"]);

    await runQuestionLoop(asker, io, { showQuery: true });

    expect(io.output).toEqual(["Generated Cypher query:", STATEMENT, "Answer: def f(): pass", ""]);
  });

  it("cancels the question in flight on interrupt", async () => {
    const io = new FakeIO(["slow", "exit"]);
    const asker = new RecordingAsker(
      (_question, signal) =>
        new Promise<QuestionOutcome>((resolve) => {
          signal?.addEventListener("abort", () => {
            const error = new QueryCancelledError();
            resolve({ ok: false, error, text: formatUserError(error) });
          });
          io.interrupt?.();
        })
    );

    const summary = await runQuestionLoop(asker, io);

    expect(summary).toEqual({ asked: 1, failed: 1 });
    expect(io.output).toEqual(["Question cancelled.", ""]);
    expect(io.closed).toBe(false);
    expect(io.interrupt).toBeUndefined();
  });

  it("closes input on interrupt while idle", async () => {
    const asker = new RecordingAsker(async () => answered("x"));
    const io = new FakeIO([]);

    const run = runQuestionLoop(asker, io);
    io.interrupt?.();
    const summary = await run;

    expect(io.closed).toBe(true);
    expect(summary).toEqual({ asked: 0, failed: 0 });
  });
});
