// ---------------------------------------------------------------------------
// Terminal implementations of the Prompter and Output seams.
// ---------------------------------------------------------------------------

import { createInterface, type Interface } from "node:readline";

import type { Output, Prompter } from "../core/types.js";

/**
 * Line prompts on stdin. Lines are queued as they arrive, so answers typed
 * ahead or piped in are kept for the next question. End of input counts as
 * an empty answer, which every prompt in the pipeline treats as "no".
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly queued: string[] = [];
  private waiting: ((line: string) => void) | null = null;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.output = output;
    this.rl = createInterface({ input, output });
    this.rl.on("line", (line: string) => this.deliver(line));
    this.rl.on("close", () => {
      this.ended = true;
      this.deliver("");
    });
  }

  ask(question: string): Promise<string> {
    if (this.ended) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve("");
    return new Promise<string>((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.ended) this.rl.close();
  }

  private deliver(line: string): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
    } else if (!this.ended) {
      this.queued.push(line);
    }
  }
}

export class StdoutOutput implements Output {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
