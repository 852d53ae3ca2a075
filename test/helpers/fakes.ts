// ---------------------------------------------------------------------------
// In-process stand-ins shared by the unit tests.
// ---------------------------------------------------------------------------

import pino from "pino";

import type { BookCandidate, Output, Prompter } from "../../src/core/types.js";
import { SourceRole } from "../../src/core/types.js";
import { createCandidate, type CandidateInit } from "../../src/domain/book/candidate.js";
import type { GenerateOptions, TextBackend } from "../../src/llm/text-backend.js";

export function createSilentLogger() {
  return pino({ level: "silent" });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** `n` words of filler text. */
export function words(n: number): string {
  return Array.from({ length: n }, (_, i) => `word${i + 1}`).join(" ");
}

export function candidate(overrides: Partial<CandidateInit> = {}): BookCandidate {
  return createCandidate({
    title: "The Lord of the Rings",
    authors: ["J.R.R. Tolkien"],
    description: null,
    source: SourceRole.PRIMARY,
    sourceName: "Google Books",
    ...overrides,
  });
}

/** Replies in order; the last reply repeats once the script runs out. */
export class ScriptedBackend implements TextBackend {
  public readonly provider = "openai";
  public readonly model = "test-model";
  public readonly calls: Array<{ prompt: string; options: GenerateOptions | undefined }> = [];

  constructor(private readonly replies: string[]) {}

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply === undefined) throw new Error("ScriptedBackend has no replies");
    return reply;
  }
}

export class ScriptedPrompter implements Prompter {
  public readonly questions: string[] = [];
  public closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? "";
  }

  close(): void {
    this.closed = true;
  }
}

export class RecordingOutput implements Output {
  public readonly lines: string[] = [];

  write(text: string): void {
    this.lines.push(text);
  }
}
