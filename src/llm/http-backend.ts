// ---------------------------------------------------------------------------
// Shared plumbing for backends spoken to over plain JSON HTTP.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type { z } from "zod";

import type { LlmProvider } from "../core/types.js";
import { TextBackendError } from "../core/errors.js";
import { deadline } from "../utils/http.js";
import type { GenerateOptions, TextBackend } from "./text-backend.js";

export interface HttpBackendOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
}

export abstract class HttpTextBackend implements TextBackend {
  public abstract readonly provider: LlmProvider;
  public readonly model: string;

  protected readonly baseUrl: string;
  public readonly timeoutMs: number;
  protected readonly logger: Logger;

  constructor(options: HttpBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  abstract generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /**
   * POST `body` as JSON and validate the reply with `schema`. Every failure
   * leaves as a {@link TextBackendError}.
   */
  protected async postJson<T extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: T,
    headers: Record<string, string> = {},
  ): Promise<z.output<T>> {
    const url = `${this.baseUrl}${path}`;
    const start = performance.now();

    let resp: Response;
    try {
      resp = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: deadline(this.timeoutMs),
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new TextBackendError(`${this.provider} request failed: ${msg}`, this.provider, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new TextBackendError(
        `${this.provider} API returned HTTP ${resp.status}${text ? ` - ${text.slice(0, 300)}` : ""}`,
        this.provider,
      );
    }

    let data: unknown;
    try {
      data = await resp.json();
    } catch (error: unknown) {
      throw new TextBackendError(`${this.provider} returned a body that is not JSON`, this.provider, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TextBackendError(
        `Unexpected ${this.provider} response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
        this.provider,
        { cause: parsed.error },
      );
    }

    this.logger.debug(
      { provider: this.provider, model: this.model, durationMs: Math.round(performance.now() - start) },
      "text backend answered",
    );
    return parsed.data;
  }
}
