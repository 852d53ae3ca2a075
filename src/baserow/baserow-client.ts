// ---------------------------------------------------------------------------
// Baserow REST client: rows addressed by field name, plus user-file uploads.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";

import {
  BaserowAuthError,
  BaserowError,
  BaserowNotFoundError,
  BaserowRequestError,
} from "../core/errors.js";
import type { CategoryRow } from "../domain/categories/category-set.js";
import { deadline } from "../utils/http.js";

const RowSchema = z.object({ id: z.number() }).passthrough();

const RowPageSchema = z.object({
  count: z.number().optional(),
  next: z.string().nullable().optional(),
  results: z.array(RowSchema),
});

const UploadedFileSchema = z.object({
  name: z.string(),
  url: z.string().optional(),
  size: z.number().optional(),
  mime_type: z.string().optional(),
  is_image: z.boolean().optional(),
});

export type BaserowRow = z.infer<typeof RowSchema>;
export type UploadedFile = z.infer<typeof UploadedFileSchema>;

export interface BaserowClientOptions {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
  logger: Logger;
}

interface PendingRequest {
  method: "GET" | "POST" | "PATCH";
  path: string;
  query?: Record<string, string>;
  json?: unknown;
  form?: FormData;
  /** Verb phrase for error messages: "create row", "upload file", ... */
  action: string;
  /** What a 404 means for this call. */
  resource: string;
}

export class BaserowClient {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: BaserowClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiToken = options.apiToken;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ module: "baserow" });
  }

  // ── Rows ────────────────────────────────────────────────────────────────

  /** One page of rows; Baserow caps `size` at 200. */
  async listRows(tableId: number, options: { size?: number } = {}): Promise<CategoryRow[]> {
    const query: Record<string, string> = { user_field_names: "true" };
    if (options.size !== undefined) query.size = String(options.size);

    const data = await this.request({
      method: "GET",
      path: `/api/database/rows/table/${tableId}/`,
      query,
      action: `list rows of table ${tableId}`,
      resource: `table ${tableId}`,
    });
    const page = this.parse(RowPageSchema, data, `list rows of table ${tableId}`);
    this.logger.debug({ tableId, rows: page.results.length, total: page.count }, "rows listed");
    return page.results;
  }

  async createRow(tableId: number, fields: Record<string, unknown>): Promise<BaserowRow> {
    const data = await this.request({
      method: "POST",
      path: `/api/database/rows/table/${tableId}/`,
      query: { user_field_names: "true" },
      json: fields,
      action: "create entry",
      resource: `table ${tableId}`,
    });
    const row = this.parse(RowSchema, data, "create entry");
    this.logger.info({ tableId, rowId: row.id }, "row created");
    return row;
  }

  async updateRow(
    tableId: number,
    rowId: number,
    fields: Record<string, unknown>,
  ): Promise<BaserowRow> {
    const data = await this.request({
      method: "PATCH",
      path: `/api/database/rows/table/${tableId}/${rowId}/`,
      query: { user_field_names: "true" },
      json: fields,
      action: `update row ${rowId}`,
      resource: `row ${rowId} in table ${tableId}`,
    });
    return this.parse(RowSchema, data, `update row ${rowId}`);
  }

  // ── Files ───────────────────────────────────────────────────────────────

  /** Baserow downloads the file itself. */
  async uploadFileViaUrl(url: string): Promise<UploadedFile> {
    const data = await this.request({
      method: "POST",
      path: "/api/user-files/upload-via-url/",
      json: { url },
      action: "upload file via URL",
      resource: "upload-via-url endpoint",
    });
    return this.parse(UploadedFileSchema, data, "upload file via URL");
  }

  async uploadFile(bytes: Uint8Array, filename: string, mimeType: string): Promise<UploadedFile> {
    const form = new FormData();
    form.append("file", new Blob([bytes], { type: mimeType }), filename);

    const data = await this.request({
      method: "POST",
      path: "/api/user-files/upload-file/",
      form,
      action: "upload file",
      resource: "upload-file endpoint",
    });
    return this.parse(UploadedFileSchema, data, "upload file");
  }

  // ── Health ──────────────────────────────────────────────────────────────

  /** Read a single row of `tableId`; throws on any failure. */
  async testConnection(tableId: number): Promise<void> {
    await this.listRows(tableId, { size: 1 });
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async request(req: PendingRequest): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${req.path}`);
    for (const [k, v] of Object.entries(req.query ?? {})) url.searchParams.set(k, v);

    const headers: Record<string, string> = { authorization: `Token ${this.apiToken}` };
    let body: string | FormData | undefined;
    if (req.form) {
      body = req.form;
    } else if (req.json !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(req.json);
    }

    this.logger.debug({ method: req.method, url: url.toString() }, "baserow request");

    let resp: Response;
    try {
      resp = await fetch(url, {
        method: req.method,
        headers,
        body,
        signal: deadline(this.timeoutMs),
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new BaserowRequestError(req.action, null, msg, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (resp.status === 401 || resp.status === 403) {
      throw new BaserowAuthError(resp.status);
    }
    if (resp.status === 404) {
      throw new BaserowNotFoundError(req.resource);
    }
    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new BaserowRequestError(req.action, resp.status, text.trim());
    }

    try {
      return await resp.json();
    } catch (error: unknown) {
      throw new BaserowError(`Failed to ${req.action}: response is not JSON`, resp.status, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, data: unknown, action: string): z.output<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new BaserowError(
        `Failed to ${action}: unexpected response (${parsed.error.issues[0]?.message ?? "invalid shape"})`,
        null,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }
}
