// ---------------------------------------------------------------------------
// Media writer: one confirmed MediaRecord becomes one row in the media table.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BaserowConfig,
  CoverAttachOutcome,
  MediaRecord,
  WriteResult,
} from "../core/types.js";
import { CoverMode, MediaClassification } from "../core/types.js";
import { BaserowRequestError } from "../core/errors.js";
import { USER_AGENT, deadline } from "../utils/http.js";
import type { BaserowClient, UploadedFile } from "./baserow-client.js";

export type MediaRowStore = Pick<
  BaserowClient,
  "createRow" | "updateRow" | "uploadFileViaUrl" | "uploadFile"
>;

export interface MediaWriterOptions {
  store: MediaRowStore;
  config: BaserowConfig;
  timeoutMs: number;
  logger: Logger;
}

const MEDIA_TYPE_LABELS: Record<MediaClassification, string> = {
  [MediaClassification.EBOOK]: "Ebook",
  [MediaClassification.PHYSICAL]: "Physical",
};

const MIME_BY_EXTENSION: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
};

/**
 * Field payload for the create call. Categories are sent as row ids of the
 * categories table; the media type as its option id when one is configured.
 */
export function buildRowFields(
  record: MediaRecord,
  config: Pick<BaserowConfig, "fields" | "mediaTypeOptionIds" | "rowDefaults">,
): Record<string, unknown> {
  const { fields, rowDefaults } = config;
  const payload: Record<string, unknown> = {
    [fields.title]: record.title,
    [fields.author]: record.authors.join(", "),
    [fields.isbn]: record.isbn13 ?? "",
    [fields.synopsis]: record.synopsis,
    [fields.category]: record.categories.map((c) => c.id),
    [fields.mediaType]:
      config.mediaTypeOptionIds[record.classification] ?? MEDIA_TYPE_LABELS[record.classification],
  };
  if (rowDefaults.read !== undefined) payload[fields.read] = rowDefaults.read;
  if (rowDefaults.rating !== undefined) payload[fields.rating] = rowDefaults.rating;
  if (rowDefaults.status !== undefined) payload[fields.status] = rowDefaults.status;
  return payload;
}

/** Last path segment of the cover URL, or `cover.jpg`. */
export function coverFileName(url: string): string {
  let segment = "";
  try {
    segment = new URL(url).pathname.split("/").pop() ?? "";
  } catch {
    return "cover.jpg";
  }
  return /\.[a-z0-9]{2,5}$/i.test(segment) ? segment : "cover.jpg";
}

function guessMime(fileName: string, header: string | null): string {
  const fromHeader = header?.split(";")[0]?.trim();
  if (fromHeader && fromHeader.startsWith("image/")) return fromHeader;
  const ext = fileName.split(".").pop()?.toLowerCase() ?? "";
  return MIME_BY_EXTENSION[ext] ?? "image/jpeg";
}

export class MediaWriter {
  private readonly store: MediaRowStore;
  private readonly config: BaserowConfig;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: MediaWriterOptions) {
    this.store = options.store;
    this.config = options.config;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ module: "media-writer" });
  }

  /**
   * Create the row, then attach the cover. A create failure throws and
   * leaves nothing behind; a cover failure after the create does not undo
   * the row and is reported in `cover`.
   */
  async write(record: MediaRecord): Promise<WriteResult> {
    const row = await this.store.createRow(
      this.config.mediaTableId,
      buildRowFields(record, this.config),
    );
    const cover = await this.attachCover(row.id, record.coverUrl);
    return { rowId: row.id, cover };
  }

  private async attachCover(rowId: number, coverUrl: string | null): Promise<CoverAttachOutcome> {
    if (this.config.coverMode === CoverMode.NONE) {
      return { status: "skipped", reason: "cover upload disabled" };
    }
    if (!coverUrl) {
      return { status: "skipped", reason: "no cover image available" };
    }

    try {
      const file =
        this.config.coverMode === CoverMode.UPLOAD
          ? await this.uploadDownloaded(coverUrl)
          : await this.store.uploadFileViaUrl(coverUrl);

      await this.store.updateRow(this.config.mediaTableId, rowId, {
        [this.config.fields.cover]: [{ name: file.name }],
      });
      this.logger.debug({ rowId, file: file.name }, "cover attached");
      return { status: "attached", fileName: file.name };
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn({ rowId, coverUrl, err }, "cover attach failed; row kept");
      return { status: "failed", error: err };
    }
  }

  private async uploadDownloaded(coverUrl: string): Promise<UploadedFile> {
    let resp: Response;
    try {
      resp = await fetch(coverUrl, {
        headers: { "user-agent": USER_AGENT },
        signal: deadline(this.timeoutMs),
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new BaserowRequestError("download cover image", null, msg, {
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (!resp.ok) {
      throw new BaserowRequestError("download cover image", resp.status, "");
    }

    const bytes = new Uint8Array(await resp.arrayBuffer());
    const fileName = coverFileName(coverUrl);
    return this.store.uploadFile(bytes, fileName, guessMime(fileName, resp.headers.get("content-type")));
  }
}
