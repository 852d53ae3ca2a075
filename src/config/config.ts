// ---------------------------------------------------------------------------
// Typed configuration loader.
// Defaults, then an optional YAML file, then environment variables; the
// merged tree is validated with zod.
// ---------------------------------------------------------------------------

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import dotenv from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { isPlaceholderSecret } from "../llm/create-backend.js";

export const DEFAULT_CONFIG_FILE = "config.yaml";

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: "warn",
  requestTimeoutMs: 15_000,

  googleBooks: {
    apiKey: "",
    baseUrl: "https://www.googleapis.com/books/v1",
  },

  openLibrary: {
    baseUrl: "https://openlibrary.org",
  },

  webSearch: {
    enabled: true,
    baseUrl: "https://api.duckduckgo.com",
  },

  baserow: {
    apiToken: "",
    baseUrl: "https://api.baserow.io",
    databaseId: 0,
    mediaTableId: 0,
    categoriesTableId: 0,
    fields: {
      title: "Title",
      author: "Author",
      isbn: "ISBN",
      synopsis: "Synopsis",
      category: "Category",
      mediaType: "Media Type",
      cover: "Cover",
      read: "Read",
      rating: "Rating",
      status: "Status",
    },
    mediaTypeOptionIds: {},
    rowDefaults: {},
    coverMode: "url",
  },

  llm: {
    provider: "openai",
    timeoutMs: 120_000,
    openai: { apiKey: "", model: "gpt-4o-mini", baseUrl: "https://api.openai.com/v1" },
    anthropic: {
      apiKey: "",
      model: "claude-3-5-haiku-latest",
      baseUrl: "https://api.anthropic.com",
    },
    ollama: { baseUrl: "http://localhost:11434", model: "llama3.1" },
  },

  app: {
    maxSearchResults: 5,
    descriptionPreviewChars: 120,
    minSynopsisWords: 50,
    targetSynopsisWords: 200,
    categoryAttempts: 3,
  },
};

const id = z.number().int().nonnegative();
const fieldName = z.string().min(1);

const ConfigSchema = z.object({
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  requestTimeoutMs: z.number().int().positive(),
  googleBooks: z.object({ apiKey: z.string(), baseUrl: z.string().url() }),
  openLibrary: z.object({ baseUrl: z.string().url() }),
  webSearch: z.object({ enabled: z.boolean(), baseUrl: z.string().url() }),
  baserow: z.object({
    apiToken: z.string(),
    baseUrl: z.string().url(),
    databaseId: id,
    mediaTableId: id,
    categoriesTableId: id,
    fields: z.object({
      title: fieldName,
      author: fieldName,
      isbn: fieldName,
      synopsis: fieldName,
      category: fieldName,
      mediaType: fieldName,
      cover: fieldName,
      read: fieldName,
      rating: fieldName,
      status: fieldName,
    }),
    mediaTypeOptionIds: z.object({
      ebook: z.number().int().positive().optional(),
      physical: z.number().int().positive().optional(),
    }),
    rowDefaults: z.object({
      read: z.boolean().optional(),
      rating: z.number().int().min(0).max(10).optional(),
      status: z.number().int().positive().optional(),
    }),
    coverMode: z.enum(["url", "upload", "none"]),
  }),
  llm: z.object({
    provider: z.enum(["openai", "anthropic", "ollama"]),
    timeoutMs: z.number().int().positive(),
    openai: z.object({ apiKey: z.string(), model: z.string().min(1), baseUrl: z.string().url() }),
    anthropic: z.object({
      apiKey: z.string(),
      model: z.string().min(1),
      baseUrl: z.string().url(),
    }),
    ollama: z.object({ baseUrl: z.string().url(), model: z.string().min(1) }),
  }),
  app: z.object({
    maxSearchResults: z.number().int().min(1).max(40),
    descriptionPreviewChars: z.number().int().min(10),
    minSynopsisWords: z.number().int().nonnegative(),
    targetSynopsisWords: z.number().int().positive(),
    categoryAttempts: z.number().int().min(1).max(10),
  }),
});

// ── Tree helpers ────────────────────────────────────────────────────────────

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Recursively overlay `over` onto `base`; arrays and scalars replace. */
function merge(base: Tree, over: Tree): Tree {
  const out: Tree = { ...base };
  for (const [key, value] of Object.entries(over)) {
    const current = out[key];
    out[key] = isTree(current) && isTree(value) ? merge(current, value) : value;
  }
  return out;
}

function setPath(tree: Tree, path: readonly string[], value: unknown): Tree {
  const [head, ...rest] = path;
  if (head === undefined) return tree;
  if (rest.length === 0) return { ...tree, [head]: value };
  const child = tree[head];
  return { ...tree, [head]: setPath(isTree(child) ? child : {}, rest, value) };
}

// ── Environment ─────────────────────────────────────────────────────────────

type EnvKind = "string" | "integer";

const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[], EnvKind]> = [
  ["BASEROW_API_TOKEN", ["baserow", "apiToken"], "string"],
  ["BASEROW_BASE_URL", ["baserow", "baseUrl"], "string"],
  ["BASEROW_DATABASE_ID", ["baserow", "databaseId"], "integer"],
  ["BASEROW_MEDIA_TABLE_ID", ["baserow", "mediaTableId"], "integer"],
  ["BASEROW_CATEGORIES_TABLE_ID", ["baserow", "categoriesTableId"], "integer"],
  ["GOOGLE_BOOKS_API_KEY", ["googleBooks", "apiKey"], "string"],
  ["SHELFWRIGHT_LLM_PROVIDER", ["llm", "provider"], "string"],
  ["SHELFWRIGHT_LLM_TIMEOUT_MS", ["llm", "timeoutMs"], "integer"],
  ["OPENAI_API_KEY", ["llm", "openai", "apiKey"], "string"],
  ["OPENAI_MODEL", ["llm", "openai", "model"], "string"],
  ["ANTHROPIC_API_KEY", ["llm", "anthropic", "apiKey"], "string"],
  ["ANTHROPIC_MODEL", ["llm", "anthropic", "model"], "string"],
  ["OLLAMA_BASE_URL", ["llm", "ollama", "baseUrl"], "string"],
  ["OLLAMA_MODEL", ["llm", "ollama", "model"], "string"],
  ["SHELFWRIGHT_MAX_SEARCH_RESULTS", ["app", "maxSearchResults"], "integer"],
  ["SHELFWRIGHT_LOG_LEVEL", ["logLevel"], "string"],
];

function envValue(name: string, raw: string, kind: EnvKind): string | number {
  const value = raw.trim();
  if (kind === "string") return value;
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${name} must be a whole number, got "${raw}"`);
  }
  return parseInt(value, 10);
}

/** Load `.env` from the working directory into `process.env`, if present. */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : {});
}

// ── Loading ─────────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Explicit file (`--config`); must exist. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function readConfigFile(path: string): Tree {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read config file ${path}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML in ${path}: ${msg}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Pick the file to read: `--config`, then `SHELFWRIGHT_CONFIG`, then
 * `config.yaml` in the working directory when it exists.
 */
export function locateConfigFile(options: LoadConfigOptions = {}): string | null {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = options.configPath ?? env["SHELFWRIGHT_CONFIG"];
  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!existsSync(path)) throw new ConfigurationError(`Config file not found: ${path}`);
    return path;
  }

  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : null;
}

/** Build the validated configuration. Does not read `.env`; see {@link loadEnvFile}. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;

  let tree: Tree = { ...DEFAULT_CONFIG };
  const file = locateConfigFile(options);
  if (file) tree = merge(tree, readConfigFile(file));

  for (const [name, path, kind] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    tree = setPath(tree, path, envValue(name, raw, kind));
  }

  const result = ConfigSchema.safeParse(tree);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`, { cause: result.error });
  }

  const config: AppConfig = result.data;
  return config;
}

/**
 * Checks that only matter when a row is about to be written: the Baserow
 * token and table ids, and the key of the selected text backend.
 */
export function validateForAdd(config: AppConfig): void {
  if (isPlaceholderSecret(config.baserow.apiToken)) {
    throw new ConfigurationError("Baserow API token not configured");
  }
  if (config.baserow.mediaTableId === 0) {
    throw new ConfigurationError("Baserow media table id not configured");
  }
  if (config.baserow.categoriesTableId === 0) {
    throw new ConfigurationError("Baserow categories table id not configured");
  }

  switch (config.llm.provider) {
    case "openai":
      if (isPlaceholderSecret(config.llm.openai.apiKey)) {
        throw new ConfigurationError("OpenAI API key not configured");
      }
      break;
    case "anthropic":
      if (isPlaceholderSecret(config.llm.anthropic.apiKey)) {
        throw new ConfigurationError("Anthropic API key not configured");
      }
      break;
    case "ollama":
      break;
  }
}
