// ---------------------------------------------------------------------------
// Layered configuration: defaults, YAML file, environment.
// ---------------------------------------------------------------------------

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  DEFAULT_CONFIG,
  loadConfig,
  locateConfigFile,
  validateForAdd,
} from "../../../src/config/config.js";
import type { AppConfig } from "../../../src/core/types.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "shelfwright-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns the defaults when there is no file and no environment", () => {
    expect(loadConfig({ env: {}, cwd: dir })).toEqual(DEFAULT_CONFIG);
  });

  it("overlays config.yaml from the working directory", () => {
    writeFileSync(
      join(dir, "config.yaml"),
      [
        "baserow:",
        "  mediaTableId: 11",
        "  categoriesTableId: 12",
        "  coverMode: upload",
        "  fields:",
        "    title: Name",
        "  mediaTypeOptionIds:",
        "    ebook: 301",
        "app:",
        "  maxSearchResults: 8",
      ].join("\n"),
    );

    const config = loadConfig({ env: {}, cwd: dir });

    expect(config.baserow.mediaTableId).toBe(11);
    expect(config.baserow.categoriesTableId).toBe(12);
    expect(config.baserow.coverMode).toBe("upload");
    expect(config.baserow.fields.title).toBe("Name");
    expect(config.baserow.fields.author).toBe("Author");
    expect(config.baserow.mediaTypeOptionIds).toEqual({ ebook: 301 });
    expect(config.app.maxSearchResults).toBe(8);
    expect(config.app.minSynopsisWords).toBe(50);
  });

  it("lets the environment win over the file", () => {
    const path = join(dir, "custom.yaml");
    writeFileSync(path, "llm:\n  provider: ollama\nbaserow:\n  apiToken: from-file\n");

    const config = loadConfig({
      configPath: path,
      cwd: dir,
      env: {
        BASEROW_API_TOKEN: "test-secret",
        BASEROW_MEDIA_TABLE_ID: "21",
        SHELFWRIGHT_LLM_PROVIDER: "anthropic",
        ANTHROPIC_MODEL: "claude-test",
        SHELFWRIGHT_MAX_SEARCH_RESULTS: "3",
        SHELFWRIGHT_LOG_LEVEL: "debug",
        OPENAI_API_KEY: "",
      },
    });

    expect(config.baserow.apiToken).toBe("test-secret");
    expect(config.baserow.mediaTableId).toBe(21);
    expect(config.llm.provider).toBe("anthropic");
    expect(config.llm.anthropic.model).toBe("claude-test");
    expect(config.app.maxSearchResults).toBe(3);
    expect(config.logLevel).toBe("debug");
    expect(config.llm.openai.apiKey).toBe("");
  });

  it("gives text backends their own, longer timeout", () => {
    expect(DEFAULT_CONFIG.llm.timeoutMs).toBe(120_000);
    expect(DEFAULT_CONFIG.requestTimeoutMs).toBe(15_000);

    const config = loadConfig({ cwd: dir, env: { SHELFWRIGHT_LLM_TIMEOUT_MS: "300000" } });
    expect(config.llm.timeoutMs).toBe(300_000);
    expect(config.requestTimeoutMs).toBe(15_000);
  });

  it("reads row defaults from the file", () => {
    writeFileSync(
      join(dir, "config.yaml"),
      ["baserow:", "  rowDefaults:", "    read: false", "    rating: 0", "    status: 3028", ""].join(
        "\n",
      ),
    );
    const config = loadConfig({ env: {}, cwd: dir });
    expect(config.baserow.rowDefaults).toEqual({ read: false, rating: 0, status: 3028 });
    expect(config.baserow.fields.status).toBe("Status");
  });

  it("finds the file named by SHELFWRIGHT_CONFIG", () => {
    writeFileSync(join(dir, "other.yaml"), "requestTimeoutMs: 5000\n");
    const config = loadConfig({ cwd: dir, env: { SHELFWRIGHT_CONFIG: "other.yaml" } });
    expect(config.requestTimeoutMs).toBe(5000);
  });

  it("fails on a missing explicit file", () => {
    expect(() => locateConfigFile({ configPath: "absent.yaml", cwd: dir, env: {} })).toThrow(
      `Config file not found: ${join(dir, "absent.yaml")}`,
    );
  });

  it("fails on a numeric variable that is not a number", () => {
    expect(() =>
      loadConfig({ cwd: dir, env: { BASEROW_MEDIA_TABLE_ID: "twelve" } }),
    ).toThrow(new ConfigurationError('BASEROW_MEDIA_TABLE_ID must be a whole number, got "twelve"'));
  });

  it("fails validation with the offending path", () => {
    expect(() => loadConfig({ cwd: dir, env: { SHELFWRIGHT_LLM_PROVIDER: "mystery" } })).toThrow(
      /^Invalid configuration: llm\.provider: /,
    );
  });

  it("fails on malformed YAML", () => {
    writeFileSync(join(dir, "config.yaml"), "app: [unclosed\n");
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigurationError);
  });
});

describe("validateForAdd", () => {
  function ready(): AppConfig {
    return {
      ...DEFAULT_CONFIG,
      baserow: {
        ...DEFAULT_CONFIG.baserow,
        apiToken: "test-secret",
        mediaTableId: 1,
        categoriesTableId: 2,
      },
      llm: {
        ...DEFAULT_CONFIG.llm,
        openai: { ...DEFAULT_CONFIG.llm.openai, apiKey: "test-secret" },
      },
    };
  }

  it("accepts a complete configuration", () => {
    expect(() => validateForAdd(ready())).not.toThrow();
  });

  it("requires a real Baserow token", () => {
    const config = ready();
    config.baserow.apiToken = "your_baserow_token";
    expect(() => validateForAdd(config)).toThrow("Baserow API token not configured");
  });

  it("requires the selected provider's key", () => {
    const config = ready();
    config.llm.openai.apiKey = "";
    expect(() => validateForAdd(config)).toThrow("OpenAI API key not configured");
  });

  it("needs no key for Ollama", () => {
    const config = ready();
    config.llm.openai.apiKey = "";
    config.llm.provider = "ollama";
    expect(() => validateForAdd(config)).not.toThrow();
  });

  it("requires the table ids", () => {
    const config = ready();
    config.baserow.mediaTableId = 0;
    expect(() => validateForAdd(config)).toThrow("Baserow media table id not configured");
  });
});
