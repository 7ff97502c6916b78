import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors/index.js";
import {
  deepMerge,
  findProjectConfig,
  loadConfig,
  parseEnvConfig,
  toConfigurationError,
} from "../loader.js";

describe("findProjectConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quillwork-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("finds quillwork.toml in the start directory", () => {
    const configPath = path.join(tempDir, "quillwork.toml");
    fs.writeFileSync(configPath, "concurrency = 2\n");

    expect(findProjectConfig(tempDir)).toBe(configPath);
  });

  it("prefers quillwork.toml over .quillwork.toml", () => {
    const primary = path.join(tempDir, "quillwork.toml");
    fs.writeFileSync(primary, "concurrency = 2\n");
    fs.writeFileSync(path.join(tempDir, ".quillwork.toml"), "concurrency = 3\n");

    expect(findProjectConfig(tempDir)).toBe(primary);
  });

  it("searches parent directories", () => {
    const configPath = path.join(tempDir, ".quillwork.toml");
    fs.writeFileSync(configPath, "concurrency = 2\n");
    const nested = path.join(tempDir, "book", "drafts");
    fs.mkdirSync(nested, { recursive: true });

    expect(findProjectConfig(nested)).toBe(configPath);
  });

  it("ignores a directory with the config name", () => {
    fs.mkdirSync(path.join(tempDir, "quillwork.toml"));
    const found = findProjectConfig(tempDir);

    expect(found === undefined || !found.startsWith(tempDir)).toBe(true);
  });
});

describe("parseEnvConfig", () => {
  it("maps and coerces QUILLWORK_* variables", () => {
    expect(
      parseEnvConfig({
        QUILLWORK_CONCURRENCY: "4",
        QUILLWORK_CONTINUITY: "false",
        QUILLWORK_BUS_DEBUG: "1",
        QUILLWORK_LOG_LEVEL: "debug",
        UNRELATED: "x",
      })
    ).toEqual({
      concurrency: 4,
      continuity: false,
      bus: { debug: true },
      logging: { level: "debug" },
    });
  });

  it("skips empty values", () => {
    expect(parseEnvConfig({ QUILLWORK_CONCURRENCY: "" })).toEqual({});
  });

  it("passes unparseable numbers through for validation", () => {
    expect(parseEnvConfig({ QUILLWORK_PERSISTENCE_RETRIES: "many" })).toEqual({ persistenceRetries: "many" });
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(
      deepMerge(
        { bus: { debug: false, dispatch: "parallel" }, characters: [{ name: "Mira" }] },
        { bus: { debug: true }, characters: [{ name: "Oren" }] }
      )
    ).toEqual({ bus: { debug: true, dispatch: "parallel" }, characters: [{ name: "Oren" }] });
  });

  it("does not let undefined overwrite", () => {
    expect(deepMerge({ concurrency: 2 }, { concurrency: undefined })).toEqual({ concurrency: 2 });
  });

  it("skips non-object sources", () => {
    expect(deepMerge(null, [1], { a: 1 })).toEqual({ a: 1 });
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quillwork-load-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when nothing is configured", () => {
    const result = loadConfig({ skipProjectFile: true, env: {} });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.concurrency).toBe(1);
    }
  });

  it("layers file, environment and overrides", () => {
    const configPath = path.join(tempDir, "quillwork.toml");
    fs.writeFileSync(
      configPath,
      [
        "concurrency = 2",
        "maxRevisionRounds = 3",
        "",
        "[timeouts]",
        "composing = 9000",
        "",
        "[[characters]]",
        'name = "Mira"',
        "",
        "[rateLimits.anthropic]",
        "requestsPerMinute = 50",
        "",
      ].join("\n")
    );

    const result = loadConfig({
      cwd: tempDir,
      env: { QUILLWORK_CONCURRENCY: "3" },
      overrides: { maxRevisionRounds: 1 },
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.concurrency).toBe(3);
      expect(result.value.maxRevisionRounds).toBe(1);
      expect(result.value.timeouts.composing).toBe(9000);
      expect(result.value.timeouts.planning).toBe(120_000);
      expect(result.value.characters).toEqual([{ name: "Mira" }]);
      expect(result.value.rateLimits).toEqual({ anthropic: { requestsPerMinute: 50 } });
    }
  });

  it("reports a TOML syntax error", () => {
    const configPath = path.join(tempDir, "quillwork.toml");
    fs.writeFileSync(configPath, "concurrency = = 2");

    const result = loadConfig({ cwd: tempDir, env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PARSE_ERROR");
      expect(result.error.path).toBe(configPath);
    }
  });

  it("reports an explicit file that does not exist", () => {
    const missing = path.join(tempDir, "missing.toml");
    const result = loadConfig({ configPath: missing, env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ code: "FILE_NOT_FOUND", path: missing });
    }
  });

  it("reports validation issues with their paths", () => {
    const result = loadConfig({ skipProjectFile: true, env: { QUILLWORK_CONCURRENCY: "0" } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      expect(result.error.issues?.map((issue) => issue.path)).toEqual(["concurrency"]);

      const error = toConfigurationError(result.error);
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.issues[0]?.path).toBe("concurrency");
    }
  });
});
