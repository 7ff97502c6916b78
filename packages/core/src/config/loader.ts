import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@quillwork/shared";
import { ConfigurationError } from "../errors/index.js";
import { type PartialQuillworkConfig, type QuillworkConfig, QuillworkConfigSchema } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigLoadError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  issues?: Array<{ path: string; message: string }>;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Directory to start the project file search from (default: process.cwd()) */
  cwd?: string;
  /** Read this file instead of searching; a missing file is an error */
  configPath?: string;
  /** Highest priority */
  overrides?: PartialQuillworkConfig;
  /** Environment to read QUILLWORK_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  skipEnv?: boolean;
  skipProjectFile?: boolean;
}

// ============================================
// findProjectConfig
// ============================================

/** Searched in each directory, in order */
const CONFIG_FILE_NAMES = ["quillwork.toml", ".quillwork.toml"];

/**
 * Find the project configuration file by searching up from startDir.
 *
 * @example
 * ```typescript
 * const configPath = findProjectConfig("/books/saga/drafts");
 * // "/books/saga/quillwork.toml"
 * ```
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

type EnvKind = "number" | "boolean" | "string";

const ENV_MAPPINGS: Record<string, { path: string[]; kind: EnvKind }> = {
  QUILLWORK_CONCURRENCY: { path: ["concurrency"], kind: "number" },
  QUILLWORK_MAX_REVISION_ROUNDS: { path: ["maxRevisionRounds"], kind: "number" },
  QUILLWORK_CONTINUITY: { path: ["continuity"], kind: "boolean" },
  QUILLWORK_CHAPTER_TIMEOUT_MS: { path: ["chapterTimeoutMs"], kind: "number" },
  QUILLWORK_PERSISTENCE_RETRIES: { path: ["persistenceRetries"], kind: "number" },
  QUILLWORK_BUS_DEBUG: { path: ["bus", "debug"], kind: "boolean" },
  QUILLWORK_BUS_JOURNAL: { path: ["bus", "journalPath"], kind: "string" },
  QUILLWORK_LOG_LEVEL: { path: ["logging", "level"], kind: "string" },
  QUILLWORK_LOG_JSON: { path: ["logging", "json"], kind: "boolean" },
};

/**
 * Numbers that do not parse are passed through so validation reports them.
 */
function coerceValue(value: string, kind: EnvKind): unknown {
  switch (kind) {
    case "boolean":
      return value === "true" || value === "1";
    case "number": {
      const parsed = Number(value);
      return Number.isNaN(parsed) ? value : parsed;
    }
    default:
      return value;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

function setNestedValue(target: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) return;

  if (rest.length === 0) {
    target[head] = value;
    return;
  }

  const existing = target[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  target[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Parse QUILLWORK_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ QUILLWORK_CONCURRENCY: "4", QUILLWORK_LOG_JSON: "1" });
 * // { concurrency: 4, logging: { json: true } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, mapping.path, coerceValue(value, mapping.kind));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Deep merge plain objects. Later sources override earlier ones, arrays are
 * replaced, and undefined values don't overwrite.
 *
 * @example
 * ```typescript
 * deepMerge({ bus: { debug: false }, concurrency: 1 }, { bus: { debug: true } });
 * // { bus: { debug: true }, concurrency: 1 }
 * ```
 */
export function deepMerge(...sources: readonly unknown[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigLoadError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Project file: `configPath`, or `findProjectConfig(cwd)`
 * 3. QUILLWORK_* environment variables
 * 4. `overrides`
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { concurrency: 2 } });
 * if (result.ok) {
 *   console.log(result.value.maxRevisionRounds);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<QuillworkConfig, ConfigLoadError> {
  const { cwd, configPath, overrides, env, skipEnv = false, skipProjectFile = false } = options;
  const sources: unknown[] = [];

  if (!skipProjectFile) {
    const projectPath = configPath ?? findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      sources.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    sources.push(parseEnvConfig(env));
  }

  if (overrides) {
    sources.push(overrides);
  }

  const parseResult = QuillworkConfigSchema.safeParse(deepMerge(...sources));
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}

/**
 * Lift a load error into the error taxonomy, for callers that throw.
 */
export function toConfigurationError(error: ConfigLoadError): ConfigurationError {
  return new ConfigurationError(
    error.message,
    error.issues ?? [{ path: error.path ?? "config", message: error.message }]
  );
}
