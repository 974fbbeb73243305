import { isSelectionMode, SELECTION_MODES, type SelectionMode } from "./core/selector.js";
import { DEFAULT_TIE_BREAKER } from "./core/query.js";
import { DEFAULT_MAX_DOCUMENT_BYTES } from "./corpus/loader.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./logging.js";
import type { FieldError } from "./http/problem.js";
import { pushErr } from "./http/validation.js";

export interface AppConfig {
  port: number;
  /** directory holding the .txt art files */
  artRoot: string;
  maxDocumentBytes: number;
  selection: SelectionMode;
  tieBreaker: number;
  logLevel: LogLevel;
  logFormat: "json" | "pretty";
}

export class ConfigError extends Error {
  constructor(readonly errors: FieldError[]) {
    super(`invalid configuration: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, errors: FieldError[]): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    pushErr(errors, key, "must be an integer");
    return fallback;
  }
  return n;
}

/** Reads `PORT`, `ART_ROOT`, `MAX_DOCUMENT_BYTES`, `SELECTION_MODE`, `TIE_BREAKER`, `LOG_LEVEL`, `LOG_FORMAT`. */
export function loadConfig(env: Env = process.env): AppConfig {
  const errors: FieldError[] = [];

  const port = readInt(env, "PORT", 3000, errors);
  if (port < 0 || port > 65535) pushErr(errors, "PORT", "must be between 0 and 65535");

  const maxDocumentBytes = readInt(env, "MAX_DOCUMENT_BYTES", DEFAULT_MAX_DOCUMENT_BYTES, errors);
  if (maxDocumentBytes < 1) pushErr(errors, "MAX_DOCUMENT_BYTES", "must be positive");

  let selection: SelectionMode = "random";
  const rawSelection = env.SELECTION_MODE || selection;
  if (isSelectionMode(rawSelection)) selection = rawSelection;
  else pushErr(errors, "SELECTION_MODE", `must be one of: ${SELECTION_MODES.join(", ")}`);

  const tieBreaker = env.TIE_BREAKER ? Number(env.TIE_BREAKER) : DEFAULT_TIE_BREAKER;
  if (!Number.isFinite(tieBreaker) || tieBreaker < 0 || tieBreaker > 1) pushErr(errors, "TIE_BREAKER", "must be a number between 0 and 1");

  let logLevel: LogLevel = "info";
  const rawLogLevel = env.LOG_LEVEL || logLevel;
  if (isLogLevel(rawLogLevel)) logLevel = rawLogLevel;
  else pushErr(errors, "LOG_LEVEL", `must be one of: ${LOG_LEVELS.join(", ")}`);

  let logFormat: AppConfig["logFormat"] = "pretty";
  const rawLogFormat = env.LOG_FORMAT || logFormat;
  if (rawLogFormat === "json" || rawLogFormat === "pretty") logFormat = rawLogFormat;
  else pushErr(errors, "LOG_FORMAT", "must be one of: json, pretty");

  if (errors.length) throw new ConfigError(errors);

  return {
    port,
    artRoot: env.ART_ROOT || "./art",
    maxDocumentBytes,
    selection,
    tieBreaker,
    logLevel,
    logFormat,
  };
}
