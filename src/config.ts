import { readFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import { CONFIG_FILENAME, DEFAULT_HOST } from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError, errorMessage } from "./shared/errors.js";
import {
  initLogger,
  isLogFormat,
  isLogLevel,
  type LogFormat,
  type LogLevel,
  type Logger,
} from "./shared/logging.js";

/** Shape of `docbridge.json`. */
export const ConfigFileSchema = type({
  "+": "reject",
  "host?": "string",
  "strictConversion?": "boolean",
  "log?": {
    "+": "reject",
    "level?": "'error' | 'warn' | 'info' | 'debug'",
    "format?": "'text' | 'json' | 'plain'",
  },
});

export type ConfigFile = typeof ConfigFileSchema.infer;

export interface BridgeConfig {
  host: string;
  strictConversion: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export const DEFAULT_CONFIG: BridgeConfig = {
  host: DEFAULT_HOST,
  strictConversion: false,
  logLevel: "info",
  logFormat: "text",
};

export interface ResolveConfigOptions {
  /** Defaults to `docbridge.json` in the working directory. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<BridgeConfig>;
}

export function getConfigPath(dir: string = process.cwd()): string {
  return path.join(dir, CONFIG_FILENAME);
}

export function parseConfigFile(data: unknown, source = CONFIG_FILENAME): ConfigFile {
  const out = ConfigFileSchema(data);
  if (out instanceof type.errors) {
    throw new ConfigError(`Invalid ${source}: ${out.summary}`);
  }
  return out;
}

/** Read and validate a config file. A missing file is an empty config. */
export async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") return {};
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`);
  }
  return parseConfigFile(data, configPath);
}

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function envConfig(env: NodeJS.ProcessEnv): Partial<BridgeConfig> {
  const out: Partial<BridgeConfig> = {};
  const host = getEnv("HOST", env);
  if (host) out.host = host;

  const strict = getEnv("STRICT_CONVERSION", env);
  if (strict) out.strictConversion = parseBoolean("DOCBRIDGE_STRICT_CONVERSION", strict);

  const level = getEnv("LOG_LEVEL", env);
  if (level) {
    if (!isLogLevel(level)) throw new ConfigError(`DOCBRIDGE_LOG_LEVEL: unknown level "${level}"`);
    out.logLevel = level;
  }

  const format = getEnv("LOG_FORMAT", env);
  if (format) {
    if (!isLogFormat(format)) throw new ConfigError(`DOCBRIDGE_LOG_FORMAT: unknown format "${format}"`);
    out.logFormat = format;
  }
  return out;
}

function definedOnly(config: Partial<BridgeConfig>): Partial<BridgeConfig> {
  const out: Partial<BridgeConfig> = {};
  if (config.host !== undefined) out.host = config.host;
  if (config.strictConversion !== undefined) out.strictConversion = config.strictConversion;
  if (config.logLevel !== undefined) out.logLevel = config.logLevel;
  if (config.logFormat !== undefined) out.logFormat = config.logFormat;
  return out;
}

/** Defaults < config file < environment < explicit overrides. */
export async function resolveConfig(opts: ResolveConfigOptions = {}): Promise<BridgeConfig> {
  const file = await readConfigFile(opts.configPath ?? getConfigPath());
  const fromFile: Partial<BridgeConfig> = {
    host: file.host,
    strictConversion: file.strictConversion,
    logLevel: file.log?.level,
    logFormat: file.log?.format,
  };
  return {
    ...DEFAULT_CONFIG,
    ...definedOnly(fromFile),
    ...envConfig(opts.env ?? process.env),
    ...definedOnly(opts.overrides ?? {}),
  };
}

export function configureLogging(config: BridgeConfig): Logger {
  return initLogger(config.logLevel, config.logFormat);
}
