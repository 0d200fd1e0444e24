/**
 * Configuration loader for the pipeline
 *
 * Precedence: CLI flags > environment > config file > defaults
 */

import type {
  CliConfigOptions,
  PipelineConfig,
  PipelineConfigFile,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger, parseLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  apiUrl: "http://localhost:3000/animaux",
  httpTimeoutMs: 30_000,
  gbifApiUrl: "https://api.gbif.org/v1",
  gbifRateLimitDelayMs: 200,
  logLevel: "info",
  rawDataDir: "data/raw",
  processedDataDir: "data/processed",
  maxAnimalsPerClass: 100,
  maxRecordsLimit: 500,
  productionMode: false,
};

export type EnvSource = Record<string, string | undefined>;

export interface ConfigSources {
  cli?: CliConfigOptions;
  env?: EnvSource;
  file?: PipelineConfigFile;
}

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`, { [name]: value });
  }
  return num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim().toLowerCase() === "true";
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

function resolveLogLevel(name: string, value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(`${name} must be one of error, warn, info, debug; got "${value}"`, {
      [name]: value,
    });
  }
  return level;
}

/**
 * Load pipeline configuration from CLI options, environment and config file
 *
 * @example
 * const config = loadPipelineConfig({
 *   cli: { timeout: "5" },
 *   env: { HTTP_TIMEOUT: "10" },
 * });
 * // config.httpTimeoutMs === 5000 (CLI takes precedence)
 */
export function loadPipelineConfig(sources: ConfigSources = {}): PipelineConfig {
  const cli = sources.cli ?? {};
  const env = sources.env ?? {};
  const file = sources.file ?? {};
  const defaults = DEFAULT_PIPELINE_CONFIG;

  const config: PipelineConfig = {
    apiUrl: cli.apiUrl ?? env.API_URL ?? file.api?.url ?? defaults.apiUrl,

    httpTimeoutMs:
      secondsToMs(parseNumber("--timeout", cli.timeout)) ??
      secondsToMs(parseNumber("HTTP_TIMEOUT", env.HTTP_TIMEOUT)) ??
      secondsToMs(file.api?.timeoutSeconds) ??
      defaults.httpTimeoutMs,

    gbifApiUrl: cli.gbifUrl ?? env.GBIF_API_URL ?? file.gbif?.url ?? defaults.gbifApiUrl,

    gbifRateLimitDelayMs:
      secondsToMs(parseNumber("GBIF_RATE_LIMIT_DELAY", env.GBIF_RATE_LIMIT_DELAY)) ??
      secondsToMs(file.gbif?.rateLimitDelaySeconds) ??
      defaults.gbifRateLimitDelayMs,

    logLevel:
      resolveLogLevel("--log-level", cli.logLevel) ??
      resolveLogLevel("LOG_LEVEL", env.LOG_LEVEL) ??
      resolveLogLevel("logLevel", file.logLevel) ??
      defaults.logLevel,

    rawDataDir: cli.rawDir ?? env.RAW_DATA_DIR ?? file.staging?.rawDataDir ?? defaults.rawDataDir,

    processedDataDir:
      cli.processedDir ??
      env.PROCESSED_DATA_DIR ??
      file.staging?.processedDataDir ??
      defaults.processedDataDir,

    maxAnimalsPerClass:
      parseNumber("MAX_ANIMALS_PER_FAMILY", env.MAX_ANIMALS_PER_FAMILY) ??
      file.gbif?.maxAnimalsPerClass ??
      defaults.maxAnimalsPerClass,

    maxRecordsLimit:
      parseNumber("MAX_RECORDS_LIMIT", env.MAX_RECORDS_LIMIT) ??
      file.gbif?.maxRecordsLimit ??
      defaults.maxRecordsLimit,

    productionMode:
      (cli.production || undefined) ??
      parseBoolean(env.PRODUCTION_MODE) ??
      file.productionMode ??
      defaults.productionMode,
  };

  // Production mode never emits debug output
  if (config.productionMode && config.logLevel === "debug") {
    config.logLevel = "info";
  }

  validatePipelineConfig(config);

  logger.debug("Pipeline config loaded", {
    apiUrl: config.apiUrl,
    gbifApiUrl: config.gbifApiUrl,
    httpTimeoutMs: config.httpTimeoutMs,
  });

  return config;
}

/**
 * Check that a string is an absolute http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return url.protocol === "http:" || url.protocol === "https:";
}

/**
 * Validate pipeline configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  if (!isHttpUrl(config.apiUrl)) {
    throw new ConfigError(`apiUrl must be an http(s) URL, got "${config.apiUrl}"`, {
      apiUrl: config.apiUrl,
    });
  }

  if (!isHttpUrl(config.gbifApiUrl)) {
    throw new ConfigError(`gbifApiUrl must be an http(s) URL, got "${config.gbifApiUrl}"`, {
      gbifApiUrl: config.gbifApiUrl,
    });
  }

  if (config.httpTimeoutMs <= 0) {
    throw new ConfigError(`HTTP timeout must be > 0 ms, got ${config.httpTimeoutMs}`);
  }

  if (config.gbifRateLimitDelayMs < 0) {
    throw new ConfigError(
      `GBIF rate limit delay must be >= 0 ms, got ${config.gbifRateLimitDelayMs}`,
    );
  }

  if (!Number.isInteger(config.maxAnimalsPerClass) || config.maxAnimalsPerClass < 1) {
    throw new ConfigError(
      `maxAnimalsPerClass must be a positive integer, got ${config.maxAnimalsPerClass}`,
    );
  }

  if (!Number.isInteger(config.maxRecordsLimit) || config.maxRecordsLimit < 1) {
    throw new ConfigError(
      `maxRecordsLimit must be a positive integer, got ${config.maxRecordsLimit}`,
    );
  }
}

/**
 * Log the effective configuration, one line per setting
 */
export function displayConfig(config: PipelineConfig): void {
  logger.info("Pipeline configuration");
  for (const [key, value] of Object.entries(config)) {
    logger.info(`  ${key}: ${String(value)}`);
  }
}
