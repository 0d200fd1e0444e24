/**
 * Configuration types for the animal pipeline
 */

import type { LogLevel } from "../utils/logger.js";

/**
 * PipelineConfig - fully resolved settings, after merging CLI flags,
 * environment and config file over the defaults
 */
export interface PipelineConfig {
  apiUrl: string; // target endpoint receiving one POST per record
  httpTimeoutMs: number; // applied to every HTTP call
  gbifApiUrl: string;
  gbifRateLimitDelayMs: number; // spacing between paged GBIF requests
  logLevel: LogLevel;
  rawDataDir: string;
  processedDataDir: string;
  maxAnimalsPerClass: number;
  maxRecordsLimit: number;
  productionMode: boolean;
}

/**
 * TargetApiSection - `api` section of a config file
 */
export interface TargetApiSection {
  url?: string;
  timeoutSeconds?: number;
}

/**
 * GbifSection - `gbif` section of a config file
 */
export interface GbifSection {
  url?: string;
  rateLimitDelaySeconds?: number;
  maxAnimalsPerClass?: number;
  maxRecordsLimit?: number;
}

/**
 * StagingSection - `staging` section of a config file
 */
export interface StagingSection {
  rawDataDir?: string;
  processedDataDir?: string;
}

/**
 * PipelineConfigFile - shape of a JSON or YAML config file. Every key is
 * optional.
 */
export interface PipelineConfigFile {
  api?: TargetApiSection;
  gbif?: GbifSection;
  staging?: StagingSection;
  logLevel?: string;
  productionMode?: boolean;
}

/**
 * CliConfigOptions - global CLI flags that override configuration
 */
export type CliConfigOptions = {
  config?: string;
  logLevel?: string;
  apiUrl?: string;
  gbifUrl?: string;
  timeout?: string; // seconds, as typed on the command line
  rawDir?: string;
  processedDir?: string;
  production?: boolean;
};
