/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { PipelineConfigFile } from "../../types/config.js";
import { createAjv } from "../../lib/validator/schema-validator.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const urlSection = {
  type: "object",
  properties: {
    url: { type: "string" },
  },
};

const configFileSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    api: {
      ...urlSection,
      additionalProperties: false,
      properties: {
        ...urlSection.properties,
        timeoutSeconds: { type: "number", exclusiveMinimum: 0 },
      },
    },
    gbif: {
      ...urlSection,
      additionalProperties: false,
      properties: {
        ...urlSection.properties,
        rateLimitDelaySeconds: { type: "number", minimum: 0 },
        maxAnimalsPerClass: { type: "integer", minimum: 1 },
        maxRecordsLimit: { type: "integer", minimum: 1 },
      },
    },
    staging: {
      type: "object",
      additionalProperties: false,
      properties: {
        rawDataDir: { type: "string", minLength: 1 },
        processedDataDir: { type: "string", minLength: 1 },
      },
    },
    logLevel: { type: "string" },
    productionMode: { type: "boolean" },
  },
};

const validateConfigFile = createAjv().compile<PipelineConfigFile>(configFileSchema);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): PipelineConfigFile {
  logger.debug("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!validateConfigFile(parsed)) {
    const problems = (validateConfigFile.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file: ${filePath}`, { filePath, problems });
  }

  logger.debug("Configuration file parsed successfully", {
    hasApiSection: !!parsed.api,
    hasGbifSection: !!parsed.gbif,
    hasStagingSection: !!parsed.staging,
  });

  return parsed;
}
