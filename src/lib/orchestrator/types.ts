/**
 * Orchestrator module types
 */

import type { PipelineCounts } from "../../types/data-model.js";
import type { PipelineConfig } from "../../types/config.js";
import type { HttpClient } from "../utils/http-client.js";
import type { PipelineError } from "../../utils/errors.js";

export const PIPELINE_STAGES = ["fetch", "transform", "validate", "send"] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type PipelineStatus = "Completed" | "CompletedWithErrors" | "Aborted";

export type PipelineSettings = Pick<
  PipelineConfig,
  "apiUrl" | "httpTimeoutMs" | "gbifApiUrl" | "rawDataDir" | "processedDataDir"
>;

export interface PipelineDeps {
  config: PipelineSettings;
  http: HttpClient;
}

/**
 * Files written by the stages that ran
 */
export interface PipelineArtifacts {
  raw?: string;
  transformed?: string;
  validated?: string;
  rejected?: string;
  sendErrors?: string;
}

export interface PipelineSummary {
  species: string;
  status: PipelineStatus;
  counts: PipelineCounts;
  artifacts: PipelineArtifacts;
  failedStage?: PipelineStage;
  error?: PipelineError;
}
