/**
 * Orchestrator module - runs fetch → transform → validate → send for one
 * species, stopping at the first stage that fails outright
 */

import { access } from "fs/promises";
import { join } from "path";
import type {
  PipelineArtifacts,
  PipelineDeps,
  PipelineStage,
  PipelineStatus,
  PipelineSummary,
} from "./types.js";
import { PIPELINE_STAGES } from "./types.js";
import type { PipelineCounts } from "../../types/data-model.js";
import { GbifClient } from "../fetcher/gbif-client.js";
import { fetchSpecies } from "../fetcher/index.js";
import { transformFiles } from "../transformer/index.js";
import { validateFile } from "../validator/index.js";
import { sendFile } from "../sender/index.js";
import {
  ErrorCode,
  FileIOError,
  PipelineError,
  toPipelineError,
} from "../../utils/errors.js";
import { speciesFileStem } from "../../utils/staging.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export const DEFAULT_SPECIES = "Cervus elaphus";

/**
 * Thrown inside a run to stop it; carries the stage that failed
 */
class StageFailure extends Error {
  constructor(
    public readonly stage: PipelineStage,
    public readonly error: PipelineError,
  ) {
    super(error.message);
    this.name = "StageFailure";
  }
}

async function runStage<T>(stage: PipelineStage, work: () => Promise<T>): Promise<T> {
  const position = PIPELINE_STAGES.indexOf(stage) + 1;
  logger.info(`Stage ${position}/${PIPELINE_STAGES.length}: ${stage}`);
  try {
    return await work();
  } catch (err) {
    throw new StageFailure(stage, toPipelineError(err));
  }
}

async function requireFile(path: string, producedBy: PipelineStage): Promise<void> {
  try {
    await access(path);
  } catch (err) {
    throw new FileIOError(`Output of the ${producedBy} stage is missing: ${path}`, { path }, {
      cause: err,
    });
  }
}

function emptyCounts(): PipelineCounts {
  return { fetched: 0, transformed: 0, validated: 0, rejected: 0, sent: 0, failed: 0 };
}

/**
 * Run the whole pipeline for one species. Never throws: a stage failure is
 * reported as an `Aborted` summary naming the stage.
 */
export async function runPipeline(
  species: string,
  deps: PipelineDeps,
): Promise<PipelineSummary> {
  const { config, http } = deps;
  const counts = emptyCounts();
  const artifacts: PipelineArtifacts = {};
  const stem = speciesFileStem(species);

  logger.info(`Starting pipeline for "${species}"`);

  try {
    const fetched = await runStage("fetch", async () => {
      const gbif = new GbifClient(http, config.gbifApiUrl);
      return fetchSpecies(gbif, species, config.rawDataDir);
    });
    counts.fetched = 1;
    artifacts.raw = fetched.path;

    const transformed = await runStage("transform", async () => {
      await requireFile(fetched.path, "fetch");
      const result = await transformFiles(
        [fetched.path],
        join(config.processedDataDir, `${stem}_transformed.json`),
      );
      if (result.records.length === 0) {
        throw new PipelineError(ErrorCode.TRANSFORM_ERROR, `No records produced for "${species}"`);
      }
      return result;
    });
    counts.transformed = transformed.records.length;
    artifacts.transformed = transformed.outputPath;

    const validation = await runStage("validate", async () => {
      await requireFile(transformed.outputPath, "transform");
      const result = await validateFile(transformed.outputPath, config.processedDataDir);
      counts.validated = result.validated.length;
      counts.rejected = result.rejected.length;
      artifacts.validated = result.validatedPath;
      artifacts.rejected = result.rejectedPath;
      if (result.validated.length === 0) {
        throw new PipelineError(
          ErrorCode.VALIDATION_ERROR,
          `No valid record for "${species}" after validation`,
          { rejected: result.rejected.length, rejectedPath: result.rejectedPath },
        );
      }
      return result;
    });

    const delivery = await runStage("send", async () => {
      await requireFile(validation.validatedPath, "validate");
      return sendFile(http, validation.validatedPath, config.processedDataDir, {
        url: config.apiUrl,
        timeoutMs: config.httpTimeoutMs,
      });
    });
    counts.sent = delivery.sent;
    counts.failed = delivery.failed;
    if (delivery.errorsPath) {
      artifacts.sendErrors = delivery.errorsPath;
    }
  } catch (err) {
    if (!(err instanceof StageFailure)) throw err;
    logger.error(`Pipeline aborted at ${err.stage} stage`, {
      species,
      code: err.error.code,
      error: err.error.message,
    });
    const summary: PipelineSummary = {
      species,
      status: "Aborted",
      counts,
      artifacts,
      failedStage: err.stage,
      error: err.error,
    };
    logSummary(summary);
    return summary;
  }

  const status: PipelineStatus =
    counts.rejected > 0 || counts.failed > 0 ? "CompletedWithErrors" : "Completed";
  const summary: PipelineSummary = { species, status, counts, artifacts };
  logSummary(summary);
  return summary;
}

/**
 * Log the final counts of a run
 */
export function logSummary(summary: PipelineSummary): void {
  const { counts } = summary;
  const line =
    `fetched=${counts.fetched} transformed=${counts.transformed} ` +
    `validated=${counts.validated} rejected=${counts.rejected} ` +
    `sent=${counts.sent} failed=${counts.failed}`;

  if (summary.status === "Aborted") {
    logger.error(`Pipeline ${summary.status} (${summary.failedStage ?? "unknown"}): ${line}`);
  } else if (summary.status === "CompletedWithErrors") {
    logger.warn(`Pipeline ${summary.status}: ${line}`);
  } else {
    logger.info(`Pipeline ${summary.status}: ${line}`);
  }
}

/**
 * JSON-friendly view of a summary for CLI output
 */
export function summaryToReport(summary: PipelineSummary) {
  return {
    species: summary.species,
    status: summary.status,
    counts: summary.counts,
    artifacts: summary.artifacts,
    ...(summary.failedStage ? { failedStage: summary.failedStage } : {}),
    ...(summary.error ? { error: summary.error.toResponse(summary.failedStage ?? "pipeline").error } : {}),
  };
}
