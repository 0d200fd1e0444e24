/**
 * Sender module - POSTs validated records to the target API, one request
 * per record
 */

import { join } from "path";
import type {
  SendFailureEntry,
  SendFileResult,
  SendOptions,
  SendOutcome,
  SendResult,
} from "./types.js";
import type { ValidatedRecord } from "../../types/data-model.js";
import type { HttpClient } from "../utils/http-client.js";
import { classifyHttpError, isSuccessStatus } from "../utils/http-client.js";
import { validateRecords } from "../validator/index.js";
import { ErrorCode, PipelineError, SendError } from "../../utils/errors.js";
import { loadJSONArray, writeJSONFile } from "../../utils/staging.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export const SEND_ERRORS_FILE_NAME = "send_errors.json";

// Response bodies kept in error reports are cut to this length
const MAX_RESPONSE_LENGTH = 2000;

function responseText(data: unknown): string {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? "";
  return text.length > MAX_RESPONSE_LENGTH ? `${text.slice(0, MAX_RESPONSE_LENGTH)}…` : text;
}

/**
 * POST one record. Never throws: every failure becomes a SendError outcome.
 */
export async function sendRecord(
  http: HttpClient,
  record: ValidatedRecord,
  index: number,
  options: SendOptions,
): Promise<SendOutcome> {
  const nom = record.nom;
  try {
    const response = await http.post<unknown>(options.url, record, {
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      // every status resolves; success is decided below
      validateStatus: () => true,
    });

    if (isSuccessStatus(response.status)) {
      return { index, nom, ok: true, statusCode: response.status };
    }

    return {
      index,
      nom,
      ok: false,
      record,
      error: new SendError(`Target API answered ${response.status} for "${nom}"`, {
        kind: "HTTP_ERROR",
        statusCode: response.status,
        response: responseText(response.data),
      }),
    };
  } catch (err) {
    const failure = classifyHttpError(err);
    return {
      index,
      nom,
      ok: false,
      record,
      error: new SendError(
        failure.kind === "TIMEOUT"
          ? `Timed out after ${options.timeoutMs}ms sending "${nom}"`
          : `Failed to send "${nom}": ${failure.message}`,
        { kind: failure.kind, statusCode: failure.statusCode },
        { cause: err },
      ),
    };
  }
}

/**
 * POST every record in order. A failed record is recorded and the batch
 * continues; nothing is retried.
 */
export async function sendRecords(
  http: HttpClient,
  records: readonly ValidatedRecord[],
  options: SendOptions,
): Promise<SendResult> {
  const outcomes: SendOutcome[] = [];
  const total = records.length;

  logger.info("Sending records", { url: options.url, count: total });

  for (const [index, record] of records.entries()) {
    const outcome = await sendRecord(http, record, index, options);
    outcomes.push(outcome);

    if (outcome.ok) {
      logger.info(`[${index + 1}/${total}] Sent: ${outcome.nom}`, {
        statusCode: outcome.statusCode,
      });
    } else {
      logger.error(`[${index + 1}/${total}] Send failed: ${outcome.nom}`, {
        kind: outcome.error.kind,
        statusCode: outcome.error.statusCode,
        error: outcome.error.message,
      });
    }
  }

  const sent = outcomes.filter((outcome) => outcome.ok).length;
  const failed = outcomes.length - sent;
  logger.info("Send complete", { sent, failed, total });

  return { outcomes, sent, failed };
}

/**
 * Entries of the send-errors report for the failed outcomes
 */
export function toFailureEntries(outcomes: readonly SendOutcome[]): SendFailureEntry[] {
  const entries: SendFailureEntry[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) continue;
    const { error } = outcome;
    entries.push({
      index: outcome.index,
      nom: outcome.nom,
      kind: error.kind,
      ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {}),
      ...(error.response !== undefined ? { response: error.response } : {}),
      error: error.message,
      record: outcome.record,
    });
  }
  return entries;
}

/**
 * Send the records of a validated staging file. When any send fails, the
 * failures are written to `send_errors.json` in `errorsDir`.
 */
export async function sendFile(
  http: HttpClient,
  inputPath: string,
  errorsDir: string,
  options: SendOptions,
): Promise<SendFileResult> {
  const entries = await loadJSONArray(inputPath, "Validated records");
  const { validated, rejected } = validateRecords(entries);
  if (rejected.length > 0) {
    throw new PipelineError(
      ErrorCode.INPUT_READ_ERROR,
      `${inputPath} holds ${rejected.length} record(s) that do not match the canonical schema`,
      { inputPath, firstReason: rejected[0]?.reason },
    );
  }

  const result = await sendRecords(http, validated, options);
  if (result.failed === 0) {
    return result;
  }

  const errorsPath = join(errorsDir, SEND_ERRORS_FILE_NAME);
  await writeJSONFile(errorsPath, toFailureEntries(result.outcomes));
  logger.warn("Send errors written", { errorsPath, failed: result.failed });
  return { ...result, errorsPath };
}
