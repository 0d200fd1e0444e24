/**
 * Sender module types
 */

import type { ValidatedRecord } from "../../types/data-model.js";
import type { SendError, SendErrorKind } from "../../utils/errors.js";

export interface SendOptions {
  url: string; // target endpoint
  timeoutMs: number;
}

/**
 * Result of POSTing one record
 */
export type SendOutcome =
  | { index: number; nom: string; ok: true; statusCode: number }
  | { index: number; nom: string; ok: false; error: SendError; record: ValidatedRecord };

export interface SendResult {
  outcomes: SendOutcome[];
  sent: number;
  failed: number;
}

/**
 * Entry of the send-errors staging file
 */
export interface SendFailureEntry {
  index: number;
  nom: string;
  kind: SendErrorKind;
  statusCode?: number;
  response?: string;
  error: string;
  record: ValidatedRecord; // body of the failed POST
}

export interface SendFileResult extends SendResult {
  errorsPath?: string; // written only when a send failed
}
