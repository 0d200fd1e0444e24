/**
 * Standard error classes for the pipeline
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  FETCH_ERROR = "FETCH_ERROR",
  TRANSFORM_ERROR = "TRANSFORM_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  SEND_ERROR = "SEND_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class PipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PipelineError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: describeCause(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends PipelineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * A species could not be fetched or its response could not be parsed
 */
export class FetchError extends PipelineError {
  constructor(
    public readonly species: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.FETCH_ERROR, message, { species }, options);
    this.name = "FetchError";
  }
}

/**
 * A raw payload was not valid JSON, or not a JSON object
 */
export class TransformError extends PipelineError {
  constructor(
    public readonly source: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.TRANSFORM_ERROR, message, { source }, options);
    this.name = "TransformError";
  }
}

export type SendErrorKind =
  | "HTTP_ERROR"
  | "TIMEOUT"
  | "CONNECTION_ERROR"
  | "UNEXPECTED_ERROR";

export interface SendErrorInfo {
  kind: SendErrorKind;
  statusCode?: number;
  response?: string;
}

/**
 * Delivery of one record to the target API failed. Recorded per record,
 * never thrown out of a batch.
 */
export class SendError extends PipelineError {
  public readonly kind: SendErrorKind;
  public readonly statusCode?: number;
  public readonly response?: string;

  constructor(message: string, info: SendErrorInfo, options?: ErrorOptions) {
    super(
      ErrorCode.SEND_ERROR,
      message,
      {
        kind: info.kind,
        ...(info.statusCode !== undefined ? { statusCode: info.statusCode } : {}),
      },
      options,
    );
    this.name = "SendError";
    this.kind = info.kind;
    this.statusCode = info.statusCode;
    this.response = info.response;
  }
}

/**
 * Render an unknown thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}

/**
 * Wrap anything thrown into a PipelineError, keeping known subclasses as-is
 */
export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  return new PipelineError(ErrorCode.GENERAL_ERROR, errorMessage(error), undefined, {
    cause: error,
  });
}

/**
 * CLI exit code for an error
 */
export function exitCodeFor(error: PipelineError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.INPUT_READ_ERROR:
      return 4;
    default:
      return 1;
  }
}
