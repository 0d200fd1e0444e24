/**
 * Shared HTTP client configuration
 *
 * Every stage talks JSON over HTTP through an axios instance created here,
 * so timeouts and request logging are applied in one place.
 */

import axios, { AxiosError, type AxiosInstance } from "axios";
import type { SendErrorKind } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * The subset of axios the stages use. Tests substitute a fake.
 */
export type HttpClient = Pick<AxiosInstance, "get" | "post">;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent?: string;
}

/**
 * Create a configured axios instance. The timeout applies to each request.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    timeout: options.timeoutMs,
    headers: {
      Accept: "application/json",
      "User-Agent": options.userAgent ?? "animalia-etl/0.1.0",
    },
  });

  client.interceptors.request.use((requestConfig) => {
    logger.debug("HTTP request", {
      method: requestConfig.method,
      url: requestConfig.url,
      params: requestConfig.params,
    });
    return requestConfig;
  });

  return client;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ERR_NETWORK",
]);

export interface HttpFailure {
  kind: SendErrorKind;
  message: string;
  statusCode?: number;
}

/**
 * Classify something thrown by an HTTP call
 */
export function classifyHttpError(error: unknown): HttpFailure {
  if (error instanceof AxiosError) {
    if (error.response) {
      return {
        kind: "HTTP_ERROR",
        statusCode: error.response.status,
        message: `HTTP ${error.response.status}`,
      };
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { kind: "TIMEOUT", message: error.message };
    }
    if (error.code && CONNECTION_CODES.has(error.code)) {
      return { kind: "CONNECTION_ERROR", message: error.message };
    }
  }
  return {
    kind: "UNEXPECTED_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * True for any 2xx status
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
