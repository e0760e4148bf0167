// src/utils/apiError.ts

import type { FastifyBaseLogger, FastifyReply } from "fastify";

import {
  PipelineError,
  RateLimitedError,
  SessionConflictError,
  SessionValidationError,
  UploadIncompleteError,
} from "./errors.js";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export const API_ERROR_CODES = [
  "INVALID_REQUEST_BODY",
  "INVALID_UPLOAD_ID",
  "INVALID_ASSET_ID",
  "INVALID_CHUNK",
  "CHUNK_STREAM_ERROR",
  "UPLOAD_NOT_FOUND",
  "INVALID_UPLOAD_REQUEST",
  "UPLOAD_CONFLICT",
  "INVALID_UPLOAD_STATE",
  "INVALID_TRANSITION",
  "UPLOAD_INCOMPLETE",
  "RATE_LIMITED",
  "CHECKSUM_MISMATCH",
  "CHUNK_TOO_LARGE",
  "CHUNK_SIZE_MISMATCH",
  "STORAGE_ERROR",
  "ASSET_NOT_FOUND",
  "INTERNAL_ERROR",
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

const STATUS_BY_CODE: Partial<Record<ApiErrorCode, number>> = {
  UPLOAD_NOT_FOUND: 404,
  ASSET_NOT_FOUND: 404,
  UPLOAD_CONFLICT: 409,
  INVALID_UPLOAD_STATE: 409,
  INVALID_TRANSITION: 409,
  INVALID_UPLOAD_REQUEST: 400,
  UPLOAD_INCOMPLETE: 400,
  RATE_LIMITED: 429,
  CHECKSUM_MISMATCH: 400,
  CHUNK_TOO_LARGE: 400,
  CHUNK_SIZE_MISMATCH: 400,
  STORAGE_ERROR: 500,
};

function isApiErrorCode(code: string): code is ApiErrorCode {
  return API_ERROR_CODES.some((c) => c === code);
}

function detailsOf(err: PipelineError): Record<string, unknown> | undefined {
  if (err instanceof SessionConflictError) return { holderId: err.holderId };
  if (err instanceof SessionValidationError) return { field: err.field };
  if (err instanceof UploadIncompleteError) return { missingChunks: err.missingChunks };
  if (err instanceof RateLimitedError) {
    return { limit: err.limit, max: err.max, retryAfterSeconds: err.retryAfterSeconds };
  }
  return undefined;
}

/**
 * Converts anything a service threw into an API error reply. Unknown errors
 * are logged and reported without their message.
 */
export function sendServiceError(reply: FastifyReply, log: FastifyBaseLogger, err: unknown) {
  if (err instanceof PipelineError && isApiErrorCode(err.code)) {
    const status = STATUS_BY_CODE[err.code];
    if (status !== undefined) {
      if (status >= 500) log.error({ err }, "Service error");
      if (err instanceof RateLimitedError && err.retryAfterSeconds !== null) {
        reply.header("Retry-After", String(err.retryAfterSeconds));
      }
      return sendApiError(reply, status, err.code, err.message, {
        retryable: err.disposition === "transient" || err.code === "UPLOAD_INCOMPLETE",
        details: detailsOf(err),
      });
    }
  }

  log.error({ err }, "Unexpected service error");
  return sendApiError(reply, 500, "INTERNAL_ERROR", "Unexpected server error", {
    retryable: true,
  });
}
