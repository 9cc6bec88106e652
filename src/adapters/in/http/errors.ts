import type { DomainError, DomainErrorType, ErrorStatusCode } from "../../../domain/models/errors.ts";
import { getErrorStatusCode } from "../../../domain/models/errors.ts";

/**
 * API error class for HTTP responses
 */
export class ApiError extends Error {
  status: ErrorStatusCode;
  type: DomainErrorType;

  constructor(message: string, status: ErrorStatusCode = 500, type: DomainErrorType = "server") {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.type = type;
  }
}

/**
 * Common interface for API error responses
 */
export interface ApiErrorResponse {
  status: "error";
  message: string;
}

export function createErrorResponse(message: string): ApiErrorResponse {
  return {
    status: "error",
    message,
  };
}

/**
 * Only the domain message reaches the caller; `details` stays server-side.
 */
export function domainErrorToResponse(error: DomainError): ApiErrorResponse {
  return createErrorResponse(error.message);
}

export function domainErrorToApiError(error: DomainError): ApiError {
  return new ApiError(error.message, getErrorStatusCode(error), error.type);
}
