import type { SentimentError } from "./sentiment.ts";

export type DomainErrorType =
  | "validation" // Validation error (400)
  | "parse" // Parse error (400)
  | "not_found" // Resource not found (404)
  | "method_not_allowed" // Wrong HTTP method (405)
  | "cancelled" // Caller abandoned the request (503)
  | "provider" // Remote provider failure (500)
  | "server"; // Server error (500)

export interface DomainError {
  type: DomainErrorType;
  message: string;
  details?: unknown;
}

export type ErrorStatusCode = 400 | 404 | 405 | 500 | 503;

export function getErrorStatusCode(error: DomainError): ErrorStatusCode {
  switch (error.type) {
    case "validation":
    case "parse":
      return 400;
    case "not_found":
      return 404;
    case "method_not_allowed":
      return 405;
    case "cancelled":
      return 503;
    case "provider":
    case "server":
    default:
      return 500;
  }
}

/**
 * Converts a pipeline error into a domain error.
 * Provider details stay in `details` and are never sent to HTTP callers.
 */
export function sentimentErrorToDomainError(error: SentimentError): DomainError {
  switch (error.type) {
    case "cancelled":
      return { type: "cancelled", message: "Request cancelled" };
    case "provider":
      return { type: "provider", message: "Internal error", details: error.cause };
  }
}
