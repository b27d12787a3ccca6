/**
 * Engagement error taxonomy.
 *
 * Every expected failure of selection, aggregation, feedback capture or
 * persistence is raised as an EngagementError. The message is written for
 * the chat user; the code is for logs and HTTP responses.
 */

export type EngagementErrorCode =
  | "EMPTY_CANDIDATE_SET"
  | "INSUFFICIENT_DATA"
  | "NO_REFERENCE"
  | "NO_SIMILAR"
  | "INSUFFICIENT_CANDIDATES"
  | "NO_CANDIDATES"
  | "NO_MATCHES"
  | "STORE_UNAVAILABLE"
  | "MALFORMED_STORE"
  | "INVALID_INPUT"
  | "FORBIDDEN";

export class EngagementError extends Error {
  /** Machine-readable error code */
  code: EngagementErrorCode;

  constructor(code: EngagementErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngagementError";
    this.code = code;
  }
}

export function isEngagementError(error: unknown): error is EngagementError {
  return error instanceof EngagementError;
}
