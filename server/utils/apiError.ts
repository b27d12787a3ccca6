import type { Response } from "express";

/**
 * Error envelope for every non-2xx gateway response:
 *
 *  {
 *    "error":   "MACHINE_READABLE_CODE",
 *    "message": "Human-readable description.",
 *    "details": { ... }                        // optional
 *  }
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

export const Errors = {
  /** 400 with zod issues in details */
  validation: (res: Response, issues: unknown, message = "Request validation failed.") =>
    sendError(res, 400, "VALIDATION_ERROR", message, { issues }),

  unauthorized: (res: Response, message = "Bridge secret required.") =>
    sendError(res, 401, "UNAUTHORIZED", message),

  notFound: (res: Response, message = "Resource not found.") =>
    sendError(res, 404, "NOT_FOUND", message),

  internal: (res: Response, message = "An unexpected error occurred.") =>
    sendError(res, 500, "INTERNAL_ERROR", message),
} as const;
