import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";
const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

/**
 * Id the bridge sent with the event, or a fresh UUID. Anything that would be
 * unsafe to echo back in a header is replaced.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim();
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER.toLowerCase()]);
  const startedAt = Date.now();

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const fields = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    };
    if (res.statusCode >= 500) {
      req.log.error("[HTTP] Event failed", fields);
    } else if (res.statusCode >= 400) {
      req.log.warn("[HTTP] Event rejected", fields);
    } else {
      req.log.info("[HTTP] Event handled", fields);
    }
  });

  next();
}
