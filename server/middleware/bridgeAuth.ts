import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { Errors } from "../utils/apiError";

/**
 * Timing-safe check of `Authorization: Bearer <secret>`.
 * Without a configured secret every caller is accepted.
 */
export const verifyBridgeSecret = (
  authHeader: string | undefined,
  secret: string | undefined
): boolean => {
  if (!secret) return true;

  const expected = `Bearer ${secret}`;
  if (!authHeader || authHeader.length !== expected.length) return false;
  try {
    return crypto.timingSafeEqual(Buffer.from(authHeader), Buffer.from(expected));
  } catch {
    // Same string length, different byte length (multi-byte characters)
    return false;
  }
};

export function requireBridgeSecret(secret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!verifyBridgeSecret(req.headers.authorization, secret)) {
      req.log.warn("[BridgeAuth] Rejected event", { path: req.originalUrl });
      return Errors.unauthorized(res);
    }
    next();
  };
}
