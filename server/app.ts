/**
 * Express Application Factory
 *
 * Builds the gateway around already-constructed bot dependencies, so tests
 * and server/index.ts wire the same app.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import type { BotDeps } from "./bot/types";
import { BODY_PARSE_LIMIT } from "./config/constants";
import { requestTracing } from "./middleware/requestTracing";
import { createEventsRouter } from "./routes/events";
import { createHealthRouter } from "./routes/health";
import { Errors } from "./utils/apiError";

function isBodyParserError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && "type" in err && typeof err.type === "string";
}

export interface AppOptions {
  bridgeSecret?: string;
}

export function createApp(deps: BotDeps, options: AppOptions = {}): express.Express {
  const app = express();

  app.set("trust proxy", 1);

  // Request tracing: request id and child logger before anything else
  app.use(requestTracing);

  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  app.use("/api/health", createHealthRouter(deps.catalog));
  app.use("/api/events", createEventsRouter(deps, options.bridgeSecret));

  app.use("/api", (_req, res) => Errors.notFound(res));

  // Malformed JSON and oversized bodies surface here from express.json()
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (isBodyParserError(err)) {
      return Errors.validation(res, [{ message: err.message }], "Request body must be valid JSON.");
    }
    req.log.error("[App] Unhandled request error", { error: err });
    return Errors.internal(res);
  });

  return app;
}
