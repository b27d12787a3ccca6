import type { Logger } from "../logger";

declare global {
  namespace Express {
    interface Request {
      /** From X-Request-ID, or generated */
      requestId: string;
      /** Child logger with requestId bound */
      log: Logger;
    }
  }
}

export {};
