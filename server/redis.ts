/**
 * Shared ioredis connection for the poll context registry.
 *
 * Only created when REDIS_URL is set. Without it, `getRedisClient` returns
 * null and pending polls live in process memory until the next restart.
 */

import Redis from "ioredis";
import { env } from "./config/env";
import logger from "./logger";

const MAX_RECONNECT_ATTEMPTS = 10;
const RECONNECT_STEP_MS = 200;
const RECONNECT_CAP_MS = 5000;

let client: Redis | null = null;
let reportedMissingUrl = false;

/** Delay before reconnect attempt `attempt`, or null to give up */
export function reconnectDelay(attempt: number): number | null {
  if (attempt > MAX_RECONNECT_ATTEMPTS) return null;
  return Math.min(attempt * RECONNECT_STEP_MS, RECONNECT_CAP_MS);
}

/** host:port of a Redis URL, credentials left out */
export function redisTarget(url: string): string {
  try {
    const { hostname, port } = new URL(url);
    return `${hostname}:${port || "6379"}`;
  } catch {
    return "unparseable url";
  }
}

export function getRedisClient(): Redis | null {
  if (client) return client;

  const url = env.REDIS_URL;
  if (!url) {
    if (!reportedMissingUrl) {
      reportedMissingUrl = true;
      logger.warn("[Redis] No REDIS_URL, pending polls are forgotten on restart");
    }
    return null;
  }

  const target = redisTarget(url);
  try {
    const created = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(attempt) {
        const delay = reconnectDelay(attempt);
        if (delay === null) {
          logger.error("[Redis] Giving up on reconnecting", { target, attempts: attempt - 1 });
        }
        return delay;
      },
    });
    created.on("connect", () => logger.info("[Redis] Poll store connected", { target }));
    created.on("error", (err) =>
      logger.error("[Redis] Poll store error", { target, error: String(err) })
    );
    created.on("close", () => logger.warn("[Redis] Poll store connection lost", { target }));
    client = created;
  } catch (err) {
    logger.error("[Redis] Could not create client, using memory", { target, error: String(err) });
    return null;
  }
  return client;
}

/** Close the shared connection. A failed QUIT drops the socket instead. */
export async function shutdownRedis(): Promise<void> {
  if (!client) return;
  const closing = client;
  client = null;

  try {
    await closing.quit();
    logger.info("[Redis] Poll store closed");
  } catch (err) {
    logger.warn("[Redis] QUIT failed, dropping the connection", { error: String(err) });
    closing.disconnect();
  }
}
