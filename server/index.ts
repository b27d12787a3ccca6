import http from "node:http";
import path from "node:path";
import { createApp } from "./app";
import type { BotDeps } from "./bot/types";
import { HttpBridgeTransport } from "./bot/httpBridgeTransport";
import { LoggingTransport, type ChatTransport } from "./bot/transport";
import { env } from "./config/env";
import logger from "./logger";
import { getRedisClient, shutdownRedis } from "./redis";
import { createPollRegistry } from "./services/pollRegistry";
import { FileQuoteSource } from "./services/quotes";
import { FileCatalogStore } from "./storage/catalogStore";
import { FileUserStateStore } from "./storage/userStateStore";
import { defaultRandom } from "./utils/random";

function createTransport(): ChatTransport {
  if (env.BRIDGE_URL) {
    logger.info("[Server] Delivering through the platform bridge", { bridgeUrl: env.BRIDGE_URL });
    return new HttpBridgeTransport({ baseUrl: env.BRIDGE_URL, secret: env.BRIDGE_SECRET });
  }
  logger.warn("[Server] BRIDGE_URL not set, outbound messages are only logged");
  return new LoggingTransport();
}

const dataDir = path.resolve(env.DATA_DIR);

const deps: BotDeps = {
  catalog: new FileCatalogStore(path.join(dataDir, "songs.json")),
  state: new FileUserStateStore(path.join(dataDir, "user_data.json")),
  registry: createPollRegistry(),
  transport: createTransport(),
  quotes: new FileQuoteSource(path.join(dataDir, "quotes.json")),
  adminIds: env.ADMIN_USER_IDS,
  random: defaultRandom,
  now: () => new Date(),
};

// Initialize Redis (eagerly connect if REDIS_URL is set)
getRedisClient();

const songs = await deps.catalog.all();
logger.info("[Server] Catalog loaded", { songs: songs.length, dataDir });

const app = createApp(deps, { bridgeSecret: env.BRIDGE_SECRET });
const server = http.createServer(app);

server.listen(env.PORT, "0.0.0.0", () => {
  logger.info(`TunePoll gateway running on port ${env.PORT}`, { mode: env.NODE_ENV });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`[Server] ${signal} received, shutting down gracefully...`);
  // Let queued state writes land before exiting
  await deps.state.snapshot();
  await shutdownRedis();
  server.close(() => {
    logger.info("[Server] HTTP server closed");
    process.exit(0);
  });
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal("[Server] Shutdown failed", { error });
      process.exit(1);
    });
  });
}
