/**
 * Poll Correlation Registry
 *
 * Maps the opaque poll id handed out by the chat platform to the context the
 * poll was opened for (a rating request or a battle). Lookups never remove
 * entries: a responder may answer, retract and answer the same poll again.
 *
 * Entries expire after a TTL. An unknown or expired poll id resolves to
 * undefined, which callers treat as "not ours", never as an error.
 *
 * Store selection: Redis when configured, otherwise process memory.
 */

import { PendingPollContextSchema, type PendingPollContext } from "@shared/schema";
import { env } from "../config/env";
import logger from "../logger";
import { getRedisClient } from "../redis";

export interface PollCorrelationRegistry {
  register(pollId: string, context: PendingPollContext): Promise<void>;
  resolve(pollId: string): Promise<PendingPollContext | undefined>;
}

export type PollRegistryOptions = {
  ttlMs?: number;
  now?: () => number;
};

/** Subset of the ioredis client used here */
export interface PollContextClient {
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
}

type MemoryEntry = {
  context: PendingPollContext;
  expiresAtMs: number;
};

const KEY_PREFIX = "tunepoll:poll:";
const PRUNE_EVERY = 100;

function defaultTtlMs(): number {
  return env.POLL_CONTEXT_TTL_HOURS * 60 * 60 * 1000;
}

export const createMemoryPollRegistry = (
  options: PollRegistryOptions = {}
): PollCorrelationRegistry => {
  const ttlMs = options.ttlMs ?? defaultTtlMs();
  const now = options.now ?? Date.now;
  const entries = new Map<string, MemoryEntry>();
  let registrations = 0;

  const prune = () => {
    const current = now();
    for (const [pollId, entry] of entries) {
      if (entry.expiresAtMs <= current) entries.delete(pollId);
    }
  };

  return {
    async register(pollId, context) {
      if (entries.has(pollId)) {
        logger.warn("[PollRegistry] Poll id registered twice, replacing context", { pollId });
      }
      entries.set(pollId, { context, expiresAtMs: now() + ttlMs });

      registrations++;
      if (registrations % PRUNE_EVERY === 0) prune();
    },

    async resolve(pollId) {
      const entry = entries.get(pollId);
      if (!entry) return undefined;

      if (entry.expiresAtMs <= now()) {
        entries.delete(pollId);
        return undefined;
      }
      return entry.context;
    },
  };
};

/**
 * Redis-backed registry for deployments that restart while polls are open.
 * Uses SET ... EX so expiry is enforced by Redis. Falls back to process
 * memory for any call where Redis fails.
 */
export const createRedisPollRegistry = (
  client: PollContextClient,
  options: PollRegistryOptions = {}
): PollCorrelationRegistry => {
  const ttlMs = options.ttlMs ?? defaultTtlMs();
  const ttlSeconds = Math.max(1, Math.ceil(ttlMs / 1000));
  const memoryFallback = createMemoryPollRegistry(options);

  return {
    async register(pollId, context) {
      try {
        await client.set(`${KEY_PREFIX}${pollId}`, JSON.stringify(context), "EX", ttlSeconds);
      } catch (error) {
        logger.warn("[PollRegistry] Redis write failed, keeping context in memory", {
          pollId,
          error: String(error),
        });
        await memoryFallback.register(pollId, context);
      }
    },

    async resolve(pollId) {
      let raw: string | null;
      try {
        raw = await client.get(`${KEY_PREFIX}${pollId}`);
      } catch (error) {
        logger.warn("[PollRegistry] Redis read failed, checking memory", {
          pollId,
          error: String(error),
        });
        return memoryFallback.resolve(pollId);
      }

      // Contexts registered while Redis was down live in memory
      if (raw === null) return memoryFallback.resolve(pollId);

      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch (error) {
        logger.warn("[PollRegistry] Stored context is not valid JSON", { pollId, error: String(error) });
        return undefined;
      }

      const parsed = PendingPollContextSchema.safeParse(decoded);
      if (!parsed.success) {
        logger.warn("[PollRegistry] Stored context has an unexpected shape", { pollId });
        return undefined;
      }
      return parsed.data;
    },
  };
};

export function createPollRegistry(options: PollRegistryOptions = {}): PollCorrelationRegistry {
  const redis = getRedisClient();
  if (redis) return createRedisPollRegistry(redis, options);
  return createMemoryPollRegistry(options);
}
