/**
 * File-backed engagement state
 *
 * Keeps the whole engagement document in one JSON file and the last
 * committed copy in memory. Every mutation is queued behind the previous
 * one, so a read-modify-write cycle always starts from the result of the
 * cycle before it.
 *
 * Loading salvages what it can: an invalid entry is dropped on its own and
 * the rest of the document survives. Whenever anything was dropped, the
 * original file is moved to `<file>.corrupt-<ms>` before the first write.
 * A file that exists but cannot be read is never written over.
 *
 * Write failures are logged and do not roll back the in-memory document;
 * the next successful write persists the change.
 */

import {
  BattleChoiceSchema,
  BattleRecordSchema,
  createEmptyState,
  LastShownSchema,
  RatingValueSchema,
  type BattleRecord,
  type EngagementState,
} from "@shared/schema";
import { z } from "zod";
import logger from "../logger";
import { EngagementError } from "../utils/engagementError";
import { preserveFile, readJsonFile, writeJsonFileAtomic } from "./jsonFile";
import type { UserStateStore } from "./types";
import { WriteQueue } from "./writeQueue";

const FavoriteListSchema = z.array(z.string());
const BlacklistSchema = z.array(z.number().int());
const BattleHeaderSchema = BattleRecordSchema.omit({ votes: true });

/** Dropped paths reported in the load warning */
const DROPPED_LOG_LIMIT = 20;

export interface ParsedEngagementState {
  state: EngagementState;
  /** Dotted paths of entries that failed validation, e.g. "ratings.4.u1" */
  dropped: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function valid<T>(result: { success: true; data: T } | { success: false }): T | undefined {
  return result.success ? result.data : undefined;
}

function salvageEntries<T>(
  value: unknown,
  at: string,
  dropped: string[],
  parseEntry: (entry: unknown, entryPath: string) => T | undefined
): Record<string, T> {
  const result: Record<string, T> = {};
  if (value === undefined) return result;
  if (!isPlainObject(value)) {
    dropped.push(at);
    return result;
  }

  for (const [key, entry] of Object.entries(value)) {
    const entryPath = `${at}.${key}`;
    const parsed = parseEntry(entry, entryPath);
    if (parsed === undefined) {
      dropped.push(entryPath);
    } else {
      result[key] = parsed;
    }
  }
  return result;
}

function salvageBattle(entry: unknown, at: string, dropped: string[]): BattleRecord | undefined {
  if (!isPlainObject(entry)) return undefined;
  const header = valid(BattleHeaderSchema.safeParse(entry));
  if (!header) return undefined;

  const votes = salvageEntries(entry.votes, `${at}.votes`, dropped, (vote) =>
    valid(BattleChoiceSchema.safeParse(vote))
  );
  return { ...header, votes };
}

/**
 * Validate a decoded state document entry by entry. A non-object document
 * yields the empty shape with "$" as the only dropped path.
 */
export function parseEngagementState(value: unknown): ParsedEngagementState {
  if (!isPlainObject(value)) {
    return { state: createEmptyState(), dropped: ["$"] };
  }

  const dropped: string[] = [];
  const state: EngagementState = {
    ratings: salvageEntries(value.ratings, "ratings", dropped, (songRatings, at) =>
      isPlainObject(songRatings)
        ? salvageEntries(songRatings, at, dropped, (rating) =>
            valid(RatingValueSchema.safeParse(rating))
          )
        : undefined
    ),
    favorites: salvageEntries(value.favorites, "favorites", dropped, (list) =>
      valid(FavoriteListSchema.safeParse(list))
    ),
    blacklist: salvageEntries(value.blacklist, "blacklist", dropped, (list) =>
      valid(BlacklistSchema.safeParse(list))
    ),
    last_shown: salvageEntries(value.last_shown, "last_shown", dropped, (shown) =>
      valid(LastShownSchema.safeParse(shown))
    ),
    battles: salvageEntries(value.battles, "battles", dropped, (battle, at) =>
      salvageBattle(battle, at, dropped)
    ),
  };

  return { state, dropped };
}

export class FileUserStateStore implements UserStateStore {
  private current: EngagementState | null = null;
  private readonly queue = new WriteQueue();
  /** The file on disk holds data the in-memory document lost */
  private preserveBeforeWrite = false;
  /** The file exists but could not be read; writing would destroy it */
  private writeBlocked = false;

  constructor(private readonly filePath: string) {}

  async load(): Promise<EngagementState> {
    const result = await readJsonFile(this.filePath);

    if (result.status === "missing") {
      logger.info("[UserState] No state file yet, starting empty", { file: this.filePath });
      return createEmptyState();
    }
    if (result.status === "unreadable") {
      this.writeBlocked = true;
      logger.error("[UserState] State file unreadable, starting empty without saving", {
        code: "STORE_UNAVAILABLE",
        file: this.filePath,
        error: String(result.error),
      });
      return createEmptyState();
    }
    if (result.status === "malformed") {
      this.preserveBeforeWrite = true;
      logger.error("[UserState] State file is not valid JSON, starting empty", {
        code: "MALFORMED_STORE",
        file: this.filePath,
        error: String(result.error),
      });
      return createEmptyState();
    }

    const { state, dropped } = parseEngagementState(result.value);
    if (dropped.length > 0) {
      this.preserveBeforeWrite = true;
      logger.warn("[UserState] Dropped invalid entries from the state file", {
        code: "MALFORMED_STORE",
        file: this.filePath,
        droppedCount: dropped.length,
        dropped: dropped.slice(0, DROPPED_LOG_LIMIT),
      });
    }
    return state;
  }

  save(state: EngagementState): Promise<void> {
    return this.queue.run(async () => {
      this.current = structuredClone(state);
      await this.persist(this.current);
    });
  }

  update<T>(mutator: (state: EngagementState) => T): Promise<T> {
    return this.queue.run(async () => {
      const draft = structuredClone(await this.ensureLoaded());
      const result = mutator(draft);
      this.current = draft;

      try {
        await this.persist(draft);
      } catch (error) {
        logger.error("[UserState] Failed to persist update, keeping it in memory", {
          code: error instanceof EngagementError ? error.code : "STORE_UNAVAILABLE",
          file: this.filePath,
          error,
        });
      }

      return result;
    });
  }

  snapshot(): Promise<EngagementState> {
    return this.queue.run(async () => structuredClone(await this.ensureLoaded()));
  }

  private async ensureLoaded(): Promise<EngagementState> {
    if (!this.current) {
      this.current = await this.load();
    }
    return this.current;
  }

  private async persist(state: EngagementState): Promise<void> {
    if (this.writeBlocked) {
      throw new EngagementError("STORE_UNAVAILABLE", "Could not save your data right now.");
    }

    try {
      if (this.preserveBeforeWrite) {
        const backup = await preserveFile(this.filePath, Date.now());
        this.preserveBeforeWrite = false;
        logger.warn("[UserState] Moved the original state file aside", {
          file: this.filePath,
          backup,
        });
      }
      await writeJsonFileAtomic(this.filePath, state);
    } catch (error) {
      throw new EngagementError("STORE_UNAVAILABLE", "Could not save your data right now.", {
        cause: error,
      });
    }
  }
}
