import { z } from "zod";
import { SongSnapshotSchema } from "./catalog";

export const RATING_MIN = 1;
export const RATING_MAX = 10;

export const RatingValueSchema = z.number().int().min(RATING_MIN).max(RATING_MAX);

/** 0 = first song of the battle, 1 = second song */
export const BattleChoiceSchema = z.union([z.literal(0), z.literal(1)]);
export type BattleChoice = z.infer<typeof BattleChoiceSchema>;

export const LastShownSchema = z.object({
  songId: z.number().int(),
  title: z.string(),
  artist: z.string(),
  timestamp: z.string(),
});

export type LastShown = z.infer<typeof LastShownSchema>;

export const BattleRecordSchema = z.object({
  song1: SongSnapshotSchema,
  song2: SongSnapshotSchema,
  start_time: z.string(),
  votes: z.record(z.string(), BattleChoiceSchema).default({}),
});

export type BattleRecord = z.infer<typeof BattleRecordSchema>;

/**
 * The persisted engagement document. All song ids inside it are soft
 * references: the song may have been removed from the catalog since.
 *
 * - ratings:    songId -> responderId -> 1..10
 * - favorites:  responderId -> songId strings
 * - blacklist:  responderId -> numeric songIds
 * - last_shown: responderId -> most recently presented song
 * - battles:    battleId -> battle record
 */
export const EngagementStateSchema = z.object({
  ratings: z.record(z.string(), z.record(z.string(), RatingValueSchema)).default({}),
  favorites: z.record(z.string(), z.array(z.string())).default({}),
  blacklist: z.record(z.string(), z.array(z.number().int())).default({}),
  last_shown: z.record(z.string(), LastShownSchema).default({}),
  battles: z.record(z.string(), BattleRecordSchema).default({}),
});

export type EngagementState = z.infer<typeof EngagementStateSchema>;

export function createEmptyState(): EngagementState {
  return { ratings: {}, favorites: {}, blacklist: {}, last_shown: {}, battles: {} };
}
