import { z } from "zod";
import { SongSnapshotSchema } from "./catalog";

/** Context of a 1-10 rating poll opened for a single song. */
export const RatingContextSchema = z.object({
  kind: z.literal("rating"),
  songId: z.number().int(),
  songTitle: z.string(),
  chatId: z.string(),
});

export type RatingContext = z.infer<typeof RatingContextSchema>;

/** Context of a two-option battle poll. */
export const BattleContextSchema = z.object({
  kind: z.literal("battle"),
  battleId: z.string(),
  song1: SongSnapshotSchema,
  song2: SongSnapshotSchema,
  chatId: z.string(),
  startTime: z.string(),
});

export type BattleContext = z.infer<typeof BattleContextSchema>;

export const PendingPollContextSchema = z.discriminatedUnion("kind", [
  RatingContextSchema,
  BattleContextSchema,
]);

export type PendingPollContext = z.infer<typeof PendingPollContextSchema>;
