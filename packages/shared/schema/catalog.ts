import { z } from "zod";

/**
 * A catalog entry. Ids are unique positive integers assigned on insert and
 * never reused while the song is present.
 */
export const SongSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().min(1),
  artist: z.string().min(1),
  genre: z.string().min(1).default("unknown"),
  year: z.number().int().positive().optional(),
  // Older catalogs store "" for songs without a link
  url: z
    .string()
    .optional()
    .transform((val) => (val && val.trim() ? val.trim() : undefined)),
});

export type Song = z.infer<typeof SongSchema>;

/** Denormalized copy of a song kept inside battle records and poll contexts. */
export const SongSnapshotSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  artist: z.string(),
});

export type SongSnapshot = z.infer<typeof SongSnapshotSchema>;

export function toSnapshot(song: Song): SongSnapshot {
  return { id: song.id, title: song.title, artist: song.artist };
}
