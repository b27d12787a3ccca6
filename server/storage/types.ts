import type { EngagementState, Song } from "@shared/schema";

export type NewSong = Omit<Song, "id">;

/**
 * Read-mostly song catalog. Writes replace the whole list.
 */
export interface CatalogStore {
  all(): Promise<Song[]>;
  reload(): Promise<Song[]>;
  add(song: NewSong): Promise<Song>;
  /** Resolves to the removed song, or undefined when the id is unknown */
  remove(id: number): Promise<Song | undefined>;
}

/**
 * Persisted engagement document.
 *
 * Mutations go through `update`, which serializes read-modify-write cycles
 * so concurrent handlers never overwrite each other's changes.
 */
export interface UserStateStore {
  /** Read the persisted document, falling back to the empty shape. */
  load(): Promise<EngagementState>;
  /** Replace the whole document. */
  save(state: EngagementState): Promise<void>;
  /** Apply `mutator` to the latest document and persist the result. */
  update<T>(mutator: (state: EngagementState) => T): Promise<T>;
  /** Copy of the latest document once queued updates have settled. */
  snapshot(): Promise<EngagementState>;
}
