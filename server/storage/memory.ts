import { createEmptyState, type EngagementState, type Song } from "@shared/schema";
import { nextSongId } from "./catalogStore";
import type { CatalogStore, NewSong, UserStateStore } from "./types";
import { WriteQueue } from "./writeQueue";

/**
 * In-process stores with the same contracts as the file stores. Used by
 * tests and by tooling that runs the engine without a data directory.
 */
export class MemCatalogStore implements CatalogStore {
  private songs: Song[];

  constructor(songs: Song[] = []) {
    this.songs = [...songs];
  }

  async all(): Promise<Song[]> {
    return [...this.songs];
  }

  async reload(): Promise<Song[]> {
    return [...this.songs];
  }

  async add(song: NewSong): Promise<Song> {
    const created: Song = { ...song, id: nextSongId(this.songs) };
    this.songs = [...this.songs, created];
    return created;
  }

  async remove(id: number): Promise<Song | undefined> {
    const target = this.songs.find((song) => song.id === id);
    if (target) {
      this.songs = this.songs.filter((song) => song.id !== id);
    }
    return target;
  }
}

export class MemUserStateStore implements UserStateStore {
  private state: EngagementState;
  private readonly queue = new WriteQueue();

  constructor(initial: EngagementState = createEmptyState()) {
    this.state = structuredClone(initial);
  }

  async load(): Promise<EngagementState> {
    return structuredClone(this.state);
  }

  save(state: EngagementState): Promise<void> {
    return this.queue.run(async () => {
      this.state = structuredClone(state);
    });
  }

  update<T>(mutator: (state: EngagementState) => T): Promise<T> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.state);
      const result = mutator(draft);
      this.state = draft;
      return result;
    });
  }

  snapshot(): Promise<EngagementState> {
    return this.queue.run(async () => structuredClone(this.state));
  }
}
