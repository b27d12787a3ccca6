/**
 * File-backed song catalog
 *
 * songs.json holds an ordered array of songs. Records that fail validation
 * are skipped (and logged) rather than failing the whole catalog.
 */

import { SongSchema, type Song } from "@shared/schema";
import logger from "../logger";
import { EngagementError } from "../utils/engagementError";
import { readJsonFile, writeJsonFileAtomic } from "./jsonFile";
import type { CatalogStore, NewSong } from "./types";
import { WriteQueue } from "./writeQueue";

export function parseCatalog(value: unknown): Song[] {
  if (!Array.isArray(value)) {
    logger.error("[Catalog] songs file must contain an array", { code: "MALFORMED_STORE" });
    return [];
  }

  const songs: Song[] = [];
  const seen = new Set<number>();

  value.forEach((record, index) => {
    const parsed = SongSchema.safeParse(record);
    if (!parsed.success) {
      logger.warn("[Catalog] Skipping invalid song record", {
        index,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return;
    }
    if (seen.has(parsed.data.id)) {
      logger.warn("[Catalog] Skipping duplicate song id", { index, id: parsed.data.id });
      return;
    }
    seen.add(parsed.data.id);
    songs.push(parsed.data);
  });

  return songs;
}

export function nextSongId(songs: readonly Song[]): number {
  return songs.reduce((max, song) => Math.max(max, song.id), 0) + 1;
}

export class FileCatalogStore implements CatalogStore {
  private songs: Song[] | null = null;
  private readonly queue = new WriteQueue();

  constructor(private readonly filePath: string) {}

  async all(): Promise<Song[]> {
    if (!this.songs) {
      this.songs = await this.read();
    }
    return [...this.songs];
  }

  reload(): Promise<Song[]> {
    return this.queue.run(async () => {
      this.songs = await this.read();
      logger.info("[Catalog] Reloaded", { count: this.songs.length });
      return [...this.songs];
    });
  }

  add(song: NewSong): Promise<Song> {
    return this.queue.run(async () => {
      const songs = await this.all();
      const created: Song = { ...song, id: nextSongId(songs) };
      await this.write([...songs, created]);
      logger.info("[Catalog] Song added", { id: created.id, title: created.title });
      return created;
    });
  }

  remove(id: number): Promise<Song | undefined> {
    return this.queue.run(async () => {
      const songs = await this.all();
      const target = songs.find((song) => song.id === id);
      if (!target) return undefined;

      await this.write(songs.filter((song) => song.id !== id));
      logger.info("[Catalog] Song removed", { id, title: target.title });
      return target;
    });
  }

  private async read(): Promise<Song[]> {
    const result = await readJsonFile(this.filePath);

    switch (result.status) {
      case "ok":
        return parseCatalog(result.value);
      case "missing":
        logger.error("[Catalog] Songs file not found", { file: this.filePath });
        return [];
      case "unreadable":
        logger.error("[Catalog] Songs file unreadable", {
          code: "STORE_UNAVAILABLE",
          file: this.filePath,
          error: String(result.error),
        });
        return [];
      case "malformed":
        logger.error("[Catalog] Songs file is not valid JSON", {
          code: "MALFORMED_STORE",
          file: this.filePath,
          error: String(result.error),
        });
        return [];
    }
  }

  private async write(songs: Song[]): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, songs);
    } catch (error) {
      throw new EngagementError("STORE_UNAVAILABLE", "Could not update the song catalog right now.", {
        cause: error,
      });
    }
    this.songs = songs;
  }
}
