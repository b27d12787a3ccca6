import type { LastShown, Song } from "@shared/schema";
import type { UserStateStore } from "../../storage/types";
import { EngagementError } from "../../utils/engagementError";
import type { PreferenceChange } from "./types";

/** Remember the song just presented; favorite, blacklist and similar refer to it. */
export async function trackLastShown(
  store: UserStateStore,
  responderId: string,
  song: Song,
  now: Date = new Date()
): Promise<LastShown> {
  const shown: LastShown = {
    songId: song.id,
    title: song.title,
    artist: song.artist,
    timestamp: now.toISOString(),
  };
  await store.update((state) => {
    state.last_shown[responderId] = shown;
  });
  return shown;
}

function requireLastShown(shown: LastShown | undefined, action: string): LastShown {
  if (!shown) {
    throw new EngagementError(
      "NO_REFERENCE",
      `No recent song to ${action}! Use /recommend, /random, or other commands first.`
    );
  }
  return shown;
}

export function favoriteLastShown(store: UserStateStore, responderId: string): Promise<PreferenceChange> {
  return store.update((state) => {
    const song = requireLastShown(state.last_shown[responderId], "favorite");
    const favorites = state.favorites[responderId] ?? [];
    const key = String(song.songId);

    if (favorites.includes(key)) return { changed: false, song };
    state.favorites[responderId] = [...favorites, key];
    return { changed: true, song };
  });
}

export function blacklistLastShown(store: UserStateStore, responderId: string): Promise<PreferenceChange> {
  return store.update((state) => {
    const song = requireLastShown(state.last_shown[responderId], "blacklist");
    const blacklist = state.blacklist[responderId] ?? [];

    if (blacklist.includes(song.songId)) return { changed: false, song };
    state.blacklist[responderId] = [...blacklist, song.songId];
    return { changed: true, song };
  });
}

/** Resolves to false when the song was not blacklisted. */
export function removeFromBlacklist(
  store: UserStateStore,
  responderId: string,
  songId: number
): Promise<boolean> {
  return store.update((state) => {
    const blacklist = state.blacklist[responderId] ?? [];
    if (!blacklist.includes(songId)) return false;
    state.blacklist[responderId] = blacklist.filter((id) => id !== songId);
    return true;
  });
}
