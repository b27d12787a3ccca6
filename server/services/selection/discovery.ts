/**
 * Personalized discovery
 *
 * Two stages: rank unrated songs against the responder's taste profile,
 * then draw uniformly from the top of the ranking. Drawing from a shortlist
 * instead of always taking the best score keeps repeat requests varied.
 */

import type { Song } from "@shared/schema";
import {
  DISCOVERY_ARTIST_WEIGHT,
  DISCOVERY_GENRE_WEIGHT,
  DISCOVERY_MIN_RATINGS,
  DISCOVERY_PREFERENCE_THRESHOLD,
  DISCOVERY_SHORTLIST_DIVISOR,
  DISCOVERY_SHORTLIST_MIN,
} from "../../config/constants";
import { EngagementError } from "../../utils/engagementError";
import { defaultRandom, pickOne, type RandomSource } from "../../utils/random";
import { filterCandidates } from "./candidates";
import type { DiscoveryPick, DiscoveryPreferences, ResponderView } from "./types";

/**
 * Sum of the responder's high ratings per genre and per artist (lower-cased).
 * Ratings of songs no longer in the catalog are skipped.
 */
export function buildPreferences(
  catalog: readonly Song[],
  ratings: Readonly<Record<string, number>>
): DiscoveryPreferences {
  const byId = new Map(catalog.map((song) => [String(song.id), song]));
  const genres: Record<string, number> = {};
  const artists: Record<string, number> = {};

  for (const [songId, rating] of Object.entries(ratings)) {
    if (rating < DISCOVERY_PREFERENCE_THRESHOLD) continue;
    const song = byId.get(songId);
    if (!song) continue;

    const genre = song.genre.toLowerCase();
    const artist = song.artist.toLowerCase();
    if (genre) genres[genre] = (genres[genre] ?? 0) + rating;
    if (artist) artists[artist] = (artists[artist] ?? 0) + rating;
  }

  return { genres, artists };
}

export function scoreSong(song: Song, preferences: DiscoveryPreferences): number {
  const genreScore = preferences.genres[song.genre.toLowerCase()] ?? 0;
  const artistScore = preferences.artists[song.artist.toLowerCase()] ?? 0;
  return genreScore * DISCOVERY_GENRE_WEIGHT + artistScore * DISCOVERY_ARTIST_WEIGHT;
}

export function shortlistSize(candidateCount: number): number {
  return Math.max(DISCOVERY_SHORTLIST_MIN, Math.floor(candidateCount / DISCOVERY_SHORTLIST_DIVISOR));
}

export function discoveryPick(
  catalog: readonly Song[],
  responder: ResponderView,
  random: RandomSource = defaultRandom
): DiscoveryPick {
  const candidates = filterCandidates(catalog, responder.blacklist);

  if (Object.keys(responder.ratings).length < DISCOVERY_MIN_RATINGS) {
    throw new EngagementError(
      "INSUFFICIENT_DATA",
      "🔍 Need more data for personalized recommendations!\n\n" +
        "Rate at least 3 songs first using /recommend or /random, then try /discover again."
    );
  }

  const unrated = candidates.filter((song) => responder.ratings[String(song.id)] === undefined);
  if (unrated.length === 0) {
    throw new EngagementError(
      "NO_CANDIDATES",
      "🎉 You've rated all available songs! Check /toprated for community favorites."
    );
  }

  const preferences = buildPreferences(catalog, responder.ratings);
  const ranked = unrated
    .map((song) => ({ song, score: scoreSong(song, preferences) }))
    .sort((a, b) => b.score - a.score);

  const picked = pickOne(ranked.slice(0, shortlistSize(ranked.length)), random);

  const reasons: string[] = [];
  const genre = picked.song.genre.toLowerCase();
  const artist = picked.song.artist.toLowerCase();
  if (preferences.genres[genre] !== undefined) reasons.push(`you like ${genre}`);
  if (preferences.artists[artist] !== undefined) reasons.push(`you like ${artist}`);

  return { song: picked.song, score: picked.score, reasons };
}
