import type { Song } from "@shared/schema";
import { BATTLE_SIZE, SEARCH_RESULT_LIMIT } from "../../config/constants";
import { EngagementError } from "../../utils/engagementError";
import { defaultRandom, pickOne, sample, type RandomSource } from "../../utils/random";
import { filterCandidates, sameText } from "./candidates";
import type { ArtistMatch, ResponderView, TitleSearchResult } from "./types";

export function randomPick(
  catalog: readonly Song[],
  responder: ResponderView,
  random: RandomSource = defaultRandom
): Song {
  return pickOne(filterCandidates(catalog, responder.blacklist), random);
}

/** Distinct lower-cased genres across the whole catalog, sorted. */
export function listGenres(catalog: readonly Song[]): string[] {
  return [...new Set(catalog.map((song) => song.genre.toLowerCase()))].sort();
}

export function genrePick(
  catalog: readonly Song[],
  responder: ResponderView,
  genre: string,
  random: RandomSource = defaultRandom
): Song {
  const matches = filterCandidates(catalog, responder.blacklist).filter((song) =>
    sameText(song.genre, genre)
  );
  if (matches.length === 0) {
    throw new EngagementError("NO_MATCHES", `No songs found for genre: ${genre.toLowerCase()}`);
  }
  return pickOne(matches, random);
}

export function artistPick(
  catalog: readonly Song[],
  responder: ResponderView,
  query: string,
  random: RandomSource = defaultRandom
): ArtistMatch {
  const needle = query.toLowerCase();
  const matches = filterCandidates(catalog, responder.blacklist).filter((song) =>
    song.artist.toLowerCase().includes(needle)
  );

  if (matches.length === 0) {
    throw new EngagementError("NO_MATCHES", `No songs found for artist: ${query}`);
  }
  if (matches.length === 1) {
    return { song: matches[0], matchCount: 1 };
  }
  return { song: pickOne(matches, random), matchCount: matches.length };
}

/**
 * Title search runs over the full catalog, blacklist included: it answers
 * "is this song here", not "what should I hear".
 */
export function titleSearch(catalog: readonly Song[], keyword: string): TitleSearchResult {
  const needle = keyword.toLowerCase();
  const matches = catalog.filter((song) => song.title.toLowerCase().includes(needle));

  if (matches.length === 0) {
    throw new EngagementError("NO_MATCHES", `No songs found with keyword: ${keyword}`);
  }
  if (matches.length === 1) {
    return { kind: "single", song: matches[0] };
  }
  return {
    kind: "list",
    matches: matches.slice(0, SEARCH_RESULT_LIMIT),
    total: matches.length,
  };
}

export function battlePair(
  catalog: readonly Song[],
  responder: ResponderView,
  random: RandomSource = defaultRandom
): [Song, Song] {
  if (catalog.length < BATTLE_SIZE) {
    throw new EngagementError("INSUFFICIENT_CANDIDATES", "Need at least 2 songs for battles!");
  }

  const candidates = filterCandidates(catalog, responder.blacklist);
  if (candidates.length < BATTLE_SIZE) {
    throw new EngagementError(
      "INSUFFICIENT_CANDIDATES",
      "Not enough songs available for battle (some may be blacklisted)."
    );
  }

  const [first, second] = sample(candidates, BATTLE_SIZE, random);
  return [first, second];
}
