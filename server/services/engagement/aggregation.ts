/**
 * Aggregation
 *
 * Read-only views over the engagement document. Song ids in the document
 * are soft references; entries whose song has left the catalog are skipped.
 */

import type { EngagementState, Song } from "@shared/schema";
import {
  FAVORITE_RATING_THRESHOLD,
  LEADERBOARD_LIMIT,
  STATS_LIMIT,
  TOP_RATED_MIN_AVERAGE,
  TOP_RATED_MIN_VOTES,
} from "../../config/constants";
import type {
  BattleLeaderboard,
  BattleStanding,
  MyFavoritesResult,
  MyRatingsResult,
  RatedSong,
  SongRatingSummary,
  TopRatedResult,
} from "./types";

function indexCatalog(catalog: readonly Song[]): Map<string, Song> {
  return new Map(catalog.map((song) => [String(song.id), song]));
}

function summarize(catalog: readonly Song[], state: EngagementState, minVotes: number): SongRatingSummary[] {
  const songs = indexCatalog(catalog);
  const summaries: SongRatingSummary[] = [];

  for (const [songId, byResponder] of Object.entries(state.ratings)) {
    const song = songs.get(songId);
    const values = Object.values(byResponder);
    if (!song || values.length < minVotes || values.length === 0) continue;

    const sum = values.reduce((acc, value) => acc + value, 0);
    summaries.push({ song, average: sum / values.length, votes: values.length });
  }

  return summaries;
}

/** Every rated song, best average first, more votes breaking ties. */
export function songStats(catalog: readonly Song[], state: EngagementState): SongRatingSummary[] {
  return summarize(catalog, state, 1)
    .sort((a, b) => b.average - a.average || b.votes - a.votes)
    .slice(0, STATS_LIMIT);
}

export function topRated(catalog: readonly Song[], state: EngagementState): TopRatedResult {
  const qualified = summarize(catalog, state, TOP_RATED_MIN_VOTES);
  const songs = qualified
    .filter((entry) => entry.average >= TOP_RATED_MIN_AVERAGE)
    .sort((a, b) => b.average - a.average)
    .slice(0, STATS_LIMIT);

  return { qualified: qualified.length, songs };
}

function ratingsBy(state: EngagementState, responderId: string): Map<string, number> {
  const ratings = new Map<string, number>();
  for (const [songId, byResponder] of Object.entries(state.ratings)) {
    const rating = byResponder[responderId];
    if (rating !== undefined) ratings.set(songId, rating);
  }
  return ratings;
}

export function myRatings(
  catalog: readonly Song[],
  state: EngagementState,
  responderId: string
): MyRatingsResult {
  const songs = indexCatalog(catalog);
  const ratings = ratingsBy(state, responderId);
  const entries: RatedSong[] = [];

  for (const [songId, rating] of ratings) {
    const song = songs.get(songId);
    if (song) entries.push({ song, rating });
  }

  entries.sort((a, b) => b.rating - a.rating);
  return { total: ratings.size, entries };
}

/**
 * Explicit favorites in the order they were added, then every other song
 * the responder rated 8 or more, best first.
 */
export function myFavorites(
  catalog: readonly Song[],
  state: EngagementState,
  responderId: string
): MyFavoritesResult {
  const songs = indexCatalog(catalog);
  const ratings = ratingsBy(state, responderId);
  const favoriteIds = [...new Set(state.favorites[responderId] ?? [])];

  const explicit: MyFavoritesResult["explicit"] = [];
  for (const songId of favoriteIds) {
    const song = songs.get(songId);
    if (song) explicit.push({ song, rating: ratings.get(songId) });
  }

  const listed = new Set(favoriteIds);
  const highRated: RatedSong[] = [];
  for (const [songId, rating] of ratings) {
    if (rating < FAVORITE_RATING_THRESHOLD || listed.has(songId)) continue;
    const song = songs.get(songId);
    if (song) highRated.push({ song, rating });
  }
  highRated.sort((a, b) => b.rating - a.rating);

  return { explicit, highRated };
}

/**
 * Win/loss table over battles with a majority. A tied battle counts for
 * nobody.
 */
export function battleLeaderboard(catalog: readonly Song[], state: EngagementState): BattleLeaderboard {
  const songs = indexCatalog(catalog);
  const wins = new Map<string, number>();
  const losses = new Map<string, number>();
  let resolvedBattles = 0;

  for (const battle of Object.values(state.battles)) {
    const votes = Object.values(battle.votes);
    const forFirst = votes.filter((choice) => choice === 0).length;
    const forSecond = votes.length - forFirst;
    if (votes.length === 0 || forFirst === forSecond) continue;

    const [winner, loser] = forFirst > forSecond ? [battle.song1, battle.song2] : [battle.song2, battle.song1];
    wins.set(String(winner.id), (wins.get(String(winner.id)) ?? 0) + 1);
    losses.set(String(loser.id), (losses.get(String(loser.id)) ?? 0) + 1);
    resolvedBattles++;
  }

  const standings: BattleStanding[] = [];
  for (const songId of new Set([...wins.keys(), ...losses.keys()])) {
    const song = songs.get(songId);
    if (!song) continue;

    const won = wins.get(songId) ?? 0;
    const lost = losses.get(songId) ?? 0;
    const total = won + lost;
    standings.push({ song, wins: won, losses: lost, total, winRate: (won / total) * 100 });
  }

  standings.sort((a, b) => b.winRate - a.winRate || b.total - a.total);
  return { resolvedBattles, standings: standings.slice(0, LEADERBOARD_LIMIT) };
}

/** Number of battles the responder has voted in. */
export function battleVoteCount(state: EngagementState, responderId: string): number {
  return Object.values(state.battles).filter((battle) => battle.votes[responderId] !== undefined).length;
}
