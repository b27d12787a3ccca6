/**
 * Chat message rendering. Everything user-visible that is longer than one
 * line is built here so handlers stay about control flow.
 */

import type { Song, SongSnapshot } from "@shared/schema";
import { SEARCH_RESULT_LIMIT } from "../config/constants";
import type {
  BattleLeaderboard,
  MyFavoritesResult,
  MyRatingsResult,
  SongRatingSummary,
} from "../services/engagement";

const MEDALS = ["🥇", "🥈", "🥉"];

export const HELP_TEXT = `🎵 **TunePoll** 🎵

**🎧 Discovery Commands:**
/recommend - Get today's song recommendation
/random - Get a completely random song
/discover - Personalized recommendations based on your ratings
/similar - Find songs similar to the last one

**🔍 Search & Filter:**
/genre [name] - Filter songs by genre
/artist [name] - Find songs by specific artist
/search [keyword] - Search song titles

**❤️ Personal Preferences:**
/favorite - Mark last song as favorite
/myfavorites - List your favorite songs
/blacklist - Manage songs you never want to hear
/myratings - Show your rating history

**📊 Statistics & Community:**
/stats - Show song ratings and popularity
/toprated - Show highest-rated songs

**🎮 Fun Features:**
/quote - Get a random music quote
/trivia - Music trivia quiz
/battle - Song vs song voting battles
/battlestats - Battle leaderboard and statistics

**🔧 Admin Commands:**
/add [title] [artist] [url] [genre] [year] - Add new song
/remove [song_id] - Remove song
/reload - Reload song catalog

Rate songs with polls to improve your recommendations! 🎶`;

export const BLACKLIST_USAGE =
  "Usage:\n/blacklist - Show blacklisted songs\n/blacklist add - Blacklist last song\n/blacklist remove [song_id] - Remove from blacklist";

export const BATTLE_QUESTION = "🥊 SONG BATTLE! Which song is better?";

/** "hip hop" -> "Hip Hop" */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/\b\w/g, (c) => c.toUpperCase());
}

export function songLine(song: Pick<Song, "title" | "artist">): string {
  return `${song.title} — ${song.artist}`;
}

function details(song: Song): string {
  return `🎵 Genre: ${song.genre} | Year: ${song.year ?? "Unknown"}`;
}

export function formatSong(song: Song, prefix: string): string {
  const lines = [`${prefix}: ${songLine(song)}`, details(song)];
  if (song.url) lines.push(song.url);
  return lines.join("\n");
}

export function formatGenres(genres: readonly string[]): string {
  return `Available genres: ${genres.join(", ")}\nUsage: /genre [genre_name]`;
}

export function formatSearchList(keyword: string, matches: readonly Song[], total: number): string {
  let text = `Found ${total} songs matching '${keyword}':\n\n`;
  matches.forEach((song, i) => {
    text += `${i + 1}. ${songLine(song)}\n`;
  });
  if (total > SEARCH_RESULT_LIMIT) {
    text += `\n... and ${total - SEARCH_RESULT_LIMIT} more`;
  }
  return text;
}

export function discoveryPrefix(reasons: readonly string[]): string {
  const why =
    reasons.length > 0
      ? ` (recommended because ${reasons.join(", ")})`
      : " (exploring new territory for you)";
  return `🔍 Discovered for you${why}`;
}

export function similarPrefix(reference: Song, basis: "artist" | "genre"): string {
  return `🎭 Similar to ${reference.title} (same ${basis})`;
}

export function formatBattle(first: Song, second: Song): string {
  const fighter = (label: string, song: Song) =>
    [`**${label}:** ${songLine(song)}`, details(song), song.url ?? ""].join("\n");

  return [
    "🥊 **SONG BATTLE!**",
    "",
    fighter("Fighter 1", first),
    "",
    "🆚",
    "",
    fighter("Fighter 2", second),
    "",
    "Vote for your favorite! 👇",
  ].join("\n");
}

export function battleOption(song: SongSnapshot): string {
  return `🎵 ${songLine(song)}`;
}

function ratingRows(rows: readonly SongRatingSummary[]): string {
  return rows
    .map(
      (row, i) =>
        `${i + 1}. ${songLine(row.song)}\n   ⭐ ${row.average.toFixed(1)}/10 (${row.votes} votes)\n\n`
    )
    .join("");
}

export function formatStats(rows: readonly SongRatingSummary[]): string {
  return `📊 Song Statistics:\n\n${ratingRows(rows)}`;
}

export function formatTopRated(rows: readonly SongRatingSummary[]): string {
  return `🏆 Top Rated Songs (7.0+):\n\n${ratingRows(rows)}`;
}

export function formatMyRatings(result: MyRatingsResult): string {
  let text = `🎭 Your Ratings (${result.total} songs):\n\n`;
  for (const { song, rating } of result.entries) {
    text += `${"⭐".repeat(rating)} ${rating}/10 - ${songLine(song)}\n`;
  }
  return text;
}

export function formatMyFavorites(result: MyFavoritesResult): string {
  let text = "❤️ Your Favorite Songs:\n\n";

  if (result.explicit.length > 0) {
    text += "💖 Explicitly Favorited:\n";
    for (const { song, rating } of result.explicit) {
      const suffix = rating !== undefined ? ` (${rating}/10)` : "";
      text += `❤️ ${songLine(song)}${suffix}\n`;
    }
    text += "\n";
  }

  if (result.highRated.length > 0) {
    text += "⭐ Highly Rated (8+):\n";
    for (const { song, rating } of result.highRated) {
      text += `⭐ ${rating}/10 - ${songLine(song)}\n`;
    }
  }

  return text;
}

export function formatLeaderboard(board: BattleLeaderboard, votesCast: number): string {
  let text = `🥊 **BATTLE LEADERBOARD** (${board.resolvedBattles} battles)\n\n`;

  board.standings.forEach((standing, i) => {
    const medal = MEDALS[i] ?? `${i + 1}.`;
    text += `${medal} ${songLine(standing.song)}\n`;
    text += `   🏆 ${standing.wins}W-${standing.losses}L (${standing.winRate.toFixed(1)}% win rate)\n\n`;
  });

  return `${text}📊 You've voted in ${votesCast} battles`;
}

export function formatBlacklist(songIds: readonly number[], catalog: readonly Song[]): string {
  const songs = new Map(catalog.map((song) => [song.id, song]));
  let text = "🚫 Your Blacklisted Songs:\n\n";
  for (const songId of songIds) {
    const song = songs.get(songId);
    if (song) text += `🚫 ID:${songId} - ${songLine(song)}\n`;
  }
  return `${text}\nTo remove: /blacklist remove [song_id]`;
}
