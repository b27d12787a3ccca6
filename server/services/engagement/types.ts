import type { BattleChoice, LastShown, Song } from "@shared/schema";

export type FeedbackOutcome =
  | { status: "recorded"; kind: "rating"; songId: number; rating: number }
  | { status: "recorded"; kind: "battle"; battleId: string; choice: BattleChoice }
  | {
      status: "ignored";
      reason: "no_options" | "unknown_poll" | "invalid_option" | "battle_mismatch";
    };

export interface PreferenceChange {
  /** false when the list already held the song */
  changed: boolean;
  song: LastShown;
}

export interface SongRatingSummary {
  song: Song;
  average: number;
  votes: number;
}

export interface TopRatedResult {
  /** Songs with enough votes to be ranked, before the average cut-off */
  qualified: number;
  songs: SongRatingSummary[];
}

export interface RatedSong {
  song: Song;
  rating: number;
}

export interface MyRatingsResult {
  /** Every song the responder rated, including ones since removed */
  total: number;
  entries: RatedSong[];
}

export interface MyFavoritesResult {
  explicit: Array<{ song: Song; rating?: number }>;
  highRated: RatedSong[];
}

export interface BattleStanding {
  song: Song;
  wins: number;
  losses: number;
  total: number;
  /** 0..100 */
  winRate: number;
}

export interface BattleLeaderboard {
  /** Battles with at least one vote and a majority */
  resolvedBattles: number;
  standings: BattleStanding[];
}
