import type { LastShown, Song } from "@shared/schema";

/** The slice of engagement state selection needs for one responder. */
export interface ResponderView {
  responderId: string;
  blacklist: readonly number[];
  /** songId (string) -> this responder's rating */
  ratings: Readonly<Record<string, number>>;
  lastShown?: LastShown;
}

export interface ArtistMatch {
  song: Song;
  /** How many candidate songs matched the query */
  matchCount: number;
}

export type TitleSearchResult =
  | { kind: "single"; song: Song }
  | { kind: "list"; matches: Song[]; total: number };

export interface DiscoveryPreferences {
  genres: Record<string, number>;
  artists: Record<string, number>;
}

export interface DiscoveryPick {
  song: Song;
  score: number;
  /** e.g. ["you like rock"]; empty when the pick is exploratory */
  reasons: string[];
}

export interface SimilarPick {
  song: Song;
  reference: Song;
  basis: "artist" | "genre";
}

export type TriviaTemplate = "artist" | "genre" | "year";

export interface TriviaQuestion {
  template: TriviaTemplate;
  question: string;
  options: Song[];
  correctIndex: number;
  explanation: string;
}
