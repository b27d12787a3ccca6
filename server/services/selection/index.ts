/**
 * Selection Engine
 *
 * Pure functions that choose a song (or pair, or quiz) from the catalog and
 * one responder's engagement state. Randomness and the current date are
 * parameters; nothing here reads or writes storage.
 *
 * @module services/selection
 */

export type {
  ResponderView,
  ArtistMatch,
  TitleSearchResult,
  DiscoveryPreferences,
  DiscoveryPick,
  SimilarPick,
  TriviaTemplate,
  TriviaQuestion,
} from "./types";
export { responderView, filterCandidates } from "./candidates";
export { dailyPick, daysSinceEpoch, euclideanMod } from "./daily";
export { randomPick, listGenres, genrePick, artistPick, titleSearch, battlePair } from "./picks";
export { discoveryPick, buildPreferences, scoreSong, shortlistSize } from "./discovery";
export { similarPick } from "./similar";
export { triviaQuestion } from "./trivia";
