/**
 * Engagement Services
 *
 * Feedback capture (ratings, battle votes), per-responder preferences
 * (favorites, blacklist, last shown song) and the aggregate views built
 * from them.
 *
 * @module services/engagement
 */

export type {
  FeedbackOutcome,
  PreferenceChange,
  SongRatingSummary,
  TopRatedResult,
  RatedSong,
  MyRatingsResult,
  MyFavoritesResult,
  BattleStanding,
  BattleLeaderboard,
} from "./types";
export type { PollAnswerDeps } from "./feedback";
export { captureRating, captureBattleVote, handlePollAnswer } from "./feedback";
export {
  trackLastShown,
  favoriteLastShown,
  blacklistLastShown,
  removeFromBlacklist,
} from "./preferences";
export {
  songStats,
  topRated,
  myRatings,
  myFavorites,
  battleLeaderboard,
  battleVoteCount,
} from "./aggregation";
