/**
 * Application Constants
 *
 * Tunables of the selection and aggregation algorithms, grouped by feature.
 */

// ============================================================================
// Ratings
// ============================================================================

/** Rating poll options, index 0 = rating 1 */
export const RATING_OPTIONS = ["1️⃣", "2️⃣", "3️⃣", "4️⃣", "5️⃣", "6️⃣", "7️⃣", "8️⃣", "9️⃣", "🔟"] as const;

/** A rating at or above this counts as a favorite in /myfavorites */
export const FAVORITE_RATING_THRESHOLD = 8;

// ============================================================================
// Daily pick
// ============================================================================

/** Day zero of the daily rotation (local calendar date) */
export const DAILY_EPOCH = { year: 2024, month: 1, day: 1 } as const;

// ============================================================================
// Discovery
// ============================================================================

/** Distinct rated songs required before discovery is personalized */
export const DISCOVERY_MIN_RATINGS = 3;

/** Ratings at or above this feed the preference profile */
export const DISCOVERY_PREFERENCE_THRESHOLD = 7;

export const DISCOVERY_GENRE_WEIGHT = 0.7;
export const DISCOVERY_ARTIST_WEIGHT = 0.9;

/** Shortlist size is max(this, floor(candidates / DISCOVERY_SHORTLIST_DIVISOR)) */
export const DISCOVERY_SHORTLIST_MIN = 5;
export const DISCOVERY_SHORTLIST_DIVISOR = 3;

// ============================================================================
// Search & lists
// ============================================================================

export const SEARCH_RESULT_LIMIT = 10;
export const LEADERBOARD_LIMIT = 10;
export const STATS_LIMIT = 10;

/** Top-rated requires this many votes per song */
export const TOP_RATED_MIN_VOTES = 2;

/** Top-rated requires this mean rating */
export const TOP_RATED_MIN_AVERAGE = 7.0;

// ============================================================================
// Trivia & battles
// ============================================================================

export const TRIVIA_OPTION_COUNT = 4;
export const BATTLE_SIZE = 2;

// ============================================================================
// Bridge transport
// ============================================================================

/** Outbound bridge request timeout (ms) */
export const BRIDGE_TIMEOUT_MS = 10_000;

/** Max inbound JSON body for bridge events */
export const BODY_PARSE_LIMIT = "100kb";
