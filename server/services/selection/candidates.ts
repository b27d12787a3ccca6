import type { EngagementState, Song } from "@shared/schema";
import { EngagementError } from "../../utils/engagementError";
import type { ResponderView } from "./types";

export function responderView(state: EngagementState, responderId: string): ResponderView {
  const ratings: Record<string, number> = {};
  for (const [songId, byResponder] of Object.entries(state.ratings)) {
    const rating = byResponder[responderId];
    if (rating !== undefined) ratings[songId] = rating;
  }

  return {
    responderId,
    blacklist: state.blacklist[responderId] ?? [],
    ratings,
    lastShown: state.last_shown[responderId],
  };
}

/**
 * Catalog minus the responder's blacklist. Every personalized selection
 * mode starts here.
 */
export function filterCandidates(catalog: readonly Song[], blacklist: readonly number[]): Song[] {
  if (catalog.length === 0) {
    throw new EngagementError("EMPTY_CANDIDATE_SET", "No songs available yet.");
  }

  const blocked = new Set(blacklist);
  const candidates = catalog.filter((song) => !blocked.has(song.id));

  if (candidates.length === 0) {
    throw new EngagementError(
      "EMPTY_CANDIDATE_SET",
      "All songs are in your blacklist! Use /blacklist to manage your preferences."
    );
  }
  return candidates;
}

export function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
