import type { Song } from "@shared/schema";
import { DAILY_EPOCH } from "../../config/constants";
import { filterCandidates } from "./candidates";
import type { ResponderView } from "./types";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Whole calendar days between the rotation epoch and `now`'s local date. */
export function daysSinceEpoch(now: Date): number {
  // Compare calendar dates through UTC so DST shifts never produce fractions
  const today = Date.UTC(now.getFullYear(), now.getMonth(), now.getDate());
  const epoch = Date.UTC(DAILY_EPOCH.year, DAILY_EPOCH.month - 1, DAILY_EPOCH.day);
  return Math.round((today - epoch) / MS_PER_DAY);
}

/** Modulo whose result is always in [0, divisor). */
export function euclideanMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Today's song: the same for every responder whose blacklist leaves the same
 * candidate list, and stable for the whole day.
 */
export function dailyPick(catalog: readonly Song[], responder: ResponderView, now: Date): Song {
  const candidates = filterCandidates(catalog, responder.blacklist);
  return candidates[euclideanMod(daysSinceEpoch(now), candidates.length)];
}
