import type { Song } from "@shared/schema";
import { EngagementError } from "../../utils/engagementError";
import { defaultRandom, pickOne, type RandomSource } from "../../utils/random";
import { filterCandidates, sameText } from "./candidates";
import type { ResponderView, SimilarPick } from "./types";

/**
 * A song like the one last shown to the responder. Same-artist songs are
 * preferred as a group; same-genre songs are used only when no same-artist
 * song is available. Within the chosen group every song is equally likely.
 */
export function similarPick(
  catalog: readonly Song[],
  responder: ResponderView,
  random: RandomSource = defaultRandom
): SimilarPick {
  const candidates = filterCandidates(catalog, responder.blacklist);

  const { lastShown } = responder;
  if (!lastShown) {
    throw new EngagementError(
      "NO_REFERENCE",
      "No recent song to find similar to! Use /recommend, /random, or other commands first."
    );
  }

  const reference = catalog.find((song) => song.id === lastShown.songId);
  if (!reference) {
    throw new EngagementError(
      "NO_REFERENCE",
      "Could not find the reference song. Try another command first."
    );
  }

  const others = candidates.filter((song) => song.id !== reference.id);
  const sameArtist = others.filter((song) => sameText(song.artist, reference.artist));
  if (sameArtist.length > 0) {
    return { song: pickOne(sameArtist, random), reference, basis: "artist" };
  }

  const sameGenre = others.filter((song) => sameText(song.genre, reference.genre));
  if (sameGenre.length > 0) {
    return { song: pickOne(sameGenre, random), reference, basis: "genre" };
  }

  throw new EngagementError(
    "NO_SIMILAR",
    `No similar songs found to ${reference.title} by ${reference.artist}.`
  );
}
