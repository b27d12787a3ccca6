import { EngagementError } from "../../utils/engagementError";
import {
  artistPick,
  dailyPick,
  discoveryPick,
  genrePick,
  listGenres,
  randomPick,
  similarPick,
  titleSearch,
} from "../../services/selection";
import {
  discoveryPrefix,
  formatGenres,
  formatSearchList,
  similarPrefix,
  titleCase,
} from "../formatters";
import { loadResponder, presentSong, reply } from "../present";
import type { CommandHandler } from "../types";

function joinedArgs(args: readonly string[]): string {
  return args.join(" ").trim();
}

export const recommend: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const song = dailyPick(catalog, view, deps.now());
  await presentSong(deps, ctx, song, "Today's pick", `Rate today's song: ${song.title}`);
};

export const random: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  await presentSong(deps, ctx, randomPick(catalog, view, deps.random), "Random pick");
};

export const genre: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const wanted = joinedArgs(ctx.args);

  if (!wanted) {
    await reply(deps, ctx, formatGenres(listGenres(catalog)));
    return;
  }

  const song = genrePick(catalog, view, wanted, deps.random);
  await presentSong(deps, ctx, song, `${titleCase(wanted)} pick`);
};

export const artist: CommandHandler = async (deps, ctx) => {
  const query = joinedArgs(ctx.args);
  if (!query) {
    throw new EngagementError("INVALID_INPUT", "Usage: /artist [artist_name]");
  }

  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const { song, matchCount } = artistPick(catalog, view, query, deps.random);
  const prefix =
    matchCount === 1 ? `By ${song.artist}` : `Random from ${song.artist} (${matchCount} available)`;
  await presentSong(deps, ctx, song, prefix);
};

export const search: CommandHandler = async (deps, ctx) => {
  const keyword = joinedArgs(ctx.args);
  if (!keyword) {
    throw new EngagementError("INVALID_INPUT", "Usage: /search [keyword]");
  }

  const result = titleSearch(await deps.catalog.all(), keyword);
  if (result.kind === "single") {
    await presentSong(deps, ctx, result.song, "Search result");
    return;
  }
  await reply(deps, ctx, formatSearchList(keyword, result.matches, result.total));
};

export const discover: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const pick = discoveryPick(catalog, view, deps.random);
  ctx.log.info("[Bot] Discovery pick", { songId: pick.song.id, score: pick.score });
  await presentSong(deps, ctx, pick.song, discoveryPrefix(pick.reasons));
};

export const similar: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const pick = similarPick(catalog, view, deps.random);
  await presentSong(deps, ctx, pick.song, similarPrefix(pick.reference, pick.basis));
};
