import {
  blacklistLastShown,
  favoriteLastShown,
  myFavorites as collectFavorites,
  myRatings as collectRatings,
  removeFromBlacklist,
} from "../../services/engagement";
import { EngagementError } from "../../utils/engagementError";
import {
  BLACKLIST_USAGE,
  formatBlacklist,
  formatMyFavorites,
  formatMyRatings,
  songLine,
} from "../formatters";
import { loadResponder, reply } from "../present";
import type { CommandHandler } from "../types";

export const favorite: CommandHandler = async (deps, ctx) => {
  const { changed, song } = await favoriteLastShown(deps.state, ctx.responderId);
  const text = changed ? `❤️ Added to favorites: ${songLine(song)}` : `💖 Already in favorites: ${songLine(song)}`;
  await reply(deps, ctx, text);
};

export const myfavorites: CommandHandler = async (deps, ctx) => {
  const { catalog, state } = await loadResponder(deps, ctx.responderId);
  const result = collectFavorites(catalog, state, ctx.responderId);

  if (result.explicit.length === 0 && result.highRated.length === 0) {
    await reply(deps, ctx, "No favorites yet! Use /favorite to mark songs or rate them 8+ ⭐");
    return;
  }
  await reply(deps, ctx, formatMyFavorites(result));
};

export const myratings: CommandHandler = async (deps, ctx) => {
  const { catalog, state } = await loadResponder(deps, ctx.responderId);
  const result = collectRatings(catalog, state, ctx.responderId);

  if (result.total === 0) {
    await reply(deps, ctx, "You haven't rated any songs yet! Use /recommend or /random to discover music.");
    return;
  }
  await reply(deps, ctx, formatMyRatings(result));
};

export const blacklist: CommandHandler = async (deps, ctx) => {
  const [rawAction = "", rawSongId = ""] = ctx.args;
  const action = rawAction.toLowerCase();

  if (!action) {
    const { catalog, view } = await loadResponder(deps, ctx.responderId);
    if (view.blacklist.length === 0) {
      await reply(
        deps,
        ctx,
        "Your blacklist is empty!\n\nTo blacklist the last recommended song: /blacklist add\nTo remove from blacklist: /blacklist remove [song_id]"
      );
      return;
    }
    await reply(deps, ctx, formatBlacklist(view.blacklist, catalog));
    return;
  }

  if (action === "add") {
    const { changed, song } = await blacklistLastShown(deps.state, ctx.responderId);
    const text = changed
      ? `🚫 Blacklisted: ${songLine(song)}\nThis song will not be recommended to you again.`
      : `Already blacklisted: ${songLine(song)}`;
    await reply(deps, ctx, text);
    return;
  }

  if (action === "remove") {
    if (!/^\d+$/.test(rawSongId)) {
      throw new EngagementError("INVALID_INPUT", "Usage: /blacklist remove [song_id]");
    }

    const songId = Number(rawSongId);
    const removed = await removeFromBlacklist(deps.state, ctx.responderId, songId);
    if (!removed) {
      await reply(deps, ctx, `Song ID ${songId} is not in your blacklist.`);
      return;
    }

    const song = (await deps.catalog.all()).find((s) => s.id === songId);
    await reply(
      deps,
      ctx,
      song ? `✅ Removed from blacklist: ${songLine(song)}` : `✅ Removed song ID ${songId} from blacklist`
    );
    return;
  }

  throw new EngagementError("INVALID_INPUT", BLACKLIST_USAGE);
};
