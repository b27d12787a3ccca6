/**
 * Catalog administration. The dispatcher only routes these commands for
 * responders listed in ADMIN_USER_IDS.
 */

import { EngagementError } from "../../utils/engagementError";
import { songLine } from "../formatters";
import { reply } from "../present";
import type { CommandHandler } from "../types";

const DIGITS = /^\d+$/;

export const add: CommandHandler = async (deps, ctx) => {
  const [title = "", artist = "", url = "", genre = "", year = ""] = ctx.args.map((arg) => arg.trim());
  if (!title || !artist) {
    throw new EngagementError("INVALID_INPUT", "Usage: /add [title] [artist] [url] [genre] [year]");
  }

  const parsedYear = DIGITS.test(year) && Number(year) > 0 ? Number(year) : undefined;
  const created = await deps.catalog.add({
    title,
    artist,
    genre: genre || "unknown",
    ...(url ? { url } : {}),
    ...(parsedYear !== undefined ? { year: parsedYear } : {}),
  });

  ctx.log.info("[Admin] Song added", { songId: created.id });
  await reply(deps, ctx, `✅ Added: ${songLine(created)}`);
};

export const remove: CommandHandler = async (deps, ctx) => {
  const [rawId = ""] = ctx.args;
  if (!DIGITS.test(rawId)) {
    throw new EngagementError("INVALID_INPUT", "Usage: /remove [song_id]");
  }

  const songId = Number(rawId);
  const removed = await deps.catalog.remove(songId);
  if (!removed) {
    await reply(deps, ctx, `Song with ID ${songId} not found.`);
    return;
  }

  ctx.log.info("[Admin] Song removed", { songId });
  await reply(deps, ctx, `✅ Removed: ${songLine(removed)}`);
};

export const reload: CommandHandler = async (deps, ctx) => {
  const songs = await deps.catalog.reload();
  await reply(deps, ctx, `✅ Reloaded ${songs.length} songs from the catalog.`);
};
