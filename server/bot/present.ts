import type { Song } from "@shared/schema";
import { RATING_OPTIONS } from "../config/constants";
import { trackLastShown } from "../services/engagement";
import { responderView } from "../services/selection";
import { formatSong } from "./formatters";
import type { MessageOptions } from "./transport";
import type { BotDeps, CommandContext } from "./types";

export async function reply(
  deps: BotDeps,
  ctx: CommandContext,
  text: string,
  options?: MessageOptions
): Promise<void> {
  await deps.transport.sendMessage(ctx.chatId, text, options);
}

/** Catalog, engagement document and this responder's view of it. */
export async function loadResponder(deps: BotDeps, responderId: string) {
  const [catalog, state] = await Promise.all([deps.catalog.all(), deps.state.snapshot()]);
  return { catalog, state, view: responderView(state, responderId) };
}

/**
 * Show one song: remember it as the responder's last song, send the song
 * message, and open a rating poll whose answers will be correlated back.
 */
export async function presentSong(
  deps: BotDeps,
  ctx: CommandContext,
  song: Song,
  prefix: string,
  pollQuestion = `Rate: ${song.title}`
): Promise<void> {
  await trackLastShown(deps.state, ctx.responderId, song, deps.now());
  await reply(deps, ctx, formatSong(song, prefix));

  const pollId = await deps.transport.openPoll(ctx.chatId, pollQuestion, RATING_OPTIONS);
  await deps.registry.register(pollId, {
    kind: "rating",
    songId: song.id,
    songTitle: song.title,
    chatId: ctx.chatId,
  });
  ctx.log.debug("[Bot] Rating poll opened", { pollId, songId: song.id });
}
