import { toSnapshot } from "@shared/schema";
import {
  battleLeaderboard,
  battleVoteCount,
  songStats,
  topRated,
} from "../../services/engagement";
import { randomQuote } from "../../services/quotes";
import { battlePair, triviaQuestion } from "../../services/selection";
import {
  BATTLE_QUESTION,
  HELP_TEXT,
  battleOption,
  formatBattle,
  formatLeaderboard,
  formatStats,
  formatTopRated,
} from "../formatters";
import { loadResponder, reply } from "../present";
import type { CommandHandler } from "../types";

const NO_RATINGS = "No ratings available yet. Start rating some songs!";

export const help: CommandHandler = async (deps, ctx) => {
  await reply(deps, ctx, HELP_TEXT, { markdown: true });
};

export const stats: CommandHandler = async (deps, ctx) => {
  const { catalog, state } = await loadResponder(deps, ctx.responderId);
  if (Object.keys(state.ratings).length === 0) {
    await reply(deps, ctx, NO_RATINGS);
    return;
  }

  const rows = songStats(catalog, state);
  await reply(deps, ctx, rows.length > 0 ? formatStats(rows) : "No valid ratings found.");
};

export const toprated: CommandHandler = async (deps, ctx) => {
  const { catalog, state } = await loadResponder(deps, ctx.responderId);
  if (Object.keys(state.ratings).length === 0) {
    await reply(deps, ctx, NO_RATINGS);
    return;
  }

  const result = topRated(catalog, state);
  if (result.qualified === 0) {
    await reply(deps, ctx, "Not enough ratings yet (need at least 2 votes per song).");
  } else if (result.songs.length === 0) {
    await reply(deps, ctx, "No songs with 7.0+ average rating yet.");
  } else {
    await reply(deps, ctx, formatTopRated(result.songs));
  }
};

export const battle: CommandHandler = async (deps, ctx) => {
  const { catalog, view } = await loadResponder(deps, ctx.responderId);
  const [first, second] = battlePair(catalog, view, deps.random);
  const startedAt = deps.now();

  await reply(deps, ctx, formatBattle(first, second), { markdown: true });

  const song1 = toSnapshot(first);
  const song2 = toSnapshot(second);
  const pollId = await deps.transport.openPoll(ctx.chatId, BATTLE_QUESTION, [
    battleOption(song1),
    battleOption(song2),
  ]);
  // Poll ids are unique per platform, so two battles started in the same
  // millisecond still get separate records
  const battleId = `${ctx.chatId}_${startedAt.getTime()}_${pollId}`;
  await deps.registry.register(pollId, {
    kind: "battle",
    battleId,
    song1,
    song2,
    chatId: ctx.chatId,
    startTime: startedAt.toISOString(),
  });
  ctx.log.info("[Bot] Battle started", { battleId, pollId, song1: song1.id, song2: song2.id });
};

export const battlestats: CommandHandler = async (deps, ctx) => {
  const { catalog, state } = await loadResponder(deps, ctx.responderId);
  if (Object.keys(state.battles).length === 0) {
    await reply(deps, ctx, "No battle data available yet! Start some battles with /battle");
    return;
  }

  const board = battleLeaderboard(catalog, state);
  if (board.resolvedBattles === 0) {
    await reply(deps, ctx, "No completed battles yet! Vote in some battles to see stats.");
    return;
  }

  await reply(deps, ctx, formatLeaderboard(board, battleVoteCount(state, ctx.responderId)), {
    markdown: true,
  });
};

export const trivia: CommandHandler = async (deps, ctx) => {
  const quiz = triviaQuestion(await deps.catalog.all(), deps.random);
  await deps.transport.openPoll(
    ctx.chatId,
    quiz.question,
    quiz.options.map((song) => song.title),
    { quiz: true, correctIndex: quiz.correctIndex, explanation: quiz.explanation }
  );
};

export const quote: CommandHandler = async (deps, ctx) => {
  const text = await randomQuote(deps.quotes, deps.random);
  await reply(deps, ctx, text ? `🎵 ${text}` : "No quotes available.");
};
