/**
 * Feedback capture
 *
 * Turns poll answers into ratings and battle votes. Answers to polls this
 * process never opened (or whose context expired) are ignored, not errors.
 */

import {
  BattleChoiceSchema,
  RatingValueSchema,
  type BattleContext,
  type PollAnswerEvent,
  type RatingContext,
} from "@shared/schema";
import logger from "../../logger";
import type { UserStateStore } from "../../storage/types";
import type { PollCorrelationRegistry } from "../pollRegistry";
import type { FeedbackOutcome } from "./types";

/**
 * Record a 1-10 rating from a rating poll. Option 0 is rating 1. A later
 * answer from the same responder replaces the earlier rating.
 */
export async function captureRating(
  store: UserStateStore,
  context: RatingContext,
  optionIndex: number,
  responderId: string
): Promise<FeedbackOutcome> {
  const parsed = RatingValueSchema.safeParse(optionIndex + 1);
  if (!parsed.success) {
    logger.warn("[Feedback] Rating option out of range", {
      songId: context.songId,
      responderId,
      optionIndex,
    });
    return { status: "ignored", reason: "invalid_option" };
  }

  const rating = parsed.data;
  const songKey = String(context.songId);

  await store.update((state) => {
    state.ratings[songKey] = { ...state.ratings[songKey], [responderId]: rating };
  });

  logger.info("[Feedback] Rating recorded", { songId: context.songId, responderId, rating });
  return { status: "recorded", kind: "rating", songId: context.songId, rating };
}

/**
 * Record a battle vote. The battle record is created from the poll context
 * on its first vote; a record under the same id for another pairing is
 * left alone.
 */
export async function captureBattleVote(
  store: UserStateStore,
  context: BattleContext,
  optionIndex: number,
  responderId: string
): Promise<FeedbackOutcome> {
  const parsed = BattleChoiceSchema.safeParse(optionIndex);
  if (!parsed.success) {
    logger.warn("[Feedback] Battle option out of range", {
      battleId: context.battleId,
      responderId,
      optionIndex,
    });
    return { status: "ignored", reason: "invalid_option" };
  }

  const choice = parsed.data;

  const recorded = await store.update((state) => {
    const existing = state.battles[context.battleId];
    if (
      existing &&
      (existing.song1.id !== context.song1.id || existing.song2.id !== context.song2.id)
    ) {
      return false;
    }

    const battle = existing ?? {
      song1: context.song1,
      song2: context.song2,
      start_time: context.startTime,
      votes: {},
    };
    battle.votes[responderId] = choice;
    state.battles[context.battleId] = battle;
    return true;
  });

  if (!recorded) {
    logger.warn("[Feedback] Battle id already holds a different pairing, vote ignored", {
      battleId: context.battleId,
      responderId,
      song1: context.song1.id,
      song2: context.song2.id,
    });
    return { status: "ignored", reason: "battle_mismatch" };
  }

  const votedFor = choice === 0 ? context.song1 : context.song2;
  logger.info("[Feedback] Battle vote recorded", {
    battleId: context.battleId,
    responderId,
    votedFor: votedFor.title,
  });
  return { status: "recorded", kind: "battle", battleId: context.battleId, choice };
}

export interface PollAnswerDeps {
  store: UserStateStore;
  registry: PollCorrelationRegistry;
}

/**
 * Route a poll answer to rating or battle capture. Only the first chosen
 * option counts; an empty selection (a retracted vote) is ignored.
 */
export async function handlePollAnswer(
  deps: PollAnswerDeps,
  event: PollAnswerEvent
): Promise<FeedbackOutcome> {
  const [optionIndex] = event.optionIds;
  if (optionIndex === undefined) {
    return { status: "ignored", reason: "no_options" };
  }

  const context = await deps.registry.resolve(event.pollId);
  if (!context) {
    logger.debug("[Feedback] Answer for unknown poll ignored", { pollId: event.pollId });
    return { status: "ignored", reason: "unknown_poll" };
  }

  switch (context.kind) {
    case "rating":
      return captureRating(deps.store, context, optionIndex, event.responderId);
    case "battle":
      return captureBattleVote(deps.store, context, optionIndex, event.responderId);
  }
}
