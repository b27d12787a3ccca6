/**
 * Inbound event dispatch
 *
 * Every command and poll answer is handled to completion here; failures
 * become a chat reply (commands) or a log line (poll answers) and never
 * propagate to the caller.
 */

import type { CommandEvent, PollAnswerEvent } from "@shared/schema";
import defaultLogger, { type Logger } from "../logger";
import { handlePollAnswer, type FeedbackOutcome } from "../services/engagement";
import { EngagementError, isEngagementError } from "../utils/engagementError";
import { ADMIN_COMMANDS, COMMANDS } from "./commands";
import type { BotDeps, CommandContext } from "./types";

export const GENERIC_FAILURE = "Sorry, an error occurred. Please try again later.";

/** "/Recommend@tunepoll_bot" -> "recommend" */
export function normalizeCommandName(raw: string): string {
  const [name = ""] = raw.trim().replace(/^\/+/, "").split("@");
  return name.toLowerCase();
}

async function reportFailure(deps: BotDeps, ctx: CommandContext, error: unknown): Promise<void> {
  let text = GENERIC_FAILURE;
  if (isEngagementError(error)) {
    ctx.log.warn("[Bot] Command failed", { code: error.code, reason: error.message });
    text = error.message;
  } else {
    ctx.log.error("[Bot] Command crashed", { error });
  }

  try {
    await deps.transport.sendMessage(ctx.chatId, text);
  } catch (sendError) {
    ctx.log.error("[Bot] Could not deliver failure reply", { error: sendError });
  }
}

export async function dispatchCommand(
  deps: BotDeps,
  event: CommandEvent,
  log: Logger = defaultLogger
): Promise<void> {
  const name = normalizeCommandName(event.name);
  const ctx: CommandContext = {
    name,
    args: event.args,
    chatId: event.chatId,
    responderId: event.responderId,
    log: log.child({ command: name, chatId: event.chatId, responderId: event.responderId }),
  };

  ctx.log.info("[Bot] Command received", { argCount: event.args.length });

  try {
    const handler = COMMANDS.get(name);
    if (!handler) {
      await deps.transport.sendMessage(
        ctx.chatId,
        `Unknown command: /${name}. Try /start for help or /recommend for today's song.`
      );
      return;
    }

    if (ADMIN_COMMANDS.has(name) && !deps.adminIds.includes(ctx.responderId)) {
      throw new EngagementError("FORBIDDEN", "❌ Admin access required.");
    }

    await handler(deps, ctx);
  } catch (error) {
    await reportFailure(deps, ctx, error);
  }
}

/** Resolves to undefined when the answer could not be processed. */
export async function dispatchPollAnswer(
  deps: BotDeps,
  event: PollAnswerEvent,
  log: Logger = defaultLogger
): Promise<FeedbackOutcome | undefined> {
  const answerLog = log.child({ pollId: event.pollId, responderId: event.responderId });
  answerLog.info("[Bot] Poll answer received", { optionIds: event.optionIds });

  try {
    const outcome = await handlePollAnswer({ store: deps.state, registry: deps.registry }, event);
    if (outcome.status === "ignored") {
      answerLog.debug("[Bot] Poll answer ignored", { reason: outcome.reason });
    }
    return outcome;
  } catch (error) {
    answerLog.error("[Bot] Poll answer failed", { error });
    return undefined;
  }
}
