/**
 * Inbound events from the platform bridge.
 *
 * POST /api/events/commands      { name, args?, chatId, responderId }
 * POST /api/events/poll-answers  { pollId, responderId, optionIds }
 *
 * The event is handled to completion before `{ ok: true }` goes back, so
 * the bridge can retry on a non-2xx without double-applying anything.
 */

import { Router, type Request, type Response } from "express";
import { CommandEventSchema, PollAnswerEventSchema } from "@shared/schema";
import { dispatchCommand, dispatchPollAnswer } from "../bot/dispatcher";
import type { BotDeps } from "../bot/types";
import { requireBridgeSecret } from "../middleware/bridgeAuth";
import { Errors } from "../utils/apiError";

export function handleCommandEvent(deps: BotDeps) {
  return async (req: Request, res: Response) => {
    const parsed = CommandEventSchema.safeParse(req.body);
    if (!parsed.success) {
      return Errors.validation(res, parsed.error.issues);
    }

    try {
      await dispatchCommand(deps, parsed.data, req.log);
      return res.json({ ok: true });
    } catch (error) {
      req.log.error("[Events] Command event failed", { error });
      return Errors.internal(res);
    }
  };
}

export function handlePollAnswerEvent(deps: BotDeps) {
  return async (req: Request, res: Response) => {
    const parsed = PollAnswerEventSchema.safeParse(req.body);
    if (!parsed.success) {
      return Errors.validation(res, parsed.error.issues);
    }

    try {
      await dispatchPollAnswer(deps, parsed.data, req.log);
      return res.json({ ok: true });
    } catch (error) {
      req.log.error("[Events] Poll answer event failed", { error });
      return Errors.internal(res);
    }
  };
}

export function createEventsRouter(deps: BotDeps, bridgeSecret: string | undefined): Router {
  const router = Router();

  router.use(requireBridgeSecret(bridgeSecret));
  router.post("/commands", handleCommandEvent(deps));
  router.post("/poll-answers", handlePollAnswerEvent(deps));

  return router;
}
