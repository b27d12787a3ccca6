/**
 * HTTP bridge transport
 *
 * Delivers messages and polls to a platform bridge service that owns the
 * actual bot connection. The bridge answers poll creation with the
 * platform's poll id.
 */

import { z } from "zod";
import { BRIDGE_TIMEOUT_MS } from "../config/constants";
import logger from "../logger";
import type { ChatTransport, MessageOptions, PollOptions } from "./transport";

const OpenPollResponseSchema = z.object({
  pollId: z.union([z.string().min(1), z.number().int()]).transform((val) => String(val)),
});

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

export interface HttpBridgeOptions {
  baseUrl: string;
  secret?: string;
  timeoutMs?: number;
}

export class HttpBridgeTransport implements ChatTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpBridgeOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? BRIDGE_TIMEOUT_MS;
  }

  async sendMessage(chatId: string, text: string, options: MessageOptions = {}): Promise<void> {
    await this.post("/messages", { chatId, text, markdown: options.markdown ?? false });
  }

  async openPoll(
    chatId: string,
    question: string,
    options: readonly string[],
    pollOptions: PollOptions = {}
  ): Promise<string> {
    const body = await this.post("/polls", {
      chatId,
      question,
      options,
      quiz: pollOptions.quiz ?? false,
      correctIndex: pollOptions.correctIndex,
      explanation: pollOptions.explanation,
    });

    const parsed = OpenPollResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BridgeError("Bridge did not return a poll id");
    }
    return parsed.data.pollId;
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.secret) {
      headers.Authorization = `Bearer ${this.options.secret}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        logger.warn("[Bridge] Non-OK response", { path, status: response.status });
        throw new BridgeError(`Bridge responded with ${response.status}`, response.status);
      }

      const text = await response.text();
      return text ? JSON.parse(text) : {};
    } finally {
      clearTimeout(timeout);
    }
  }
}
