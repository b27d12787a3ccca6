import { randomUUID } from "node:crypto";
import logger from "../logger";

export interface MessageOptions {
  /** Render the text with the platform's Markdown dialect */
  markdown?: boolean;
}

export interface PollOptions {
  quiz?: boolean;
  correctIndex?: number;
  explanation?: string;
}

/**
 * Outbound side of the chat platform. Poll ids are opaque to the engine and
 * unique for the lifetime of the process.
 */
export interface ChatTransport {
  sendMessage(chatId: string, text: string, options?: MessageOptions): Promise<void>;
  openPoll(
    chatId: string,
    question: string,
    options: readonly string[],
    pollOptions?: PollOptions
  ): Promise<string>;
}

/**
 * Writes outbound traffic to the log instead of a platform. Used when no
 * bridge is configured, e.g. while developing against curl.
 */
export class LoggingTransport implements ChatTransport {
  async sendMessage(chatId: string, text: string, options: MessageOptions = {}): Promise<void> {
    logger.info("[Transport] sendMessage", { chatId, text, markdown: options.markdown ?? false });
  }

  async openPoll(
    chatId: string,
    question: string,
    options: readonly string[],
    pollOptions: PollOptions = {}
  ): Promise<string> {
    const pollId = `local-${randomUUID()}`;
    logger.info("[Transport] openPoll", { chatId, pollId, question, options, ...pollOptions });
    return pollId;
  }
}
