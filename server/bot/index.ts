/**
 * Chat bot layer: command handlers, message rendering and transports.
 *
 * @module bot
 */

export type { BotDeps, CommandContext, CommandHandler } from "./types";
export type { ChatTransport, MessageOptions, PollOptions } from "./transport";
export { LoggingTransport } from "./transport";
export { HttpBridgeTransport, BridgeError } from "./httpBridgeTransport";
export { dispatchCommand, dispatchPollAnswer, normalizeCommandName, GENERIC_FAILURE } from "./dispatcher";
