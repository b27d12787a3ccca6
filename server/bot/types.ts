import type { Logger } from "../logger";
import type { PollCorrelationRegistry } from "../services/pollRegistry";
import type { QuoteSource } from "../services/quotes";
import type { CatalogStore, UserStateStore } from "../storage/types";
import type { RandomSource } from "../utils/random";
import type { ChatTransport } from "./transport";

/** Everything a command handler may touch. */
export interface BotDeps {
  catalog: CatalogStore;
  state: UserStateStore;
  registry: PollCorrelationRegistry;
  transport: ChatTransport;
  quotes: QuoteSource;
  /** Responder ids allowed to run admin commands */
  adminIds: readonly string[];
  random: RandomSource;
  now: () => Date;
}

export interface CommandContext {
  /** Normalized: no leading slash, no @bot suffix, lower case */
  name: string;
  args: string[];
  chatId: string;
  responderId: string;
  log: Logger;
}

export type CommandHandler = (deps: BotDeps, ctx: CommandContext) => Promise<void>;
