/**
 * Music quotes for /quote, read once from quotes.json (an array of strings).
 * A missing or broken file means no quotes, never a failed command.
 */

import { z } from "zod";
import logger from "../logger";
import { readJsonFile } from "../storage/jsonFile";
import { defaultRandom, pickOne, type RandomSource } from "../utils/random";

const QuotesSchema = z.array(z.string().trim().min(1));

export interface QuoteSource {
  all(): Promise<string[]>;
}

export class FileQuoteSource implements QuoteSource {
  private quotes: string[] | null = null;

  constructor(private readonly filePath: string) {}

  async all(): Promise<string[]> {
    if (!this.quotes) {
      this.quotes = await this.read();
    }
    return [...this.quotes];
  }

  private async read(): Promise<string[]> {
    const result = await readJsonFile(this.filePath);
    if (result.status === "missing") {
      logger.info("[Quotes] No quotes file", { file: this.filePath });
      return [];
    }
    if (result.status !== "ok") {
      logger.error("[Quotes] Quotes file could not be read", {
        file: this.filePath,
        status: result.status,
        error: String(result.error),
      });
      return [];
    }

    const parsed = QuotesSchema.safeParse(result.value);
    if (!parsed.success) {
      logger.error("[Quotes] Quotes file must be an array of non-empty strings", {
        file: this.filePath,
      });
      return [];
    }
    return parsed.data;
  }
}

export class StaticQuoteSource implements QuoteSource {
  constructor(private readonly quotes: string[]) {}

  async all(): Promise<string[]> {
    return [...this.quotes];
  }
}

export async function randomQuote(
  source: QuoteSource,
  random: RandomSource = defaultRandom
): Promise<string | undefined> {
  const quotes = await source.all();
  return quotes.length > 0 ? pickOne(quotes, random) : undefined;
}
