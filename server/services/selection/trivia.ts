import type { Song } from "@shared/schema";
import { TRIVIA_OPTION_COUNT } from "../../config/constants";
import { EngagementError } from "../../utils/engagementError";
import { defaultRandom, pickOne, sample, shuffle, type RandomSource } from "../../utils/random";
import { sameText } from "./candidates";
import type { TriviaQuestion, TriviaTemplate } from "./types";

function questionFor(template: TriviaTemplate, song: Song): string {
  switch (template) {
    case "artist":
      return `🎵 Which song is by ${song.artist}?`;
    case "genre":
      return `🎸 Which song is from the ${song.genre} genre?`;
    case "year":
      return `📅 Which song was released in ${song.year}?`;
  }
}

function sharesAnswer(template: TriviaTemplate, a: Song, b: Song): boolean {
  switch (template) {
    case "artist":
      return sameText(a.artist, b.artist);
    case "genre":
      return sameText(a.genre, b.genre);
    case "year":
      return a.year === b.year;
  }
}

/**
 * Multiple-choice question about one catalog song. Uses the whole catalog:
 * trivia is a game, not a recommendation, so blacklists do not apply.
 *
 * Wrong options are drawn from songs that do not also fit the question when
 * enough exist, so the quiz has a single right answer.
 */
export function triviaQuestion(
  catalog: readonly Song[],
  random: RandomSource = defaultRandom
): TriviaQuestion {
  if (catalog.length < TRIVIA_OPTION_COUNT) {
    throw new EngagementError("INSUFFICIENT_CANDIDATES", "Need at least 4 songs for trivia!");
  }

  const correct = pickOne(catalog, random);
  const templates: TriviaTemplate[] =
    correct.year !== undefined ? ["artist", "genre", "year"] : ["artist", "genre"];
  const template = pickOne(templates, random);

  const others = catalog.filter((song) => song.id !== correct.id);
  const clean = others.filter((song) => !sharesAnswer(template, song, correct));
  const wrongCount = TRIVIA_OPTION_COUNT - 1;

  let wrong: Song[];
  if (clean.length >= wrongCount) {
    wrong = sample(clean, wrongCount, random);
  } else {
    const fillers = others.filter((song) => sharesAnswer(template, song, correct));
    wrong = [...clean, ...sample(fillers, wrongCount - clean.length, random)];
  }

  const options = shuffle([correct, ...wrong], random);

  return {
    template,
    question: questionFor(template, correct),
    options,
    correctIndex: options.findIndex((song) => song.id === correct.id),
    explanation: `Correct! ${correct.title} by ${correct.artist} (${correct.genre}, ${correct.year ?? "Unknown"})`,
  };
}
