import type { CommandHandler } from "../types";
import { add, reload, remove } from "./admin";
import { battle, battlestats, help, quote, stats, toprated, trivia } from "./community";
import { blacklist, favorite, myfavorites, myratings } from "./preferences";
import { artist, discover, genre, random, recommend, search, similar } from "./recommendations";

export const COMMANDS: ReadonlyMap<string, CommandHandler> = new Map([
  ["start", help],
  ["help", help],
  ["recommend", recommend],
  ["random", random],
  ["genre", genre],
  ["artist", artist],
  ["search", search],
  ["discover", discover],
  ["similar", similar],
  ["favorite", favorite],
  ["myfavorites", myfavorites],
  ["blacklist", blacklist],
  ["myratings", myratings],
  ["stats", stats],
  ["toprated", toprated],
  ["battle", battle],
  ["battlestats", battlestats],
  ["trivia", trivia],
  ["quote", quote],
  ["add", add],
  ["remove", remove],
  ["reload", reload],
]);

export const ADMIN_COMMANDS: ReadonlySet<string> = new Set(["add", "remove", "reload"]);
