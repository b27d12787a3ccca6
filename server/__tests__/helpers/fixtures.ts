/**
 * Song, engagement-state and randomness fixtures shared by server tests.
 */

import { createEmptyState, type EngagementState, type Song } from "@shared/schema";
import { EngagementError, isEngagementError } from "../../utils/engagementError";
import type { RandomSource } from "../../utils/random";

export function createSong(id: number, overrides: Partial<Omit<Song, "id">> = {}): Song {
  return {
    id,
    title: `Song ${id}`,
    artist: `Artist ${id}`,
    genre: "pop",
    ...overrides,
  };
}

/** A small mixed catalog: two rock artists, one jazz, one pop. */
export function createCatalog(): Song[] {
  return [
    createSong(1, { title: "Night Drive", artist: "The Lanterns", genre: "rock", year: 2019 }),
    createSong(2, { title: "Paper Moon Run", artist: "The Lanterns", genre: "rock", year: 2021 }),
    createSong(3, { title: "Slow Brass", artist: "Ada Quartet", genre: "jazz", year: 1998 }),
    createSong(4, { title: "Glass Garden", artist: "Mira Vale", genre: "pop" }),
    createSong(5, { title: "Iron Orchard", artist: "Stone Relay", genre: "Rock", year: 2010 }),
    createSong(6, { title: "Moonlit Avenue", artist: "Ada Quartet", genre: "jazz", year: 2003 }),
  ];
}

type StateOverrides = Partial<EngagementState>;

export function createState(overrides: StateOverrides = {}): EngagementState {
  return { ...createEmptyState(), ...overrides };
}

/**
 * A RandomSource that replays `values` in order and then repeats the last
 * one. Use 0 for "first element" and 0.999 for "last element".
 */
export function sequenceRandom(...values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index++;
    return value;
  };
}

/** Run `fn` and return the EngagementError it throws. */
export function captureEngagementError(fn: () => unknown): EngagementError {
  try {
    fn();
  } catch (error) {
    if (isEngagementError(error)) return error;
    throw error;
  }
  throw new Error("Expected an EngagementError to be thrown");
}

/** Await `promise` and return the EngagementError it rejects with. */
export async function rejectedEngagementError(promise: Promise<unknown>): Promise<EngagementError> {
  try {
    await promise;
  } catch (error) {
    if (isEngagementError(error)) return error;
    throw error;
  }
  throw new Error("Expected an EngagementError rejection");
}
