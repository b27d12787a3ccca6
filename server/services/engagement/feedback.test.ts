import { describe, it, expect, vi } from "vitest";
import type { BattleContext, RatingContext } from "@shared/schema";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const { MemUserStateStore } = await import("../../storage/memory");
const { createMemoryPollRegistry } = await import("../pollRegistry");
const { captureBattleVote, captureRating, handlePollAnswer } = await import("./feedback");

const ratingContext: RatingContext = {
  kind: "rating",
  songId: 3,
  songTitle: "Slow Brass",
  chatId: "chat-1",
};

const battleContext: BattleContext = {
  kind: "battle",
  battleId: "chat-1_1714557600",
  song1: { id: 1, title: "Night Drive", artist: "The Lanterns" },
  song2: { id: 4, title: "Glass Garden", artist: "Mira Vale" },
  chatId: "chat-1",
  startTime: "2024-05-01T10:00:00.000Z",
};

describe("captureRating", () => {
  it("stores the option index plus one", async () => {
    const store = new MemUserStateStore();

    const outcome = await captureRating(store, ratingContext, 6, "u1");

    expect(outcome).toEqual({ status: "recorded", kind: "rating", songId: 3, rating: 7 });
    expect((await store.snapshot()).ratings).toEqual({ "3": { u1: 7 } });
  });

  it("replaces an earlier rating from the same responder", async () => {
    const store = new MemUserStateStore();

    await captureRating(store, ratingContext, 1, "u1");
    await captureRating(store, ratingContext, 8, "u2");
    await captureRating(store, ratingContext, 9, "u1");

    expect((await store.snapshot()).ratings["3"]).toEqual({ u1: 10, u2: 9 });
  });

  it("ignores options outside the 1-10 scale", async () => {
    const store = new MemUserStateStore();

    const outcome = await captureRating(store, ratingContext, 10, "u1");

    expect(outcome).toEqual({ status: "ignored", reason: "invalid_option" });
    expect((await store.snapshot()).ratings).toEqual({});
  });

  it("keeps every rating when answers arrive concurrently", async () => {
    const store = new MemUserStateStore();

    await Promise.all(
      Array.from({ length: 12 }, (_, i) => captureRating(store, ratingContext, i % 10, `u${i}`))
    );

    expect(Object.keys((await store.snapshot()).ratings["3"])).toHaveLength(12);
  });
});

describe("captureBattleVote", () => {
  it("creates the battle record on the first vote", async () => {
    const store = new MemUserStateStore();

    const outcome = await captureBattleVote(store, battleContext, 1, "u1");

    expect(outcome).toEqual({
      status: "recorded",
      kind: "battle",
      battleId: "chat-1_1714557600",
      choice: 1,
    });
    expect((await store.snapshot()).battles["chat-1_1714557600"]).toEqual({
      song1: battleContext.song1,
      song2: battleContext.song2,
      start_time: "2024-05-01T10:00:00.000Z",
      votes: { u1: 1 },
    });
  });

  it("refuses to add votes to a record for a different pairing", async () => {
    const store = new MemUserStateStore();
    await captureBattleVote(store, battleContext, 1, "u1");
    const otherPairing: BattleContext = {
      ...battleContext,
      song1: { id: 6, title: "Moonlit Avenue", artist: "Ada Quartet" },
      song2: { id: 5, title: "Iron Orchard", artist: "Stone Relay" },
    };

    const outcome = await captureBattleVote(store, otherPairing, 0, "u2");

    expect(outcome).toEqual({ status: "ignored", reason: "battle_mismatch" });
    expect((await store.snapshot()).battles["chat-1_1714557600"]).toEqual({
      song1: battleContext.song1,
      song2: battleContext.song2,
      start_time: "2024-05-01T10:00:00.000Z",
      votes: { u1: 1 },
    });
  });

  it("lets a responder change their vote", async () => {
    const store = new MemUserStateStore();

    await captureBattleVote(store, battleContext, 0, "u1");
    await captureBattleVote(store, battleContext, 0, "u2");
    await captureBattleVote(store, battleContext, 1, "u1");

    expect((await store.snapshot()).battles["chat-1_1714557600"].votes).toEqual({ u1: 1, u2: 0 });
  });

  it("ignores options other than the two songs", async () => {
    const store = new MemUserStateStore();

    const outcome = await captureBattleVote(store, battleContext, 2, "u1");

    expect(outcome).toEqual({ status: "ignored", reason: "invalid_option" });
    expect((await store.snapshot()).battles).toEqual({});
  });
});

describe("handlePollAnswer", () => {
  function setup() {
    const store = new MemUserStateStore();
    const registry = createMemoryPollRegistry({ ttlMs: 60_000 });
    return { store, registry };
  }

  it("drops answers for polls it never registered", async () => {
    const deps = setup();

    const outcome = await handlePollAnswer(deps, { pollId: "p404", responderId: "u1", optionIds: [3] });

    expect(outcome).toEqual({ status: "ignored", reason: "unknown_poll" });
    expect(await deps.store.snapshot()).toEqual({
      ratings: {},
      favorites: {},
      blacklist: {},
      last_shown: {},
      battles: {},
    });
  });

  it("drops retracted votes", async () => {
    const deps = setup();
    await deps.registry.register("p1", ratingContext);

    const outcome = await handlePollAnswer(deps, { pollId: "p1", responderId: "u1", optionIds: [] });

    expect(outcome).toEqual({ status: "ignored", reason: "no_options" });
  });

  it("routes rating polls and keeps them answerable", async () => {
    const deps = setup();
    await deps.registry.register("p1", ratingContext);

    await handlePollAnswer(deps, { pollId: "p1", responderId: "u1", optionIds: [4] });
    await handlePollAnswer(deps, { pollId: "p1", responderId: "u2", optionIds: [9, 2] });

    expect((await deps.store.snapshot()).ratings["3"]).toEqual({ u1: 5, u2: 10 });
  });

  it("routes battle polls", async () => {
    const deps = setup();
    await deps.registry.register("p2", battleContext);

    const outcome = await handlePollAnswer(deps, { pollId: "p2", responderId: "u3", optionIds: [0] });

    expect(outcome).toMatchObject({ status: "recorded", kind: "battle", choice: 0 });
    expect((await deps.store.snapshot()).battles["chat-1_1714557600"].votes).toEqual({ u3: 0 });
  });
});
