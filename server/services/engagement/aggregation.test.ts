import type { BattleRecord } from "@shared/schema";
import { createCatalog, createState } from "../../__tests__/helpers/fixtures";
import {
  battleLeaderboard,
  battleVoteCount,
  myFavorites,
  myRatings,
  songStats,
  topRated,
} from "./aggregation";

const catalog = createCatalog();

function battle(song1: number, song2: number, votes: BattleRecord["votes"]): BattleRecord {
  const snapshot = (id: number) => ({ id, title: `Song ${id}`, artist: `Artist ${id}` });
  return {
    song1: snapshot(song1),
    song2: snapshot(song2),
    start_time: "2024-05-01T10:00:00.000Z",
    votes,
  };
}

describe("songStats", () => {
  it("orders by average, then by vote count, skipping removed songs", () => {
    const state = createState({
      ratings: {
        "1": { u1: 8, u2: 8 },
        "2": { u1: 8 },
        "3": { u1: 10, u2: 2 },
        "99": { u1: 10 },
      },
    });

    const stats = songStats(catalog, state);

    expect(stats.map((s) => [s.song.id, s.average, s.votes])).toEqual([
      [1, 8, 2],
      [2, 8, 1],
      [3, 6, 2],
    ]);
  });

  it("caps the list at ten songs", () => {
    const ratings = Object.fromEntries(
      Array.from({ length: 12 }, (_, i) => [String(i + 1), { u1: 5 }])
    );
    const bigCatalog = Array.from({ length: 12 }, (_, i) => ({
      id: i + 1,
      title: `T${i + 1}`,
      artist: "A",
      genre: "pop",
    }));

    expect(songStats(bigCatalog, createState({ ratings }))).toHaveLength(10);
  });
});

describe("topRated", () => {
  it("needs two votes and a 7.0 average", () => {
    const state = createState({
      ratings: {
        "1": { u1: 9, u2: 7 },
        "2": { u1: 10 },
        "3": { u1: 7, u2: 6 },
        "5": { u1: 10, u2: 9, u3: 8 },
      },
    });

    const result = topRated(catalog, state);

    expect(result.qualified).toBe(3);
    expect(result.songs.map((s) => s.song.id)).toEqual([5, 1]);
    expect(result.songs[0].average).toBe(9);
  });

  it("reports how many songs qualified when none reach the cut-off", () => {
    const state = createState({ ratings: { "1": { u1: 3, u2: 4 } } });
    expect(topRated(catalog, state)).toEqual({ qualified: 1, songs: [] });
  });
});

describe("myRatings", () => {
  it("lists the responder's ratings best first and counts removed songs", () => {
    const state = createState({
      ratings: {
        "1": { u1: 4, u2: 10 },
        "3": { u1: 9 },
        "99": { u1: 7 },
        "4": { u2: 1 },
      },
    });

    const result = myRatings(catalog, state, "u1");

    expect(result.total).toBe(3);
    expect(result.entries.map((e) => [e.song.id, e.rating])).toEqual([
      [3, 9],
      [1, 4],
    ]);
  });
});

describe("myFavorites", () => {
  it("lists explicit favorites first, then other songs rated 8 or more", () => {
    const state = createState({
      favorites: { u1: ["4", "1", "99"] },
      ratings: {
        "1": { u1: 9 },
        "2": { u1: 8 },
        "3": { u1: 10 },
        "5": { u1: 7 },
      },
    });

    const result = myFavorites(catalog, state, "u1");

    expect(result.explicit).toEqual([
      { song: catalog[3], rating: undefined },
      { song: catalog[0], rating: 9 },
    ]);
    expect(result.highRated.map((e) => [e.song.id, e.rating])).toEqual([
      [3, 10],
      [2, 8],
    ]);
  });

  it("is empty for a responder with no favorites or high ratings", () => {
    expect(myFavorites(catalog, createState(), "u1")).toEqual({ explicit: [], highRated: [] });
  });
});

describe("battleLeaderboard", () => {
  it("credits the majority song with a win and the other with a loss", () => {
    const state = createState({ battles: { b1: battle(1, 2, { u1: 0, u2: 0, u3: 1 }) } });

    const board = battleLeaderboard(catalog, state);

    expect(board.resolvedBattles).toBe(1);
    expect(board.standings.map((s) => [s.song.id, s.wins, s.losses, s.winRate])).toEqual([
      [1, 1, 0, 100],
      [2, 0, 1, 0],
    ]);
  });

  it("never counts tied or unvoted battles", () => {
    const state = createState({
      battles: {
        tie: battle(1, 2, { u1: 0, u2: 1 }),
        empty: battle(3, 4, {}),
      },
    });

    expect(battleLeaderboard(catalog, state)).toEqual({ resolvedBattles: 0, standings: [] });
  });

  it("orders by win rate, then by battles fought", () => {
    const state = createState({
      battles: {
        a: battle(1, 2, { u1: 0 }),
        b: battle(3, 2, { u1: 0 }),
        c: battle(3, 4, { u1: 0 }),
        d: battle(4, 1, { u1: 0 }),
        e: battle(5, 99, { u1: 0 }),
      },
    });

    const board = battleLeaderboard(catalog, state);

    expect(board.resolvedBattles).toBe(5);
    expect(board.standings.map((s) => [s.song.id, s.wins, s.losses])).toEqual([
      [3, 2, 0],
      [5, 1, 0],
      [1, 1, 1],
      [4, 1, 1],
      [2, 0, 2],
    ]);
  });
});

describe("battleVoteCount", () => {
  it("counts battles the responder voted in", () => {
    const state = createState({
      battles: {
        a: battle(1, 2, { u1: 0, u2: 1 }),
        b: battle(3, 4, { u2: 0 }),
        c: battle(5, 6, { u1: 1 }),
      },
    });

    expect(battleVoteCount(state, "u1")).toBe(2);
    expect(battleVoteCount(state, "u3")).toBe(0);
  });
});
