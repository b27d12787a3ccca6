import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

vi.mock("../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import logger from "../logger";
import { FileUserStateStore } from "./userStateStore";

describe("FileUserStateStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(os.tmpdir(), "user-state-"));
    file = path.join(dir, "user_data.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("returns the empty shape when no file exists", async () => {
      const store = new FileUserStateStore(file);
      expect(await store.load()).toEqual({
        ratings: {},
        favorites: {},
        blacklist: {},
        last_shown: {},
        battles: {},
      });
    });

    it("returns the empty shape and logs MALFORMED_STORE for invalid JSON", async () => {
      await writeFile(file, "{ not json", "utf-8");
      const store = new FileUserStateStore(file);

      const state = await store.load();

      expect(state.ratings).toEqual({});
      expect(logger.error).toHaveBeenCalledWith(
        "[UserState] State file is not valid JSON, starting empty",
        expect.objectContaining({ code: "MALFORMED_STORE" })
      );
    });

    it("drops only the invalid entries and keeps the rest", async () => {
      await writeFile(
        file,
        JSON.stringify({
          ratings: { "1": { u1: 11, u2: 8 }, "2": "seven" },
          favorites: { u1: ["3"], u2: [4] },
          blacklist: { u1: [2] },
          last_shown: { u1: { songId: 1 } },
          battles: {
            "chat-1_1": {
              song1: { id: 1, title: "Night Drive", artist: "The Lanterns" },
              song2: { id: 2, title: "Paper Moon Run", artist: "The Lanterns" },
              start_time: "2024-01-08T09:00:00.000Z",
              votes: { u1: 0, u2: 2 },
            },
            "chat-1_2": { song1: "missing" },
          },
        }),
        "utf-8"
      );
      const store = new FileUserStateStore(file);

      expect(await store.load()).toEqual({
        ratings: { "1": { u2: 8 } },
        favorites: { u1: ["3"] },
        blacklist: { u1: [2] },
        last_shown: {},
        battles: {
          "chat-1_1": {
            song1: { id: 1, title: "Night Drive", artist: "The Lanterns" },
            song2: { id: 2, title: "Paper Moon Run", artist: "The Lanterns" },
            start_time: "2024-01-08T09:00:00.000Z",
            votes: { u1: 0 },
          },
        },
      });
      expect(logger.warn).toHaveBeenCalledWith(
        "[UserState] Dropped invalid entries from the state file",
        expect.objectContaining({
          code: "MALFORMED_STORE",
          droppedCount: 6,
          dropped: [
            "ratings.1.u1",
            "ratings.2",
            "favorites.u2",
            "last_shown.u1",
            "battles.chat-1_1.votes.u2",
            "battles.chat-1_2",
          ],
        })
      );
    });

    it("fills in sections missing from an older document", async () => {
      await writeFile(file, JSON.stringify({ ratings: { "3": { u1: 9 } } }), "utf-8");
      const store = new FileUserStateStore(file);

      expect(await store.load()).toEqual({
        ratings: { "3": { u1: 9 } },
        favorites: {},
        blacklist: {},
        last_shown: {},
        battles: {},
      });
    });
  });

  describe("damaged files", () => {
    it("keeps every valid rating when one entry is out of range", async () => {
      const ratings: Record<string, Record<string, number>> = {};
      for (let songId = 1; songId <= 50; songId++) {
        ratings[String(songId)] = { alice: 7, bob: 9 };
      }
      ratings["51"] = { carol: 0 };
      const original = JSON.stringify({ ratings, favorites: { alice: ["2"] } });
      await writeFile(file, original, "utf-8");
      const store = new FileUserStateStore(file);

      await store.update((state) => {
        state.blacklist.dave = [3];
      });

      const written = JSON.parse(await readFile(file, "utf-8"));
      expect(Object.keys(written.ratings)).toHaveLength(51);
      expect(written.ratings["50"]).toEqual({ alice: 7, bob: 9 });
      expect(written.ratings["51"]).toEqual({});
      expect(written.favorites).toEqual({ alice: ["2"] });
      expect(written.blacklist).toEqual({ dave: [3] });
    });

    it("moves the original aside before the first write after salvaging", async () => {
      const original = JSON.stringify({ ratings: { "1": { u1: 0, u2: 5 } } });
      await writeFile(file, original, "utf-8");
      const store = new FileUserStateStore(file);

      await store.update((state) => {
        state.favorites.u2 = ["1"];
      });
      await store.update((state) => {
        state.favorites.u3 = ["1"];
      });

      const files = (await readdir(dir)).sort();
      expect(files).toHaveLength(2);
      expect(files[0]).toBe("user_data.json");
      expect(files[1]).toMatch(/^user_data\.json\.corrupt-\d+$/);
      expect(await readFile(path.join(dir, files[1]), "utf-8")).toBe(original);
    });

    it("moves undecodable JSON aside instead of overwriting it", async () => {
      await writeFile(file, "{ not json", "utf-8");
      const store = new FileUserStateStore(file);

      await store.update((state) => {
        state.favorites.u1 = ["1"];
      });

      const backups = (await readdir(dir)).filter((name) => name.includes(".corrupt-"));
      expect(backups).toHaveLength(1);
      expect(await readFile(path.join(dir, backups[0]), "utf-8")).toBe("{ not json");
      expect(JSON.parse(await readFile(file, "utf-8")).favorites).toEqual({ u1: ["1"] });
    });

    it("does not move a clean file aside", async () => {
      await writeFile(file, JSON.stringify({ ratings: { "1": { u1: 4 } } }), "utf-8");
      const store = new FileUserStateStore(file);

      await store.update((state) => {
        state.favorites.u1 = ["1"];
      });

      expect(await readdir(dir)).toEqual(["user_data.json"]);
    });

    it("never writes over a state file it could not read", async () => {
      // A directory in place of the file makes the read fail
      await mkdir(file);
      const store = new FileUserStateStore(file);

      await store.update((state) => {
        state.favorites.u1 = ["1"];
      });

      expect(logger.error).toHaveBeenCalledWith(
        "[UserState] State file unreadable, starting empty without saving",
        expect.objectContaining({ code: "STORE_UNAVAILABLE" })
      );
      expect(logger.error).toHaveBeenCalledWith(
        "[UserState] Failed to persist update, keeping it in memory",
        expect.objectContaining({ code: "STORE_UNAVAILABLE" })
      );
      expect((await stat(file)).isDirectory()).toBe(true);
      expect(await readdir(dir)).toEqual(["user_data.json"]);
      expect((await store.snapshot()).favorites).toEqual({ u1: ["1"] });
    });
  });

  describe("save", () => {
    it("replaces the file contents and leaves no temp files behind", async () => {
      const store = new FileUserStateStore(file);
      const state = await store.load();
      state.favorites.u1 = ["4"];

      await store.save(state);

      const written = JSON.parse(await readFile(file, "utf-8"));
      expect(written.favorites).toEqual({ u1: ["4"] });
      expect(await readdir(dir)).toEqual(["user_data.json"]);
    });
  });

  describe("update", () => {
    it("returns the mutator result and persists the change", async () => {
      const store = new FileUserStateStore(file);

      const result = await store.update((state) => {
        state.blacklist.u1 = [5];
        return "added";
      });

      expect(result).toBe("added");
      const reloaded = await new FileUserStateStore(file).load();
      expect(reloaded.blacklist).toEqual({ u1: [5] });
    });

    it("does not lose concurrent updates to different keys", async () => {
      const store = new FileUserStateStore(file);

      await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          store.update((state) => {
            state.ratings[String(i + 1)] = { u1: (i % 10) + 1 };
          })
        )
      );

      const reloaded = await new FileUserStateStore(file).load();
      expect(Object.keys(reloaded.ratings)).toHaveLength(20);
      expect(reloaded.ratings["20"]).toEqual({ u1: 10 });
    });

    it("leaves the document untouched when the mutator throws", async () => {
      const store = new FileUserStateStore(file);
      await store.update((state) => {
        state.favorites.u1 = ["1"];
      });

      await expect(
        store.update((state) => {
          state.favorites.u1.push("2");
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      expect((await store.snapshot()).favorites).toEqual({ u1: ["1"] });
    });

    it("keeps the change in memory when the write fails", async () => {
      // A regular file where the data directory should be makes every write fail
      const blocker = path.join(dir, "blocker");
      await writeFile(blocker, "", "utf-8");
      const store = new FileUserStateStore(path.join(blocker, "user_data.json"));

      await store.update((state) => {
        state.favorites.u1 = ["7"];
      });

      expect(logger.error).toHaveBeenCalledWith(
        "[UserState] Failed to persist update, keeping it in memory",
        expect.objectContaining({ code: "STORE_UNAVAILABLE" })
      );
      expect((await store.snapshot()).favorites).toEqual({ u1: ["7"] });
    });
  });

  describe("snapshot", () => {
    it("returns a copy that callers cannot use to mutate the store", async () => {
      const store = new FileUserStateStore(file);
      const copy = await store.snapshot();
      copy.favorites.u1 = ["9"];

      expect((await store.snapshot()).favorites).toEqual({});
    });
  });
});
