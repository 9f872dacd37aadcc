import { decode, encode } from "@msgpack/msgpack";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileProfileRepository } from "../../src/store/file-repository";
import { ProfileStore } from "../../src/store/profile-store";

let dir = "";
let filePath = "";

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "star-swarm-"));
  filePath = join(dir, "nested", "profiles.msgpack");
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("FileProfileRepository", () => {
  it("starts empty without a file and without warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const repository = new FileProfileRepository(filePath);

    expect(repository.list()).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("persists profiles across instances", () => {
    const store = new ProfileStore(new FileProfileRepository(filePath));
    store.create("ada", "pw");
    store.update("ada", { lastScore: 4, highScore: 4 });

    const reopened = new ProfileStore(new FileProfileRepository(filePath));
    expect(reopened.lookup("ada")).toEqual({ username: "ada", password: "pw", highScore: 4, lastScore: 4 });
    expect(existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it("writes the mapping as username and record pairs", () => {
    const repository = new FileProfileRepository(filePath);
    repository.set({ username: "ada", password: "pw", highScore: 7, lastScore: 2 });

    expect(decode(readFileSync(filePath))).toEqual([["ada", { password: "pw", high_score: 7, last_score: 2 }]]);
  });

  it("keeps usernames that collide with object keys", () => {
    const store = new ProfileStore(new FileProfileRepository(filePath));
    store.create("__proto__", "pw");
    store.update("__proto__", { lastScore: 3, highScore: 3 });

    const reopened = new ProfileStore(new FileProfileRepository(filePath));
    expect(reopened.lookup("__proto__")).toEqual({ username: "__proto__", password: "pw", highScore: 3, lastScore: 3 });
    expect(reopened.leaderboard().map((profile) => profile.username)).toEqual(["__proto__"]);
  });

  it("starts empty when the file is corrupt", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const corruptPath = join(dir, "corrupt.msgpack");
    writeFileSync(corruptPath, new Uint8Array([0xc1]));

    const repository = new FileProfileRepository(corruptPath);

    expect(repository.list()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\[profile-store\] corrupt profile file /);
  });

  it("starts empty when the file holds neither pairs nor a map", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const scalarPath = join(dir, "scalar.msgpack");
    writeFileSync(scalarPath, encode("profiles"));

    expect(new FileProfileRepository(scalarPath).list()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      `[profile-store] unexpected profile file layout in ${scalarPath}, starting empty`,
    );
  });

  it("reads a plain map, skipping malformed records and normalizing scores", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const mixedPath = join(dir, "mixed.msgpack");
    writeFileSync(
      mixedPath,
      encode({
        ada: { password: "pw", high_score: 3, last_score: -2 },
        bob: { high_score: 1 },
      }),
    );

    const repository = new FileProfileRepository(mixedPath);

    expect(repository.list()).toEqual([{ username: "ada", password: "pw", highScore: 3, lastScore: 0 }]);
    expect(warn).toHaveBeenCalledWith('[profile-store] skipping malformed record for "bob"');
  });

  it("keeps memory unchanged when a write fails", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const repository = new FileProfileRepository(join(blocker, "profiles.msgpack"));

    expect(() => repository.set({ username: "ada", password: "pw", highScore: 0, lastScore: 0 })).toThrow();
    expect(repository.get("ada")).toBeNull();
  });
});
