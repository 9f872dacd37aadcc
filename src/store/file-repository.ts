import { decode, encode } from "@msgpack/msgpack";
import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { safeErrorMessage, toNonNegativeInteger } from "../utils";
import type { ProfileRepository } from "./repository";
import type { UserProfile } from "./types";

interface StoredProfileRecord {
  password: string;
  high_score: number;
  last_score: number;
}

/**
 * On-disk shape: the username mapping as a MessagePack array of `[username, record]` pairs.
 * Usernames never become object keys, so names such as `__proto__` round-trip.
 */
type StoredProfileEntry = [username: string, record: StoredProfileRecord];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeStoredRecord(username: string, value: unknown): UserProfile | null {
  if (username.length === 0 || !isRecord(value) || typeof value.password !== "string") {
    return null;
  }

  return {
    username,
    password: value.password,
    highScore: toNonNegativeInteger(value.high_score, 0),
    lastScore: toNonNegativeInteger(value.last_score, 0),
  };
}

/** Pairs from the current layout, or from a plain map written by hand. */
function storedEntries(decoded: unknown): Array<[unknown, unknown]> | null {
  if (Array.isArray(decoded)) {
    return decoded.map((entry: unknown): [unknown, unknown] =>
      Array.isArray(entry) && entry.length === 2 ? [entry[0], entry[1]] : [null, entry],
    );
  }
  if (isRecord(decoded)) {
    return Object.entries(decoded);
  }
  return null;
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

/**
 * Durable profile mapping backed by a single file. The whole map is loaded once and rewritten on
 * every `set`, through a temp file and a rename so a crash never leaves half a file behind.
 */
export class FileProfileRepository implements ProfileRepository {
  private readonly profiles: Map<string, UserProfile>;

  constructor(private readonly filePath: string) {
    this.profiles = this.load();
  }

  get(username: string): UserProfile | null {
    const profile = this.profiles.get(username);
    return profile ? { ...profile } : null;
  }

  set(profile: UserProfile): void {
    const next = new Map(this.profiles);
    next.set(profile.username, { ...profile });
    this.persist(next);
    this.profiles.set(profile.username, { ...profile });
  }

  list(): UserProfile[] {
    return Array.from(this.profiles.values(), (profile) => ({ ...profile }));
  }

  private load(): Map<string, UserProfile> {
    const profiles = new Map<string, UserProfile>();

    let raw: Uint8Array;
    try {
      raw = readFileSync(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(
          `[profile-store] cannot read ${this.filePath}, starting empty: ${safeErrorMessage(error)}`,
        );
      }
      return profiles;
    }

    let decoded: unknown;
    try {
      decoded = decode(raw);
    } catch (error) {
      console.warn(
        `[profile-store] corrupt profile file ${this.filePath}, starting empty: ${safeErrorMessage(error)}`,
      );
      return profiles;
    }

    const entries = storedEntries(decoded);
    if (!entries) {
      console.warn(`[profile-store] unexpected profile file layout in ${this.filePath}, starting empty`);
      return profiles;
    }

    for (const [username, value] of entries) {
      const profile = typeof username === "string" ? normalizeStoredRecord(username, value) : null;
      if (profile) {
        profiles.set(profile.username, profile);
      } else {
        console.warn(`[profile-store] skipping malformed record for "${String(username)}"`);
      }
    }

    return profiles;
  }

  private persist(profiles: Map<string, UserProfile>): void {
    const payload = Array.from(profiles.values(), (profile): StoredProfileEntry => [
      profile.username,
      { password: profile.password, high_score: profile.highScore, last_score: profile.lastScore },
    ]);

    mkdirSync(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, encode(payload));
    renameSync(tempPath, this.filePath);
  }
}
