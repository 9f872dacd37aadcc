import type { ProfileRepository } from "./repository";
import type { ProfileStoreErrorCode, ScoreUpdate, UserProfile } from "./types";

export class ProfileStoreError extends Error {
  readonly code: ProfileStoreErrorCode;

  constructor(message: string, code: ProfileStoreErrorCode) {
    super(message);
    this.name = "ProfileStoreError";
    this.code = code;
  }
}

function normalizeUsername(raw: string): string {
  return raw.trim();
}

function assertScore(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Credential and score bookkeeping over a `ProfileRepository`.
 * Reads then writes with last-writer-wins semantics; there is a single active session.
 */
export class ProfileStore {
  constructor(private readonly repository: ProfileRepository) {}

  lookup(username: string): UserProfile | null {
    return this.repository.get(normalizeUsername(username));
  }

  create(username: string, password: string): UserProfile {
    const key = normalizeUsername(username);
    if (key.length === 0) {
      throw new ProfileStoreError("username must not be empty", "invalid_username");
    }
    if (this.repository.get(key)) {
      throw new ProfileStoreError(`username "${key}" is already registered`, "duplicate_username");
    }

    const profile: UserProfile = { username: key, password, highScore: 0, lastScore: 0 };
    this.repository.set(profile);
    return profile;
  }

  authenticate(username: string, password: string): UserProfile | null {
    const profile = this.repository.get(normalizeUsername(username));
    if (!profile || profile.password !== password) {
      return null;
    }
    return profile;
  }

  /** Records a finished match. The stored high score is never lowered. */
  update(username: string, scores: ScoreUpdate): UserProfile {
    assertScore(scores.lastScore, "lastScore");
    assertScore(scores.highScore, "highScore");

    const key = normalizeUsername(username);
    const existing = this.repository.get(key);
    if (!existing) {
      throw new ProfileStoreError(`unknown user "${key}"`, "unknown_user");
    }

    const updated: UserProfile = {
      ...existing,
      lastScore: scores.lastScore,
      highScore: Math.max(existing.highScore, scores.highScore, scores.lastScore),
    };
    this.repository.set(updated);
    return updated;
  }

  /** Profiles by high score, best first; ties broken by username. */
  leaderboard(limit = 10): UserProfile[] {
    return this.repository
      .list()
      .sort((a, b) => b.highScore - a.highScore || a.username.localeCompare(b.username))
      .slice(0, Math.max(0, limit));
  }
}
