import type { Difficulty } from "./types";

export interface DifficultyProfile {
  adversaryCount: number;
  adversarySpeed: number;
  adversaryDropStep: number;
}

const DIFFICULTY_PROFILES: Readonly<Record<Difficulty, Readonly<DifficultyProfile>>> = Object.freeze({
  easy: Object.freeze({ adversaryCount: 20, adversarySpeed: 4, adversaryDropStep: 40 }),
  medium: Object.freeze({ adversaryCount: 40, adversarySpeed: 6, adversaryDropStep: 60 }),
  hard: Object.freeze({ adversaryCount: 60, adversarySpeed: 8, adversaryDropStep: 80 }),
});

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

export function getDifficultyProfile(tier: Difficulty): Readonly<DifficultyProfile> {
  return DIFFICULTY_PROFILES[tier];
}

/** Menu digits: 1 = easy, 2 = medium, 3 = hard. */
export function difficultyFromDigit(digit: number): Difficulty | null {
  return DIFFICULTIES[digit - 1] ?? null;
}

export function parseDifficulty(raw: string | undefined): Difficulty | null {
  if (raw === undefined) {
    return null;
  }
  const normalized = raw.trim().toLowerCase();
  return DIFFICULTIES.find((tier) => tier === normalized) ?? null;
}

// Tape header encoding
export function difficultyCode(tier: Difficulty): number {
  return DIFFICULTIES.indexOf(tier);
}

export function difficultyFromCode(code: number): Difficulty | null {
  return DIFFICULTIES[code] ?? null;
}

export function difficultyLabel(tier: Difficulty): string {
  return tier.charAt(0).toUpperCase() + tier.slice(1);
}
