import {
  ADVERSARY_HEIGHT,
  ADVERSARY_WIDTH,
  AREA_WIDTH,
  PLAYER_HEIGHT,
  PLAYER_SPAWN_X,
  PLAYER_SPAWN_Y,
  PLAYER_WIDTH,
  SPAWN_BAND_MAX_Y,
  SPAWN_BAND_MIN_Y,
  STARTING_LIVES,
} from "./constants";
import { getDifficultyProfile, type DifficultyProfile } from "./difficulty";
import { SeededRng } from "./rng";
import type { Adversary, Difficulty, PlayerCraft, Projectile } from "./types";

/**
 * Everything a match mutates, in one aggregate. Only `tickMatch` and the state machine's
 * transitions write to it.
 */
export interface MatchState {
  difficulty: Difficulty;
  profile: Readonly<DifficultyProfile>;
  seed: number;
  rng: SeededRng;
  score: number;
  lives: number;
  /** Sub-counter for the `hits` damage policy */
  hits: number;
  player: PlayerCraft;
  projectiles: Projectile[];
  adversaries: Adversary[];
  /** Timestamp of the last accepted shot; null right after a reset */
  lastFireMs: number | null;
  frame: number;
  nextId: number;
}

export function createPlayer(): PlayerCraft {
  return {
    x: PLAYER_SPAWN_X,
    y: PLAYER_SPAWN_Y,
    width: PLAYER_WIDTH,
    height: PLAYER_HEIGHT,
    vx: 0,
    vy: 0,
    invulnerable: false,
    invulnerableSinceMs: 0,
  };
}

export function createMatch(difficulty: Difficulty, seed: number): MatchState {
  const profile = getDifficultyProfile(difficulty);
  const match: MatchState = {
    difficulty,
    profile,
    seed: seed >>> 0,
    rng: new SeededRng(seed),
    score: 0,
    lives: STARTING_LIVES,
    hits: 0,
    player: createPlayer(),
    projectiles: [],
    adversaries: [],
    lastFireMs: null,
    frame: 0,
    nextId: 1,
  };

  for (let i = 0; i < profile.adversaryCount; i += 1) {
    const adversary: Adversary = {
      id: match.nextId++,
      x: 0,
      y: 0,
      width: ADVERSARY_WIDTH,
      height: ADVERSARY_HEIGHT,
      vx: 0,
    };
    placeInSpawnBand(match, adversary);
    adversary.vx = match.rng.nextSign() * profile.adversarySpeed;
    match.adversaries.push(adversary);
  }

  return match;
}

function placeInSpawnBand(match: MatchState, adversary: Adversary): void {
  adversary.x = match.rng.nextInclusive(0, AREA_WIDTH - ADVERSARY_WIDTH);
  adversary.y = match.rng.nextInclusive(SPAWN_BAND_MIN_Y, SPAWN_BAND_MAX_Y);
}

/** Moves a destroyed adversary back into the spawn band. The slot and its velocity stay. */
export function respawnAdversary(match: MatchState, adversary: Adversary): void {
  placeInSpawnBand(match, adversary);
}

export function resetMatchForRestart(match: MatchState): void {
  match.score = 0;
  match.lives = STARTING_LIVES;
  match.hits = 0;
  match.player = createPlayer();
  match.projectiles = [];
  match.lastFireMs = null;
}
