export type GameMode = "login" | "start" | "playing" | "game-over" | "terminated";

export type Difficulty = "easy" | "medium" | "hard";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PlayerCraft extends Rect {
  vx: number;
  vy: number;
  invulnerable: boolean;
  invulnerableSinceMs: number;
}

export interface Projectile extends Rect {
  id: number;
  vy: number;
}

export interface Adversary extends Rect {
  id: number;
  vx: number;
}

export type Axis = -1 | 0 | 1;

/** Input sampled once at the start of a tick and held fixed for all of its logic. */
export interface FrameInput {
  dx: Axis;
  dy: Axis;
  fire: boolean;
}

export type TickEvent =
  | { type: "fire"; projectileId: number }
  | { type: "kill"; adversaryId: number; x: number; y: number }
  | { type: "player-hit"; adversaryId: number; livesLost: number }
  | { type: "breach"; adversaryId: number };
