import type { MenuButton } from "./menu";
import type { Adversary, Difficulty, GameMode, PlayerCraft, Projectile, TickEvent } from "./types";

/** Everything the renderer needs for one frame. Renderers read it and never feed state back. */
export interface GameRenderState {
  mode: GameMode;
  frame: number;
  player: Readonly<PlayerCraft> | null;
  projectiles: readonly Readonly<Projectile>[];
  adversaries: readonly Readonly<Adversary>[];
  score: number;
  highScore: number;
  lives: number;
  difficulty: Difficulty | null;
  username: string | null;
  menu: readonly MenuButton[];
  /** Login feedback or other one-line status text */
  message: string | null;
  events: readonly TickEvent[];
}

export interface RenderSurface {
  render(state: GameRenderState): void;
}
