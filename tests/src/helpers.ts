import type { MatchState } from "../../src/game/match";
import type { Adversary, FrameInput, Rect } from "../../src/game/types";

export const IDLE: FrameInput = { dx: 0, dy: 0, fire: false };
export const FIRE: FrameInput = { dx: 0, dy: 0, fire: true };

/** Moves every adversary to the upper-left corner, drifting right, away from the craft's column. */
export function parkAdversaries(match: MatchState): void {
  for (const adversary of match.adversaries) {
    adversary.x = 100;
    adversary.y = 100;
    adversary.vx = match.profile.adversarySpeed;
  }
}

/**
 * Positions an adversary so that, after this tick's +vx step, its top-left corner sits at
 * (x, y). Velocity is set to +speed and no wall is involved as long as x is inside the area.
 */
export function placeAfterStep(match: MatchState, adversary: Adversary, x: number, y: number): void {
  adversary.vx = match.profile.adversarySpeed;
  adversary.x = x - adversary.vx;
  adversary.y = y;
}

export function firstAdversary(match: MatchState): Adversary {
  const adversary = match.adversaries[0];
  if (!adversary) {
    throw new Error("match has no adversaries");
  }
  return adversary;
}

export function inBounds(rect: Rect, width: number, height: number): boolean {
  return rect.x >= 0 && rect.y >= 0 && rect.x <= width - rect.width && rect.y <= height - rect.height;
}
