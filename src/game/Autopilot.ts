import { PLAYER_SPAWN_Y } from "./constants";
import type { FrameInputPolicy } from "./input-source";
import type { MatchState } from "./match";
import { bottom, centerX } from "./math";
import type { Adversary, Axis, FrameInput } from "./types";

// Horizontal slack before the craft bothers to move
const AIM_DEADZONE = 6;
// Vertical clearance the craft keeps from a descending adversary
const DANGER_CLEARANCE = 90;

/**
 * Steering policy for headless runs: track the lowest adversary, keep fire held, and back away
 * when something is about to land on the craft.
 */
export class Autopilot implements FrameInputPolicy {
  private enabled = false;

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  toggle(): void {
    this.enabled = !this.enabled;
  }

  decide(match: Readonly<MatchState>): FrameInput {
    const player = match.player;
    const target = lowestAdversary(match.adversaries);

    let dx: Axis = 0;
    if (target) {
      const offset = centerX(target) - centerX(player);
      if (offset > AIM_DEADZONE) dx = 1;
      else if (offset < -AIM_DEADZONE) dx = -1;
    }

    let dy: Axis = 0;
    if (target && bottom(target) + DANGER_CLEARANCE > player.y) {
      dy = 1;
    } else if (player.y > PLAYER_SPAWN_Y) {
      dy = -1;
    }

    return { dx, dy, fire: true };
  }
}

function lowestAdversary(adversaries: readonly Adversary[]): Adversary | null {
  let lowest: Adversary | null = null;
  for (const adversary of adversaries) {
    if (!lowest || adversary.y > lowest.y) {
      lowest = adversary;
    }
  }
  return lowest;
}
