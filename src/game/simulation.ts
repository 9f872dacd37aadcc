import {
  AREA_HEIGHT,
  AREA_WIDTH,
  FIRE_DELAY_MS,
  HITS_PER_LIFE,
  INVULNERABLE_MS,
  MUZZLE_OFFSET_X,
  MUZZLE_OFFSET_Y,
  PLAYER_SPEED,
  PROJECTILE_HEIGHT,
  PROJECTILE_SPEED,
  PROJECTILE_WIDTH,
} from "./constants";
import { collides } from "./collision";
import { respawnAdversary, type MatchState } from "./match";
import { clamp } from "./math";
import type { GameRules } from "./rules";
import type { FrameInput, Projectile, TickEvent } from "./types";

/**
 * Advance a match by one frame.
 *
 * Motion is applied before collision detection, and every collision is resolved as soon as it is
 * found, so later checks in the same tick see the post-resolution state.
 */
export function tickMatch(
  match: MatchState,
  input: FrameInput,
  nowMs: number,
  rules: GameRules,
): TickEvent[] {
  const events: TickEvent[] = [];

  expireInvulnerability(match, nowMs);
  updatePlayer(match, input);
  tryFire(match, input, nowMs, rules, events);
  updateProjectiles(match);
  updateAdversaries(match, events);
  handleCollisions(match, nowMs, rules, events);

  match.frame += 1;
  return events;
}

function expireInvulnerability(match: MatchState, nowMs: number): void {
  const player = match.player;
  if (player.invulnerable && nowMs - player.invulnerableSinceMs >= INVULNERABLE_MS) {
    player.invulnerable = false;
  }
}

function updatePlayer(match: MatchState, input: FrameInput): void {
  const player = match.player;
  player.vx = input.dx * PLAYER_SPEED;
  player.vy = input.dy * PLAYER_SPEED;
  player.x = clamp(player.x + player.vx, 0, AREA_WIDTH - player.width);
  player.y = clamp(player.y + player.vy, 0, AREA_HEIGHT - player.height);
}

export function canFire(match: MatchState, nowMs: number, rules: GameRules): boolean {
  if (rules.firePolicy === "single" && match.projectiles.length > 0) {
    return false;
  }
  return match.lastFireMs === null || nowMs - match.lastFireMs > FIRE_DELAY_MS;
}

function tryFire(
  match: MatchState,
  input: FrameInput,
  nowMs: number,
  rules: GameRules,
  events: TickEvent[],
): void {
  if (!input.fire || !canFire(match, nowMs, rules)) {
    return;
  }

  match.lastFireMs = nowMs;
  const projectile: Projectile = {
    id: match.nextId++,
    x: match.player.x + MUZZLE_OFFSET_X,
    y: match.player.y + MUZZLE_OFFSET_Y,
    width: PROJECTILE_WIDTH,
    height: PROJECTILE_HEIGHT,
    vy: -PROJECTILE_SPEED,
  };
  match.projectiles.push(projectile);
  events.push({ type: "fire", projectileId: projectile.id });
}

function updateProjectiles(match: MatchState): void {
  for (const projectile of match.projectiles) {
    projectile.y += projectile.vy;
  }
  match.projectiles = match.projectiles.filter((projectile) => projectile.y > 0);
}

function updateAdversaries(match: MatchState, events: TickEvent[]): void {
  const dropStep = match.profile.adversaryDropStep;

  for (const adversary of match.adversaries) {
    adversary.x += adversary.vx;

    const maxAdversaryX = AREA_WIDTH - adversary.width;
    if (adversary.x <= 0) {
      // Pinned to the wall so the next step cannot bounce it again
      adversary.x = 0;
      adversary.vx = Math.abs(adversary.vx);
      adversary.y += dropStep;
    } else if (adversary.x >= maxAdversaryX) {
      adversary.x = maxAdversaryX;
      adversary.vx = -Math.abs(adversary.vx);
      adversary.y += dropStep;
    }

    if (adversary.y > AREA_HEIGHT) {
      if (match.lives > 0) {
        events.push({ type: "breach", adversaryId: adversary.id });
      }
      match.lives = 0;
    }
  }
}

function handleCollisions(
  match: MatchState,
  nowMs: number,
  rules: GameRules,
  events: TickEvent[],
): void {
  const player = match.player;

  for (const adversary of match.adversaries) {
    for (let index = 0; index < match.projectiles.length; index += 1) {
      const projectile = match.projectiles[index];
      if (!projectile || !collides(projectile, adversary, rules.collisionPolicy)) {
        continue;
      }

      match.projectiles.splice(index, 1);
      events.push({ type: "kill", adversaryId: adversary.id, x: adversary.x, y: adversary.y });
      match.score += rules.killScore;
      respawnAdversary(match, adversary);
      // The adversary that was hit is gone for the rest of this frame's projectile checks
      break;
    }

    if (player.invulnerable || match.lives <= 0) {
      continue;
    }

    if (collides(adversary, player, rules.collisionPolicy)) {
      const livesLost = registerPlayerHit(match, rules);
      player.invulnerable = true;
      player.invulnerableSinceMs = nowMs;
      events.push({ type: "player-hit", adversaryId: adversary.id, livesLost });
      respawnAdversary(match, adversary);
    }
  }
}

function registerPlayerHit(match: MatchState, rules: GameRules): number {
  if (rules.damagePolicy === "hits") {
    match.hits += 1;
    if (match.hits < HITS_PER_LIFE) {
      return 0;
    }
    match.hits = 0;
  }

  match.lives = Math.max(0, match.lives - 1);
  return 1;
}
