/**
 * Rule switches for firing, collision, damage and scoring. Tapes store them in the header, so a
 * replay always runs under the rules it was recorded with.
 */

export type FirePolicy = "multi" | "single";
export type CollisionPolicy = "rect" | "radius";
export type DamagePolicy = "direct" | "hits";

export interface GameRules {
  /** `multi`: unbounded projectile list. `single`: at most one projectile in flight. */
  firePolicy: FirePolicy;
  /** `rect`: bounding-box overlap. `radius`: reference points closer than the proximity threshold. */
  collisionPolicy: CollisionPolicy;
  /** `direct`: each hit costs a life. `hits`: every third hit costs a life. */
  damagePolicy: DamagePolicy;
  killScore: number;
}

export const DEFAULT_RULES: Readonly<GameRules> = Object.freeze({
  firePolicy: "multi",
  collisionPolicy: "rect",
  damagePolicy: "direct",
  killScore: 1,
});

const FLAG_SINGLE_SHOT = 0x01;
const FLAG_RADIUS_COLLISION = 0x02;
const FLAG_HITS_DAMAGE = 0x04;
const KNOWN_FLAGS = FLAG_SINGLE_SHOT | FLAG_RADIUS_COLLISION | FLAG_HITS_DAMAGE;

export function encodeRuleFlags(rules: GameRules): number {
  return (
    (rules.firePolicy === "single" ? FLAG_SINGLE_SHOT : 0) |
    (rules.collisionPolicy === "radius" ? FLAG_RADIUS_COLLISION : 0) |
    (rules.damagePolicy === "hits" ? FLAG_HITS_DAMAGE : 0)
  );
}

export function decodeRuleFlags(flags: number, killScore: number): GameRules {
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw new Error(`Unknown rule flags: 0x${flags.toString(16)}`);
  }
  return {
    firePolicy: flags & FLAG_SINGLE_SHOT ? "single" : "multi",
    collisionPolicy: flags & FLAG_RADIUS_COLLISION ? "radius" : "rect",
    damagePolicy: flags & FLAG_HITS_DAMAGE ? "hits" : "direct",
    killScore,
  };
}

export function parseFirePolicy(raw: string | undefined, fallback: FirePolicy): FirePolicy {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "multi" || normalized === "single" ? normalized : fallback;
}

export function parseCollisionPolicy(
  raw: string | undefined,
  fallback: CollisionPolicy,
): CollisionPolicy {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "rect" || normalized === "radius" ? normalized : fallback;
}

export function parseDamagePolicy(raw: string | undefined, fallback: DamagePolicy): DamagePolicy {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "direct" || normalized === "hits" ? normalized : fallback;
}
