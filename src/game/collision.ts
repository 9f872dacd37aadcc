import { PROXIMITY_THRESHOLD } from "./constants";
import type { CollisionPolicy } from "./rules";
import type { Rect } from "./types";

/** Strict AABB intersection; boxes that only share an edge do not collide. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

/** Distance between top-left corners, strictly under the threshold. */
export function withinRadius(a: Rect, b: Rect, threshold: number = PROXIMITY_THRESHOLD): boolean {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return dx * dx + dy * dy < threshold * threshold;
}

export function collides(a: Rect, b: Rect, policy: CollisionPolicy): boolean {
  return policy === "radius" ? withinRadius(a, b) : rectsOverlap(a, b);
}
