import type { Rect } from "./types";

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function centerX(rect: Rect): number {
  return rect.x + rect.width / 2;
}

export function bottom(rect: Rect): number {
  return rect.y + rect.height;
}
