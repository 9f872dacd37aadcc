/**
 * Headless tape verifier.
 *
 * Usage: tsx scripts/verify-tape.ts <tape-file>
 *
 * Replays a .tape file in headless mode and compares the final score + RNG state
 * against the tape footer. Exit 0 = PASSED, Exit 1 = FAILED.
 */

import { readFileSync } from "fs";
import { verifyTape } from "../src/game/replay";

const DEFAULT_MAX_FRAMES = 18_000;

const tapePath = process.argv[2];

if (!tapePath) {
  console.error("Usage: tsx scripts/verify-tape.ts <tape-file>");
  process.exit(1);
}

const start = performance.now();
const { tape, result, framesOk, scoreOk, rngOk, passed } = verifyTape(
  new Uint8Array(readFileSync(tapePath)),
  DEFAULT_MAX_FRAMES,
);
const elapsed = performance.now() - start;
const { header, footer } = tape;

console.log(`Tape: ${tapePath}`);
console.log(`  Seed:       0x${header.seed.toString(16).padStart(8, "0")}`);
console.log(`  Difficulty: ${header.difficulty}`);
console.log(`  Rules:      ${header.rules.firePolicy}-shot, ${header.rules.collisionPolicy} collisions, ${header.rules.damagePolicy} damage, +${header.rules.killScore}/kill`);
console.log(`  Frames:     ${header.frameCount} @ ${header.tickMs}ms`);
console.log(`  Exp. Score: ${footer.finalScore}`);
console.log(`  Exp. RNG:   0x${footer.finalRngState.toString(16).padStart(8, "0")}`);
console.log();

console.log(`Replay complete in ${elapsed.toFixed(1)}ms (${result.frames} frames, ended in ${result.mode})`);
console.log(`  Score:  ${result.score} (expected ${footer.finalScore})`);
console.log(`  RNG:    0x${result.rngState.toString(16).padStart(8, "0")} (expected 0x${footer.finalRngState.toString(16).padStart(8, "0")})`);

if (passed) {
  console.log("\nVERIFICATION PASSED");
  process.exit(0);
} else {
  if (!framesOk) console.error(`  Match ended after ${result.frames} of ${header.frameCount} frames`);
  if (!scoreOk) console.error(`  Score mismatch: got ${result.score}, expected ${footer.finalScore}`);
  if (!rngOk) console.error(`  RNG mismatch: got 0x${result.rngState.toString(16)}, expected 0x${footer.finalRngState.toString(16)}`);
  console.error("\nVERIFICATION FAILED");
  process.exit(1);
}
