/**
 * Dumps intermediate match state during tape replay.
 *
 * Usage: tsx scripts/dump-tape-state.ts <tape-file> [--every <N>]
 *
 * Outputs JSON lines: one per sampled frame with RNG state, score, lives and entity counts.
 */

import { readFileSync } from "fs";
import { replayTape } from "../src/game/replay";
import { deserializeTape } from "../src/game/tape";

const tapePath = process.argv[2];
let everyN = 1;

const args = process.argv.slice(3);
for (let i = 0; i < args.length; i++) {
  const value = args[i + 1];
  if (args[i] === "--every" && value) {
    everyN = Math.max(1, Number.parseInt(value, 10) || 1);
    i++;
  }
}

if (!tapePath) {
  console.error("Usage: tsx scripts/dump-tape-state.ts <tape-file> [--every <N>]");
  process.exit(1);
}

const tape = deserializeTape(new Uint8Array(readFileSync(tapePath)));

console.error(`Tape: ${tapePath}`);
console.error(`  Seed: 0x${tape.header.seed.toString(16).padStart(8, "0")}`);
console.error(`  Frames: ${tape.header.frameCount}`);

replayTape(tape, (frame, game) => {
  const match = game.getMatch();
  if (!match || (frame % everyN !== 0 && frame !== tape.header.frameCount)) {
    return;
  }
  console.log(
    JSON.stringify({
      frame,
      rng: match.rng.getState() >>> 0,
      score: match.score,
      lives: match.lives,
      hits: match.hits,
      projectiles: match.projectiles.length,
      adversaries: match.adversaries.length,
      player: { x: match.player.x, y: match.player.y },
    }),
  );
});
