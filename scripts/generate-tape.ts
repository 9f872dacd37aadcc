/**
 * Headless tape generator using the autopilot.
 *
 * Usage: tsx scripts/generate-tape.ts [--seed <hex>] [--difficulty easy|medium|hard]
 *        [--max-frames <n>] [--output <path>] [--user <name>]
 *
 * Plays one match in headless mode, writes the tape, then verifies it inline.
 * With --user the final score is also recorded in that player's profile.
 */

import { readFileSync, writeFileSync } from "fs";
import { loadConfig } from "../src/config";
import { parseDifficulty } from "../src/game/difficulty";
import { headlessFrameTimeMs, verifyTape } from "../src/game/replay";
import { SwarmGame } from "../src/game/SwarmGame";
import type { Difficulty } from "../src/game/types";
import { FileProfileRepository } from "../src/store/file-repository";
import { ProfileStore } from "../src/store/profile-store";

const DEFAULT_MAX_FRAMES = 18_000;

const config = loadConfig();

let seed = Date.now() >>> 0;
let difficulty: Difficulty = "medium";
let maxFrames = DEFAULT_MAX_FRAMES;
let outputPath = "";
let user = "";

const args = process.argv.slice(2);
for (let i = 0; i < args.length; i++) {
  const value = args[i + 1];
  if (args[i] === "--seed" && value) {
    seed = Number.parseInt(value, 16) >>> 0;
    i++;
  } else if (args[i] === "--difficulty" && value) {
    const parsed = parseDifficulty(value);
    if (!parsed) {
      console.error(`Unknown difficulty: ${value}`);
      process.exit(1);
    }
    difficulty = parsed;
    i++;
  } else if (args[i] === "--max-frames" && value) {
    maxFrames = Number.parseInt(value, 10);
    i++;
  } else if (args[i] === "--output" && value) {
    outputPath = value;
    i++;
  } else if (args[i] === "--user" && value) {
    user = value;
    i++;
  }
}

if (!Number.isFinite(maxFrames) || maxFrames < 1) {
  console.error("--max-frames must be a positive integer");
  process.exit(1);
}

if (!outputPath) {
  outputPath = `star-swarm-${seed.toString(16).padStart(8, "0")}.tape`;
}

console.log(`Generating tape:`);
console.log(`  Seed:       0x${seed.toString(16).padStart(8, "0")}`);
console.log(`  Difficulty: ${difficulty}`);
console.log(`  Max frames: ${maxFrames}`);
console.log(`  Output:     ${outputPath}`);
console.log();

let store: ProfileStore | null = null;
if (user) {
  store = new ProfileStore(new FileProfileRepository(config.profilePath));
  if (!store.lookup(user)) {
    console.error(`Unknown user "${user}" in ${config.profilePath}`);
    process.exit(1);
  }
}

const game = new SwarmGame({ store, rules: config.rules, tickMs: config.tickMs, requireLogin: user !== "" });
if (user) {
  const profile = store?.lookup(user);
  game.getInput().submitLogin(user, profile?.password ?? "");
  game.frame(0);
}

game.startMatch(difficulty, seed);
game.setAutopilotEnabled(true);

const start = performance.now();
let frame = 0;

while (frame < maxFrames && game.getMode() === "playing") {
  game.frame(headlessFrameTimeMs(frame, config.tickMs));
  frame++;

  if (frame % 3000 === 0) {
    console.log(`  Frame ${frame}/${maxFrames} (score: ${game.getScore()}, lives: ${game.getLives()})`);
  }
}

const elapsed = performance.now() - start;

console.log();
console.log(`Generation complete:`);
console.log(`  Frames: ${frame}`);
console.log(`  Score:  ${game.getScore()}`);
console.log(`  Lives:  ${game.getLives()}`);
console.log(`  Mode:   ${game.getMode()}`);
console.log(`  Time:   ${elapsed.toFixed(1)}ms (${(frame / (elapsed / 1000)).toFixed(0)} fps)`);

const tapeData = game.getTape();
if (!tapeData) {
  console.error("Failed to get tape data");
  process.exit(1);
}

writeFileSync(outputPath, tapeData);
console.log(`  Written: ${outputPath} (${tapeData.length} bytes)`);

console.log();
console.log("Verifying tape...");

const { tape, result, framesOk, scoreOk, rngOk, passed } = verifyTape(
  new Uint8Array(readFileSync(outputPath)),
  maxFrames,
);

if (passed) {
  console.log("VERIFICATION PASSED");
} else {
  if (!framesOk) console.error(`  Match ended after ${result.frames} of ${tape.header.frameCount} frames`);
  if (!scoreOk) console.error(`  Score mismatch: got ${result.score}, expected ${tape.footer.finalScore}`);
  if (!rngOk)
    console.error(
      `  RNG mismatch: got 0x${result.rngState.toString(16)}, expected 0x${tape.footer.finalRngState.toString(16)}`,
    );
  console.error("VERIFICATION FAILED");
  process.exit(1);
}
