import { TapeInputSource } from "./input-source";
import { SwarmGame } from "./SwarmGame";
import { deserializeTape, type Tape } from "./tape";
import type { GameMode } from "./types";

export interface ReplayResult {
  frames: number;
  score: number;
  rngState: number;
  lives: number;
  mode: GameMode;
}

/** Clock used by headless runs: frame N (0-based) happens at (N + 1) * tickMs, one step per frame. */
export function headlessFrameTimeMs(frameIndex: number, tickMs: number): number {
  return (frameIndex + 1) * tickMs;
}

/**
 * Replays a tape in a fresh headless game. `onFrame` sees the game after every frame
 * (for state dumps).
 */
export function replayTape(tape: Tape, onFrame?: (frame: number, game: SwarmGame) => void): ReplayResult {
  const { header } = tape;
  const game = new SwarmGame({ rules: header.rules, tickMs: header.tickMs });

  game.startMatch(header.difficulty, header.seed);
  game.setInputSource(new TapeInputSource(tape.inputs));

  let frames = 0;
  while (frames < header.frameCount && game.getMode() === "playing") {
    game.frame(headlessFrameTimeMs(frames, header.tickMs));
    frames += 1;
    onFrame?.(frames, game);
  }

  return {
    frames,
    score: game.getScore(),
    rngState: game.getMatch()?.rng.getState() ?? 0,
    lives: game.getLives(),
    mode: game.getMode(),
  };
}

export interface TapeVerification {
  tape: Tape;
  result: ReplayResult;
  framesOk: boolean;
  scoreOk: boolean;
  rngOk: boolean;
  passed: boolean;
}

/** Decodes a tape (at most `maxFrames` long) and checks that replaying it matches its footer. */
export function verifyTape(data: Uint8Array, maxFrames?: number): TapeVerification {
  const tape = deserializeTape(data, maxFrames);
  const result = replayTape(tape);
  const framesOk = result.frames === tape.header.frameCount;
  const scoreOk = result.score === tape.footer.finalScore;
  const rngOk = result.rngState >>> 0 === tape.footer.finalRngState >>> 0;

  return { tape, result, framesOk, scoreOk, rngOk, passed: framesOk && scoreOk && rngOk };
}
