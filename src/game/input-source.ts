import type { InputController } from "./input";
import type { MatchState } from "./match";
import { decodeInputByte } from "./tape";
import type { FrameInput } from "./types";

const IDLE_INPUT: FrameInput = { dx: 0, dy: 0, fire: false };

/**
 * Abstraction over input for a single simulation frame.
 * Implementations: LiveInputSource (controller/autopilot) and TapeInputSource (replay).
 */
export interface InputSource {
  getFrameInput(match: Readonly<MatchState>): FrameInput;
  advance(): void;
}

export interface FrameInputPolicy {
  isEnabled(): boolean;
  decide(match: Readonly<MatchState>): FrameInput;
}

/**
 * Live input from the controller, or from a steering policy (the autopilot) while that policy
 * is enabled.
 */
export class LiveInputSource implements InputSource {
  constructor(
    private readonly input: InputController,
    private readonly policy: FrameInputPolicy | null = null,
  ) {}

  getFrameInput(match: Readonly<MatchState>): FrameInput {
    if (this.policy?.isEnabled()) {
      return this.policy.decide(match);
    }
    return this.input.sample();
  }

  advance(): void {
    // Nothing to advance for live input
  }
}

/**
 * Replays pre-recorded input from a tape's input byte array.
 */
export class TapeInputSource implements InputSource {
  private cursor = 0;

  constructor(private readonly inputs: Uint8Array) {}

  getFrameInput(): FrameInput {
    const byte = this.inputs[this.cursor];
    return byte === undefined ? IDLE_INPUT : decodeInputByte(byte);
  }

  advance(): void {
    if (this.cursor < this.inputs.length) {
      this.cursor++;
    }
  }

  isComplete(): boolean {
    return this.cursor >= this.inputs.length;
  }

  getCurrentFrame(): number {
    return this.cursor;
  }

  getTotalFrames(): number {
    return this.inputs.length;
  }
}
