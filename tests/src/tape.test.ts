import { describe, expect, it } from "vitest";
import { headlessFrameTimeMs, replayTape, verifyTape } from "../../src/game/replay";
import { DEFAULT_RULES, type GameRules } from "../../src/game/rules";
import { SwarmGame } from "../../src/game/SwarmGame";
import {
  TAPE_MAGIC,
  TapeFormatError,
  TapeRecorder,
  crc32,
  deserializeTape,
  serializeTape,
  type TapeMetadata,
} from "../../src/game/tape";

const META: TapeMetadata = { difficulty: "medium", rules: { ...DEFAULT_RULES }, seed: 0xdeadbeef, tickMs: 16 };
const INPUTS = new Uint8Array([0x00, 0x19, 0x10]);

function sampleTape(meta: TapeMetadata = META, inputs: Uint8Array = INPUTS): Uint8Array {
  return serializeTape(meta, inputs, 42, 0x12345678);
}

function withByte(data: Uint8Array, offset: number, value: number): Uint8Array {
  const copy = new Uint8Array(data);
  copy[offset] = value;
  return copy;
}

describe("crc32", () => {
  it("matches the standard check value", () => {
    expect(crc32(new TextEncoder().encode("123456789"))).toBe(0xcbf43926);
  });
});

describe("TapeRecorder", () => {
  it("grows past its initial capacity", () => {
    const recorder = new TapeRecorder();
    for (let i = 0; i < 20_000; i += 1) {
      recorder.record({ dx: 0, dy: 0, fire: i % 2 === 0 });
    }
    expect(recorder.getFrameCount()).toBe(20_000);
    expect(recorder.getInputs()[19_998]).toBe(0x10);
    expect(recorder.getInputs()[19_999]).toBe(0x00);
  });
});

describe("serializeTape / deserializeTape", () => {
  it("lays out header, body and footer", () => {
    const data = sampleTape();
    const view = new DataView(data.buffer);

    expect(data.length).toBe(20 + 3 + 12);
    expect(view.getUint32(0, true)).toBe(TAPE_MAGIC);
    expect(view.getUint8(4)).toBe(1);
    expect(view.getUint8(5)).toBe(1);
    expect(view.getUint32(8, true)).toBe(0xdeadbeef);
    expect(view.getUint32(12, true)).toBe(3);
    expect(view.getUint16(16, true)).toBe(16);
    expect(Array.from(data.subarray(20, 23))).toEqual([0x00, 0x19, 0x10]);
    expect(view.getUint32(27, true)).toBe(0x12345678);
    expect(view.getUint32(31, true)).toBe(crc32(data.subarray(0, 23)));
  });

  it("reads back what was written", () => {
    const rules: GameRules = { firePolicy: "single", collisionPolicy: "rect", damagePolicy: "hits", killScore: 10 };
    const tape = deserializeTape(sampleTape({ ...META, rules, difficulty: "hard", tickMs: 20 }));

    expect(tape.header).toEqual({
      magic: TAPE_MAGIC,
      version: 1,
      difficulty: "hard",
      rules,
      seed: 0xdeadbeef,
      frameCount: 3,
      tickMs: 20,
    });
    expect(Array.from(tape.inputs)).toEqual([0x00, 0x19, 0x10]);
    expect(tape.footer.finalScore).toBe(42);
    expect(tape.footer.finalRngState).toBe(0x12345678);
  });

  it("refuses settings the header cannot hold", () => {
    expect(() => sampleTape({ ...META, rules: { ...DEFAULT_RULES, killScore: 256 } })).toThrow(TapeFormatError);
    expect(() => sampleTape({ ...META, tickMs: 0 })).toThrow(TapeFormatError);
  });

  it("rejects truncated and padded tapes", () => {
    const data = sampleTape();
    expect(() => deserializeTape(data.subarray(0, 10))).toThrow("Tape too short");

    const padded = new Uint8Array(data.length + 1);
    padded.set(data);
    expect(() => deserializeTape(padded)).toThrow("Tape length mismatch: expected 35 bytes, got 36");
  });

  it("rejects bad header fields", () => {
    const data = sampleTape();
    expect(() => deserializeTape(withByte(data, 0, 0))).toThrow(/Invalid tape magic/);
    expect(() => deserializeTape(withByte(data, 4, 2))).toThrow("Unsupported tape version: 2");
    expect(() => deserializeTape(withByte(data, 5, 3))).toThrow("Unknown difficulty code: 3");
    expect(() => deserializeTape(withByte(data, 6, 0x08))).toThrow("Unknown rule flags: 0x8");
    expect(() => deserializeTape(withByte(data, 7, 0))).toThrow("Kill score must be positive");
    expect(() => deserializeTape(withByte(data, 18, 1))).toThrow(/reserved bytes/);
  });

  it("enforces the frame limit", () => {
    expect(() => deserializeTape(sampleTape(), 2)).toThrow("Frame count out of range: 3 (max 2)");
    expect(() => deserializeTape(sampleTape(META, new Uint8Array(0)))).toThrow(/Frame count out of range/);
  });

  it("rejects reserved input bits", () => {
    expect(() => deserializeTape(withByte(sampleTape(), 21, 0x39))).toThrow(
      "Input byte reserved bits set at frame 1: 0x39",
    );
  });

  it("detects corruption through the checksum", () => {
    expect(() => deserializeTape(withByte(sampleTape(), 21, 0x18))).toThrow(/CRC mismatch/);
  });
});

describe("replayTape", () => {
  it("reproduces an autopilot run from its tape", () => {
    const game = new SwarmGame({ tickMs: 16 });
    game.startMatch("easy", 42);
    game.setAutopilotEnabled(true);

    let frame = 0;
    while (frame < 600 && game.getMode() === "playing") {
      game.frame(headlessFrameTimeMs(frame, 16));
      frame += 1;
    }

    const data = game.getTape();
    expect(data).not.toBeNull();
    if (!data) return;

    const tape = deserializeTape(data);
    expect(tape.header.frameCount).toBe(frame);
    expect(tape.footer.finalScore).toBe(game.getScore());

    const result = replayTape(tape);
    expect(result.frames).toBe(frame);
    expect(result.score).toBe(tape.footer.finalScore);
    expect(result.rngState).toBe(tape.footer.finalRngState);
    expect(result.lives).toBe(game.getLives());
    expect(result.mode).toBe(game.getMode());
  });

  it("reproduces a match played under an uneven frame clock", () => {
    const game = new SwarmGame({ tickMs: 16 });
    game.startMatch("medium", 0x1234);
    game.setAutopilotEnabled(true);

    let now = 0;
    for (let i = 0; i < 4000 && game.getMode() === "playing"; i += 1) {
      now += i % 2 === 0 ? 10 : 25;
      game.frame(now);
    }

    const data = game.getTape();
    expect(data).not.toBeNull();
    if (!data) return;

    const tape = deserializeTape(data);
    expect(tape.header.frameCount).toBe(game.getMatch()?.frame);

    const result = replayTape(tape);
    expect(result.frames).toBe(tape.header.frameCount);
    expect(result.score).toBe(tape.footer.finalScore);
    expect(result.rngState).toBe(tape.footer.finalRngState);
    expect(result.lives).toBe(game.getLives());
  });

  it("reports each frame to the observer", () => {
    const inputs = new Uint8Array([0x10, 0x10, 0x00]);
    const data = serializeTape({ ...META, difficulty: "easy", seed: 5 }, inputs, 0, 0);

    const seen: number[] = [];
    replayTape(deserializeTape(data), (frame, game) => {
      seen.push(frame);
      expect(game.getMatch()?.frame).toBe(frame);
    });

    expect(seen).toEqual([1, 2, 3]);
  });
});

describe("verifyTape", () => {
  it("accepts a tape up to the frame limit it is given", () => {
    const game = new SwarmGame({ tickMs: 16 });
    game.startMatch("easy", 7);
    for (let i = 0; i < 30; i += 1) {
      game.frame(headlessFrameTimeMs(i, 16));
    }

    const data = game.getTape();
    expect(data).not.toBeNull();
    if (!data) return;

    expect(verifyTape(data, 30).passed).toBe(true);
    expect(() => verifyTape(data, 29)).toThrow("Frame count out of range: 30 (max 29)");
  });

  it("flags a footer that the replay does not reproduce", () => {
    const data = serializeTape({ ...META, difficulty: "easy", seed: 5 }, new Uint8Array(3), 999, 0);

    const verification = verifyTape(data);

    expect(verification.framesOk).toBe(true);
    expect(verification.scoreOk).toBe(false);
    expect(verification.result.score).toBe(0);
    expect(verification.passed).toBe(false);
  });
});
