/**
 * Replay Tape: binary format, recorder, serializer, and CRC-32.
 *
 * Tape layout (little-endian):
 *
 * HEADER (20 bytes):
 *   [0..3]   u32    magic           = 0x50545753 ("SWTP")
 *   [4]      u8     version         = 1
 *   [5]      u8     difficulty      (0 easy, 1 medium, 2 hard)
 *   [6]      u8     rule flags      (see rules.ts)
 *   [7]      u8     kill score
 *   [8..11]  u32    seed
 *   [12..15] u32    frameCount
 *   [16..17] u16    tick interval in ms
 *   [18..19] u8[2]  reserved        = 0
 *
 * BODY (frameCount bytes), one byte per frame:
 *   bit 0 (0x01): left
 *   bit 1 (0x02): right
 *   bit 2 (0x04): up
 *   bit 3 (0x08): down
 *   bit 4 (0x10): fire
 *   bits 5-7: reserved (0)
 *
 * FOOTER (12 bytes):
 *   u32  finalScore
 *   u32  finalRngState
 *   u32  checksum (CRC-32 of header+body)
 */

import { TAPE_FORMAT_VERSION } from "./constants";
import { difficultyCode, difficultyFromCode } from "./difficulty";
import { decodeRuleFlags, encodeRuleFlags, type GameRules } from "./rules";
import type { Difficulty, FrameInput } from "./types";

export const TAPE_MAGIC = 0x50545753;

const HEADER_SIZE = 20;
const FOOTER_SIZE = 12;
const RESERVED_INPUT_BITS = 0xe0;

export class TapeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TapeFormatError";
  }
}

export interface TapeHeader {
  magic: number;
  version: number;
  difficulty: Difficulty;
  rules: GameRules;
  seed: number;
  frameCount: number;
  tickMs: number;
}

export interface TapeFooter {
  finalScore: number;
  finalRngState: number;
  checksum: number;
}

export interface Tape {
  header: TapeHeader;
  inputs: Uint8Array;
  footer: TapeFooter;
}

export interface TapeMetadata {
  difficulty: Difficulty;
  rules: GameRules;
  seed: number;
  tickMs: number;
}

export function encodeInputByte(input: FrameInput): number {
  return (
    (input.dx < 0 ? 0x01 : 0) |
    (input.dx > 0 ? 0x02 : 0) |
    (input.dy < 0 ? 0x04 : 0) |
    (input.dy > 0 ? 0x08 : 0) |
    (input.fire ? 0x10 : 0)
  );
}

export function decodeInputByte(byte: number): FrameInput {
  const left = (byte & 0x01) !== 0;
  const right = (byte & 0x02) !== 0;
  const up = (byte & 0x04) !== 0;
  const down = (byte & 0x08) !== 0;
  return {
    dx: left ? -1 : right ? 1 : 0,
    dy: up ? -1 : down ? 1 : 0,
    fire: (byte & 0x10) !== 0,
  };
}

const INITIAL_CAPACITY = 18000; // ~5 minutes at 60fps

export class TapeRecorder {
  private buffer: Uint8Array;
  private cursor = 0;

  constructor() {
    this.buffer = new Uint8Array(INITIAL_CAPACITY);
  }

  record(input: FrameInput): void {
    if (this.cursor >= this.buffer.length) {
      const next = new Uint8Array(this.buffer.length * 2);
      next.set(this.buffer);
      this.buffer = next;
    }
    this.buffer[this.cursor++] = encodeInputByte(input);
  }

  getInputs(): Uint8Array {
    return this.buffer.subarray(0, this.cursor);
  }

  getFrameCount(): number {
    return this.cursor;
  }
}

export function serializeTape(
  meta: TapeMetadata,
  inputs: Uint8Array,
  finalScore: number,
  finalRngState: number,
): Uint8Array {
  if (!Number.isInteger(meta.rules.killScore) || meta.rules.killScore < 1 || meta.rules.killScore > 0xff) {
    throw new TapeFormatError(`Kill score does not fit the tape header: ${meta.rules.killScore}`);
  }
  if (!Number.isInteger(meta.tickMs) || meta.tickMs < 1 || meta.tickMs > 0xffff) {
    throw new TapeFormatError(`Tick interval does not fit the tape header: ${meta.tickMs}`);
  }

  const frameCount = inputs.length;
  const data = new Uint8Array(HEADER_SIZE + frameCount + FOOTER_SIZE);
  const view = new DataView(data.buffer);

  view.setUint32(0, TAPE_MAGIC, true);
  view.setUint8(4, TAPE_FORMAT_VERSION);
  view.setUint8(5, difficultyCode(meta.difficulty));
  view.setUint8(6, encodeRuleFlags(meta.rules));
  view.setUint8(7, meta.rules.killScore);
  view.setUint32(8, meta.seed >>> 0, true);
  view.setUint32(12, frameCount, true);
  view.setUint16(16, meta.tickMs, true);
  // reserved bytes 18-19 already 0

  data.set(inputs, HEADER_SIZE);

  const footerOffset = HEADER_SIZE + frameCount;
  view.setUint32(footerOffset, finalScore >>> 0, true);
  view.setUint32(footerOffset + 4, finalRngState >>> 0, true);
  view.setUint32(footerOffset + 8, crc32(data.subarray(0, footerOffset)), true);

  return data;
}

export function deserializeTape(data: Uint8Array, maxFrames?: number): Tape {
  if (data.length < HEADER_SIZE + FOOTER_SIZE) {
    throw new TapeFormatError("Tape too short");
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const magic = view.getUint32(0, true);
  if (magic !== TAPE_MAGIC) {
    throw new TapeFormatError(`Invalid tape magic: 0x${magic.toString(16)}`);
  }

  const version = view.getUint8(4);
  if (version !== TAPE_FORMAT_VERSION) {
    throw new TapeFormatError(`Unsupported tape version: ${version}`);
  }

  const difficulty = difficultyFromCode(view.getUint8(5));
  if (difficulty === null) {
    throw new TapeFormatError(`Unknown difficulty code: ${view.getUint8(5)}`);
  }

  let rules: GameRules;
  try {
    rules = decodeRuleFlags(view.getUint8(6), view.getUint8(7));
  } catch (error) {
    throw new TapeFormatError(error instanceof Error ? error.message : String(error));
  }
  if (rules.killScore === 0) {
    throw new TapeFormatError("Kill score must be positive");
  }

  const seed = view.getUint32(8, true);
  const frameCount = view.getUint32(12, true);
  if (frameCount === 0 || (maxFrames !== undefined && frameCount > maxFrames)) {
    throw new TapeFormatError(
      `Frame count out of range: ${frameCount}${maxFrames !== undefined ? ` (max ${maxFrames})` : ""}`,
    );
  }

  const tickMs = view.getUint16(16, true);
  if (tickMs === 0) {
    throw new TapeFormatError("Tick interval must be positive");
  }
  if (view.getUint8(18) !== 0 || view.getUint8(19) !== 0) {
    throw new TapeFormatError("Header reserved bytes [18..19] are non-zero");
  }

  const expectedLength = HEADER_SIZE + frameCount + FOOTER_SIZE;
  if (data.length !== expectedLength) {
    throw new TapeFormatError(
      `Tape length mismatch: expected ${expectedLength} bytes, got ${data.length}`,
    );
  }

  const footerOffset = HEADER_SIZE + frameCount;
  const inputs = data.subarray(HEADER_SIZE, footerOffset);
  const finalScore = view.getUint32(footerOffset, true);
  const finalRngState = view.getUint32(footerOffset + 4, true);
  const storedChecksum = view.getUint32(footerOffset + 8, true);

  const computed = crc32AndValidateInputs(data, HEADER_SIZE, footerOffset);
  if (computed !== storedChecksum) {
    throw new TapeFormatError(
      `CRC mismatch: stored=0x${storedChecksum.toString(16)}, computed=0x${computed.toString(16)}`,
    );
  }

  return {
    header: { magic, version, difficulty, rules, seed, frameCount, tickMs },
    inputs,
    footer: { finalScore, finalRngState, checksum: storedChecksum },
  };
}

// CRC-32 (ISO 3309 / ITU-T V.42 polynomial)
const CRC_TABLE = buildCrcTable();

function buildCrcTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
}

function crcStep(crc: number, byte: number): number {
  return (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = crcStep(crc, byte);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function crc32AndValidateInputs(data: Uint8Array, inputsStart: number, inputsEnd: number): number {
  let crc = 0xffffffff;
  for (let i = 0; i < inputsEnd; i++) {
    const byte = data[i] ?? 0;
    if (i >= inputsStart && (byte & RESERVED_INPUT_BITS) !== 0) {
      throw new TapeFormatError(
        `Input byte reserved bits set at frame ${i - inputsStart}: 0x${byte.toString(16).padStart(2, "0")}`,
      );
    }
    crc = crcStep(crc, byte);
  }
  return (crc ^ 0xffffffff) >>> 0;
}
