import { ProfileStoreError, type ProfileStore } from "../store/profile-store";
import type { UserProfile } from "../store/types";
import { safeErrorMessage } from "../utils";
import { Autopilot } from "./Autopilot";
import { AREA_HEIGHT, AREA_WIDTH, DEFAULT_TICK_MS, MAX_FRAME_DELTA_MS, MAX_SUBSTEPS } from "./constants";
import { difficultyFromDigit } from "./difficulty";
import { InputController, type InputEvent } from "./input";
import { LiveInputSource, TapeInputSource, type InputSource } from "./input-source";
import { createMatch, resetMatchForRestart, type MatchState } from "./match";
import { clamp } from "./math";
import { hitTestMenu, layoutStartMenu, type MenuButton } from "./menu";
import type { GameRenderState, RenderSurface } from "./render-state";
import { DEFAULT_RULES, type GameRules } from "./rules";
import { tickMatch } from "./simulation";
import { serializeTape, TapeRecorder } from "./tape";
import type { Difficulty, GameMode, TickEvent } from "./types";

export interface GameConfig {
  /** Omit for a headless game */
  surface?: RenderSurface | null;
  /** Omit to play without profiles (guest only, nothing persisted) */
  store?: ProfileStore | null;
  input?: InputController;
  rules?: GameRules;
  /** Start in the login screen instead of the difficulty menu */
  requireLogin?: boolean;
  /** Tick interval recorded in tapes */
  tickMs?: number;
}

export interface GameRunRecord {
  difficulty: Difficulty;
  seed: number;
  inputs: Uint8Array;
  finalScore: number;
  finalRngState: number;
}

const MESSAGE_INVALID_CREDENTIALS = "Invalid username or password";
const MESSAGE_PROFILES_UNAVAILABLE = "Profiles are unavailable";

export class SwarmGame {
  private readonly surface: RenderSurface | null;

  private readonly store: ProfileStore | null;

  private readonly input: InputController;

  private readonly rules: GameRules;

  private readonly tickMs: number;

  private readonly autopilot = new Autopilot();

  private mode: GameMode;

  private match: MatchState | null = null;

  private profile: UserProfile | null = null;

  // Best score seen this session, for guests and the HUD
  private highScore = 0;

  private message: string | null = null;

  private menu: MenuButton[] = [];

  private frameEvents: TickEvent[] = [];

  private inputSource: InputSource | null = null;

  private recorder: TapeRecorder | null = null;

  private lastFrameMs: number | null = null;

  private accumulatorMs = 0;

  constructor(config: GameConfig = {}) {
    this.surface = config.surface ?? null;
    this.store = config.store ?? null;
    this.input = config.input ?? new InputController();
    this.rules = { ...(config.rules ?? DEFAULT_RULES) };
    this.tickMs = config.tickMs ?? DEFAULT_TICK_MS;
    this.mode = config.requireLogin === true && this.store ? "login" : "start";
  }

  /**
   * Run one frame: consume the input events collected since the last frame, advance the match
   * if one is being played, then hand the result to the renderer.
   *
   * `nowMs` only paces the match. The simulation runs in fixed `tickMs` steps and reads its own
   * frame-derived clock, so a tape replays the same whatever the frame timing was.
   */
  frame(nowMs: number): void {
    if (this.mode === "terminated") {
      return;
    }

    this.frameEvents = [];
    this.menu = layoutStartMenu(AREA_WIDTH, AREA_HEIGHT);

    for (const event of this.input.drainEvents()) {
      this.handleEvent(event);
    }

    if (this.mode === "playing") {
      this.advance(nowMs);
    }

    this.surface?.render(this.buildRenderState());
  }

  private handleEvent(event: InputEvent): void {
    if (event.kind === "quit" || (event.kind === "key" && event.key === "escape")) {
      this.terminate();
      return;
    }

    switch (this.mode) {
      case "login":
        if (event.kind === "login") {
          this.login(event.username, event.password);
        } else if (event.kind === "register") {
          this.register(event.username, event.password);
        }
        break;
      case "start":
        this.handleStartInput(event);
        break;
      case "game-over":
        if (event.kind === "key" && event.key === "restart") {
          this.restart();
        }
        break;
      default:
        break;
    }
  }

  private handleStartInput(event: InputEvent): void {
    let difficulty: Difficulty | null = null;

    if (event.kind === "key") {
      if (event.key === "digit1") difficulty = difficultyFromDigit(1);
      else if (event.key === "digit2") difficulty = difficultyFromDigit(2);
      else if (event.key === "digit3") difficulty = difficultyFromDigit(3);
    } else if (event.kind === "click") {
      difficulty = hitTestMenu(this.menu, event.x, event.y);
    }

    if (difficulty) {
      this.startMatch(difficulty);
    }
  }

  private login(username: string, password: string): void {
    if (!this.store) {
      this.message = MESSAGE_PROFILES_UNAVAILABLE;
      return;
    }

    const profile = this.store.authenticate(username, password);
    if (!profile) {
      this.message = MESSAGE_INVALID_CREDENTIALS;
      return;
    }

    this.signIn(profile);
  }

  private register(username: string, password: string): void {
    if (!this.store) {
      this.message = MESSAGE_PROFILES_UNAVAILABLE;
      return;
    }

    try {
      this.signIn(this.store.create(username, password));
    } catch (error) {
      if (error instanceof ProfileStoreError) {
        this.message =
          error.code === "duplicate_username" ? "Username already taken" : "Username must not be empty";
        return;
      }
      console.error(`[game] registration failed: ${safeErrorMessage(error)}`);
      this.message = "Registration failed";
    }
  }

  private signIn(profile: UserProfile): void {
    this.profile = profile;
    this.highScore = profile.highScore;
    this.message = null;
    this.mode = "start";
  }

  /** Leave the start screen with a fresh match. Public for headless tools. */
  startMatch(difficulty: Difficulty, seed: number = Date.now()): void {
    if (this.mode !== "start") {
      throw new Error(`Cannot start a match from the ${this.mode} screen`);
    }

    this.match = createMatch(difficulty, seed);
    this.input.resetAxes();
    this.recorder = new TapeRecorder();
    // The frame that starts a match always runs its first step
    this.lastFrameMs = null;
    this.accumulatorMs = this.tickMs;

    if (!this.inputSource || this.inputSource instanceof TapeInputSource) {
      this.inputSource = new LiveInputSource(this.input, this.autopilot);
    }

    this.mode = "playing";
  }

  private advance(nowMs: number): void {
    if (this.lastFrameMs !== null) {
      this.accumulatorMs += clamp(nowMs - this.lastFrameMs, 0, MAX_FRAME_DELTA_MS);
    }
    this.lastFrameMs = nowMs;

    let steps = 0;
    while (this.mode === "playing" && this.accumulatorMs >= this.tickMs && steps < MAX_SUBSTEPS) {
      this.runTick();
      this.accumulatorMs -= this.tickMs;
      steps += 1;
    }

    if (steps === MAX_SUBSTEPS) {
      this.accumulatorMs = 0;
    }
  }

  private runTick(): void {
    const match = this.match;
    if (!match) {
      return;
    }

    const frameInput = this.inputSource
      ? this.inputSource.getFrameInput(match)
      : { dx: 0 as const, dy: 0 as const, fire: false };
    this.recorder?.record(frameInput);

    const simulationMs = (match.frame + 1) * this.tickMs;
    this.frameEvents.push(...tickMatch(match, frameInput, simulationMs, this.rules));
    this.inputSource?.advance();

    if (match.score > this.highScore) {
      this.highScore = match.score;
    }

    if (match.lives <= 0) {
      this.endMatch(match);
    }
  }

  private endMatch(match: MatchState): void {
    // Written before the mode flips; this is the only write per match
    if (this.profile && this.store) {
      try {
        this.profile = this.store.update(this.profile.username, {
          lastScore: match.score,
          highScore: Math.max(this.profile.highScore, match.score),
        });
        this.highScore = Math.max(this.highScore, this.profile.highScore);
      } catch (error) {
        console.error(
          `[game] failed to record score for ${this.profile.username}: ${safeErrorMessage(error)}`,
        );
      }
    }

    this.mode = "game-over";
  }

  private restart(): void {
    if (this.match) {
      resetMatchForRestart(this.match);
    }
    this.recorder = null;
    this.mode = "start";
  }

  private terminate(): void {
    this.mode = "terminated";
    this.input.close();
  }

  private buildRenderState(): GameRenderState {
    const match = this.match;
    const showMatch = match !== null && (this.mode === "playing" || this.mode === "game-over");

    return {
      mode: this.mode,
      frame: match?.frame ?? 0,
      player: showMatch ? match.player : null,
      projectiles: showMatch ? match.projectiles : [],
      adversaries: showMatch ? match.adversaries : [],
      score: match?.score ?? 0,
      highScore: this.highScore,
      lives: match?.lives ?? 0,
      difficulty: match?.difficulty ?? null,
      username: this.profile?.username ?? null,
      menu: this.mode === "start" ? this.menu : [],
      message: this.message,
      events: this.frameEvents,
    };
  }

  // =========================================================================
  // Public API (for headless runs, replay, scripts and tests)
  // =========================================================================

  getRenderState(): GameRenderState {
    return this.buildRenderState();
  }

  /** Replace the current input source. */
  setInputSource(source: InputSource): void {
    this.inputSource = source;
  }

  setAutopilotEnabled(enabled: boolean): void {
    this.autopilot.setEnabled(enabled);
  }

  getInput(): InputController {
    return this.input;
  }

  getMode(): GameMode {
    return this.mode;
  }

  getMatch(): MatchState | null {
    return this.match;
  }

  getScore(): number {
    return this.match?.score ?? 0;
  }

  getLives(): number {
    return this.match?.lives ?? 0;
  }

  getHighScore(): number {
    return this.highScore;
  }

  getUsername(): string | null {
    return this.profile?.username ?? null;
  }

  getMessage(): string | null {
    return this.message;
  }

  getRules(): Readonly<GameRules> {
    return this.rules;
  }

  getRunRecord(): GameRunRecord | null {
    if (!this.recorder || !this.match) {
      return null;
    }

    return {
      difficulty: this.match.difficulty,
      seed: this.match.seed,
      inputs: this.recorder.getInputs(),
      finalScore: this.match.score,
      finalRngState: this.match.rng.getState(),
    };
  }

  /** Serialized tape of the current (or last) match. */
  getTape(): Uint8Array | null {
    const record = this.getRunRecord();
    if (!record || record.inputs.length === 0) {
      return null;
    }

    return serializeTape(
      { difficulty: record.difficulty, rules: this.rules, seed: record.seed, tickMs: this.tickMs },
      record.inputs,
      record.finalScore,
      record.finalRngState,
    );
  }
}
