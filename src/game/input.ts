import type { Axis, FrameInput } from "./types";

export type GameKey =
  | "left"
  | "right"
  | "up"
  | "down"
  | "fire"
  | "digit1"
  | "digit2"
  | "digit3"
  | "restart"
  | "escape";

const GAME_KEYS = new Set<string>([
  "left",
  "right",
  "up",
  "down",
  "fire",
  "digit1",
  "digit2",
  "digit3",
  "restart",
  "escape",
]);

export function isGameKey(value: string): value is GameKey {
  return GAME_KEYS.has(value);
}

/** Discrete events the state machine consumes once per frame. */
export type InputEvent =
  | { kind: "key"; key: GameKey }
  | { kind: "click"; x: number; y: number }
  | { kind: "login"; username: string; password: string }
  | { kind: "register"; username: string; password: string }
  | { kind: "quit" };

/**
 * Collects logical input between frames. Whatever maps physical devices to these calls
 * (a window, a terminal, a test) is the caller's concern.
 */
export class InputController {
  private axisX: Axis = 0;
  private axisY: Axis = 0;
  private fireHeld = false;
  private events: InputEvent[] = [];
  private closed = false;

  keyDown(key: GameKey): void {
    if (this.closed) {
      return;
    }
    switch (key) {
      case "left":
        this.axisX = -1;
        break;
      case "right":
        this.axisX = 1;
        break;
      case "up":
        this.axisY = -1;
        break;
      case "down":
        this.axisY = 1;
        break;
      case "fire":
        this.fireHeld = true;
        break;
      default:
        break;
    }
    this.push({ kind: "key", key });
  }

  keyUp(key: GameKey): void {
    // Releasing either key of an axis stops motion on that axis
    if (key === "left" || key === "right") {
      this.axisX = 0;
    } else if (key === "up" || key === "down") {
      this.axisY = 0;
    } else if (key === "fire") {
      this.fireHeld = false;
    }
  }

  click(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return;
    }
    this.push({ kind: "click", x, y });
  }

  submitLogin(username: string, password: string): void {
    this.push({ kind: "login", username, password });
  }

  submitRegistration(username: string, password: string): void {
    this.push({ kind: "register", username, password });
  }

  quit(): void {
    this.push({ kind: "quit" });
  }

  /** Held-state snapshot for the current frame. */
  sample(): FrameInput {
    return { dx: this.axisX, dy: this.axisY, fire: this.fireHeld };
  }

  drainEvents(): InputEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  /** Forget direction state so keys held before a match do not move the new craft. */
  resetAxes(): void {
    this.axisX = 0;
    this.axisY = 0;
  }

  reset(): void {
    this.resetAxes();
    this.fireHeld = false;
    this.events = [];
  }

  /** Clears all state and drops every later call; used once the game has terminated. */
  close(): void {
    this.reset();
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private push(event: InputEvent): void {
    if (!this.closed) {
      this.events.push(event);
    }
  }
}
