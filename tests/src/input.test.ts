import { describe, expect, it } from "vitest";
import { Autopilot } from "../../src/game/Autopilot";
import { InputController, isGameKey } from "../../src/game/input";
import { LiveInputSource, TapeInputSource } from "../../src/game/input-source";
import { createMatch } from "../../src/game/match";
import { hitTestMenu, layoutStartMenu } from "../../src/game/menu";
import { decodeInputByte, encodeInputByte } from "../../src/game/tape";
import { firstAdversary, parkAdversaries } from "./helpers";

describe("InputController", () => {
  it("holds the last pressed direction per axis", () => {
    const input = new InputController();
    input.keyDown("left");
    expect(input.sample()).toEqual({ dx: -1, dy: 0, fire: false });

    input.keyDown("right");
    input.keyDown("up");
    expect(input.sample()).toEqual({ dx: 1, dy: -1, fire: false });
  });

  it("stops an axis when either of its keys is released", () => {
    const input = new InputController();
    input.keyDown("right");
    input.keyDown("down");
    input.keyUp("left");
    expect(input.sample()).toEqual({ dx: 0, dy: 1, fire: false });
    input.keyUp("up");
    expect(input.sample()).toEqual({ dx: 0, dy: 0, fire: false });
  });

  it("tracks the fire key as held state", () => {
    const input = new InputController();
    input.keyDown("fire");
    expect(input.sample().fire).toBe(true);
    input.keyUp("fire");
    expect(input.sample().fire).toBe(false);
  });

  it("queues discrete events until drained", () => {
    const input = new InputController();
    input.keyDown("digit2");
    input.click(10, 20);
    input.click(Number.NaN, 5);
    input.submitLogin("ada", "pw");
    input.quit();

    expect(input.drainEvents()).toEqual([
      { kind: "key", key: "digit2" },
      { kind: "click", x: 10, y: 20 },
      { kind: "login", username: "ada", password: "pw" },
      { kind: "quit" },
    ]);
    expect(input.drainEvents()).toEqual([]);
  });

  it("keeps fire across an axis reset and clears everything on a full reset", () => {
    const input = new InputController();
    input.keyDown("left");
    input.keyDown("fire");

    input.resetAxes();
    expect(input.sample()).toEqual({ dx: 0, dy: 0, fire: true });
    expect(input.drainEvents()).toHaveLength(2);

    input.keyDown("up");
    input.reset();
    expect(input.sample()).toEqual({ dx: 0, dy: 0, fire: false });
    expect(input.drainEvents()).toEqual([]);
  });

  it("ignores everything once closed", () => {
    const input = new InputController();
    input.keyDown("fire");
    input.close();

    input.keyDown("left");
    input.click(1, 2);
    input.submitRegistration("ada", "pw");
    input.quit();

    expect(input.isClosed()).toBe(true);
    expect(input.sample()).toEqual({ dx: 0, dy: 0, fire: false });
    expect(input.drainEvents()).toEqual([]);
  });

  it("recognizes logical key names", () => {
    expect(isGameKey("restart")).toBe(true);
    expect(isGameKey("jump")).toBe(false);
  });
});

describe("input bytes", () => {
  it("pack direction and fire into one byte", () => {
    expect(encodeInputByte({ dx: -1, dy: 1, fire: true })).toBe(0x19);
    expect(encodeInputByte({ dx: 1, dy: -1, fire: false })).toBe(0x06);
    expect(decodeInputByte(0x19)).toEqual({ dx: -1, dy: 1, fire: true });
  });

  it("let left and up win when both keys of an axis are set", () => {
    expect(decodeInputByte(0x0f)).toEqual({ dx: -1, dy: -1, fire: false });
  });
});

describe("TapeInputSource", () => {
  it("steps through recorded inputs and idles past the end", () => {
    const source = new TapeInputSource(new Uint8Array([0x19, 0x02]));
    expect(source.getTotalFrames()).toBe(2);

    expect(source.getFrameInput()).toEqual({ dx: -1, dy: 1, fire: true });
    source.advance();
    expect(source.getFrameInput()).toEqual({ dx: 1, dy: 0, fire: false });
    source.advance();

    expect(source.isComplete()).toBe(true);
    expect(source.getFrameInput()).toEqual({ dx: 0, dy: 0, fire: false });
    source.advance();
    expect(source.getCurrentFrame()).toBe(2);
  });
});

describe("LiveInputSource", () => {
  it("samples the controller unless the policy is enabled", () => {
    const input = new InputController();
    const autopilot = new Autopilot();
    const source = new LiveInputSource(input, autopilot);
    const match = createMatch("easy", 1);
    parkAdversaries(match);

    input.keyDown("right");
    expect(source.getFrameInput(match)).toEqual({ dx: 1, dy: 0, fire: false });

    autopilot.setEnabled(true);
    expect(source.getFrameInput(match)).toEqual({ dx: -1, dy: 0, fire: true });
  });
});

describe("Autopilot", () => {
  it("starts disabled and toggles", () => {
    const autopilot = new Autopilot();
    expect(autopilot.isEnabled()).toBe(false);
    autopilot.toggle();
    expect(autopilot.isEnabled()).toBe(true);
  });

  it("lines up under the lowest adversary with fire held", () => {
    const autopilot = new Autopilot();
    const match = createMatch("easy", 1);
    parkAdversaries(match);
    const target = firstAdversary(match);
    target.y = 200;

    target.x = 1200;
    expect(autopilot.decide(match)).toEqual({ dx: 1, dy: 0, fire: true });

    // Centers within the deadzone: 962 + 30 vs 960 + 30
    target.x = 962;
    expect(autopilot.decide(match)).toEqual({ dx: 0, dy: 0, fire: true });
  });

  it("backs away from a descending adversary and returns to the spawn line", () => {
    const autopilot = new Autopilot();
    const match = createMatch("easy", 1);
    parkAdversaries(match);
    const target = firstAdversary(match);
    target.x = 960;

    target.y = 850;
    expect(autopilot.decide(match).dy).toBe(1);

    target.y = 200;
    match.player.y = 1000;
    expect(autopilot.decide(match).dy).toBe(-1);
  });
});

describe("start menu", () => {
  const buttons = layoutStartMenu(1920, 1080);

  it("stacks one button per difficulty under the midline", () => {
    expect(buttons.map((button) => button.label)).toEqual(["1 - Easy", "2 - Medium", "3 - Hard"]);
    expect(buttons.map((button) => button.rect)).toEqual([
      { x: 800, y: 500, width: 320, height: 48 },
      { x: 800, y: 560, width: 320, height: 48 },
      { x: 800, y: 620, width: 320, height: 48 },
    ]);
  });

  it("hit-tests clicks against the button rectangles", () => {
    expect(hitTestMenu(buttons, 800, 500)).toBe("easy");
    expect(hitTestMenu(buttons, 1119, 547)).toBe("easy");
    expect(hitTestMenu(buttons, 900, 570)).toBe("medium");
    expect(hitTestMenu(buttons, 900, 630)).toBe("hard");
  });

  it("ignores clicks outside every button", () => {
    expect(hitTestMenu(buttons, 799, 510)).toBeNull();
    expect(hitTestMenu(buttons, 1120, 500)).toBeNull();
    expect(hitTestMenu(buttons, 900, 550)).toBeNull();
  });
});
