import { MENU_BUTTON_HEIGHT, MENU_BUTTON_SPACING, MENU_BUTTON_WIDTH } from "./constants";
import { DIFFICULTIES, difficultyLabel } from "./difficulty";
import type { Difficulty, Rect } from "./types";

export interface MenuButton {
  difficulty: Difficulty;
  label: string;
  rect: Rect;
}

/**
 * Start-screen buttons, one per difficulty, stacked under the screen's midline.
 * Pure: the state machine lays the menu out once per frame and hit-tests clicks against that
 * frame's rectangles.
 */
export function layoutStartMenu(width: number, height: number): MenuButton[] {
  const x = width / 2 - MENU_BUTTON_WIDTH / 2;
  const top = height / 2 - 40;

  return DIFFICULTIES.map((difficulty, index) => ({
    difficulty,
    label: `${index + 1} - ${difficultyLabel(difficulty)}`,
    rect: {
      x,
      y: top + index * MENU_BUTTON_SPACING,
      width: MENU_BUTTON_WIDTH,
      height: MENU_BUTTON_HEIGHT,
    },
  }));
}

export function hitTestMenu(buttons: readonly MenuButton[], x: number, y: number): Difficulty | null {
  for (const { difficulty, rect } of buttons) {
    if (x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height) {
      return difficulty;
    }
  }
  return null;
}
