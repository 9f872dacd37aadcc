export const AREA_WIDTH = 1920;
export const AREA_HEIGHT = 1080;

export const DEFAULT_TICK_MS = 16; // ~60 ticks/s
// Caps on how much wall-clock time one rendered frame may feed the fixed-step loop
export const MAX_FRAME_DELTA_MS = 250;
export const MAX_SUBSTEPS = 5;

export const STARTING_LIVES = 3;
export const HITS_PER_LIFE = 3;

export const PLAYER_WIDTH = 60;
export const PLAYER_HEIGHT = 60;
export const PLAYER_SPEED = 5;
export const PLAYER_SPAWN_X = AREA_WIDTH / 2;
export const PLAYER_SPAWN_Y = AREA_HEIGHT - 150;

export const PROJECTILE_WIDTH = 20;
export const PROJECTILE_HEIGHT = 40;
export const PROJECTILE_SPEED = 70;
// Muzzle point relative to the craft's top-left corner
export const MUZZLE_OFFSET_X = PLAYER_WIDTH / 2 - PROJECTILE_WIDTH / 2;
export const MUZZLE_OFFSET_Y = -PROJECTILE_HEIGHT;

export const FIRE_DELAY_MS = 50;
export const INVULNERABLE_MS = 300;

export const ADVERSARY_WIDTH = 60;
export const ADVERSARY_HEIGHT = 60;

// Respawned adversaries land somewhere in this y-range (inclusive)
export const SPAWN_BAND_MIN_Y = 50;
export const SPAWN_BAND_MAX_Y = 300;

export const PROXIMITY_THRESHOLD = 40;

export const MENU_BUTTON_WIDTH = 320;
export const MENU_BUTTON_HEIGHT = 48;
export const MENU_BUTTON_SPACING = 60;

// Written to tape header byte [4]
export const TAPE_FORMAT_VERSION = 1;
