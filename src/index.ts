export { loadConfig, type AppConfig, type GameEnv } from "./config";
export { Autopilot } from "./game/Autopilot";
export { collides, rectsOverlap, withinRadius } from "./game/collision";
export * from "./game/constants";
export {
  DIFFICULTIES,
  difficultyFromDigit,
  getDifficultyProfile,
  parseDifficulty,
  type DifficultyProfile,
} from "./game/difficulty";
export { InputController, isGameKey, type GameKey, type InputEvent } from "./game/input";
export { LiveInputSource, TapeInputSource, type InputSource } from "./game/input-source";
export { createMatch, type MatchState } from "./game/match";
export { hitTestMenu, layoutStartMenu, type MenuButton } from "./game/menu";
export type { GameRenderState, RenderSurface } from "./game/render-state";
export { headlessFrameTimeMs, replayTape, verifyTape, type ReplayResult, type TapeVerification } from "./game/replay";
export { DEFAULT_RULES, type GameRules } from "./game/rules";
export { tickMatch } from "./game/simulation";
export { SwarmGame, type GameConfig, type GameRunRecord } from "./game/SwarmGame";
export { deserializeTape, serializeTape, TapeFormatError, type Tape } from "./game/tape";
export type * from "./game/types";
export { FileProfileRepository } from "./store/file-repository";
export { ProfileStore, ProfileStoreError } from "./store/profile-store";
export { InMemoryProfileRepository, type ProfileRepository } from "./store/repository";
export type { ScoreUpdate, UserProfile } from "./store/types";
