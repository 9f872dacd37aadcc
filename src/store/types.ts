export interface UserProfile {
  username: string;
  /** Opaque; compared by equality */
  password: string;
  highScore: number;
  lastScore: number;
}

export interface ScoreUpdate {
  lastScore: number;
  highScore: number;
}

export type ProfileStoreErrorCode = "duplicate_username" | "invalid_username" | "unknown_user";
