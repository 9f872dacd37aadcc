import type { UserProfile } from "./types";

/**
 * Flat key-value storage of profiles keyed by username. Implementations are synchronous:
 * the game loop writes at most once per match and has no async seams.
 */
export interface ProfileRepository {
  get(username: string): UserProfile | null;
  set(profile: UserProfile): void;
  list(): UserProfile[];
}

export class InMemoryProfileRepository implements ProfileRepository {
  private readonly profiles = new Map<string, UserProfile>();

  constructor(initial: readonly UserProfile[] = []) {
    for (const profile of initial) {
      this.profiles.set(profile.username, { ...profile });
    }
  }

  get(username: string): UserProfile | null {
    const profile = this.profiles.get(username);
    return profile ? { ...profile } : null;
  }

  set(profile: UserProfile): void {
    this.profiles.set(profile.username, { ...profile });
  }

  list(): UserProfile[] {
    return Array.from(this.profiles.values(), (profile) => ({ ...profile }));
  }
}
