import { DEFAULT_TICK_MS } from "./game/constants";
import {
  DEFAULT_RULES,
  parseCollisionPolicy,
  parseDamagePolicy,
  parseFirePolicy,
  type GameRules,
} from "./game/rules";
import { parseBoolean, parseInteger } from "./utils";

export const DEFAULT_PROFILE_PATH = ".star-swarm/profiles.msgpack";

export interface GameEnv {
  [name: string]: string | undefined;
  STAR_SWARM_PROFILE_PATH?: string;
  STAR_SWARM_REQUIRE_LOGIN?: string;
  STAR_SWARM_FIRE_POLICY?: string;
  STAR_SWARM_COLLISION_POLICY?: string;
  STAR_SWARM_DAMAGE_POLICY?: string;
  STAR_SWARM_KILL_SCORE?: string;
  STAR_SWARM_TICK_MS?: string;
}

export interface AppConfig {
  profilePath: string;
  requireLogin: boolean;
  rules: GameRules;
  tickMs: number;
}

/** Unset or unparseable values fall back to the defaults; configuration never fails startup. */
export function loadConfig(env: GameEnv = process.env): AppConfig {
  const profilePath = env.STAR_SWARM_PROFILE_PATH?.trim();

  return {
    profilePath: profilePath && profilePath.length > 0 ? profilePath : DEFAULT_PROFILE_PATH,
    requireLogin: parseBoolean(env.STAR_SWARM_REQUIRE_LOGIN, false),
    rules: {
      firePolicy: parseFirePolicy(env.STAR_SWARM_FIRE_POLICY, DEFAULT_RULES.firePolicy),
      collisionPolicy: parseCollisionPolicy(
        env.STAR_SWARM_COLLISION_POLICY,
        DEFAULT_RULES.collisionPolicy,
      ),
      damagePolicy: parseDamagePolicy(env.STAR_SWARM_DAMAGE_POLICY, DEFAULT_RULES.damagePolicy),
      killScore: Math.min(255, parseInteger(env.STAR_SWARM_KILL_SCORE, DEFAULT_RULES.killScore)),
    },
    tickMs: Math.min(1000, parseInteger(env.STAR_SWARM_TICK_MS, DEFAULT_TICK_MS)),
  };
}
