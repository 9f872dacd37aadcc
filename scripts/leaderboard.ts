/**
 * Prints the best profiles from the profile file.
 *
 * Usage: tsx scripts/leaderboard.ts [--limit <n>]
 */

import { loadConfig } from "../src/config";
import { FileProfileRepository } from "../src/store/file-repository";
import { ProfileStore } from "../src/store/profile-store";
import { parseInteger } from "../src/utils";

const args = process.argv.slice(2);
const limitIndex = args.indexOf("--limit");
const limit = parseInteger(limitIndex >= 0 ? args[limitIndex + 1] : undefined, 10);

const config = loadConfig();
const store = new ProfileStore(new FileProfileRepository(config.profilePath));
const rows = store.leaderboard(limit);

if (rows.length === 0) {
  console.log(`No profiles in ${config.profilePath}`);
  process.exit(0);
}

console.log(`Top ${rows.length} (${config.profilePath})`);
rows.forEach((profile, index) => {
  const rank = String(index + 1).padStart(3, " ");
  console.log(`${rank}. ${profile.username.padEnd(20, " ")} high ${String(profile.highScore).padStart(6, " ")}  last ${profile.lastScore}`);
});
