/**
 * Creates a profile in the profile file.
 *
 * Usage: tsx scripts/register.ts <username> <password>
 */

import { loadConfig } from "../src/config";
import { FileProfileRepository } from "../src/store/file-repository";
import { ProfileStore, ProfileStoreError } from "../src/store/profile-store";
import { safeErrorMessage } from "../src/utils";

const [username, password] = process.argv.slice(2);

if (!username || password === undefined) {
  console.error("Usage: tsx scripts/register.ts <username> <password>");
  process.exit(1);
}

const config = loadConfig();
const store = new ProfileStore(new FileProfileRepository(config.profilePath));

try {
  const profile = store.create(username, password);
  console.log(`Registered "${profile.username}" in ${config.profilePath}`);
} catch (error) {
  const reason = error instanceof ProfileStoreError ? error.code : "write_failed";
  console.error(`[profile-store] registration rejected (${reason}): ${safeErrorMessage(error)}`);
  process.exit(1);
}
