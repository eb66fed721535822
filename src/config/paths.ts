import os from "node:os";
import path from "node:path";

export const CONFIG_FILENAME = "committee.json";

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (trimmed.startsWith("~")) {
    return path.resolve(trimmed.replace(/^~(?=$|[\\/])/, os.homedir()));
  }
  return path.resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.VIRTUAL_COMMITTEE_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override);
  }
  return path.join(os.homedir(), ".virtual-committee");
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.VIRTUAL_COMMITTEE_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override);
  }
  return path.join(resolveStateDir(env), CONFIG_FILENAME);
}
