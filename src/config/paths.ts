import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const STATE_DIR_ENV = "TEXTPULSE_STATE_DIR";
export const CONFIG_PATH_ENV = "TEXTPULSE_CONFIG_PATH";

const DEFAULT_CONFIG_FILE = "textpulse.config.json";
const DATABASE_FILE = "analytics.db";

/** Directory holding the analytics database. Resolves the path only; see `ensureDir`. */
export function getStateDir(): string {
  return process.env[STATE_DIR_ENV] ?? join(homedir(), ".textpulse");
}

/** Explicit path first, then the environment, then ./textpulse.config.json. */
export function resolveConfigPath(explicit?: string): string {
  return resolve(explicit ?? process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_FILE);
}

export function databasePath(stateDir: string): string {
  return join(stateDir, DATABASE_FILE);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
