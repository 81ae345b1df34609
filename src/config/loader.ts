import { readFileSync } from "node:fs";
import type { TextpulseConfig } from "./types.js";
import { resolveConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** Parses config file text: env substitution, JSON, then schema defaults. */
export function parseConfigText(content: string): TextpulseConfig {
  const raw = JSON.parse(substituteEnv(content)) as unknown;
  return parseConfig(raw);
}

export function loadConfig(path?: string): TextpulseConfig {
  const configPath = resolveConfigPath(path);

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
