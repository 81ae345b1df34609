import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, parseConfigText, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";
import { databasePath, getStateDir, resolveConfigPath } from "../../src/config/paths.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_PORT"] = "9999";
    process.env["TEST_HOST"] = "0.0.0.0";
  });

  afterEach(() => {
    delete process.env["TEST_PORT"];
    delete process.env["TEST_HOST"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("port: ${env:TEST_PORT}")).toBe("port: 9999");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_HOST}:${env:TEST_PORT}")).toBe("0.0.0.0:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });

  it("feeds substituted values through the schema", () => {
    const config = parseConfigText('{ "server": { "port": ${env:TEST_PORT} } }');
    expect(config.server.port).toBe(9999);
  });
});

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseConfig({});
    expect(config.server).toEqual({ port: 8787, hostname: "127.0.0.1" });
    expect(config.logging?.level).toBe("info");
    expect(config.analytics).toEqual({
      defaultPeriod: "7d",
      peakHourCap: 5,
      dailyStatsCap: 30,
      maxResponseGapMinutes: 1440,
      peakHoursLimit: 3,
    });
    expect(config.maintenance).toEqual({
      enabled: true,
      engagementSchedule: "0 * * * *",
      rollupSchedule: "15 0 * * *",
      retentionSchedule: "30 3 1 * *",
      retentionMonths: 24,
    });
  });

  it("keeps overrides", () => {
    const config = parseConfig({
      analytics: { defaultPeriod: "30d", peakHourCap: 3 },
      maintenance: { inactiveAfterDays: 14 },
    });
    expect(config.analytics.defaultPeriod).toBe("30d");
    expect(config.analytics.peakHourCap).toBe(3);
    expect(config.analytics.dailyStatsCap).toBe(30);
    expect(config.maintenance.inactiveAfterDays).toBe(14);
  });

  it("rejects an unknown default period", () => {
    expect(() => parseConfig({ analytics: { defaultPeriod: "2w" } })).toThrow();
  });

  it("rejects a non-numeric port", () => {
    expect(() => parseConfig({ server: { port: "not-a-number" } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "textpulse-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(dir, "missing.json"));
    expect(config.server.port).toBe(8787);
  });

  it("reads and validates a file", () => {
    const path = join(dir, "textpulse.config.json");
    writeFileSync(path, JSON.stringify({ server: { port: 9100 }, logging: { level: "debug" } }));
    const config = loadConfig(path);
    expect(config.server.port).toBe(9100);
    expect(config.logging?.level).toBe("debug");
  });

  it("throws on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ server: ");
    expect(() => loadConfig(path)).toThrow();
  });
});

describe("config paths", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefers an explicit config path over the environment", () => {
    vi.stubEnv("TEXTPULSE_CONFIG_PATH", "/etc/textpulse/env.json");
    expect(resolveConfigPath("/srv/explicit.json")).toBe("/srv/explicit.json");
  });

  it("falls back to the environment, then the working directory", () => {
    vi.stubEnv("TEXTPULSE_CONFIG_PATH", "/etc/textpulse/env.json");
    expect(resolveConfigPath()).toBe("/etc/textpulse/env.json");

    delete process.env["TEXTPULSE_CONFIG_PATH"];
    expect(resolveConfigPath()).toBe(resolve("textpulse.config.json"));
  });

  it("reads the state directory from the environment", () => {
    vi.stubEnv("TEXTPULSE_STATE_DIR", "/var/lib/textpulse");
    expect(getStateDir()).toBe("/var/lib/textpulse");
    expect(databasePath(getStateDir())).toBe(join("/var/lib/textpulse", "analytics.db"));
  });
});
