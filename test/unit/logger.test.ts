import { describe, it, expect } from "vitest";
import { createLogger, maskAddress } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("defaults to info", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.level).toBe("info");
  });

  it("honours a custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates component child loggers at the parent level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "ingest" });
    expect(child.level).toBe("warn");
  });
});

describe("maskAddress", () => {
  it("keeps only the last four characters", () => {
    expect(maskAddress("+15550001111")).toBe("***1111");
  });

  it("masks short or non-string values entirely", () => {
    expect(maskAddress("1234")).toBe("***");
    expect(maskAddress(42)).toBe("***");
    expect(maskAddress(undefined)).toBe("***");
  });
});
