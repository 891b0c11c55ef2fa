import path from "node:path";
import { describe, it, expect } from "vitest";
import { resolveLogSettings } from "./logger.js";

describe("resolveLogSettings", () => {
  it("defaults to info under ./logs", () => {
    expect(resolveLogSettings({})).toEqual({ level: "info", logDir: path.resolve("logs"), issues: [] });
  });

  it("reads the level and directory", () => {
    expect(resolveLogSettings({ LOG_LEVEL: "debug", LOG_DIR: "/var/log/matrix" })).toEqual({
      level: "debug",
      logDir: path.resolve("/var/log/matrix"),
      issues: [],
    });
  });

  it("falls back to defaults and reports an invalid level", () => {
    const settings = resolveLogSettings({ LOG_LEVEL: "loud", LOG_DIR: "/var/log/matrix" });

    expect(settings.level).toBe("info");
    expect(settings.logDir).toBe(path.resolve("logs"));
    expect(settings.issues).toHaveLength(1);
    expect(settings.issues[0]).toMatch(/^LOG_LEVEL: /);
  });

  it("ignores unrelated variables", () => {
    expect(resolveLogSettings({ LOG_LEVEL: "warn", MATRIX_CONFIG: "" }).level).toBe("warn");
  });
});
