import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const loadConfig = async () => (await import("../../src/config.ts")).default;

describe("config", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("falls back to defaults", async () => {
    delete process.env.HTTP_PORT;
    delete process.env.UC_CONFIG_HOME;
    delete process.env.GOVEE_API_BASE;

    const config = await loadConfig();

    expect(config.httpPort).toBe(9090);
    expect(config.configHome).toBe("./config");
    expect(config.configFile).toBe(path.join("config", "config.json"));
    expect(config.goveeApiBase).toBe("https://openapi.api.govee.com");
    expect(config.rateLimit).toBe(10);
    expect(config.ratePeriod).toBe(60);
    expect(config.requestTimeout).toBe(30_000);
  });

  it("reads the configuration directory from UC_CONFIG_HOME", async () => {
    process.env.UC_CONFIG_HOME = "/var/lib/govee";

    const config = await loadConfig();

    expect(config.configFile).toBe(path.join("/var/lib/govee", "config.json"));
  });

  it("normalizes the environment name", async () => {
    process.env.NODE_ENV = "Development";

    expect((await loadConfig()).env).toBe("development");
  });

  it("ignores a port that is not a number", async () => {
    process.env.HTTP_PORT = "http";

    expect((await loadConfig()).httpPort).toBe(9090);
  });

  it("reads rate limiting settings", async () => {
    process.env.GOVEE_RATE_LIMIT = "5";
    process.env.GOVEE_RATE_PERIOD = "30";

    const config = await loadConfig();

    expect(config.rateLimit).toBe(5);
    expect(config.ratePeriod).toBe(30);
  });

  it("rejects a rate limit that is not positive", async () => {
    process.env.GOVEE_RATE_LIMIT = "0";

    await expect(loadConfig()).rejects.toThrow(
      "GOVEE_RATE_LIMIT must be a positive integer"
    );
  });
});
