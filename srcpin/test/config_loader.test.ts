import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: {} });
    expect(config).toEqual({
      schema_version: "1.0.0",
      http: { timeout_ms: 300000, github_api_url: "https://api.github.com" },
      git: { timeout_ms: 30000 },
      registry: { prefer: "none", crane_bin: "crane" },
      log: { level: "info" },
    });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig({ envName: "ci", configDir: CONFIG_DIR, env: {} });
    expect(config.http).toEqual({ timeout_ms: 120000, github_api_url: "https://api.github.com" });
    expect(config.git).toEqual({ timeout_ms: 15000 });
    expect(config.schema_version).toBe("1.0.0");
  });

  it("fails when the named env file does not exist", () => {
    expect(() => loadConfig({ envName: "nonexistent-env", configDir: CONFIG_DIR, env: {} })).toThrow(
      `Config environment not found: ${path.join(CONFIG_DIR, "nonexistent-env.yaml")}`,
    );
  });

  it("applies SRCPIN_ variables over every file layer", () => {
    const config = loadConfig({
      envName: "ci",
      configDir: CONFIG_DIR,
      env: { SRCPIN_HTTP__TIMEOUT_MS: "5000", SRCPIN_REGISTRY__PREFER: "mcr", OTHER: "ignored" },
    });
    expect(config.http).toEqual({ timeout_ms: 5000, github_api_url: "https://api.github.com" });
    expect(config.registry).toEqual({ prefer: "mcr", crane_bin: "crane" });
    expect(config).not.toHaveProperty("other");
  });

  it("fills github.token from GITHUB_TOKEN only when unset", () => {
    expect(loadConfig({ configDir: CONFIG_DIR, env: { GITHUB_TOKEN: "test-token" } }).github).toEqual({ token: "test-token" });
    expect(
      loadConfig({ configDir: CONFIG_DIR, env: { GITHUB_TOKEN: "test-token", SRCPIN_GITHUB__TOKEN: "test-secret" } }).github,
    ).toEqual({ token: "test-secret" });
  });

  it("rejects a config file that is not a mapping", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "srcpin-config-"));
    fs.writeFileSync(path.join(dir, "base.yaml"), "- a\n- b\n");
    expect(() => loadConfig({ configDir: dir, env: {} })).toThrow("Config file is not a mapping");
  });
});

describe("merge helpers", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: "x" }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: "x" });
  });

  it("coerces all-digit values to numbers", () => {
    expect(applyEnvOverrides({}, { SRCPIN_GIT__TIMEOUT_MS: "10", SRCPIN_LOG__LEVEL: "debug", SRCPIN_X: "1e3" })).toEqual({
      git: { timeout_ms: 10 },
      log: { level: "debug" },
      x: "1e3",
    });
  });
});

describe("config validator", () => {
  it("validates a correct base config", async () => {
    const res = await validateConfig(loadConfig({ configDir: CONFIG_DIR, env: {} }));
    expect(res.valid).toBe(true);
  });

  it("rejects config missing required fields", async () => {
    const res = await validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("must have required property 'http'");
  });

  it("rejects an unknown registry preference", async () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: { SRCPIN_REGISTRY__PREFER: "quay" } });
    const res = await validateConfig(config);
    expect(res.valid).toBe(false);
  });

  it("rejects a non-numeric timeout from the environment", async () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: { SRCPIN_HTTP__TIMEOUT_MS: "soon" } });
    expect((await validateConfig(config)).valid).toBe(false);
  });

  it("rejects unknown keys", async () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: { SRCPIN_COLOR: "1" } });
    expect((await validateConfig(config)).valid).toBe(false);
  });
});
