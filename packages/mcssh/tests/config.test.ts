import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { getConfigPath, loadEnvConfig, resolveConfig, saveConfigFile } from "../src/config.js";
import { configOverrides } from "../src/context.js";

const ENV_KEYS = [
  "MCSSH_HOME",
  "MCSSH_MC_ENDPOINT",
  "ACCESS_TOKEN",
  "OIDC",
  "OS_ACCESS_TOKEN",
  "OIDC_ACCESS_TOKEN",
  "WATTS_TOKEN",
  "WATTSON_TOKEN",
  "OIDC_AGENT_ACCOUNT",
  "OIDC_ISS",
  "OIDC_ISSUER",
  "MCSSH_LOG_LEVEL",
  "MCSSH_TIMEOUT_MS",
  "MCSSH_CACHE_TTL_SECONDS",
  "MCSSH_INSECURE",
  "MCSSH_CACHE",
  "MCSSH_VALIDATE_TOKEN_LENGTH",
  "MCSSH_LOG_FILE"
];

describe("Config Module", () => {
  const originalEnv: Record<string, string | undefined> = {};
  let home: string;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
    home = mkdtempSync(join(tmpdir(), "mcssh-config-"));
    process.env.MCSSH_HOME = home;
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(originalEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(home, { recursive: true, force: true });
  });

  it("should return default config values", () => {
    const config = resolveConfig();

    assert.deepStrictEqual(config, {
      insecure: false,
      timeoutMs: 3050,
      cacheEnabled: true,
      cacheTtlSeconds: 300,
      validateTokenLength: true,
      logLevel: "warn",
      logToFile: false
    });
  });

  it("should take the first token variable that is set", () => {
    process.env.OIDC = "";
    process.env.OS_ACCESS_TOKEN = "os-token";
    process.env.WATTS_TOKEN = "watts-token";

    assert.equal(resolveConfig().token, "os-token");
  });

  it("should prefer ACCESS_TOKEN over the other token variables", () => {
    process.env.ACCESS_TOKEN = "access-token";
    process.env.OIDC = "oidc-token";

    assert.equal(resolveConfig().token, "access-token");
  });

  it("should read the issuer from OIDC_ISS or OIDC_ISSUER", () => {
    process.env.OIDC_ISSUER = "https://op.example.org";

    assert.equal(resolveConfig().issuer, "https://op.example.org");
  });

  it("should use env var over config file", () => {
    saveConfigFile({ timeoutMs: 5000, oidcAgentAccount: "file-account" });
    process.env.OIDC_AGENT_ACCOUNT = "env-account";

    const config = resolveConfig();

    assert.equal(config.timeoutMs, 5000);
    assert.equal(config.oidcAgentAccount, "env-account");
  });

  it("should use CLI overrides over all else", () => {
    process.env.MCSSH_MC_ENDPOINT = "https://env.example.org";
    process.env.MCSSH_INSECURE = "false";

    const config = resolveConfig(configOverrides({ mcEndpoint: "https://cli.example.org", insecure: true }));

    assert.equal(config.mcEndpoint, "https://cli.example.org");
    assert.equal(config.insecure, true);
  });

  it("should let --debug win over --log-level", () => {
    const config = resolveConfig(configOverrides({ logLevel: "error", debug: true }));

    assert.equal(config.logLevel, "debug");
  });

  it("should map --no-cache and --no-validate-length", () => {
    const config = resolveConfig(configOverrides({ cache: false, validateLength: false }));

    assert.equal(config.cacheEnabled, false);
    assert.equal(config.validateTokenLength, false);
  });

  it("should parse boolean and numeric env values", () => {
    const config = loadEnvConfig({
      MCSSH_CACHE: "off",
      MCSSH_LOG_FILE: "yes",
      MCSSH_CACHE_TTL_SECONDS: "60"
    });

    assert.deepStrictEqual(config, { cacheEnabled: false, logToFile: true, cacheTtlSeconds: 60 });
  });

  it("should handle invalid env values gracefully", () => {
    process.env.MCSSH_TIMEOUT_MS = "invalid";
    process.env.MCSSH_INSECURE = "maybe";

    const config = resolveConfig();

    assert.equal(config.timeoutMs, 3050);
    assert.equal(config.insecure, false);
  });

  it("should write the config file with owner-only permissions", () => {
    saveConfigFile({ issuer: "https://op.example.org" });

    const path = getConfigPath();
    assert.equal(path, join(home, "config.json"));
    assert.ok(existsSync(path));
    assert.deepStrictEqual(JSON.parse(readFileSync(path, "utf-8")), { issuer: "https://op.example.org" });
    assert.equal(statSync(path).mode & 0o777, 0o600);
  });

  it("should merge successive saves", () => {
    saveConfigFile({ timeoutMs: 4000 });
    saveConfigFile({ cacheTtlSeconds: 10 });

    const config = resolveConfig();

    assert.equal(config.timeoutMs, 4000);
    assert.equal(config.cacheTtlSeconds, 10);
  });

  it("should ignore a config file that is not valid JSON", () => {
    writeFileSync(getConfigPath(), "{not json");

    assert.equal(resolveConfig().timeoutMs, 3050);
  });
});
