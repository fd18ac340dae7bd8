import type { Config } from "./types.js";
import { ConfigSchema } from "./types.js";
import { ensureMcsshDir, getConfigFilePath } from "./paths.js";
import { readJsonFile, writeSecureFile } from "./utils/fs.js";

type StringKey = "mcEndpoint" | "token" | "oidcAgentAccount" | "issuer" | "logLevel";
type NumberKey = "timeoutMs" | "cacheTtlSeconds";
type BooleanKey = "insecure" | "cacheEnabled" | "validateTokenLength" | "logToFile";

// Earlier names win when several are set.
const STRING_ENV: Record<StringKey, string[]> = {
  mcEndpoint: ["MCSSH_MC_ENDPOINT"],
  token: ["ACCESS_TOKEN", "OIDC", "OS_ACCESS_TOKEN", "OIDC_ACCESS_TOKEN", "WATTS_TOKEN", "WATTSON_TOKEN"],
  oidcAgentAccount: ["OIDC_AGENT_ACCOUNT"],
  issuer: ["OIDC_ISS", "OIDC_ISSUER"],
  logLevel: ["MCSSH_LOG_LEVEL"]
};

const NUMBER_ENV: Record<NumberKey, string> = {
  timeoutMs: "MCSSH_TIMEOUT_MS",
  cacheTtlSeconds: "MCSSH_CACHE_TTL_SECONDS"
};

const BOOLEAN_ENV: Record<BooleanKey, string> = {
  insecure: "MCSSH_INSECURE",
  cacheEnabled: "MCSSH_CACHE",
  validateTokenLength: "MCSSH_VALIDATE_TOKEN_LENGTH",
  logToFile: "MCSSH_LOG_FILE"
};

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function loadConfigFile(): Record<string, unknown> | null {
  const parsed = readJsonFile(getConfigFilePath());
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return null;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [configKey, envKeys] of Object.entries(STRING_ENV)) {
    const value = envKeys.map((key) => env[key]).find((v) => v !== undefined && v !== "");
    if (value !== undefined) {
      config[configKey] = value;
    }
  }

  for (const [configKey, envKey] of Object.entries(NUMBER_ENV)) {
    const value = env[envKey];
    if (value !== undefined) {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        config[configKey] = parsed;
      }
    }
  }

  for (const [configKey, envKey] of Object.entries(BOOLEAN_ENV)) {
    const value = env[envKey];
    if (value !== undefined) {
      const parsed = parseBoolean(value);
      if (parsed !== undefined) {
        config[configKey] = parsed;
      }
    }
  }

  return config;
}

export function resolveConfig(cliOverrides: Partial<Config> = {}): Config {
  const fileConfig = loadConfigFile() ?? {};
  const envConfig = loadEnvConfig();

  const merged: Record<string, unknown> = {};

  for (const layer of [fileConfig, envConfig, cliOverrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  return ConfigSchema.parse(merged);
}

export function saveConfigFile(config: Partial<Config>): void {
  ensureMcsshDir();
  const existing = loadConfigFile() ?? {};
  const merged = { ...existing, ...config };
  writeSecureFile(getConfigFilePath(), JSON.stringify(merged, null, 2));
}

export function getConfigPath(): string {
  return getConfigFilePath();
}
