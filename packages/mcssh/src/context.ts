import { resolveConfig } from "./config.js";
import { DnsHostResolver } from "./discovery.js";
import type { EngineDeps, ResolveOptions } from "./engine.js";
import { CachingTransport, FileCacheStore } from "./http-cache.js";
import { logger, setFileLogging, setLogLevel } from "./logger.js";
import { OidcAgentClient } from "./oidc-agent.js";
import { sshHostname } from "./ssh.js";
import { FetchTransport, type Transport } from "./transport.js";
import type { Config } from "./types.js";

export interface CommonFlags {
  mcEndpoint?: string;
  token?: string;
  oaAccount?: string;
  iss?: string;
  insecure?: boolean;
  cache?: boolean;
  validateLength?: boolean;
  logLevel?: Config["logLevel"];
  logFile?: boolean;
  debug?: boolean;
}

export interface CliContext {
  config: Config;
  deps: EngineDeps;
  credentials: ResolveOptions;
  close(): Promise<void>;
}

export function configOverrides(flags: CommonFlags): Partial<Config> {
  return {
    mcEndpoint: flags.mcEndpoint,
    token: flags.token,
    oidcAgentAccount: flags.oaAccount,
    issuer: flags.iss,
    insecure: flags.insecure ? true : undefined,
    cacheEnabled: flags.cache === false ? false : undefined,
    validateTokenLength: flags.validateLength === false ? false : undefined,
    logLevel: flags.debug ? "debug" : flags.logLevel,
    logToFile: flags.logFile ? true : undefined
  };
}

export function createTransport(config: Config): Transport {
  const transport = new FetchTransport({ timeoutMs: config.timeoutMs });
  if (!config.cacheEnabled) {
    return transport;
  }
  return new CachingTransport(transport, {
    store: new FileCacheStore(),
    ttlSeconds: config.cacheTtlSeconds,
    logger
  });
}

export function createContext(flags: CommonFlags): CliContext {
  const config = resolveConfig(configOverrides(flags));
  setLogLevel(config.logLevel);
  setFileLogging(config.logToFile);

  const transport = createTransport(config);
  logger.debug(config.cacheEnabled ? "HTTP response cache enabled" : "HTTP response cache disabled");

  return {
    config,
    deps: {
      transport,
      agent: new OidcAgentClient(),
      hostResolver: new DnsHostResolver({ timeoutMs: config.timeoutMs }),
      sshHostname: (target) => sshHostname(target),
      logger
    },
    credentials: {
      mcEndpoint: config.mcEndpoint,
      token: config.token,
      agentAccount: config.oidcAgentAccount,
      issuer: config.issuer,
      verify: !config.insecure,
      validateLength: config.validateTokenLength
    },
    close: async () => {
      await transport.close?.();
    }
  };
}
