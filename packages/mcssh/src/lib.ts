export { resolveUsername, type AccountResolverDeps } from "./account.js";
export {
  DnsHostResolver,
  discoverFromHostname,
  discoverFromUserInput,
  hostnameCandidates,
  identityHostResolver,
  probeEndpoint,
  type DiscoveryDeps,
  type HostResolver
} from "./discovery.js";
export {
  augmentScpCommand,
  resolveCredential,
  type EndpointCredential,
  type EngineDeps,
  type ResolveOptions
} from "./engine.js";
export { McsshError, isMcsshError, type McsshErrorCode } from "./errors.js";
export {
  CachingTransport,
  DEFAULT_TTL_RULES,
  FileCacheStore,
  MemoryCacheStore,
  type CacheStore,
  type TtlRule
} from "./http-cache.js";
export { createLogger, logger, setLogLevel, type Logger, type LogLevel } from "./logger.js";
export { MotleyCueClient, describeLocalStatus, usernameFromStatusMessage } from "./motley-cue.js";
export { OidcAgentClient, type TokenAgent } from "./oidc-agent.js";
export { formatOperand, parseScpOperand, splitScpArguments } from "./scp.js";
export { sshHostname } from "./ssh.js";
export { describeTokenSource, selectToken, tokenTimeLeft, type TokenSelectionOptions } from "./token.js";
export { FetchTransport, TransportError, type HttpResponse, type Transport } from "./transport.js";
export * from "./types.js";
