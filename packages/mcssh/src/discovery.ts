import { lookup, reverse } from "node:dns/promises";
import { McsshError } from "./errors.js";
import type { Logger } from "./logger.js";
import { MotleyCueClient } from "./motley-cue.js";
import { TransportError, type Transport } from "./transport.js";
import { SERVICE_SIGNATURE } from "./types.js";

export interface HostResolver {
  canonicalHost(host: string): Promise<string>;
}

export interface DnsHostResolverOptions {
  timeoutMs: number;
  lookup?: (host: string) => Promise<{ address: string }>;
  reverse?: (address: string) => Promise<string[]>;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Resolves a host to its fully qualified name through a forward then a
 * reverse lookup, each bounded by `timeoutMs`. Falls back to the host as
 * given.
 */
export class DnsHostResolver implements HostResolver {
  private readonly timeoutMs: number;
  private readonly lookup: (host: string) => Promise<{ address: string }>;
  private readonly reverse: (address: string) => Promise<string[]>;

  constructor(options: DnsHostResolverOptions) {
    this.timeoutMs = options.timeoutMs;
    this.lookup = options.lookup ?? ((host) => lookup(host));
    this.reverse = options.reverse ?? ((address) => reverse(address));
  }

  async canonicalHost(host: string): Promise<string> {
    try {
      const { address } = await withTimeout(this.lookup(host), this.timeoutMs, `lookup of ${host}`);
      const names = await withTimeout(this.reverse(address), this.timeoutMs, `reverse lookup of ${address}`);
      return names.find((name) => name.includes(".")) ?? host;
    } catch {
      return host;
    }
  }
}

export const identityHostResolver: HostResolver = {
  canonicalHost: async (host) => host
};

export interface DiscoveryDeps {
  transport: Transport;
  hostResolver: HostResolver;
  logger: Logger;
}

export const TLS_FAILURE_MESSAGE =
  "SSL certificate verification failed. Use --insecure if you wish to ignore SSL certificate verification";

export function formatEndpoint(url: URL): string {
  const path = url.pathname === "/" ? "" : url.pathname.replace(/\/+$/, "");
  return `${url.protocol}//${url.host}${path}`;
}

async function withCanonicalHost(candidate: string, deps: DiscoveryDeps): Promise<string | null> {
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    deps.logger.debug(`Not a valid URL: ${candidate}`);
    return null;
  }
  // IPv6 literals keep their brackets in URL.hostname and have no name to resolve.
  if (url.hostname.startsWith("[")) {
    return formatEndpoint(url);
  }
  const fqdn = await deps.hostResolver.canonicalHost(url.hostname);
  if (fqdn && fqdn !== url.hostname) {
    url.hostname = fqdn;
    const endpoint = formatEndpoint(url);
    deps.logger.info(`Using FQDN for host: ${endpoint}`);
    return endpoint;
  }
  return formatEndpoint(url);
}

/**
 * One bounded GET of the candidate root. Returns the endpoint when the body
 * carries the service signature, null when nothing answers as the service.
 * Certificate failures are raised, never reported as "not found".
 */
export async function probeEndpoint(
  candidate: string,
  verify: boolean,
  deps: DiscoveryDeps
): Promise<string | null> {
  const { logger } = deps;
  logger.info(`Looking for motley_cue service at '${candidate}'...`);

  const endpoint = await withCanonicalHost(candidate, deps);
  if (endpoint === null) {
    logger.info("...NOTHING HERE");
    return null;
  }

  try {
    const root = await new MotleyCueClient(endpoint, deps.transport, verify, logger).getRoot();
    if (root.response.status === 200 && !verify) {
      logger.warn(
        `InsecureRequestWarning: Unverified HTTPS request is being made to '${endpoint}'. ` +
          "Adding certificate verification is strongly advised."
      );
    }
    if (root.ok && root.data.description === SERVICE_SIGNATURE) {
      logger.info("...FOUND IT!");
      return endpoint;
    }
  } catch (error) {
    if (error instanceof TransportError && error.kind === "tls") {
      logger.info(TLS_FAILURE_MESSAGE);
      throw new McsshError("TLS_VERIFICATION_FAILED", TLS_FAILURE_MESSAGE, { endpoint });
    }
    logger.debug(`Probe of ${endpoint} failed`, {
      error: error instanceof Error ? error.message : String(error)
    });
  }

  logger.info("...NOTHING HERE");
  return null;
}

async function firstMatch(
  candidates: string[],
  probe: (candidate: string) => Promise<string | null>
): Promise<string | null> {
  for (const candidate of candidates) {
    const endpoint = await probe(candidate);
    if (endpoint) return endpoint;
  }
  return null;
}

/**
 * Validates an endpoint given by the user. Without a scheme, plain http is
 * probed before https.
 */
export async function discoverFromUserInput(
  mcEndpoint: string,
  verify: boolean,
  deps: DiscoveryDeps
): Promise<string> {
  const candidates = mcEndpoint.startsWith("http")
    ? [mcEndpoint]
    : ["http", "https"].map((scheme) => `${scheme}://${mcEndpoint}`);

  const endpoint = await firstMatch(candidates, async (candidate) => {
    if (candidate !== mcEndpoint) {
      deps.logger.warn(`No URL schema specified for mc-endpoint, trying ${candidate.split(":")[0]}`);
    }
    return probeEndpoint(candidate, verify, deps);
  });

  if (!endpoint) {
    throw new McsshError(
      "ENDPOINT_NOT_FOUND",
      `No motley_cue service found at '${mcEndpoint}'. Please specify a valid motley_cue endpoint.`,
      { input: mcEndpoint }
    );
  }
  return endpoint;
}

export function hostnameCandidates(hostname: string): string[] {
  const host = hostname.includes(":") && !hostname.startsWith("[") ? `[${hostname}]` : hostname;
  return [`https://${host}`, `https://${host}:8443`, `http://${host}:8080`];
}

/**
 * Looks for the service next to an SSH host: https on 443, https on 8443,
 * then unencrypted http on 8080.
 */
export async function discoverFromHostname(
  hostname: string,
  verify: boolean,
  deps: DiscoveryDeps
): Promise<string> {
  if (!hostname) {
    throw new McsshError("ENDPOINT_NOT_FOUND", "Could not resolve hostname.");
  }
  deps.logger.info(`Got host '${hostname}', looking for motley_cue service on host.`);

  const endpoint = await firstMatch(hostnameCandidates(hostname), (candidate) =>
    probeEndpoint(candidate, verify, deps)
  );

  if (!endpoint) {
    throw new McsshError(
      "ENDPOINT_NOT_FOUND",
      `No motley_cue service found on host '${hostname}' on port 443, 8443 or 8080. ` +
        "Please specify motley_cue endpoint via --mc-endpoint.",
      { hostname }
    );
  }
  if (endpoint.startsWith("http://")) {
    deps.logger.warn(`using unencrypted motley_cue endpoint: ${endpoint}`);
  }
  return endpoint;
}
