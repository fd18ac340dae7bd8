import jwt, { type JwtPayload } from "jsonwebtoken";
import { McsshError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { MotleyCueClient } from "./motley-cue.js";
import type { TokenAgent } from "./oidc-agent.js";
import type { Transport } from "./transport.js";
import type { SelectedToken, TokenSource } from "./types.js";

export const MAX_TOKEN_LENGTH = 1024;

export const OIDC_AGENT_URL = "https://github.com/indigo-dc/oidc-agent";

const HELP_HINT = "Try 'mcssh --help' for help on specifying the Access Token source.";

// oidc-gen invocations with the scopes each of these issuers needs
const OIDC_GEN_COMMANDS: Record<string, string> = {
  "aai.egi.eu/oidc":
    'oidc-gen --pub --iss https://aai.egi.eu/oidc --scope "openid profile email offline_access eduperson_entitlement eduperson_scoped_affiliation eduperson_unique_id" egi',
  "wlcg.cloud.cnaf.infn.it":
    'oidc-gen --pub --issuer https://wlcg.cloud.cnaf.infn.it --scope "openid profile offline_access eduperson_entitlement eduperson_scoped_affiliation wlcg.groups wlcg" wlcg',
  "login.helmholtz.de/oauth2":
    'oidc-gen --pub --iss https://login.helmholtz.de/oauth2 --scope "openid profile email offline_access eduperson_entitlement eduperson_scoped_affiliation eduperson_unique_id" helmholtz',
  "accounts.google.com": "oidc-gen --pub --iss https://accounts.google.com/ --flow device --scope max google"
};

export function canonicalIssuer(url: string): string {
  return url
    .toLowerCase()
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "")
    .replace(/\/$/, "");
}

export function oidcGenCommand(issuer: string): string {
  return OIDC_GEN_COMMANDS[canonicalIssuer(issuer)] ?? `oidc-gen --iss ${issuer}`;
}

/**
 * Seconds until the token's `exp` claim, or undefined when the token is not
 * a JWT carrying a numeric expiry.
 */
export function tokenTimeLeft(token: string, nowSeconds: number = Date.now() / 1000): number | undefined {
  let payload: JwtPayload | null;
  try {
    payload = jwt.decode(token, { json: true });
  } catch {
    return undefined;
  }
  if (!payload || typeof payload.exp !== "number") {
    return undefined;
  }
  return Math.floor(payload.exp - nowSeconds);
}

export function describeTokenSource(source: TokenSource): string {
  switch (source.kind) {
    case "explicit":
      return `'${source.token}'`;
    case "agent-account":
      return `\`oidc-token ${source.account}\``;
    case "agent-issuer":
    case "service-issuer":
      return `\`oidc-token ${source.issuer}\``;
  }
}

export function normalizeIssuer(issuer: string, logger: Logger): string {
  if (issuer.startsWith("http")) {
    return issuer;
  }
  const normalized = `https://${issuer}`;
  logger.warn(
    `The issuer URL you provided does not contain protocol information, assuming HTTPS: ${normalized}`
  );
  return normalized;
}

export function assertTokenLength(selected: SelectedToken, validateLength: boolean = true): SelectedToken {
  const length = selected.token.length;
  if (validateLength && length > MAX_TOKEN_LENGTH) {
    throw new McsshError(
      "TOKEN_TOO_LONG",
      `Sorry, your token is too long (${length} > ${MAX_TOKEN_LENGTH}) and cannot be used for SSH authentication. Please ask your OP admin if they can release shorter tokens.`,
      { length }
    );
  }
  return selected;
}

export interface TokenSelectionOptions {
  token?: string;
  agentAccount?: string;
  issuer?: string;
  endpoint?: string;
  verify: boolean;
  validateLength?: boolean;
}

export interface TokenSelectionDeps {
  agent: TokenAgent;
  transport: Transport;
  logger: Logger;
  now?: () => number;
}

type TokenAttempt = () => Promise<SelectedToken | null>;

function selected(token: string, source: TokenSource): SelectedToken {
  return { token, source, provenance: describeTokenSource(source) };
}

function noTokenFound(expired: boolean): McsshError {
  const message = expired
    ? "The provided Access Token is expired. Have you considered using 'oidc-agent' to always have valid tokens?\n" +
      `    ${OIDC_AGENT_URL}\n` +
      HELP_HINT
    : `No Access Token found.\n${HELP_HINT}`;
  return new McsshError("NO_TOKEN_FOUND", message, { expired });
}

/**
 * Picks one access token: explicit token, then oidc-agent account, then
 * oidc-agent issuer, then the single issuer the service supports. The first
 * source producing a token wins.
 */
export async function findToken(
  options: TokenSelectionOptions,
  deps: TokenSelectionDeps
): Promise<SelectedToken> {
  const { agent, logger } = deps;
  const nowSeconds = (): number => (deps.now ?? Date.now)() / 1000;
  let expired = false;

  const fromExplicitToken: TokenAttempt = async () => {
    const token = options.token;
    if (token === undefined) {
      logger.info("No access token provided.");
      return null;
    }
    const timeLeft = tokenTimeLeft(token, nowSeconds());
    if (timeLeft === undefined) {
      logger.warn("Could not get expiration date from provided token, it might not be a JWT. Using it anyway...");
      logger.debug(`Access Token: ${token}`);
      return selected(token, { kind: "explicit", token });
    }
    if (timeLeft > 0) {
      logger.info(`Token valid for ${timeLeft} more seconds, using provided token.`);
      logger.debug(`Access Token: ${token}`);
      return selected(token, { kind: "explicit", token });
    }
    expired = true;
    logger.warn(`Token is expired for ${-timeLeft} seconds. Looking for another source for Access Token...`);
    logger.debug(`Access Token: ${token}`);
    return null;
  };

  const fromAgentAccount: TokenAttempt = async () => {
    const account = options.agentAccount;
    if (account === undefined) {
      logger.info("No oidc-agent account provided.");
      return null;
    }
    try {
      logger.info(`Using oidc-agent account: ${account}`);
      const token = await agent.getTokenByAccount(account);
      return selected(token, { kind: "agent-account", account });
    } catch (error) {
      logger.warn(`Failed to get Access Token for oidc-agent account '${account}': ${errorMessage(error)}.`);
      logger.warn(`Are you sure this account is loaded? Load it with:\n    oidc-add ${account}`);
      logger.warn(`Are you sure this account is configured? Create it with:\n    oidc-gen ${account}`);
      return null;
    }
  };

  const fromIssuer: TokenAttempt = async () => {
    if (options.issuer === undefined) {
      logger.info("No issuer URL provided.");
      return null;
    }
    logger.info(`Using issuer: ${options.issuer}`);
    const issuer = normalizeIssuer(options.issuer, logger);
    try {
      const token = await agent.getTokenByIssuer(issuer);
      return selected(token, { kind: "agent-issuer", issuer });
    } catch (error) {
      logger.warn(`Failed to get Access Token from oidc-agent for issuer '${issuer}': ${errorMessage(error)}.`);
      logger.warn(
        "Are you sure the issuer URL is correct or that you have an account configured with oidc-agent for this issuer? " +
          `Create it with:\n    ${oidcGenCommand(issuer)}`
      );
      return null;
    }
  };

  const fromServiceIssuer: TokenAttempt = async () => {
    if (options.endpoint === undefined) {
      return null;
    }
    logger.info(`Trying to get list of supported AT issuers from ${options.endpoint}...`);
    const client = new MotleyCueClient(options.endpoint, deps.transport, options.verify, logger);
    const issuers = await client.getSupportedIssuers();
    if (issuers.length > 1) {
      logger.warn("Multiple issuers supported on service, I don't know which one to use:");
      logger.warn("[" + ["", ...issuers].join("\n    ") + "\n]");
      return null;
    }
    if (issuers.length === 0) {
      return null;
    }
    const issuer = issuers[0];
    try {
      logger.info(`Using the only issuer supported on service to retrieve token from oidc-agent: ${issuer}`);
      const token = await agent.getTokenByIssuer(issuer);
      return selected(token, { kind: "service-issuer", issuer });
    } catch (error) {
      logger.warn(
        `Failed to get Access Token from oidc-agent for the only issuer supported on service '${issuer}': ${errorMessage(error)}`
      );
      logger.warn(
        `If you don't have an oidc-agent account configured for this issuer, create it with:\n    ${oidcGenCommand(issuer)}`
      );
      return null;
    }
  };

  const attempts: TokenAttempt[] = [fromExplicitToken, fromAgentAccount, fromIssuer, fromServiceIssuer];
  for (const attempt of attempts) {
    const result = await attempt();
    if (result) {
      return result;
    }
  }

  throw noTokenFound(expired);
}

export async function selectToken(
  options: TokenSelectionOptions,
  deps: TokenSelectionDeps
): Promise<SelectedToken> {
  return assertTokenLength(await findToken(options, deps), options.validateLength);
}
