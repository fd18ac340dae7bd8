import { resolveUsername } from "./account.js";
import { discoverFromHostname, discoverFromUserInput, type HostResolver } from "./discovery.js";
import type { Logger } from "./logger.js";
import type { TokenAgent } from "./oidc-agent.js";
import { formatOperand } from "./scp.js";
import { selectToken } from "./token.js";
import type { Transport } from "./transport.js";
import type {
  AugmentedScpCommand,
  CredentialOptions,
  ResolvedCredential,
  ScpCommand
} from "./types.js";

export interface EngineDeps {
  transport: Transport;
  // Maps an ssh target (possibly an alias) to the host ssh connects to.
  sshHostname: (target: string) => string;
  agent: TokenAgent;
  hostResolver: HostResolver;
  logger: Logger;
  now?: () => number;
}

export interface ResolveOptions extends CredentialOptions {
  mcEndpoint?: string;
}

export interface EndpointCredential extends ResolvedCredential {
  endpoint: string;
}

/**
 * Endpoint discovery, then token selection, then account resolution for
 * one SSH host.
 */
export async function resolveCredential(
  host: string,
  options: ResolveOptions,
  deps: EngineDeps
): Promise<EndpointCredential> {
  const endpoint = options.mcEndpoint
    ? await discoverFromUserInput(options.mcEndpoint, options.verify, deps)
    : await discoverFromHostname(host, options.verify, deps);

  const selected = await selectToken(
    {
      token: options.token,
      agentAccount: options.agentAccount,
      issuer: options.issuer,
      endpoint,
      verify: options.verify,
      validateLength: options.validateLength
    },
    deps
  );

  const username = await resolveUsername(endpoint, selected.token, options.verify, deps);
  return { endpoint, username, token: selected.token, provenance: selected.provenance };
}

/**
 * Fills in the username of every remote operand that has none. Sources are
 * handled before the target; tokens and provenances follow that order.
 */
export async function augmentScpCommand(
  command: ScpCommand,
  options: CredentialOptions,
  deps: EngineDeps
): Promise<AugmentedScpCommand> {
  const args = [...command.options];
  const tokens: string[] = [];
  const provenances: string[] = [];

  for (const operand of [...command.sources, command.target]) {
    if (!operand.remote || !operand.host || operand.user !== undefined) {
      args.push(operand.original);
      continue;
    }
    const host = deps.sshHostname(operand.host);
    deps.logger.debug(`Trying to get username from motley_cue service on ${host}.`);
    const credential = await resolveCredential(
      host,
      {
        token: options.token,
        agentAccount: options.agentAccount,
        issuer: options.issuer,
        verify: options.verify,
        validateLength: options.validateLength
      },
      deps
    );
    args.push(formatOperand(operand, credential.username));
    tokens.push(credential.token);
    provenances.push(credential.provenance);
  }

  return { args, tokens, provenances };
}
