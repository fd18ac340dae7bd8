import { McsshError } from "./errors.js";
import type { RemoteOperand, ScpCommand } from "./types.js";

// scp flags that take the following argument as their value
const VALUE_FLAGS = new Set(["-c", "-D", "-F", "-i", "-J", "-l", "-o", "-P", "-S", "-X"]);

const URI_PREFIX = "scp://";

function local(original: string): RemoteOperand {
  return { original, remote: false, path: original, uri: false };
}

function splitUser(authority: string): { user?: string; hostPart: string } {
  const at = authority.lastIndexOf("@");
  if (at === -1) return { hostPart: authority };
  return { user: authority.slice(0, at) || undefined, hostPart: authority.slice(at + 1) };
}

function parseUri(original: string): RemoteOperand {
  const rest = original.slice(URI_PREFIX.length);
  const slash = rest.indexOf("/");
  const authority = slash === -1 ? rest : rest.slice(0, slash);
  const path = slash === -1 ? "" : rest.slice(slash + 1);
  const { user, hostPart } = splitUser(authority);

  const match = /^\[([^\]]+)\](?::(\d+))?$/.exec(hostPart) ?? /^([^:]+)(?::(\d+))?$/.exec(hostPart);
  if (!match) {
    throw new McsshError("INVALID_ARGUMENT", `Invalid scp URI: ${original}`);
  }
  return {
    original,
    remote: true,
    host: match[1],
    user,
    port: match[2] ? parseInt(match[2], 10) : undefined,
    path,
    uri: true
  };
}

/**
 * Parses one scp operand: `scp://[user@]host[:port][/path]`,
 * `[user@]host:path`, or a local path.
 */
export function parseScpOperand(original: string): RemoteOperand {
  if (original.startsWith(URI_PREFIX)) {
    return parseUri(original);
  }

  const bracket = original.indexOf("[");
  const searchFrom = bracket === -1 ? 0 : original.indexOf("]", bracket);
  const colon = searchFrom === -1 ? -1 : original.indexOf(":", searchFrom);
  if (colon <= 0) {
    return local(original);
  }

  const authority = original.slice(0, colon);
  if (authority.includes("/")) {
    return local(original);
  }

  const { user, hostPart } = splitUser(authority);
  const host = hostPart.replace(/^\[(.*)\]$/, "$1");
  if (!host) {
    return local(original);
  }
  return { original, remote: true, host, user, path: original.slice(colon + 1), uri: false };
}

export function formatOperand(operand: RemoteOperand, user: string): string {
  if (!operand.remote || !operand.host) {
    return operand.original;
  }
  const host = operand.host.includes(":") ? `[${operand.host}]` : operand.host;
  if (operand.uri) {
    const port = operand.port !== undefined ? `:${operand.port}` : "";
    const path = operand.path ? `/${operand.path}` : "";
    return `${URI_PREFIX}${user}@${host}${port}${path}`;
  }
  return `${user}@${host}:${operand.path}`;
}

/**
 * Splits scp arguments into options and operands; the last operand is the
 * target.
 */
export function splitScpArguments(args: string[]): ScpCommand {
  const options: string[] = [];
  const operands: string[] = [];
  let endOfOptions = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (endOfOptions || !arg.startsWith("-") || arg === "-") {
      operands.push(arg);
      continue;
    }
    if (arg === "--") {
      endOfOptions = true;
      options.push(arg);
      continue;
    }
    options.push(arg);
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new McsshError("INVALID_ARGUMENT", `Option ${arg} requires a value`);
      }
      options.push(value);
      i++;
    }
  }

  if (operands.length < 2) {
    throw new McsshError("INVALID_ARGUMENT", "scp needs at least one source and a target");
  }

  const parsed = operands.map(parseScpOperand);
  return {
    options,
    sources: parsed.slice(0, -1),
    target: parsed[parsed.length - 1]
  };
}
