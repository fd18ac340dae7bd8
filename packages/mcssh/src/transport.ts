import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
  fromCache: boolean;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  verify: boolean;
}

export interface Transport {
  get(url: string, options: RequestOptions): Promise<HttpResponse>;
  close?(): Promise<void>;
}

export type TransportErrorKind = "tls" | "timeout" | "network";

export class TransportError extends Error {
  public readonly kind: TransportErrorKind;
  public readonly url: string;

  constructor(kind: TransportErrorKind, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
    this.url = url;
  }
}

export interface FetchResponseLike {
  status: number;
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  dispatcher: Dispatcher;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface FetchTransportOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

const TLS_ERROR_CODES = new Set([
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "CERT_SIGNATURE_FAILURE",
  "ERR_TLS_CERT_ALTNAME_INVALID"
]);

const TIMEOUT_ERROR_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT"
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function classifyFetchError(error: unknown): TransportErrorKind {
  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [error, cause]) {
    const code = errorCode(candidate);
    if (code && TLS_ERROR_CODES.has(code)) return "tls";
    if (code && TIMEOUT_ERROR_CODES.has(code)) return "timeout";
    if (candidate instanceof Error && (candidate.name === "TimeoutError" || candidate.name === "AbortError")) {
      return "timeout";
    }
  }
  return "network";
}

/**
 * GET-only HTTP transport on undici. Every request is bounded by `timeoutMs`
 * for connect, headers and body; certificate checks follow `verify`.
 */
export class FetchTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly agents = new Map<boolean, Agent>();

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
  }

  private agentFor(verify: boolean): Agent {
    const existing = this.agents.get(verify);
    if (existing) return existing;
    const agent = new Agent({
      connect: { rejectUnauthorized: verify, timeout: this.timeoutMs },
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs
    });
    this.agents.set(verify, agent);
    return agent;
  }

  async get(url: string, options: RequestOptions): Promise<HttpResponse> {
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { accept: "application/json", ...options.headers },
        dispatcher: this.agentFor(options.verify),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const body = await response.text();
      return { url, status: response.status, body, fromCache: false };
    } catch (error) {
      const kind = classifyFetchError(error);
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error;
      const message = cause instanceof Error ? cause.message : String(cause);
      throw new TransportError(kind, url, `GET ${url} failed (${kind}): ${message}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }
}

export function parseJsonBody(body: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return undefined;
  }
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}
