import jwt from "jsonwebtoken";
import { createLogger, type LogData, type Logger, type LogLevel } from "../src/logger.js";
import type { TokenAgent } from "../src/oidc-agent.js";
import { TransportError, type HttpResponse, type RequestOptions, type Transport } from "../src/transport.js";
import { SERVICE_SIGNATURE } from "../src/types.js";

export interface RecordedLog {
  level: LogLevel;
  message: string;
  data?: LogData;
}

export function createRecordingLogger(): { logger: Logger; entries: RecordedLog[]; messages(level: LogLevel): string[] } {
  const entries: RecordedLog[] = [];
  const logger = createLogger((level, message, data) => {
    entries.push({ level, message, data });
  });
  return {
    logger,
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message)
  };
}

export type FixtureReply =
  | { status: number; body: unknown }
  | { error: TransportError["kind"] }
  | ((options: RequestOptions) => { status: number; body: unknown });

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  verify: boolean;
}

/**
 * In-memory transport answering from a url → reply table. Unknown URLs fail
 * like an unreachable host.
 */
export class FixtureTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FixtureReply>();

  constructor(routes: Record<string, FixtureReply> = {}) {
    for (const [url, reply] of Object.entries(routes)) {
      this.routes.set(url, reply);
    }
  }

  on(url: string, reply: FixtureReply): this {
    this.routes.set(url, reply);
    return this;
  }

  urls(): string[] {
    return this.requests.map((r) => r.url);
  }

  async get(url: string, options: RequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, headers: options.headers ?? {}, verify: options.verify });
    const reply = this.routes.get(url);
    if (reply === undefined) {
      throw new TransportError("network", url, `GET ${url} failed (network): connect ECONNREFUSED`);
    }
    const resolved = typeof reply === "function" ? reply(options) : reply;
    if ("error" in resolved) {
      throw new TransportError(resolved.error, url, `GET ${url} failed (${resolved.error})`);
    }
    const body = typeof resolved.body === "string" ? resolved.body : JSON.stringify(resolved.body);
    return { url, status: resolved.status, body, fromCache: false };
  }
}

export const SIGNATURE_BODY = { description: SERVICE_SIGNATURE };

export class FakeAgent implements TokenAgent {
  readonly calls: string[] = [];

  constructor(
    private readonly accounts: Record<string, string> = {},
    private readonly issuers: Record<string, string> = {}
  ) {}

  async getTokenByAccount(account: string): Promise<string> {
    this.calls.push(`account:${account}`);
    const token = this.accounts[account];
    if (token === undefined) throw new Error(`account not loaded: ${account}`);
    return token;
  }

  async getTokenByIssuer(issuer: string): Promise<string> {
    this.calls.push(`issuer:${issuer}`);
    const token = this.issuers[issuer];
    if (token === undefined) throw new Error(`no account for issuer: ${issuer}`);
    return token;
  }
}

export const NOW_MS = 1_700_000_000_000;

export function makeJwt(expiresInSeconds: number, nowMs: number = NOW_MS): string {
  return jwt.sign({ sub: "test-user", exp: Math.floor(nowMs / 1000) + expiresInSeconds }, "test-secret");
}
