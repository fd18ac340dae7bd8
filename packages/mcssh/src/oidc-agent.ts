import { createConnection } from "node:net";
import { z } from "zod";
import { McsshError, errorMessage } from "./errors.js";

export const APPLICATION_HINT = "mcssh";

export interface TokenAgent {
  getTokenByAccount(account: string): Promise<string>;
  getTokenByIssuer(issuer: string): Promise<string>;
}

const AgentResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), access_token: z.string().min(1) }).passthrough(),
  z.object({ status: z.literal("failure"), error: z.string().default("unknown error") }).passthrough()
]);

type AgentRequest = {
  request: "access_token";
  application_hint: string;
  min_valid_period: number;
} & ({ account: string } | { issuer: string });

export interface OidcAgentClientOptions {
  socketPath?: string;
  timeoutMs?: number;
  minValidPeriod?: number;
}

/**
 * Talks to a running oidc-agent over the UNIX socket in `OIDC_SOCK`.
 */
export class OidcAgentClient implements TokenAgent {
  private readonly socketPath: string | undefined;
  private readonly timeoutMs: number;
  private readonly minValidPeriod: number;

  constructor(options: OidcAgentClientOptions = {}) {
    this.socketPath = options.socketPath ?? process.env.OIDC_SOCK;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.minValidPeriod = options.minValidPeriod ?? 0;
  }

  async getTokenByAccount(account: string): Promise<string> {
    return this.requestToken({
      request: "access_token",
      account,
      min_valid_period: this.minValidPeriod,
      application_hint: APPLICATION_HINT
    });
  }

  async getTokenByIssuer(issuer: string): Promise<string> {
    return this.requestToken({
      request: "access_token",
      issuer,
      min_valid_period: this.minValidPeriod,
      application_hint: APPLICATION_HINT
    });
  }

  private async requestToken(request: AgentRequest): Promise<string> {
    const raw = await this.exchange(JSON.stringify(request));
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      throw new McsshError("AGENT_ERROR", `oidc-agent sent an unreadable response: ${raw}`);
    }
    const parsed = AgentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new McsshError("AGENT_ERROR", `oidc-agent sent an unexpected response: ${raw}`);
    }
    if (parsed.data.status === "failure") {
      throw new McsshError("AGENT_ERROR", parsed.data.error);
    }
    return parsed.data.access_token;
  }

  private exchange(payload: string): Promise<string> {
    const socketPath = this.socketPath;
    if (!socketPath) {
      return Promise.reject(
        new McsshError(
          "AGENT_ERROR",
          "Could not connect to oidc-agent: OIDC_SOCK is not set. Start it with: eval `oidc-agent`"
        )
      );
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let settled = false;
      const socket = createConnection(socketPath);
      socket.setTimeout(this.timeoutMs);

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        if (error) {
          reject(error);
          return;
        }
        resolve(Buffer.concat(chunks).toString("utf-8").trim());
      };

      // The agent answers with a single JSON document; stop as soon as it parses.
      const complete = (): boolean => {
        try {
          JSON.parse(Buffer.concat(chunks).toString("utf-8"));
          return true;
        } catch {
          return false;
        }
      };

      socket.on("connect", () => {
        socket.write(payload);
      });
      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
        if (complete()) finish();
      });
      socket.on("end", () => {
        if (chunks.length === 0) {
          finish(new McsshError("AGENT_ERROR", "oidc-agent closed the connection without a response"));
          return;
        }
        finish();
      });
      socket.on("timeout", () => {
        finish(new McsshError("AGENT_ERROR", `oidc-agent did not answer within ${this.timeoutMs}ms`));
      });
      socket.on("error", (error) => {
        finish(new McsshError("AGENT_ERROR", `Could not connect to oidc-agent: ${errorMessage(error)}`));
      });
    });
  }
}
