import type { z } from "zod";
import type { Logger } from "./logger.js";
import { bearer, parseJsonBody, type HttpResponse, type Transport } from "./transport.js";
import {
  AccountStateSchema,
  DeployResponseSchema,
  ErrorResponseSchema,
  ServiceInfoSchema,
  ServiceRootSchema,
  StatusResponseSchema,
  type DeployResponse,
  type ServiceInfo,
  type StatusResponse
} from "./types.js";

export const ADMIN_CONTACT_HINT = "Please contact an administrator for more information.";

export type ServiceOperation = "get_status" | "deploy" | "info" | "info_authorisation" | "root";

export type ServiceResult<T> =
  | { ok: true; data: T; response: HttpResponse }
  | { ok: false; response: HttpResponse; detail: string };

export function describeErrorResponse(operation: ServiceOperation, response: HttpResponse): string {
  const parsed = ErrorResponseSchema.safeParse(parseJsonBody(response.body));
  if (parsed.success) {
    return `Failed on ${operation}: [HTTP ${response.status}] [state=${parsed.data.state}] ${parsed.data.message}`;
  }
  return `Failed on ${operation}: [HTTP ${response.status}] ${response.body}`;
}

/**
 * Client for the motley_cue user API at a validated endpoint.
 */
export class MotleyCueClient {
  readonly endpoint: string;
  private readonly transport: Transport;
  private readonly verify: boolean;
  private readonly logger: Logger;

  constructor(endpoint: string, transport: Transport, verify: boolean, logger: Logger) {
    this.endpoint = endpoint.replace(/\/+$/, "");
    this.transport = transport;
    this.verify = verify;
    this.logger = logger;
  }

  private async fetch(path: string, token?: string): Promise<HttpResponse> {
    const url = `${this.endpoint}${path}`;
    const response = await this.transport.get(url, {
      headers: token ? bearer(token) : {},
      verify: this.verify
    });
    if (response.fromCache) {
      this.logger.debug(`Using cached response for ${url}`);
    }
    return response;
  }

  private async call<S extends z.ZodTypeAny>(
    operation: ServiceOperation,
    path: string,
    schema: S,
    token?: string
  ): Promise<ServiceResult<z.infer<S>>> {
    const response = await this.fetch(path, token);
    if (response.status !== 200) {
      return { ok: false, response, detail: describeErrorResponse(operation, response) };
    }
    const parsed = schema.safeParse(parseJsonBody(response.body));
    if (!parsed.success) {
      return {
        ok: false,
        response,
        detail: `Failed on ${operation}: [HTTP ${response.status}] unexpected response: ${response.body}`
      };
    }
    return { ok: true, data: parsed.data, response };
  }

  async getRoot(): Promise<ServiceResult<z.infer<typeof ServiceRootSchema>>> {
    return this.call("root", "", ServiceRootSchema);
  }

  async getInfo(): Promise<ServiceResult<ServiceInfo>> {
    return this.call("info", "/info", ServiceInfoSchema);
  }

  async getAuthorisationInfo(token: string): Promise<ServiceResult<Record<string, unknown>>> {
    const response = await this.fetch("/info/authorisation", token);
    const body = parseJsonBody(response.body);
    if (response.status !== 200 || !body || typeof body !== "object" || Array.isArray(body)) {
      return { ok: false, response, detail: describeErrorResponse("info_authorisation", response) };
    }
    return { ok: true, data: { ...body }, response };
  }

  async getStatus(token: string): Promise<ServiceResult<StatusResponse>> {
    return this.call("get_status", "/user/get_status", StatusResponseSchema, token);
  }

  async deploy(token: string): Promise<ServiceResult<DeployResponse>> {
    return this.call("deploy", "/user/deploy", DeployResponseSchema, token);
  }

  /**
   * Issuers the service accepts tokens from. Failures are logged and yield an
   * empty list.
   */
  async getSupportedIssuers(): Promise<string[]> {
    try {
      const result = await this.getInfo();
      if (result.ok) {
        return result.data["supported OPs"];
      }
      this.logger.debug(result.detail);
    } catch (error) {
      this.logger.debug("Something went wrong fetching service info", {
        error: error instanceof Error ? error.message : String(error)
      });
    }
    this.logger.error("Failed to get service info");
    return [];
  }
}

/**
 * The service reports the local username as the second word of the status
 * message, e.g. "deployed alice01".
 */
export function usernameFromStatusMessage(message: string | undefined): string | undefined {
  const words = (message ?? "").split(/\s+/).filter((word) => word.length > 0);
  return words[1];
}

export function describeLocalStatus(status: StatusResponse): string {
  const state = AccountStateSchema.safeParse(status.state);
  if (!state.success) {
    return "Failed to get more information about your local account.";
  }
  const username = usernameFromStatusMessage(status.message);
  const withUser = (text: string): string =>
    username ? `${text}\nLocal username: ${username}` : text;

  switch (state.data) {
    case "suspended":
      return withUser(`Your account on service is suspended, you might not be able to login. ${ADMIN_CONTACT_HINT}`);
    case "limited":
      return withUser(
        `Your account on service has limited capabilities, but you might still be able to login. ${ADMIN_CONTACT_HINT}`
      );
    case "pending":
      return `Your account creation on service is still pending approval. ${ADMIN_CONTACT_HINT}`;
    case "unknown":
      return `Your account on service is in an undefined state. ${ADMIN_CONTACT_HINT}`;
    case "not_deployed":
      return "Your account on service is not deployed, but it will be created on the first login if authorised.";
    case "deployed":
      return withUser("Your account on service is deployed.");
  }
}
