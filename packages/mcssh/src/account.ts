import { McsshError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { ADMIN_CONTACT_HINT, MotleyCueClient, usernameFromStatusMessage } from "./motley-cue.js";
import type { Transport } from "./transport.js";
import { AccountStateSchema, type AccountState, type StatusResponse } from "./types.js";

export interface AccountResolverDeps {
  transport: Transport;
  logger: Logger;
}

function usernameFromStatus(status: StatusResponse): string {
  const username = usernameFromStatusMessage(status.message);
  if (!username) {
    throw new McsshError(
      "RESOLUTION_FAILED",
      `Failed to get ssh username: unexpected status message for state '${status.state}': '${status.message ?? ""}'. ${ADMIN_CONTACT_HINT}`,
      { state: status.state, message: status.message }
    );
  }
  return username;
}

function assertNever(state: never): never {
  throw new McsshError("UNEXPECTED_STATE", `Unhandled account state: ${String(state)}`);
}

async function deployAccount(
  client: MotleyCueClient,
  token: string,
  state: Extract<AccountState, "unknown" | "not_deployed" | "deployed">,
  status: StatusResponse,
  logger: Logger
): Promise<string> {
  if (state === "unknown") {
    logger.warn("Your account on service is in an undefined state. Will try redeploying...");
  } else if (state === "not_deployed") {
    logger.info("Creating local account...");
  } else {
    logger.info("Updating local account...");
  }

  let failure: string;
  try {
    const result = await client.deploy(token);
    if (result.ok) {
      logger.debug(JSON.stringify(result.data, null, 2));
      return result.data.credentials.ssh_user;
    }
    failure = result.detail;
  } catch (error) {
    failure = `Failed on deploy: ${errorMessage(error)}`;
  }

  if (state === "deployed") {
    logger.warn("Failed on redeploy. Some of your user information might be outdated.");
    logger.debug(failure);
    return usernameFromStatus(status);
  }
  throw new McsshError("DEPLOY_FAILED", `Failed to get ssh username. ${failure}`, { state });
}

/**
 * Maps the caller's identity at `endpoint` to a local username, deploying
 * the account when the service allows it.
 */
export async function resolveUsername(
  endpoint: string,
  token: string,
  verify: boolean,
  deps: AccountResolverDeps
): Promise<string> {
  const { logger } = deps;
  const client = new MotleyCueClient(endpoint, deps.transport, verify, logger);

  let statusResult: Awaited<ReturnType<MotleyCueClient["getStatus"]>>;
  try {
    statusResult = await client.getStatus(token);
  } catch (error) {
    throw new McsshError(
      "RESOLUTION_FAILED",
      `Failed to get ssh username. Failed on get_status: ${errorMessage(error)}`,
      { endpoint }
    );
  }
  if (!statusResult.ok) {
    logger.error(statusResult.detail);
    throw new McsshError("RESOLUTION_FAILED", `Failed to get ssh username. ${statusResult.detail}`, {
      endpoint,
      status: statusResult.response.status
    });
  }

  const status = statusResult.data;
  const parsedState = AccountStateSchema.safeParse(status.state);
  if (!parsedState.success) {
    throw new McsshError(
      "UNEXPECTED_STATE",
      `Weird, this should never have happened... Your account is in state: ${status.state}. ${ADMIN_CONTACT_HINT}`,
      { state: status.state }
    );
  }

  const state = parsedState.data;
  logger.info(`State of your local account: ${state}`);

  switch (state) {
    case "suspended":
      logger.warn(`Your account on service is suspended, you might not be able to login. ${ADMIN_CONTACT_HINT}`);
      return usernameFromStatus(status);
    case "limited":
      logger.warn(
        `Your account on service has limited capabilities, but you might still be able to login. ${ADMIN_CONTACT_HINT}`
      );
      return usernameFromStatus(status);
    case "pending":
      throw new McsshError(
        "ACCOUNT_PENDING",
        `Your account creation on service is still pending approval. ${ADMIN_CONTACT_HINT}`
      );
    case "unknown":
    case "not_deployed":
    case "deployed":
      return deployAccount(client, token, state, status, logger);
    default:
      return assertNever(state);
  }
}
