import ora from "ora";
import { createContext, type CommonFlags } from "../context.js";
import { discoverFromHostname, discoverFromUserInput } from "../discovery.js";
import { McsshError, errorMessage } from "../errors.js";
import { MotleyCueClient, describeLocalStatus } from "../motley-cue.js";
import { selectToken } from "../token.js";
import { printHeader, printJson, printKeyValue, printWarning } from "../utils/formatting.js";

export async function infoCommand(target: string | undefined, flags: CommonFlags): Promise<void> {
  const context = createContext(flags);
  const { credentials, deps } = context;

  try {
    const spinner = ora("Looking for motley_cue service...").start();
    let endpoint: string;
    try {
      if (credentials.mcEndpoint) {
        endpoint = await discoverFromUserInput(credentials.mcEndpoint, credentials.verify, deps);
      } else if (target) {
        endpoint = await discoverFromHostname(deps.sshHostname(target), credentials.verify, deps);
      } else {
        throw new McsshError("INVALID_ARGUMENT", "Specify an SSH host or --mc-endpoint.");
      }
      spinner.succeed(`Found service at ${endpoint}`);
    } catch (error) {
      spinner.fail("No service found");
      throw error;
    }

    const client = new MotleyCueClient(endpoint, deps.transport, credentials.verify, deps.logger);

    printHeader("Service information");
    const info = await client.getInfo();
    if (info.ok) {
      printJson(info.data);
    } else {
      printWarning(info.detail);
    }

    let token: string;
    try {
      const selected = await selectToken({ ...credentials, endpoint }, deps);
      token = selected.token;
      printKeyValue("Access token", selected.provenance);
    } catch (error) {
      printWarning(`Skipping account information: ${errorMessage(error)}`);
      return;
    }

    printHeader("Authorisation on service");
    const authorisation = await client.getAuthorisationInfo(token);
    if (authorisation.ok) {
      printJson(authorisation.data);
    } else {
      printWarning(authorisation.detail);
    }

    printHeader("Local account");
    const status = await client.getStatus(token);
    if (status.ok) {
      for (const line of describeLocalStatus(status.data).split("\n")) {
        console.log(`  ${line}`);
      }
    } else {
      printWarning(status.detail);
    }
    console.log("");
  } finally {
    await context.close();
  }
}
