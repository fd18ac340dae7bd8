import chalk from "chalk";
import ora from "ora";
import { createContext, type CommonFlags } from "../context.js";
import { resolveCredential } from "../engine.js";
import { printCommand, printHeader, printKeyValue } from "../utils/formatting.js";

export async function resolveCommand(target: string, flags: CommonFlags): Promise<void> {
  const context = createContext(flags);
  const host = context.deps.sshHostname(target);

  printHeader(`Local account on ${host}`);
  const spinner = ora("Resolving username...").start();

  try {
    const credential = await resolveCredential(host, context.credentials, context.deps);
    spinner.succeed(`Username: ${chalk.green(credential.username)}`);
    console.log("");
    printKeyValue("Service", credential.endpoint);
    printKeyValue("Access token", credential.provenance);
    console.log("");
    console.log("  Connect with:");
    printCommand(["ssh", `${credential.username}@${host}`]);
    console.log(`  and use the access token as password.`);
    console.log("");
  } catch (error) {
    spinner.fail("Could not resolve username");
    throw error;
  } finally {
    await context.close();
  }
}
