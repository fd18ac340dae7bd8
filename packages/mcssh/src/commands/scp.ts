import ora from "ora";
import { createContext, type CommonFlags } from "../context.js";
import { augmentScpCommand } from "../engine.js";
import { splitScpArguments } from "../scp.js";
import { printCommand, printHeader, printInfo } from "../utils/formatting.js";

export async function scpCommand(args: string[], flags: CommonFlags): Promise<void> {
  const command = splitScpArguments(args);
  const context = createContext(flags);

  const spinner = ora("Resolving usernames for remote operands...").start();
  try {
    const augmented = await augmentScpCommand(command, context.credentials, context.deps);
    spinner.succeed(
      augmented.tokens.length === 1
        ? "Resolved 1 remote operand"
        : `Resolved ${augmented.tokens.length} remote operands`
    );

    printHeader("scp command");
    printCommand(["scp", ...augmented.args]);
    console.log("");

    if (augmented.provenances.length > 0) {
      printInfo("When prompted for passwords, use these access tokens in order:");
      augmented.provenances.forEach((provenance, index) => {
        console.log(`    ${index + 1}. ${provenance}`);
      });
      console.log("");
    }
  } catch (error) {
    spinner.fail("Could not resolve remote usernames");
    throw error;
  } finally {
    await context.close();
  }
}
