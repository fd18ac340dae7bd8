#!/usr/bin/env node
import { Command, Option } from "commander";
import chalk from "chalk";
import { infoCommand } from "./commands/info.js";
import { resolveCommand } from "./commands/resolve.js";
import { scpCommand } from "./commands/scp.js";
import { configOverrides, type CommonFlags } from "./context.js";
import { getConfigPath, resolveConfig } from "./config.js";
import { isMcsshError } from "./errors.js";
import { printError } from "./utils/formatting.js";

const VERSION = "0.1.0";

function withCommonOptions(command: Command): Command {
  return command
    .option("--mc-endpoint <url>", "motley_cue service endpoint (default: look for it on the SSH host)")
    .option("--token <token>", "access token to use")
    .option("--oa-account <name>", "oidc-agent account to get the access token from")
    .option("--iss <url>", "issuer URL to get the access token for from oidc-agent")
    .option("--insecure", "ignore TLS certificate verification errors")
    .option("--no-cache", "do not cache HTTP responses")
    .option("--no-validate-length", "accept access tokens longer than 1024 characters")
    .addOption(new Option("--log-level <level>", "log level").choices(["debug", "info", "warn", "error"]))
    .option("--debug", "shorthand for --log-level debug")
    .option("--log-file", "also write logs to ~/.mcssh/logs");
}

const program = new Command();

program
  .name("mcssh")
  .description("Resolve SSH accounts and access tokens through a motley_cue service")
  .version(VERSION)
  .addHelpText(
    "after",
    `
Access token sources, in order of precedence:
  --token, --oa-account, --iss, the only issuer supported by the service.
Tokens are read from oidc-agent (https://github.com/indigo-dc/oidc-agent).`
  );

withCommonOptions(
  program
    .command("info")
    .description("Show service information, authorisation and local account status")
    .argument("[host]", "SSH host running the service")
).action(async (host: string | undefined, options: CommonFlags) => {
  await infoCommand(host, options);
});

withCommonOptions(
  program
    .command("resolve")
    .description("Resolve (and deploy if needed) the local username on an SSH host")
    .argument("<host>", "SSH host, as you would pass it to ssh")
).action(async (host: string, options: CommonFlags) => {
  await resolveCommand(host, options);
});

withCommonOptions(
  program
    .command("scp")
    .description("Fill in usernames for remote scp operands (pass scp flags after --)")
    .argument("<args...>", "scp options and operands")
    .allowUnknownOption()
).action(async (args: string[], options: CommonFlags) => {
  await scpCommand(args, options);
});

withCommonOptions(program.command("config").description("Show current configuration")).action(
  (options: CommonFlags) => {
    const config = resolveConfig(configOverrides(options));
    console.log("");
    console.log(chalk.bold("Current Configuration:"));
    console.log("");
    for (const [key, value] of Object.entries(config)) {
      const shown = key === "token" && typeof value === "string" ? `${value.slice(0, 8)}...` : String(value);
      console.log(`  ${chalk.dim(key)}: ${chalk.white(shown)}`);
    }
    console.log("");
    console.log(chalk.dim(`Config file: ${getConfigPath()}`));
    console.log(chalk.dim("Precedence: CLI flags > Environment variables > Config file > Defaults"));
    console.log("");
  }
);

program.parseAsync().catch((error: unknown) => {
  if (isMcsshError(error)) {
    printError(error.message);
  } else {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
});
