import chalk from "chalk";

// Single-quotes an argument for a POSIX shell unless it is already safe.
export function shellQuote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function printHeader(title: string): void {
  console.log("");
  console.log(chalk.bold.blue(`═══ ${title} ═══`));
  console.log("");
}

export function printKeyValue(key: string, value: string): void {
  console.log(`  ${chalk.dim(key)}: ${chalk.white(value)}`);
}

export function printCommand(args: string[]): void {
  console.log(`  ${chalk.cyan(args.map(shellQuote).join(" "))}`);
}

export function printError(message: string): void {
  console.error(chalk.red(`  ✗ ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(chalk.blue(`  ℹ ${message}`));
}

export function printJson(value: unknown): void {
  for (const line of JSON.stringify(value, null, 2).split("\n")) {
    console.log(`    ${line}`);
  }
}
