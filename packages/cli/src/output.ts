import chalk from "chalk";

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold(`  assertdiff — ${title}`));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();
}

export function printBlock(text: string): void {
  console.log(text);
}

export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`  Error: ${message}`));
  process.exitCode = 1;
}
