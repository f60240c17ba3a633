import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import chalk from "chalk";
import { loadConfig } from "../config.js";
import { parseCaseFile, renderCase } from "../cases.js";
import { printBlock, printHeader } from "../output.js";

export interface ExplainOptions {
  width?: number;
  cwd?: string;
}

export async function runExplain(file: string, options: ExplainOptions): Promise<void> {
  const { config } = await loadConfig(options.cwd);
  const effective = { ...config, maxLineLength: options.width ?? config.maxLineLength };

  const path = resolve(options.cwd ?? process.cwd(), file);
  const cases = parseCaseFile(await readFile(path, "utf8"), basename(path));

  printHeader("explain");

  if (cases.length === 0) {
    console.log(chalk.yellow("  No cases in file."));
    console.log();
    return;
  }

  cases.forEach((failure, index) => {
    console.log(chalk.red(`  ✗ ${failure.name ?? `case ${index + 1}`}`));
    printBlock(renderCase(failure, effective));
    console.log();
  });

  console.log(chalk.dim(`  ${cases.length} case(s) rendered`));
  console.log();
}
