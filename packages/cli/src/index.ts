#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { runExplain, type ExplainOptions } from "./commands/explain.js";
import { runStrings, type StringsOptions } from "./commands/strings.js";
import { runValues, type ValuesOptions } from "./commands/values.js";
import { reportError } from "./output.js";

const require = createRequire(import.meta.url);

function readVersion(): string {
  if (process.env.ASSERTDIFF_CLI_VERSION) return process.env.ASSERTDIFF_CLI_VERSION;
  // src/ and dist/ both sit one level below the package manifest.
  const pkg: unknown = require("../package.json");
  const version: unknown = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

const program = new Command();

program
  .name("assertdiff")
  .description("Render Expected / But was failure messages")
  .version(readVersion());

program
  .command("values")
  .description("Show how two values differ, optionally under a tolerance")
  .argument("<expected>", "Expected value (JSON, or plain text)")
  .argument("<actual>", "Actual value (JSON, or plain text)")
  .option("--tolerance <n>", "Allowed deviation", parseNumber)
  .option("--percent", "Read the tolerance as a percentage of the expected value")
  .option("--width <n>", "Maximum line length", parseInteger)
  .action(async (expected: string, actual: string, options: ValuesOptions) => {
    await runValues(expected, actual, {
      tolerance: options.tolerance,
      percent: options.percent,
      width: options.width,
    });
  });

program
  .command("strings")
  .description("Show where two strings start to differ")
  .argument("<expected>", "Expected string")
  .argument("<actual>", "Actual string")
  .option("--ignore-case", "Compare case-insensitively")
  .option("--no-clip", "Show long strings in full")
  .option("--width <n>", "Maximum line length", parseInteger)
  .action(async (expected: string, actual: string, options: StringsOptions, command: Command) => {
    await runStrings(expected, actual, {
      ignoreCase: options.ignoreCase,
      // --no-clip always yields a value; only an explicit flag overrides the config.
      clip: command.getOptionValueSource("clip") === "cli" ? options.clip : undefined,
      width: options.width,
    });
  });

program
  .command("explain")
  .description("Render every failure case in a JSON file")
  .argument("<file>", "JSON array of failure cases")
  .option("--width <n>", "Maximum line length", parseInteger)
  .action(async (file: string, options: ExplainOptions) => {
    await runExplain(file, { width: options.width });
  });

program.parseAsync().catch(reportError);
