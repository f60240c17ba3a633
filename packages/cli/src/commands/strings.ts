import { explainStringDifferences } from "@assertdiff/core";
import { loadConfig } from "../config.js";
import { printBlock } from "../output.js";

export interface StringsOptions {
  ignoreCase?: boolean;
  clip?: boolean;
  width?: number;
  cwd?: string;
}

export async function runStrings(expected: string, actual: string, options: StringsOptions): Promise<void> {
  const { config } = await loadConfig(options.cwd);

  printBlock(
    explainStringDifferences(expected, actual, {
      ignoreCase: options.ignoreCase ?? config.ignoreCase,
      clip: options.clip ?? config.clip,
      maxLineLength: options.width ?? config.maxLineLength,
    })
  );
}
