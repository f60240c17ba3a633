import { Tolerance, explainDifferences } from "@assertdiff/core";
import { loadConfig } from "../config.js";
import { parseLiteral } from "../cases.js";
import { printBlock } from "../output.js";

export interface ValuesOptions {
  tolerance?: number;
  percent?: boolean;
  width?: number;
  cwd?: string;
}

export async function runValues(expected: string, actual: string, options: ValuesOptions): Promise<void> {
  const { config } = await loadConfig(options.cwd);

  let tolerance: Tolerance | undefined;
  if (options.tolerance !== undefined) {
    tolerance = new Tolerance(options.tolerance, options.percent ? "Percent" : "Linear");
  }

  printBlock(
    explainDifferences(parseLiteral(expected), parseLiteral(actual), {
      tolerance,
      maxLineLength: options.width ?? config.maxLineLength,
    })
  );
}
