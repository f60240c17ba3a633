import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { AssertDiffError, DEFAULT_LINE_LENGTH, MIN_LINE_LENGTH } from "@assertdiff/core";

export const configSchema = z
  .object({
    maxLineLength: z.number().int().min(MIN_LINE_LENGTH).default(DEFAULT_LINE_LENGTH),
    clip: z.boolean().default(true),
    ignoreCase: z.boolean().default(false),
  })
  .strict();

export type AssertDiffConfig = z.output<typeof configSchema>;
export type AssertDiffConfigInput = z.input<typeof configSchema>;

export interface LoadedConfig {
  config: AssertDiffConfig;
  /** Absent when no config file was found and defaults apply. */
  filepath?: string;
}

export class ConfigError extends AssertDiffError {}

export function defineConfig(config: AssertDiffConfigInput): AssertDiffConfigInput {
  return config;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export async function loadConfig(searchFrom?: string): Promise<LoadedConfig> {
  const explorer = cosmiconfig("assertdiff", {
    searchPlaces: [
      "package.json",
      "assertdiff.config.js",
      "assertdiff.config.mjs",
      "assertdiff.config.json",
      ".assertdiffrc",
      ".assertdiffrc.json",
    ],
  });

  const result = searchFrom ? await explorer.search(searchFrom) : await explorer.search();

  if (!result || result.isEmpty) {
    return { config: configSchema.parse({}) };
  }

  const parsed = configSchema.safeParse(result.config);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${result.filepath}: ${formatIssues(parsed.error)}`);
  }

  return { config: parsed.data, filepath: result.filepath };
}
