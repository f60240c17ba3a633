import { z } from "zod";
import {
  AssertDiffError,
  Duration,
  Tolerance,
  explainDifferences,
  explainStringDifferences,
} from "@assertdiff/core";
import { formatIssues, type AssertDiffConfig } from "./config.js";

const typedArrayName = z.enum([
  "Int8Array",
  "Uint8Array",
  "Int16Array",
  "Uint16Array",
  "Int32Array",
  "Uint32Array",
  "Float32Array",
  "Float64Array",
]);

type TypedArrayName = z.infer<typeof typedArrayName>;

const TYPED_ARRAYS: Record<TypedArrayName, new (values: number[]) => object> = {
  Int8Array,
  Uint8Array,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
};

const bigintTag = z.object({ $bigint: z.string().regex(/^-?\d+$/) }).strict();
const dateTag = z.object({ $date: z.string() }).strict();
const durationTag = z.object({ $duration: z.number() }).strict();
const typedTag = z.object({ $typed: typedArrayName, values: z.array(z.number()) }).strict();

const toleranceSchema = z.object({
  amount: z.union([z.number(), z.object({ milliseconds: z.number() }).strict()]),
  mode: z.enum(["None", "Linear", "Percent", "Ulps"]).default("Linear"),
});

const valuesCase = z.object({
  kind: z.literal("values"),
  name: z.string().optional(),
  message: z.string().optional(),
  expected: z.unknown(),
  actual: z.unknown(),
  tolerance: toleranceSchema.optional(),
});

const stringsCase = z.object({
  kind: z.literal("strings"),
  name: z.string().optional(),
  message: z.string().optional(),
  expected: z.string(),
  actual: z.string(),
  ignoreCase: z.boolean().optional(),
  clip: z.boolean().optional(),
});

export const failureCaseSchema = z.discriminatedUnion("kind", [valuesCase, stringsCase]);
export const caseFileSchema = z.array(failureCaseSchema);

export type FailureCase = z.infer<typeof failureCaseSchema>;
export type ToleranceInput = z.infer<typeof toleranceSchema>;

export class CaseFileError extends AssertDiffError {}

/**
 * Turns the JSON spelling of values JSON cannot hold (`{"$bigint": "4"}`,
 * `{"$date": "..."}`, `{"$duration": 250}`, `{"$typed": "Int32Array", "values": [4]}`)
 * into the real thing, recursively.
 */
export function reviveValue(raw: unknown): unknown {
  if (Array.isArray(raw)) return raw.map(reviveValue);
  if (typeof raw !== "object" || raw === null) return raw;

  const big = bigintTag.safeParse(raw);
  if (big.success) return BigInt(big.data.$bigint);

  const date = dateTag.safeParse(raw);
  if (date.success) return new Date(date.data.$date);

  const duration = durationTag.safeParse(raw);
  if (duration.success) return Duration.ofMilliseconds(duration.data.$duration);

  const typed = typedTag.safeParse(raw);
  if (typed.success) return new TYPED_ARRAYS[typed.data.$typed](typed.data.values);

  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, reviveValue(value)]));
}

/** Reads a command-line value as JSON when it is JSON, otherwise as a string. */
export function parseLiteral(text: string): unknown {
  try {
    return reviveValue(JSON.parse(text));
  } catch {
    return text;
  }
}

export function toTolerance(input: ToleranceInput): Tolerance {
  const amount = typeof input.amount === "number" ? input.amount : Duration.ofMilliseconds(input.amount.milliseconds);
  return new Tolerance(amount, input.mode);
}

export function parseCaseFile(text: string, source = "input"): FailureCase[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new CaseFileError(`Malformed JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = caseFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CaseFileError(`Invalid cases in ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function renderCase(failure: FailureCase, config: AssertDiffConfig): string {
  if (failure.kind === "strings") {
    return explainStringDifferences(failure.expected, failure.actual, {
      ignoreCase: failure.ignoreCase ?? config.ignoreCase,
      clip: failure.clip ?? config.clip,
      maxLineLength: config.maxLineLength,
      message: failure.message,
    });
  }

  return explainDifferences(reviveValue(failure.expected), reviveValue(failure.actual), {
    tolerance: failure.tolerance ? toTolerance(failure.tolerance) : undefined,
    maxLineLength: config.maxLineLength,
    message: failure.message,
  });
}
