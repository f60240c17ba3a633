import type { ComparisonResult } from "./result/comparison-result.js";
import type { Tolerance } from "./numeric/tolerance.js";
import { findMismatchPosition } from "./strings/mismatch.js";
import { StringSink } from "./writer/sink.js";
import { TextMessageWriter } from "./writer/text-message-writer.js";

export interface ExplainOptions {
  maxLineLength?: number;
  /** Line written above the differences. */
  message?: string;
  messageArgs?: unknown[];
}

export interface ExplainValuesOptions extends ExplainOptions {
  tolerance?: Tolerance;
}

export interface ExplainStringsOptions extends ExplainOptions {
  ignoreCase?: boolean;
  /** Defaults to true. */
  clip?: boolean;
}

function render(options: ExplainOptions, draw: (writer: TextMessageWriter) => void): string {
  const sink = new StringSink();
  const writer = new TextMessageWriter({
    sink,
    maxLineLength: options.maxLineLength,
    userMessage: options.message,
    userMessageArgs: options.messageArgs,
  });
  draw(writer);
  return sink.lines().join("\n");
}

export function explainDifferences(
  expected: unknown,
  actual: unknown,
  options: ExplainValuesOptions = {}
): string {
  return render(options, (writer) => writer.displayDifferences(expected, actual, options.tolerance));
}

export function explainStringDifferences(
  expected: string,
  actual: string,
  options: ExplainStringsOptions = {}
): string {
  const ignoreCase = options.ignoreCase ?? false;
  const mismatch = findMismatchPosition(expected, actual, 0, ignoreCase);

  return render(options, (writer) =>
    writer.displayStringDifferences(expected, actual, mismatch, ignoreCase, options.clip ?? true)
  );
}

export function explainResult(result: ComparisonResult, options: ExplainOptions = {}): string {
  return render(options, (writer) => writer.displayDifferences(result));
}
