import type { ComparisonResult } from "../result/comparison-result.js";
import type { Tolerance } from "../numeric/tolerance.js";
import { StringSink, type TextSink } from "./sink.js";

/**
 * Line-oriented writer for assertion failure messages. Subclasses decide how
 * values and differences are laid out; this class owns the sink.
 */
export abstract class MessageWriter {
  readonly sink: TextSink;

  protected constructor(sink: TextSink = new StringSink()) {
    this.sink = sink;
  }

  abstract get maxLineLength(): number;
  abstract set maxLineLength(value: number);

  write(text: string): void {
    this.sink.write(text);
  }

  writeLine(text?: string): void {
    this.sink.writeLine(text);
  }

  /** Writes one message line at indentation level 0. */
  writeMessageLine(message: string, ...args: unknown[]): void;
  /**
   * Indents by `level + 1` steps of two spaces, so level 0 lines up with the
   * `Expected:` prefix and level 1 sits two columns deeper.
   */
  writeMessageLine(level: number, message: string, ...args: unknown[]): void;
  writeMessageLine(levelOrMessage: number | string, ...rest: unknown[]): void {
    if (typeof levelOrMessage === "string") {
      this.writeMessageLineAt(0, levelOrMessage, rest);
      return;
    }

    const [message, ...args] = rest;
    if (typeof message !== "string") {
      throw new TypeError("writeMessageLine(level, message) requires a message string");
    }
    this.writeMessageLineAt(levelOrMessage, message, args);
  }

  protected abstract writeMessageLineAt(level: number, message: string, args: readonly unknown[]): void;

  abstract displayDifferences(result: ComparisonResult): void;
  abstract displayDifferences(expected: unknown, actual: unknown, tolerance?: Tolerance): void;

  abstract displayStringDifferences(
    expected: string,
    actual: string,
    mismatch: number,
    ignoreCase: boolean,
    clipping: boolean
  ): void;

  abstract writeActualValue(actual: unknown): void;

  abstract writeValue(value: unknown): void;

  abstract writeCollectionElements(collection: Iterable<unknown>, start: number, max: number): void;
}
