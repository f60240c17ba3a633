import type { ComparisonResult } from "../result/comparison-result.js";
import { escapeControlChars, escapeNullCharacters } from "../format/escape.js";
import { formatTemplate } from "../format/template.js";
import { formatCollection, formatValue, quote } from "../format/value.js";
import { difference } from "../numeric/difference.js";
import type { Tolerance } from "../numeric/tolerance.js";
import { ELLIPSIS, caretLine, clipExpectedAndActual } from "../strings/clip.js";
import { findMismatchPosition } from "../strings/mismatch.js";
import { needsTypeDisambiguation, typeLabels } from "../types/type-name.js";
import { MessageWriter } from "./message-writer.js";
import { PFX_ACTUAL, PFX_DIFFERENCE, PFX_EXPECTED, PREFIX_LENGTH } from "./prefixes.js";
import type { TextSink } from "./sink.js";

export const DEFAULT_LINE_LENGTH = 78;

/** Room for the prefix, both quotes and an ellipsis at each end of a clipped value. */
export const MIN_LINE_LENGTH = PREFIX_LENGTH + 2 + 2 * ELLIPSIS.length + 1;

// Two quotation marks around a displayed string.
const QUOTES_LENGTH = 2;

type RenderState =
  | { kind: "idle" }
  | { kind: "rendering"; expectedLabel: string; actualLabel: string };

const IDLE: RenderState = { kind: "idle" };

export interface TextMessageWriterOptions {
  sink?: TextSink;
  maxLineLength?: number;
  /** Written as the first line, before any differences. */
  userMessage?: string;
  userMessageArgs?: unknown[];
}

/**
 * Writes failure messages in the standard layout:
 *
 * ```
 *   Expected: 5.0d +/- 0.05d
 *   But was:  6.0d
 *   Off by:   1.0d
 * ```
 *
 * One instance renders one failure at a time; it keeps per-call state and is
 * not meant to be shared between concurrent renderings.
 */
export class TextMessageWriter extends MessageWriter {
  private lineLength = DEFAULT_LINE_LENGTH;
  private state: RenderState = IDLE;

  constructor(options: TextMessageWriterOptions = {}) {
    super(options.sink);

    if (options.maxLineLength !== undefined) {
      this.maxLineLength = options.maxLineLength;
    }

    if (options.userMessage) {
      this.writeMessageLine(options.userMessage, ...(options.userMessageArgs ?? []));
    }
  }

  get maxLineLength(): number {
    return this.lineLength;
  }

  set maxLineLength(value: number) {
    if (!Number.isInteger(value) || value < MIN_LINE_LENGTH) {
      throw new RangeError(`maxLineLength must be an integer >= ${MIN_LINE_LENGTH}, got ${value}`);
    }
    this.lineLength = value;
  }

  protected writeMessageLineAt(level: number, message: string, args: readonly unknown[]): void {
    // Resolve the template first so a bad one leaves no partial line behind.
    const text = args.length > 0 ? formatTemplate(message, args) : message;

    this.write("  ".repeat(Math.max(0, level + 1)));
    this.writeLine(escapeNullCharacters(text));
  }

  displayDifferences(result: ComparisonResult): void;
  displayDifferences(expected: unknown, actual: unknown, tolerance?: Tolerance): void;
  displayDifferences(
    ...args: [result: ComparisonResult] | [expected: unknown, actual: unknown, tolerance?: Tolerance]
  ): void {
    this.state = IDLE;
    try {
      if (args.length === 1) {
        this.displayResultDifferences(args[0]);
      } else {
        const [expected, actual, tolerance] = args;
        this.displayValueDifferences(expected, actual, tolerance);
      }
    } finally {
      this.state = IDLE;
    }
  }

  displayStringDifferences(
    expected: string,
    actual: string,
    mismatch: number,
    ignoreCase: boolean,
    clipping: boolean
  ): void {
    this.state = IDLE;

    const maxDisplayLength = this.maxLineLength - PREFIX_LENGTH - QUOTES_LENGTH;

    const [clippedExpected, clippedActual] = clipping
      ? clipExpectedAndActual(expected, actual, maxDisplayLength, mismatch)
      : [expected, actual];

    const shownExpected = escapeControlChars(clippedExpected);
    const shownActual = escapeControlChars(clippedActual);

    // Clipping and escaping both move characters, so look again.
    const position = findMismatchPosition(shownExpected, shownActual, 0, ignoreCase);

    this.write(PFX_EXPECTED);
    this.write(quote(shownExpected));
    if (ignoreCase) this.write(", ignoring case");
    this.writeLine();

    this.write(PFX_ACTUAL);
    this.write(quote(shownActual));
    this.writeLine();

    if (position >= 0) this.writeLine(caretLine(position));
  }

  writeActualValue(actual: unknown): void {
    this.writeValue(actual);
  }

  writeValue(value: unknown): void {
    this.write(formatValue(value));
  }

  writeCollectionElements(collection: Iterable<unknown>, start: number, max: number): void {
    this.write(formatCollection(collection, start, max));
  }

  private displayResultDifferences(result: ComparisonResult): void {
    this.write(PFX_EXPECTED);
    this.writeLine(result.description);

    this.write(PFX_ACTUAL);
    result.writeActualValueTo(this);
    this.writeLine();

    result.writeAdditionalLinesTo(this);
  }

  private displayValueDifferences(expected: unknown, actual: unknown, tolerance: Tolerance | undefined): void {
    if (needsTypeDisambiguation(expected, actual)) {
      const [expectedLabel, actualLabel] = typeLabels(expected, actual);
      this.state = { kind: "rendering", expectedLabel, actualLabel };
    }

    this.writeExpectedLine(expected, tolerance);
    this.writeActualLine(actual);
    if (tolerance) this.writeDifferenceLine(expected, actual, tolerance);
  }

  private writeExpectedLine(expected: unknown, tolerance: Tolerance | undefined): void {
    this.write(PFX_EXPECTED);
    this.write(formatValue(expected));
    if (this.state.kind === "rendering") this.write(this.state.expectedLabel);

    if (tolerance?.hasVariance) {
      this.write(" +/- ");
      this.write(formatValue(tolerance.amount));
      if (tolerance.mode !== "Linear") this.write(` ${tolerance.mode}`);
    }

    this.writeLine();
  }

  private writeActualLine(actual: unknown): void {
    this.write(PFX_ACTUAL);
    this.writeActualValue(actual);
    if (this.state.kind === "rendering") this.write(this.state.actualLabel);
    this.writeLine();
  }

  private writeDifferenceLine(expected: unknown, actual: unknown, tolerance: Tolerance): void {
    // Only an absolute or relative distance means anything to a reader.
    if (tolerance.mode !== "Linear" && tolerance.mode !== "Percent") return;

    const result = difference(expected, actual, tolerance.mode);
    if (result.kind === "not-a-number") return;

    this.write(PFX_DIFFERENCE);
    this.write(formatValue(result.value));
    if (tolerance.mode !== "Linear") this.write(` ${tolerance.mode}`);
    this.writeLine();
  }
}
