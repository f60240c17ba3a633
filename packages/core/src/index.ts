// Writer
export { MessageWriter } from "./writer/message-writer.js";
export {
  TextMessageWriter,
  DEFAULT_LINE_LENGTH,
  MIN_LINE_LENGTH,
} from "./writer/text-message-writer.js";
export type { TextMessageWriterOptions } from "./writer/text-message-writer.js";
export { PREFIX_LENGTH, PFX_EXPECTED, PFX_ACTUAL, PFX_DIFFERENCE } from "./writer/prefixes.js";
export { StringSink, StreamSink, NEWLINE } from "./writer/sink.js";
export type { TextSink } from "./writer/sink.js";

// Comparison results
export { createComparisonResult } from "./result/comparison-result.js";
export type { ComparisonResult, ComparisonResultInit } from "./result/comparison-result.js";

// Value formatting
export {
  formatValue,
  formatCollection,
  quote,
  DEFAULT_MAX_ITEMS,
  FMT_NULL,
  FMT_UNDEFINED,
  FMT_EMPTY_COLLECTION,
} from "./format/value.js";
export { escapeControlChars, escapeNullCharacters } from "./format/escape.js";
export { formatTemplate } from "./format/template.js";

// Numerics
export { Duration } from "./numeric/duration.js";
export { Tolerance } from "./numeric/tolerance.js";
export type { ToleranceMode, ToleranceAmount } from "./numeric/tolerance.js";
export { difference, durationDifference, NOT_A_NUMBER } from "./numeric/difference.js";
export type { DifferenceResult } from "./numeric/difference.js";

// Types
export {
  describeType,
  needsTypeDisambiguation,
  resolveTypeNameDifference,
  typeLabels,
} from "./types/type-name.js";
export type { TypeNames } from "./types/type-name.js";

// Strings
export { findMismatchPosition } from "./strings/mismatch.js";
export { clipString, clipExpectedAndActual, caretLine, ELLIPSIS } from "./strings/clip.js";

// Convenience
export { explainDifferences, explainStringDifferences, explainResult } from "./explain.js";
export type { ExplainOptions, ExplainValuesOptions, ExplainStringsOptions } from "./explain.js";

// Errors
export { AssertDiffError, FormatError, ToleranceError, SinkError } from "./errors.js";
