import { PREFIX_LENGTH } from "../writer/prefixes.js";

export const ELLIPSIS = "...";

/** True when `index` falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const at = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && at >= 0xdc00 && at <= 0xdfff;
}

/**
 * Cuts `text` to at most `maxLength` characters starting at `clipStart`,
 * marking removed content on either side with an ellipsis. A window edge
 * that would split a surrogate pair moves inward.
 */
export function clipString(text: string, maxLength: number, clipStart: number): string {
  let clipLength = maxLength;
  let out = "";

  if (clipStart > 0) {
    clipLength -= ELLIPSIS.length;
    out += ELLIPSIS;
  }

  const start = splitsSurrogatePair(text, clipStart) ? clipStart + 1 : clipStart;

  if (text.length - start > clipLength) {
    clipLength -= ELLIPSIS.length;
    let end = start + clipLength;
    if (splitsSurrogatePair(text, end)) end--;
    return out + text.slice(start, end) + ELLIPSIS;
  }

  return out + text.slice(start);
}

/**
 * Clips both strings to the same window so that the mismatch stays on
 * screen. The window prefers showing the tail of the longer string and only
 * moves back to centre on the mismatch when the tail would hide it.
 */
export function clipExpectedAndActual(
  expected: string,
  actual: string,
  maxDisplayLength: number,
  mismatch: number
): [string, string] {
  const longest = Math.max(expected.length, actual.length);
  if (longest <= maxDisplayLength) return [expected, actual];

  const clipLength = maxDisplayLength - ELLIPSIS.length;
  let clipStart = longest - clipLength;

  if (clipStart > mismatch) {
    clipStart = Math.max(0, mismatch - Math.floor(clipLength / 2));
  }

  return [
    clipString(expected, maxDisplayLength, clipStart),
    clipString(actual, maxDisplayLength, clipStart),
  ];
}

/**
 * The line pointing at `mismatch` in a quoted value that follows a prefix:
 * two blanks, then dashes up to the column of the mismatching character.
 */
export function caretLine(mismatch: number): string {
  return `  ${"-".repeat(PREFIX_LENGTH + mismatch - 1)}^`;
}
