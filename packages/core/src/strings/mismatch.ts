/**
 * Index of the first character at or after `start` where the strings differ.
 * When one string is a prefix of the other the shorter length is returned,
 * since that is where they stop agreeing. Equal strings give -1.
 */
export function findMismatchPosition(
  expected: string,
  actual: string,
  start: number,
  ignoreCase: boolean
): number {
  const length = Math.min(expected.length, actual.length);

  let i = Math.max(0, start);
  while (i < length) {
    const a = expected.codePointAt(i) ?? 0;
    const b = actual.codePointAt(i) ?? 0;
    if (a !== b && !(ignoreCase && sameIgnoringCase(a, b))) return i;
    i += a > 0xffff ? 2 : 1;
  }

  if (expected.length !== actual.length) return length;

  return -1;
}

// Folds one character at a time so indexes stay those of the displayed text.
function sameIgnoringCase(a: number, b: number): boolean {
  return String.fromCodePoint(a).toLowerCase() === String.fromCodePoint(b).toLowerCase();
}
