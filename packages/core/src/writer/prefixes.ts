/** Width of every line prefix, including the two leading blanks. */
export const PREFIX_LENGTH = 12;

const LEAD = "  ";

function linePrefix(label: string): string {
  const width = PREFIX_LENGTH - LEAD.length;
  // At least one blank has to separate the label from the value.
  if (label.length >= width) {
    throw new RangeError(`Prefix label "${label}" does not fit in ${width} columns`);
  }
  return LEAD + label.padEnd(width);
}

export const PFX_EXPECTED = linePrefix("Expected:");
export const PFX_ACTUAL = linePrefix("But was:");
export const PFX_DIFFERENCE = linePrefix("Off by:");
