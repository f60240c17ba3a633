const NAMED_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\0": "\\0",
  "\x07": "\\a",
  "\b": "\\b",
  "\t": "\\t",
  "\n": "\\n",
  "\v": "\\v",
  "\f": "\\f",
  "\r": "\\r",
};

function needsHexEscape(code: number): boolean {
  return code < 0x20 || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

function hexEscape(code: number): string {
  return `\\x${code.toString(16).padStart(4, "0")}`;
}

/**
 * Replaces control characters with a visible escape so a rendered value
 * always stays on one line. Backslashes are doubled.
 */
export function escapeControlChars(text: string): string {
  let out = "";
  for (const ch of text) {
    const named = NAMED_ESCAPES[ch];
    if (named !== undefined) {
      out += named;
      continue;
    }
    const code = ch.charCodeAt(0);
    out += needsHexEscape(code) ? hexEscape(code) : ch;
  }
  return out;
}

export function escapeNullCharacters(text: string): string {
  return text.replace(/\0/g, "\\0");
}
