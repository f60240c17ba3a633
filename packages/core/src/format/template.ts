import { FormatError } from "../errors.js";

function renderArg(arg: unknown): string {
  if (arg === null || arg === undefined) return "";
  return String(arg);
}

/**
 * Fills `{0}`, `{1}`, ... placeholders. `{{` and `}}` produce literal braces.
 */
export function formatTemplate(template: string, args: readonly unknown[]): string {
  let out = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];

    if (ch === "}") {
      if (template[i + 1] === "}") {
        out += "}";
        i += 2;
        continue;
      }
      throw new FormatError(`Unexpected "}" at position ${i}`, template);
    }

    if (ch !== "{") {
      out += ch;
      i++;
      continue;
    }

    if (template[i + 1] === "{") {
      out += "{";
      i += 2;
      continue;
    }

    const close = template.indexOf("}", i + 1);
    if (close === -1) {
      throw new FormatError(`Unclosed "{" at position ${i}`, template);
    }

    const token = template.slice(i + 1, close);
    if (!/^\d+$/.test(token)) {
      throw new FormatError(`Invalid placeholder "{${token}}"`, template);
    }

    const index = Number(token);
    if (index >= args.length) {
      throw new FormatError(
        `Placeholder {${index}} has no argument (${args.length} given)`,
        template
      );
    }

    out += renderArg(args[index]);
    i = close + 1;
  }

  return out;
}
