import { formatValue } from "../format/value.js";

/** The names a value's type can be displayed under, shortest first. */
export interface TypeNames {
  short: string;
  qualified: string;
  full: string;
}

function ancestry(value: object): string[] {
  const names: string[] = [];
  let proto: unknown = Object.getPrototypeOf(value);

  while (typeof proto === "object" && proto !== null && proto !== Object.prototype) {
    const ctor: unknown = Reflect.get(proto, "constructor");
    names.push(typeof ctor === "function" && ctor.name.length > 0 ? ctor.name : "anonymous");
    proto = Object.getPrototypeOf(proto);
  }

  return names;
}

function toStringTag(value: object): string {
  // "[object Foo]" -> "Foo"
  return Object.prototype.toString.call(value).slice(8, -1);
}

export function describeType(value: unknown): TypeNames {
  if (value === null || (typeof value !== "object" && typeof value !== "function")) {
    const name = value === null ? "null" : typeof value;
    return { short: name, qualified: name, full: name };
  }

  const chain = ancestry(value);
  const short = chain[0] ?? "Object";
  const qualified = chain.length > 1 ? [...chain].reverse().join(".") : short;
  const tag = toStringTag(value);
  const full = tag === short || tag === "Object" ? qualified : `${qualified}[${tag}]`;

  return { short, qualified, full };
}

function sameRuntimeType(a: unknown, b: unknown): boolean {
  if (typeof a !== typeof b) return false;
  if (typeof a !== "object" || a === null || b === null) return true;
  return Object.getPrototypeOf(a) === Object.getPrototypeOf(b);
}

/**
 * True when both values print the same but are of different types, the case
 * where the failure message has to name the types to make sense.
 */
export function needsTypeDisambiguation(expected: unknown, actual: unknown): boolean {
  if (expected === null || expected === undefined) return false;
  if (actual === null || actual === undefined) return false;
  if (sameRuntimeType(expected, actual)) return false;
  return formatValue(expected) === formatValue(actual);
}

/**
 * Shortest pair of type names that tells the two values apart. Falls back to
 * the full names, which may still be equal for types generated at run time.
 */
export function resolveTypeNameDifference(expected: unknown, actual: unknown): [string, string] {
  const e = describeType(expected);
  const a = describeType(actual);

  if (e.short !== a.short) return [e.short, a.short];
  if (e.qualified !== a.qualified) return [e.qualified, a.qualified];
  return [e.full, a.full];
}

export function typeLabels(expected: unknown, actual: unknown): [string, string] {
  const [expectedType, actualType] = resolveTypeNameDifference(expected, actual);
  return [` (${expectedType})`, ` (${actualType})`];
}
