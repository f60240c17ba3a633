import { Duration } from "../numeric/duration.js";
import { escapeControlChars } from "./escape.js";

export const DEFAULT_MAX_ITEMS = 10;

export const FMT_NULL = "null";
export const FMT_UNDEFINED = "undefined";
export const FMT_EMPTY_COLLECTION = "<empty>";

const DOUBLE_SUFFIX = "d";

/** Wraps text that is already escaped in display quotes. */
export function quote(escaped: string): string {
  return `"${escaped}"`;
}

function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Object.is(value, -0)) return `-0.0${DOUBLE_SUFFIX}`;

  const text = String(value);
  // Integral doubles keep a fractional digit so they read differently from bigints.
  const needsFraction = !text.includes(".") && !text.includes("e");
  return `${text}${needsFraction ? ".0" : ""}${DOUBLE_SUFFIX}`;
}

function safeJson(value: unknown): string {
  try {
    const s = JSON.stringify(value, (_k, v: unknown) =>
      typeof v === "bigint" ? `${v.toString()}n` : v
    );
    return s ?? String(value);
  } catch {
    return String(value);
  }
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasOwnToString(value: object): boolean {
  return value.toString !== Object.prototype.toString;
}

function constructorName(value: object): string {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return "Object";
  const ctor: unknown = Reflect.get(proto, "constructor");
  if (typeof ctor === "function" && ctor.name.length > 0) return ctor.name;
  return "Object";
}

function isIterable(value: object): value is Iterable<unknown> {
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

function formatMapEntry(entry: unknown): string {
  if (Array.isArray(entry) && entry.length === 2) {
    return `[${formatValue(entry[0])}, ${formatValue(entry[1])}]`;
  }
  return formatValue(entry);
}

function formatElements(
  elements: Iterable<unknown>,
  start: number,
  max: number,
  formatItem: (item: unknown) => string
): string {
  let index = 0;
  let count = 0;
  let truncated = false;
  const parts: string[] = [];

  for (const item of elements) {
    if (index++ < start) continue;
    if (count === max) {
      truncated = true;
      break;
    }
    count++;
    parts.push(formatItem(item));
  }

  if (count === 0 && !truncated) return FMT_EMPTY_COLLECTION;
  return `< ${parts.join(", ")}${truncated ? "..." : ""} >`;
}

/**
 * Renders the elements of `collection` from `start`, at most `max` of them.
 * The iterable is walked once and left untouched, so one-shot generators work.
 */
export function formatCollection(
  collection: Iterable<unknown>,
  start = 0,
  max = DEFAULT_MAX_ITEMS
): string {
  if (collection instanceof Map) {
    return formatElements(collection, start, max, formatMapEntry);
  }
  return formatElements(collection, start, max, formatValue);
}

function formatObject(value: object): string {
  if (value instanceof Duration) return value.toString();

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }

  if (value instanceof Error) return `<${value.name}: ${value.message}>`;

  if (isIterable(value)) return formatCollection(value);

  if (isPlainObject(value)) return `<${safeJson(value)}>`;

  if (hasOwnToString(value)) return `<${String(value)}>`;

  return `<${constructorName(value)} ${safeJson(value)}>`;
}

export function formatValue(value: unknown): string {
  if (value === null) return FMT_NULL;
  if (value === undefined) return FMT_UNDEFINED;
  if (typeof value === "string") return quote(escapeControlChars(value));
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "function") {
    return value.name.length > 0 ? `<function ${value.name}>` : "<function>";
  }
  if (typeof value === "object") return formatObject(value);
  return String(value);
}
