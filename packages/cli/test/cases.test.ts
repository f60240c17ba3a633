import { describe, expect, it } from "vitest";
import { Duration, Tolerance } from "@assertdiff/core";
import { CaseFileError, parseCaseFile, parseLiteral, renderCase, reviveValue, toTolerance } from "../src/cases.js";

const defaults = { maxLineLength: 78, clip: true, ignoreCase: false };

describe("reviveValue", () => {
  it("revives tagged values", () => {
    expect(reviveValue({ $bigint: "-12" })).toBe(-12n);
    expect(reviveValue({ $date: "2024-01-02T03:04:05.000Z" })).toEqual(new Date("2024-01-02T03:04:05.000Z"));
    expect(reviveValue({ $duration: 250 })).toEqual(Duration.ofMilliseconds(250));
    expect(reviveValue({ $typed: "Int32Array", values: [1, 2] })).toEqual(new Int32Array([1, 2]));
  });

  it("walks arrays and objects", () => {
    expect(reviveValue([{ $bigint: "1" }, { nested: { $bigint: "2" } }])).toEqual([1n, { nested: 2n }]);
  });

  it("leaves untagged objects alone", () => {
    expect(reviveValue({ $bigint: "1", extra: true })).toEqual({ $bigint: "1", extra: true });
    expect(reviveValue({ $bigint: "one" })).toEqual({ $bigint: "one" });
  });
});

describe("parseLiteral", () => {
  it("reads JSON", () => {
    expect(parseLiteral("5")).toBe(5);
    expect(parseLiteral('"5"')).toBe("5");
    expect(parseLiteral("[1,2]")).toEqual([1, 2]);
    expect(parseLiteral('{"$bigint":"7"}')).toBe(7n);
  });

  it("keeps anything else as text", () => {
    expect(parseLiteral("hello")).toBe("hello");
  });
});

describe("toTolerance", () => {
  it("builds numeric and duration tolerances", () => {
    const linear = toTolerance({ amount: 0.5, mode: "Linear" });
    expect(linear).toBeInstanceOf(Tolerance);
    expect(linear.amount).toBe(0.5);

    const timed = toTolerance({ amount: { milliseconds: 20 }, mode: "Linear" });
    expect(timed.amount).toEqual(Duration.ofMilliseconds(20));
  });
});

describe("parseCaseFile", () => {
  it("fills in the default tolerance mode", () => {
    const cases = parseCaseFile(JSON.stringify([{ kind: "values", expected: 1, actual: 2, tolerance: { amount: 1 } }]));
    expect(cases).toEqual([{ kind: "values", expected: 1, actual: 2, tolerance: { amount: 1, mode: "Linear" } }]);
  });

  it("reports malformed JSON", () => {
    expect(() => parseCaseFile("[", "broken.json")).toThrow(CaseFileError);
    expect(() => parseCaseFile("[", "broken.json")).toThrow(/^Malformed JSON in broken\.json: /);
  });

  it("reports invalid cases with their path", () => {
    expect(() => parseCaseFile(JSON.stringify([{ kind: "strings", expected: "a", actual: 1 }]), "cases.json")).toThrow(
      /^Invalid cases in cases\.json: 0\.actual: /
    );
  });
});

describe("renderCase", () => {
  it("renders values with a tolerance", () => {
    const [failure] = parseCaseFile(
      JSON.stringify([{ kind: "values", expected: 5, actual: 6, tolerance: { amount: 0.05 } }])
    );
    expect(renderCase(failure, defaults)).toBe("  Expected: 5.0d +/- 0.05d\n  But was:  6.0d\n  Off by:   1.0d");
  });

  it("labels typed arrays that print alike", () => {
    const [failure] = parseCaseFile(
      JSON.stringify([
        {
          kind: "values",
          expected: { $typed: "Int32Array", values: [4] },
          actual: { $typed: "Uint8Array", values: [4] },
        },
      ])
    );
    expect(renderCase(failure, defaults)).toBe(
      "  Expected: < 4.0d > (Int32Array)\n  But was:  < 4.0d > (Uint8Array)"
    );
  });

  it("puts the case message first", () => {
    const [failure] = parseCaseFile(
      JSON.stringify([{ kind: "strings", message: "Greeting differs", expected: "abc", actual: "abd" }])
    );
    expect(renderCase(failure, defaults)).toBe(
      `  Greeting differs\n  Expected: "abc"\n  But was:  "abd"\n  ${"-".repeat(13)}^`
    );
  });

  it("clips long strings to the configured width", () => {
    const [failure] = parseCaseFile(
      JSON.stringify([{ kind: "strings", expected: `${"a".repeat(30)}X`, actual: `${"a".repeat(30)}Y` }])
    );
    expect(renderCase(failure, { ...defaults, maxLineLength: 40 }).split("\n")).toEqual([
      `  Expected: "...${"a".repeat(22)}X"`,
      `  But was:  "...${"a".repeat(22)}Y"`,
      `  ${"-".repeat(36)}^`,
    ]);
  });

  it("lets a case override the configured case sensitivity", () => {
    const [failure] = parseCaseFile(
      JSON.stringify([{ kind: "strings", expected: "ABC", actual: "abd", ignoreCase: true }])
    );
    expect(renderCase(failure, defaults)).toBe(
      `  Expected: "ABC", ignoring case\n  But was:  "abd"\n  ${"-".repeat(13)}^`
    );
  });
});
