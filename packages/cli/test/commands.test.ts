import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runExplain } from "../src/commands/explain.js";
import { runStrings } from "../src/commands/strings.js";
import { runValues } from "../src/commands/values.js";
import { CaseFileError } from "../src/cases.js";

function captureLog() {
  return vi.spyOn(console, "log").mockImplementation(() => {});
}

describe("commands", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "assertdiff-cli-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("values prints the block for two literals", async () => {
    const log = captureLog();
    await runValues("5", "6", { tolerance: 0.05, cwd: dir });
    expect(log).toHaveBeenCalledWith("  Expected: 5.0d +/- 0.05d\n  But was:  6.0d\n  Off by:   1.0d");
  });

  it("values reads the tolerance as a percentage on request", async () => {
    const log = captureLog();
    await runValues("200", "210", { tolerance: 10, percent: true, cwd: dir });
    expect(log).toHaveBeenCalledWith(
      "  Expected: 200.0d +/- 10.0d Percent\n  But was:  210.0d\n  Off by:   5.0d Percent"
    );
  });

  it("values keeps integers and doubles apart", async () => {
    const log = captureLog();
    await runValues('{"$bigint":"4"}', "4", { cwd: dir });
    expect(log).toHaveBeenCalledWith("  Expected: 4\n  But was:  4.0d");
  });

  it("strings prints the caret under the first difference", async () => {
    const log = captureLog();
    await runStrings("abc", "abd", { cwd: dir });
    expect(log).toHaveBeenCalledWith(`  Expected: "abc"\n  But was:  "abd"\n  ${"-".repeat(13)}^`);
  });

  it("strings takes the width from the config file", async () => {
    const log = captureLog();
    await writeFile(join(dir, ".assertdiffrc.json"), JSON.stringify({ maxLineLength: 40 }));
    await runStrings(`${"a".repeat(30)}X`, `${"a".repeat(30)}Y`, { cwd: dir });
    expect(log).toHaveBeenCalledWith(
      `  Expected: "...${"a".repeat(22)}X"\n  But was:  "...${"a".repeat(22)}Y"\n  ${"-".repeat(36)}^`
    );
  });

  it("explain renders each case in the file", async () => {
    const log = captureLog();
    await writeFile(
      join(dir, "cases.json"),
      JSON.stringify([
        { kind: "values", name: "count", expected: 1, actual: 2 },
        { kind: "strings", expected: "abc", actual: "abd" },
      ])
    );

    await runExplain("cases.json", { cwd: dir });

    expect(log).toHaveBeenCalledWith("  Expected: 1.0d\n  But was:  2.0d");
    expect(log).toHaveBeenCalledWith(`  Expected: "abc"\n  But was:  "abd"\n  ${"-".repeat(13)}^`);
  });

  it("explain rejects a malformed file", async () => {
    await writeFile(join(dir, "cases.json"), "{ nope");
    await expect(runExplain("cases.json", { cwd: dir })).rejects.toThrow(CaseFileError);
  });
});
