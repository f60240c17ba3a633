import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, defineConfig, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "assertdiff-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when no file exists", async () => {
    const loaded = await loadConfig(dir);
    expect(loaded.config).toEqual({ maxLineLength: 78, clip: true, ignoreCase: false });
    expect(loaded.filepath).toBeUndefined();
  });

  it("reads an rc file and fills in the rest", async () => {
    await writeFile(join(dir, ".assertdiffrc.json"), JSON.stringify({ maxLineLength: 40 }));

    const loaded = await loadConfig(dir);
    expect(loaded.config).toEqual({ maxLineLength: 40, clip: true, ignoreCase: false });
    expect(loaded.filepath).toBe(join(dir, ".assertdiffrc.json"));
  });

  it("reads the assertdiff key of package.json", async () => {
    await writeFile(
      join(dir, "package.json"),
      JSON.stringify({ name: "sample", assertdiff: { clip: false, ignoreCase: true } })
    );

    const { config } = await loadConfig(dir);
    expect(config).toEqual({ maxLineLength: 78, clip: false, ignoreCase: true });
  });

  it("rejects a line length the writer cannot honour", async () => {
    await writeFile(join(dir, ".assertdiffrc.json"), JSON.stringify({ maxLineLength: 10 }));

    await expect(loadConfig(dir)).rejects.toThrow(ConfigError);
    await expect(loadConfig(dir)).rejects.toThrow(/maxLineLength:/);
  });

  it("rejects unknown keys", async () => {
    await writeFile(join(dir, ".assertdiffrc.json"), JSON.stringify({ colour: "red" }));

    await expect(loadConfig(dir)).rejects.toThrow(/\(root\): Unrecognized key/);
  });
});

describe("defineConfig", () => {
  it("returns its argument", () => {
    const config = { maxLineLength: 100 };
    expect(defineConfig(config)).toBe(config);
  });
});
