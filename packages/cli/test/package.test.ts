/**
 * Published layout: bin and exports name the files the build emits from src/
 */

import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

const Manifest = z.object({
  bin: z.record(z.string()).optional(),
  exports: z.object({
    ".": z.object({ types: z.string(), import: z.string(), default: z.string() }),
  }),
});

const BuildConfig = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(url: URL): unknown {
  return JSON.parse(readFileSync(url, "utf-8"));
}

const packages = [
  { name: "cli", root: new URL("../", import.meta.url) },
  { name: "sdk", root: new URL("../../sdk/", import.meta.url) },
];

describe("package layout", () => {
  it.each(packages)("should build $name from src/ into dist/ at the same depth", ({ root }) => {
    const { compilerOptions } = BuildConfig.parse(readJson(new URL("tsconfig.build.json", root)));
    expect(compilerOptions).toMatchObject({ rootDir: "src", outDir: "dist" });
  });

  it.each(packages)("should export built code whose source is the types entry for $name", ({ root }) => {
    const entry = Manifest.parse(readJson(new URL("package.json", root))).exports["."];

    expect(entry.default).toBe(entry.import);
    expect(entry.import.replace(/^\.\/dist\//, "./src/").replace(/\.js$/, ".ts")).toBe(entry.types);
    expect(existsSync(new URL(entry.types, root))).toBe(true);
  });

  it("should point the dealbook bin at the built entry point", () => {
    const root = new URL("../", import.meta.url);
    const { bin } = Manifest.parse(readJson(new URL("package.json", root)));

    expect(bin).toEqual({ dealbook: "./dist/cli.js" });
    expect(readFileSync(new URL("src/cli.ts", root), "utf-8").split("\n")[0]).toBe("#!/usr/bin/env node");
  });
});
