/**
 * The published entry points must be files the package build emits
 */

import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join, relative } from "node:path";
import { z } from "zod";

const CLI_DIR = join(dirname(fileURLToPath(import.meta.url)), "..");
const SDK_DIR = join(CLI_DIR, "../sdk");

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
  references: z.array(z.object({ path: z.string() })).optional(),
});

const CliPackageSchema = z.object({
  bin: z.record(z.string()),
});

const SdkPackageSchema = z.object({
  exports: z.object({ ".": z.object({ types: z.string(), import: z.string() }) }),
});

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

/**
 * Source file that the package build compiles into `emitted`
 */
function sourceOf(packageDir: string, emitted: string): string {
  const { compilerOptions } = BuildConfigSchema.parse(
    readJson(join(packageDir, "tsconfig.build.json"))
  );
  const withinOutDir = relative(join(packageDir, compilerOptions.outDir), join(packageDir, emitted));
  expect(withinOutDir.startsWith("..")).toBe(false);
  return join(packageDir, compilerOptions.rootDir, withinOutDir.replace(/\.js$/, ".ts"));
}

describe("package build layout", () => {
  it("should point the bin at the compiled CLI entry", () => {
    const { bin } = CliPackageSchema.parse(readJson(join(CLI_DIR, "package.json")));
    const entry = bin["seriesindex"];
    expect(entry).toBe("./dist/cli.js");

    const source = sourceOf(CLI_DIR, entry ?? "");
    expect(source).toBe(join(CLI_DIR, "src", "cli.ts"));
    expect(readFileSync(source, "utf-8").startsWith("#!/usr/bin/env node\n")).toBe(true);
  });

  it("should load the compiled sdk at run time and its sources for types", () => {
    const pkg = SdkPackageSchema.parse(readJson(join(SDK_DIR, "package.json")));
    const entry = pkg.exports["."];

    expect(entry.types).toBe("./src/index.ts");
    expect(sourceOf(SDK_DIR, entry.import)).toBe(join(SDK_DIR, "src", "index.ts"));
    expect(existsSync(join(SDK_DIR, entry.types))).toBe(true);
  });

  it("should build the sdk before the CLI", () => {
    const { references } = BuildConfigSchema.parse(
      readJson(join(CLI_DIR, "tsconfig.build.json"))
    );
    expect(references).toEqual([{ path: "../sdk/tsconfig.build.json" }]);
  });
});
