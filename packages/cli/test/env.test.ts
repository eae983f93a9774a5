/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { BLESSED_TABLES } from "@seriesindex/sdk";
import { isVerbose, resolveSource, resolveTables } from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

describe("environment resolution", () => {
  describe("resolveSource", () => {
    it("should use CLI option when provided", () => {
      const result = resolveSource("/cli/path", { SERIESINDEX_SOURCE: "/env/path" });
      expect(result).toBe(path.resolve("/cli/path"));
    });

    it("should use SERIESINDEX_SOURCE when CLI option not provided", () => {
      expect(resolveSource(undefined, { SERIESINDEX_SOURCE: "/env/path" })).toBe(
        path.resolve("/env/path")
      );
    });

    it("should use default ./series when neither provided", () => {
      expect(resolveSource(undefined, {})).toBe(path.resolve("./series"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveSource("~/series", {})).toBe(path.join(homedir(), "series"));
    });
  });

  describe("resolveTables", () => {
    it("should default to the blessed tables", () => {
      expect(resolveTables(undefined, {})).toEqual([...BLESSED_TABLES]);
    });

    it("should prefer the CLI option over SERIESINDEX_TABLES", () => {
      expect(resolveTables("series_double", { SERIESINDEX_TABLES: "series_blob" })).toEqual([
        "series_double",
      ]);
      expect(resolveTables(undefined, { SERIESINDEX_TABLES: " series_blob , series_float," })).toEqual([
        "series_blob",
        "series_float",
      ]);
    });

    it("should reject invalid table names", () => {
      expect(() => resolveTables("series-double", {})).toThrow(CliError);
      expect(() => resolveTables("series-double", {})).toThrow('Invalid table name "series-double"');
    });

    it("should reject an empty list", () => {
      expect(() => resolveTables(" , ", {})).toThrow("At least one table is required");
    });
  });

  describe("isVerbose", () => {
    it("should only turn on for SERIESINDEX_CLI_DEBUG=1", () => {
      expect(isVerbose({ SERIESINDEX_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ SERIESINDEX_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
