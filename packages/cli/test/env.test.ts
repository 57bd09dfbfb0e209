/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { homedir } from "node:os";
import * as path from "node:path";
import { resolveFilePath, resolveConfigPath, isVerbose } from "../src/lib/env.js";

const VARS = ["DEALBOOK_FILE", "DEALBOOK_CONFIG", "DEALBOOK_CLI_DEBUG"] as const;

describe("environment resolution", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved.get(name);
      if (value !== undefined) {
        process.env[name] = value;
      } else {
        delete process.env[name];
      }
    }
  });

  describe("resolveFilePath", () => {
    it("should prefer the CLI option", () => {
      process.env.DEALBOOK_FILE = "/env/pipeline.xlsx";
      expect(resolveFilePath("/cli/pipeline.xlsx", "/config/pipeline.xlsx")).toBe(
        path.resolve("/cli/pipeline.xlsx")
      );
    });

    it("should use DEALBOOK_FILE before the config file", () => {
      process.env.DEALBOOK_FILE = "/env/pipeline.xlsx";
      expect(resolveFilePath(undefined, "/config/pipeline.xlsx")).toBe(
        path.resolve("/env/pipeline.xlsx")
      );
    });

    it("should use the config file before the default", () => {
      expect(resolveFilePath(undefined, "/config/pipeline.xlsx")).toBe(
        path.resolve("/config/pipeline.xlsx")
      );
    });

    it("should fall back to ./data/pipeline.xlsx", () => {
      expect(resolveFilePath()).toBe(path.resolve("./data/pipeline.xlsx"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveFilePath("~/deals/pipeline.xlsx")).toBe(
        path.join(homedir(), "deals/pipeline.xlsx")
      );
    });
  });

  describe("resolveConfigPath", () => {
    it("should be undefined when nothing names a config file", () => {
      expect(resolveConfigPath()).toBeUndefined();
    });

    it("should prefer the CLI option over DEALBOOK_CONFIG", () => {
      process.env.DEALBOOK_CONFIG = "/env/dealbook.json";
      expect(resolveConfigPath("/cli/dealbook.json")).toBe(path.resolve("/cli/dealbook.json"));
      expect(resolveConfigPath()).toBe(path.resolve("/env/dealbook.json"));
    });
  });

  describe("isVerbose", () => {
    it("should only be on for DEALBOOK_CLI_DEBUG=1", () => {
      expect(isVerbose()).toBe(false);
      process.env.DEALBOOK_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
      process.env.DEALBOOK_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
