import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_CONFIG,
  createSink,
  loadDiagnosticsConfig,
  parseLevel,
  resolveDiagnosticsConfig,
  silentSink,
} from "../src/index.js";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}/`, import.meta.url));

const loadFrom = (name: string, env: Record<string, string> = {}) =>
  loadDiagnosticsConfig({ searchFrom: fixture(name), env });

describe("configuration", () => {
  describe("parseLevel", () => {
    it("accepts known levels in any case", () => {
      expect(parseLevel("debug")).toBe("debug");
      expect(parseLevel(" WARN ")).toBe("warn");
      expect(parseLevel("off")).toBe("off");
    });

    it("rejects unknown levels", () => {
      expect(() => parseLevel("verbose")).toThrow(RangeError);
      expect(() => parseLevel("verbose")).toThrow('Unknown diagnostics level "verbose"');
    });
  });

  describe("resolveDiagnosticsConfig", () => {
    it("defaults to off", () => {
      expect(resolveDiagnosticsConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
      expect(resolveDiagnosticsConfig({ unrelated: true }, {})).toEqual({ level: "off" });
    });

    it("reads the level from the file payload", () => {
      const payload = { diagnostics: { level: "info" } };
      expect(resolveDiagnosticsConfig(payload, {})).toEqual({ level: "info" });
    });

    it("lets the environment override the file", () => {
      const payload = { diagnostics: { level: "info" } };
      const env = { RATTRIG_LOG: "error" };
      expect(resolveDiagnosticsConfig(payload, env)).toEqual({ level: "error" });
      expect(resolveDiagnosticsConfig(undefined, { RATTRIG_LOG: "" })).toEqual({ level: "off" });
    });

    it("rejects a level of the wrong type", () => {
      expect(() => resolveDiagnosticsConfig({ diagnostics: { level: 3 } }, {})).toThrow(
        "diagnostics.level must be a string, got number"
      );
    });
  });

  describe("loadDiagnosticsConfig", () => {
    it("finds a .rattrigrc.json", () => {
      expect(loadFrom("debug-config")).toEqual({ level: "debug" });
    });

    it("applies the environment on top of the file", () => {
      expect(loadFrom("debug-config", { RATTRIG_LOG: "warn" })).toEqual({ level: "warn" });
    });

    it("falls back to the default without a config file", () => {
      expect(loadFrom("empty")).toEqual({ level: "off" });
    });

    it("does not look for .mjs config files", () => {
      expect(loadFrom("esm-config")).toEqual({ level: "off" });
    });

    it("rejects an unknown level in the file", () => {
      expect(() => loadFrom("bad-level")).toThrow(RangeError);
    });
  });

  describe("createSink", () => {
    it("returns the silent sink when diagnostics are off", () => {
      expect(createSink({ level: "off" })).toBe(silentSink);
    });

    it("returns a console sink otherwise", () => {
      expect(createSink({ level: "debug" })).not.toBe(silentSink);
    });
  });
});
