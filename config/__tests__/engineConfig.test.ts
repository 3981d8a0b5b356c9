import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../astro/errors.js";
import { FIXTURE_TABLE_PATH } from "../../astro/__tests__/helpers.js";
import { createEphemerisProvider, loadBatchDefaults, loadEngineConfig } from "../engineConfig.js";

describe("loadEngineConfig", () => {
  it("defaults to Swiss Ephemeris with a 5s timeout", () => {
    const config = loadEngineConfig({});
    expect(config.ephemeris).toEqual({ kind: "swisseph", ephePath: undefined });
    expect(config.ephemerisTimeoutMs).toBe(5000);
    expect(config.batchFailFast).toBe(false);
    expect(config.batchConcurrency).toBeGreaterThanOrEqual(1);
  });

  it("treats empty variables as unset", () => {
    const config = loadEngineConfig({
      CHART_EPHEMERIS_SOURCE: "",
      CHART_EPHEMERIS_TIMEOUT_MS: "",
      CHART_BATCH_CONCURRENCY: "",
    });
    expect(config.ephemeris.kind).toBe("swisseph");
    expect(config.ephemerisTimeoutMs).toBe(5000);
  });

  it("reads the table source and batch settings", () => {
    const config = loadEngineConfig({
      CHART_EPHEMERIS_SOURCE: "table",
      CHART_EPHEMERIS_TABLE_PATH: "/data/positions.json",
      CHART_EPHEMERIS_TIMEOUT_MS: "250",
      CHART_BATCH_CONCURRENCY: "3",
      CHART_BATCH_FAIL_FAST: "1",
    });
    expect(config).toEqual({
      ephemeris: { kind: "table", tablePath: "/data/positions.json" },
      ephemerisTimeoutMs: 250,
      batchConcurrency: 3,
      batchFailFast: true,
    });
  });

  it("requires a table path for the table source", () => {
    expect(() => loadEngineConfig({ CHART_EPHEMERIS_SOURCE: "table" })).toThrow(
      "Missing CHART_EPHEMERIS_TABLE_PATH (required when CHART_EPHEMERIS_SOURCE=table)"
    );
  });

  it("names the variable that failed validation", () => {
    expect(() => loadEngineConfig({ CHART_EPHEMERIS_TIMEOUT_MS: "soon" })).toThrow(
      /^Invalid CHART_EPHEMERIS_TIMEOUT_MS: /
    );
    expect(() => loadEngineConfig({ CHART_EPHEMERIS_SOURCE: "jpl" })).toThrow(ConfigurationError);
  });
});

describe("loadBatchDefaults", () => {
  it("reads only the batch variables", () => {
    expect(
      loadBatchDefaults({
        CHART_EPHEMERIS_SOURCE: "jpl",
        CHART_BATCH_CONCURRENCY: "2",
        CHART_BATCH_FAIL_FAST: "1",
      })
    ).toEqual({ batchConcurrency: 2, batchFailFast: true });
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => loadBatchDefaults({ CHART_BATCH_CONCURRENCY: "0" })).toThrow(
      /^Invalid CHART_BATCH_CONCURRENCY: /
    );
  });
});

describe("createEphemerisProvider", () => {
  it("loads a table provider from its file", () => {
    const provider = createEphemerisProvider({ kind: "table", tablePath: FIXTURE_TABLE_PATH });
    expect(provider.name).toBe("table:test-fixture");
  });
});
