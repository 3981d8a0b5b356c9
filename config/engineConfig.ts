import os from "node:os";
import { z } from "zod";
import { ConfigurationError } from "../astro/errors.js";
import { DEFAULT_EPHEMERIS_TIMEOUT_MS } from "../astro/ephemeris/fetchPositions.js";
import type { EphemerisProvider } from "../astro/ephemeris/provider.js";
import { SwissEphemerisProvider } from "../astro/ephemeris/swisseph.js";
import { TableEphemerisProvider } from "../astro/ephemeris/tableProvider.js";

/**
 * Engine configuration from environment variables. Entry scripts load
 * `.env` via `dotenv/config` before calling this.
 */

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const BatchEnvSchema = z.object({
  CHART_BATCH_CONCURRENCY: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional()
  ),
  CHART_BATCH_FAIL_FAST: z.preprocess(emptyToUndefined, z.enum(["0", "1"]).default("0")),
});

const EngineEnvSchema = BatchEnvSchema.extend({
  CHART_EPHEMERIS_SOURCE: z.preprocess(
    emptyToUndefined,
    z.enum(["swisseph", "table"]).default("swisseph")
  ),
  CHART_EPHEMERIS_TABLE_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  SWISSEPH_EPHE_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  CHART_EPHEMERIS_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_EPHEMERIS_TIMEOUT_MS)
  ),
});

export type EphemerisSource =
  | { kind: "swisseph"; ephePath?: string }
  | { kind: "table"; tablePath: string };

export interface BatchDefaults {
  batchConcurrency: number;
  batchFailFast: boolean;
}

export interface EngineConfig extends BatchDefaults {
  ephemeris: EphemerisSource;
  ephemerisTimeoutMs: number;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") || "environment";
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

function toBatchDefaults(vars: z.infer<typeof BatchEnvSchema>): BatchDefaults {
  return {
    batchConcurrency: vars.CHART_BATCH_CONCURRENCY ?? Math.max(1, os.availableParallelism()),
    batchFailFast: vars.CHART_BATCH_FAIL_FAST === "1",
  };
}

/** Batch settings alone, so a batch run does not depend on the ephemeris variables. */
export function loadBatchDefaults(env: NodeJS.ProcessEnv = process.env): BatchDefaults {
  return toBatchDefaults(parseEnv(BatchEnvSchema, env));
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const vars = parseEnv(EngineEnvSchema, env);

  let ephemeris: EphemerisSource;
  if (vars.CHART_EPHEMERIS_SOURCE === "table") {
    if (!vars.CHART_EPHEMERIS_TABLE_PATH) {
      throw new ConfigurationError(
        "Missing CHART_EPHEMERIS_TABLE_PATH (required when CHART_EPHEMERIS_SOURCE=table)"
      );
    }
    ephemeris = { kind: "table", tablePath: vars.CHART_EPHEMERIS_TABLE_PATH };
  } else {
    ephemeris = { kind: "swisseph", ephePath: vars.SWISSEPH_EPHE_PATH };
  }

  return {
    ephemeris,
    ephemerisTimeoutMs: vars.CHART_EPHEMERIS_TIMEOUT_MS,
    ...toBatchDefaults(vars),
  };
}

export function createEphemerisProvider(source: EphemerisSource): EphemerisProvider {
  switch (source.kind) {
    case "swisseph":
      return new SwissEphemerisProvider({ ephePath: source.ephePath });
    case "table":
      return TableEphemerisProvider.fromFile(source.tablePath);
  }
}
