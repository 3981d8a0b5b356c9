import { createRequire } from "node:module";
import fs from "node:fs";
import { z } from "zod";
import { EphemerisError } from "../errors.js";
import { julianDay } from "../julianDate.js";
import type { EphemerisBody } from "../reference/ids.js";
import type { EphemerisPosition, EphemerisProvider } from "./provider.js";

const require = createRequire(import.meta.url);

const REQUIRED_PREFIXES = ["sepl_", "semo_"];

const SE_SUN = 0;
const SE_MOON = 1;
const SE_MERCURY = 2;
const SE_VENUS = 3;
const SE_MARS = 4;
const SE_JUPITER = 5;
const SE_SATURN = 6;
const SE_MEAN_NODE = 10;
const SEFLG_SWIEPH = 2;
const SEFLG_MOSEPH = 4;
const SEFLG_SPEED = 256;

const BODY_MAP: Record<EphemerisBody, number> = {
  sun: SE_SUN,
  moon: SE_MOON,
  mercury: SE_MERCURY,
  venus: SE_VENUS,
  mars: SE_MARS,
  jupiter: SE_JUPITER,
  saturn: SE_SATURN,
  rahu: SE_MEAN_NODE,
};

interface SwissEphBinding {
  swe_set_ephe_path(path: string): void;
  swe_calc_ut(jd: number, ipl: number, iflag: number): unknown;
}

function isSwissEphBinding(value: unknown): value is SwissEphBinding {
  return (
    typeof value === "object" &&
    value !== null &&
    "swe_calc_ut" in value &&
    typeof value.swe_calc_ut === "function" &&
    "swe_set_ephe_path" in value &&
    typeof value.swe_set_ephe_path === "function"
  );
}

const CalcResultSchema = z.union([
  z.object({
    longitude: z.number(),
    latitude: z.number(),
    distance: z.number(),
    longitudeSpeed: z.number(),
    rflag: z.number().optional(),
  }),
  z.object({ error: z.string() }),
]);

export function ensureEphePath(ephePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(ephePath);
  } catch {
    throw new EphemerisError(
      "swisseph",
      `Swiss Ephemeris data files not found at ${ephePath}. Place .se1 files there or unset SWISSEPH_EPHE_PATH.`
    );
  }

  if (!stats.isDirectory()) {
    throw new EphemerisError("swisseph", `Swiss Ephemeris path ${ephePath} is not a directory.`);
  }

  const se1Files = fs
    .readdirSync(ephePath)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new EphemerisError(
      "swisseph",
      `Swiss Ephemeris .se1 files incomplete in ${ephePath}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ") || "none"}.`
    );
  }
}

export interface SwissEphemerisOptions {
  /** Directory of .se1 files; without it the built-in Moshier ephemeris is used. */
  ephePath?: string;
}

/**
 * Swiss Ephemeris via the `swisseph` native binding. The binding is an
 * optional dependency and is loaded on first use.
 */
export class SwissEphemerisProvider implements EphemerisProvider {
  readonly name: string;
  private binding: SwissEphBinding | undefined;

  constructor(private readonly options: SwissEphemerisOptions = {}) {
    this.name = options.ephePath ? "swisseph" : "swisseph-moshier";
  }

  private init(): SwissEphBinding {
    if (this.binding) return this.binding;

    let loaded: unknown;
    try {
      loaded = require("swisseph");
    } catch (err) {
      throw new EphemerisError(
        "swisseph",
        "The swisseph binding is not installed; use CHART_EPHEMERIS_SOURCE=table or install swisseph",
        err
      );
    }
    if (!isSwissEphBinding(loaded)) {
      throw new EphemerisError("swisseph", "The swisseph module does not expose swe_calc_ut");
    }
    if (this.options.ephePath) {
      ensureEphePath(this.options.ephePath);
      loaded.swe_set_ephe_path(this.options.ephePath);
    }
    this.binding = loaded;
    return loaded;
  }

  position(body: EphemerisBody, utcInstant: Date): EphemerisPosition {
    const swe = this.init();
    const jd = julianDay(utcInstant);
    const flags = (this.options.ephePath ? SEFLG_SWIEPH : SEFLG_MOSEPH) | SEFLG_SPEED;

    const parsed = CalcResultSchema.safeParse(swe.swe_calc_ut(jd, BODY_MAP[body], flags));
    if (!parsed.success) {
      throw new EphemerisError(body, "Swiss Ephemeris returned invalid data");
    }
    const result = parsed.data;
    if ("error" in result) {
      throw new EphemerisError(body, result.error || "Swiss Ephemeris calculation failed");
    }

    if (this.options.ephePath && result.rflag !== undefined && result.rflag & SEFLG_MOSEPH) {
      throw new EphemerisError(
        body,
        "Swiss Ephemeris fell back to Moshier (SEFLG_MOSEPH) unexpectedly"
      );
    }

    return {
      tropical_longitude_deg: result.longitude,
      is_retrograde: result.longitudeSpeed < 0,
    };
  }
}
