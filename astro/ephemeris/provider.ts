import type { EphemerisBody } from "../reference/ids.js";

/**
 * Ephemeris boundary. The engine only needs tropical longitude and a
 * retrograde flag per body; anything that supplies those can back a chart.
 */

export interface EphemerisPosition {
  tropical_longitude_deg: number;
  is_retrograde: boolean;
}

export interface EphemerisProvider {
  readonly name: string;
  position(body: EphemerisBody, utcInstant: Date): EphemerisPosition | Promise<EphemerisPosition>;
  /** Obliquity of the ecliptic in degrees; `undefined` falls back to the mean-obliquity formula. */
  obliquity?(utcInstant: Date): number | undefined | Promise<number | undefined>;
}
