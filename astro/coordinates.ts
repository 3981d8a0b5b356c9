/**
 * Coordinate conversion: tropical → sidereal, UTC → local sidereal time,
 * and the ecliptic angles (ascendant, midheaven) that follow from it.
 *
 * Obliquity uses the IAU 1980 mean-obliquity polynomial (epoch J2000.0)
 * unless the ephemeris supplies its own value.
 */

import { ayanamsaForJulianDay, resolveAyanamsa } from "./ayanamsa.js";
import { degToRad, normalizeDegrees, radToDeg } from "./angles.js";
import { InputError } from "./errors.js";
import { J2000, julianCenturiesSinceJ2000, julianDay } from "./julianDate.js";

export function toSiderealLongitude(
  tropicalLongitude: number,
  instant: Date,
  ayanamsaName: string
): number {
  if (!Number.isFinite(tropicalLongitude)) {
    throw new InputError(`Tropical longitude must be finite, got ${tropicalLongitude}`);
  }
  const ayanamsa = ayanamsaForJulianDay(julianDay(instant), resolveAyanamsa(ayanamsaName));
  return normalizeDegrees(tropicalLongitude - ayanamsa);
}

/** Greenwich mean sidereal time in degrees [0, 360). */
export function greenwichMeanSiderealTime(jd: number): number {
  const t = julianCenturiesSinceJ2000(jd);
  return normalizeDegrees(
    280.46061837 +
      360.98564736629 * (jd - J2000) +
      0.000387933 * t * t -
      (t * t * t) / 38_710_000
  );
}

/**
 * Local sidereal time in hours [0, 24) for an east-positive longitude.
 */
export function localSiderealTime(instant: Date, longitude: number): number {
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InputError(`Longitude must be within [-180, 180], got ${longitude}`);
  }
  const gmst = greenwichMeanSiderealTime(julianDay(instant));
  return normalizeDegrees(gmst + longitude) / 15;
}

export function meanObliquity(jd: number): number {
  const t = julianCenturiesSinceJ2000(jd);
  return 23.43929111 - (46.815 * t + 0.00059 * t * t - 0.001813 * t * t * t) / 3600;
}

/**
 * Tropical ascendant (degrees) from local sidereal time, geographic
 * latitude and obliquity.
 */
export function ascendantLongitude(
  localSiderealTimeHours: number,
  latitude: number,
  obliquity: number
): number {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InputError(`Latitude must be within [-90, 90], got ${latitude}`);
  }
  if (!Number.isFinite(localSiderealTimeHours) || !Number.isFinite(obliquity)) {
    throw new InputError("Sidereal time and obliquity must be finite");
  }
  const theta = degToRad(localSiderealTimeHours * 15);
  const phi = degToRad(latitude);
  const eps = degToRad(obliquity);

  const y = Math.cos(theta);
  const x = -(Math.sin(theta) * Math.cos(eps) + Math.tan(phi) * Math.sin(eps));
  return normalizeDegrees(radToDeg(Math.atan2(y, x)));
}

/** Tropical midheaven (degrees). */
export function midheavenLongitude(localSiderealTimeHours: number, obliquity: number): number {
  const theta = degToRad(localSiderealTimeHours * 15);
  const eps = degToRad(obliquity);
  return normalizeDegrees(radToDeg(Math.atan2(Math.sin(theta), Math.cos(theta) * Math.cos(eps))));
}
