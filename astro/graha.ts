/**
 * Graha placement: rasi, degree within rasi, nakshatra and pada from a
 * sidereal longitude.
 * Layer 0: no interpretation.
 */

import { normalizeDegrees } from "./angles.js";
import { CalculationInvariantError } from "./errors.js";
import { GRAHA_IDS, rasiAt, type GrahaId, type RasiId } from "./reference/ids.js";
import type { ReferenceTables } from "./reference/referenceTables.js";

const NAKSHATRA_SPAN = 360 / 27;

export interface NakshatraPlacement {
  index: number;
  name: string;
  lord: GrahaId;
  pada: 1 | 2 | 3 | 4;
}

export interface ZodiacPlacement {
  longitude: number;
  rasi: RasiId;
  rasi_index: number;
  degree_in_rasi: number;
  nakshatra: NakshatraPlacement;
}

export interface GrahaPlacement extends ZodiacPlacement {
  graha: GrahaId;
  retrograde: boolean;
}

const PADAS = [1, 2, 3, 4] as const;

export function placeLongitude(rawLongitude: number, tables: ReferenceTables): ZodiacPlacement {
  const longitude = normalizeDegrees(rawLongitude);
  if (!(longitude >= 0 && longitude < 360)) {
    throw new CalculationInvariantError("Longitude did not normalize into [0, 360)", {
      raw_longitude: rawLongitude,
    });
  }

  const rasiIndex = Math.min(11, Math.floor(longitude / 30));
  const nakshatraFloat = longitude / NAKSHATRA_SPAN;
  const nakshatraIndex = Math.min(26, Math.floor(nakshatraFloat));
  const padaIndex = Math.min(3, Math.floor((nakshatraFloat - nakshatraIndex) * 4));
  const nakshatra = tables.nakshatras[nakshatraIndex];
  const pada = PADAS[padaIndex];
  if (!nakshatra || pada === undefined) {
    throw new CalculationInvariantError("Nakshatra lookup out of range", { longitude });
  }

  return {
    longitude,
    rasi: rasiAt(rasiIndex),
    rasi_index: rasiIndex,
    degree_in_rasi: longitude - rasiIndex * 30,
    nakshatra: { index: nakshatraIndex, name: nakshatra.name, lord: nakshatra.lord, pada },
  };
}

export interface SiderealInput {
  longitude: number;
  retrograde: boolean;
}

/**
 * Place all nine grahas. Ketu is forced to Rahu + 180°, both nodes
 * retrograde.
 */
export function buildGrahaPlacements(
  positions: Record<Exclude<GrahaId, "ketu">, SiderealInput>,
  tables: ReferenceTables
): GrahaPlacement[] {
  const rahu = positions.rahu;
  return GRAHA_IDS.map((graha) => {
    if (graha === "ketu") {
      return { graha, retrograde: true, ...placeLongitude(rahu.longitude + 180, tables) };
    }
    const input = positions[graha];
    return {
      graha,
      retrograde: graha === "rahu" ? true : input.retrograde,
      ...placeLongitude(input.longitude, tables),
    };
  });
}

export function findPlacement<T extends { graha: GrahaId }>(list: readonly T[], graha: GrahaId): T {
  const found = list.find((entry) => entry.graha === graha);
  if (!found) {
    throw new CalculationInvariantError(`No placement for ${graha}`);
  }
  return found;
}
