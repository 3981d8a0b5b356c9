/**
 * Ayanamsa variants.
 *
 * All three systems share the general-precession polynomial and differ only
 * in their value at J2000.0, so the difference between any two is constant.
 */

import { ConfigurationError } from "./errors.js";
import { AYANAMSA_NAMES, type AyanamsaName } from "./reference/ids.js";
import { julianCenturiesSinceJ2000 } from "./julianDate.js";

export interface AyanamsaDefinition {
  name: AyanamsaName;
  /** Offset in degrees at J2000.0. */
  base_deg: number;
}

export const AYANAMSA_DEFINITIONS: Readonly<Record<AyanamsaName, AyanamsaDefinition>> = {
  Lahiri: { name: "Lahiri", base_deg: 23.85 },
  Raman: { name: "Raman", base_deg: 22.5 },
  Krishnamurti: { name: "Krishnamurti", base_deg: 23.77 },
};

export function resolveAyanamsa(name: string): AyanamsaName {
  const match = AYANAMSA_NAMES.find((candidate) => candidate === name);
  if (!match) {
    throw new ConfigurationError(
      `Unknown ayanamsa "${name}"; expected one of ${AYANAMSA_NAMES.join(", ")}`
    );
  }
  return match;
}

/** Precession accumulated since J2000.0, in degrees. */
function precessionSinceJ2000(t: number): number {
  return (5029.0966 * t + 1.11113 * t * t) / 3600;
}

export function ayanamsaForJulianDay(jd: number, name: AyanamsaName): number {
  return AYANAMSA_DEFINITIONS[name].base_deg + precessionSinceJ2000(julianCenturiesSinceJ2000(jd));
}
