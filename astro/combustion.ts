/**
 * Combustion detector. Degree-based, unlike drishti.
 */

import { z } from "zod";
import { angularSeparation } from "./angles.js";
import { ConfigurationError } from "./errors.js";
import {
  COMBUSTION_POLICY_V1,
  type CombustionPolicyV1,
} from "./policy/combustionPolicy.v1.js";
import { GRAHA_IDS, type GrahaId } from "./reference/ids.js";

export function combustionOrb(
  graha: GrahaId,
  retrograde: boolean,
  policy: CombustionPolicyV1 = COMBUSTION_POLICY_V1
): number | null {
  const orb = policy.orbs[graha];
  if (!orb) return null;
  return retrograde ? orb.retrograde_deg : orb.direct_deg;
}

/** Combust iff the shortest arc to the Sun is strictly less than the orb. */
export function isCombust(
  graha: GrahaId,
  distanceFromSun: number,
  retrograde = false,
  policy: CombustionPolicyV1 = COMBUSTION_POLICY_V1
): boolean {
  const orb = combustionOrb(graha, retrograde, policy);
  return orb !== null && distanceFromSun < orb;
}

export interface CombustionFlag {
  graha: GrahaId;
  distance_from_sun: number;
  orb_deg: number | null;
  combust: boolean;
}

export function computeCombustion(
  placements: ReadonlyArray<{ graha: GrahaId; longitude: number; retrograde: boolean }>,
  sunLongitude: number,
  policy: CombustionPolicyV1 = COMBUSTION_POLICY_V1
): CombustionFlag[] {
  return placements.map((placement) => {
    const distance = angularSeparation(placement.longitude, sunLongitude);
    return {
      graha: placement.graha,
      distance_from_sun: distance,
      orb_deg: combustionOrb(placement.graha, placement.retrograde, policy),
      combust: isCombust(placement.graha, distance, placement.retrograde, policy),
    };
  });
}

const OrbSchema = z
  .object({ direct_deg: z.number().positive().max(30), retrograde_deg: z.number().positive().max(30) })
  .nullable();

export function validateCombustionPolicy(policy: CombustionPolicyV1): void {
  const missing = GRAHA_IDS.filter((graha) => !(graha in policy.orbs));
  const invalid = GRAHA_IDS.filter((graha) => !OrbSchema.safeParse(policy.orbs[graha]).success);
  if (missing.length || invalid.length || policy.orbs.sun !== null) {
    throw new ConfigurationError(
      `Combustion policy ${policy.combustion_policy_version} is invalid ` +
        `(missing: ${missing.join(", ") || "none"}; invalid: ${invalid.join(", ") || "none"})`
    );
  }
}
