/**
 * Combustion Policy v1
 *
 * Orbs (degrees of shortest arc from the Sun) within which a graha is combust.
 * `null` means the graha is never combust.
 */

import type { GrahaId } from "../reference/ids.js";

export interface CombustionOrb {
  direct_deg: number;
  retrograde_deg: number;
}

export interface CombustionPolicyV1 {
  combustion_policy_version: string;
  orbs: Record<GrahaId, CombustionOrb | null>;
}

export const COMBUSTION_POLICY_V1: CombustionPolicyV1 = {
  combustion_policy_version: "combustion_v1",
  orbs: {
    sun: null,
    moon: { direct_deg: 12, retrograde_deg: 12 },
    mars: { direct_deg: 17, retrograde_deg: 17 },
    mercury: { direct_deg: 14, retrograde_deg: 12 },
    jupiter: { direct_deg: 11, retrograde_deg: 11 },
    venus: { direct_deg: 10, retrograde_deg: 8 },
    saturn: { direct_deg: 15, retrograde_deg: 15 },
    rahu: null,
    ketu: null,
  },
};
