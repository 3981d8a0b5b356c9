/**
 * Lordship Policy v1
 *
 * House groupings and the functional-nature precedence table used when a
 * graha rules both a kendra/trikona and a dusthana for a given ascendant.
 */

import type { GrahaId, HouseNumber, RasiId } from "../reference/ids.js";

export type HouseGroup = "kendra" | "trikona" | "dusthana" | "upachaya" | "maraka";

export type ResolvedNature = "benefic" | "neutral" | "malefic";

export interface LordshipPolicyV1 {
  lordship_policy_version: string;
  house_groups: Record<HouseGroup, HouseNumber[]>;
  /** Houses that make a yoga karaka: one from each list. Lagna excluded. */
  yoga_karaka: { kendra: HouseNumber[]; trikona: HouseNumber[] };
  /** Lords of only these houses are malefic; others in the leftover set are neutral. */
  malefic_leftover_houses: HouseNumber[];
  conflicted_lord_overrides: Record<RasiId, Partial<Record<GrahaId, ResolvedNature>>>;
}

export const LORDSHIP_POLICY_V1: LordshipPolicyV1 = {
  lordship_policy_version: "lordship_v1",
  house_groups: {
    kendra: [1, 4, 7, 10],
    trikona: [1, 5, 9],
    dusthana: [6, 8, 12],
    upachaya: [3, 6, 10, 11],
    maraka: [2, 7],
  },
  yoga_karaka: { kendra: [4, 7, 10], trikona: [5, 9] },
  malefic_leftover_houses: [3, 11],
  conflicted_lord_overrides: {
    aries: { mars: "benefic", jupiter: "benefic" },
    taurus: { venus: "benefic", mars: "malefic" },
    gemini: { venus: "benefic", saturn: "neutral" },
    cancer: { jupiter: "benefic", saturn: "malefic" },
    leo: { jupiter: "benefic", saturn: "malefic" },
    virgo: { saturn: "neutral" },
    libra: { venus: "benefic", mercury: "benefic" },
    scorpio: { mars: "benefic", venus: "malefic" },
    sagittarius: { mars: "benefic" },
    capricorn: { mercury: "benefic" },
    aquarius: { saturn: "benefic", mercury: "benefic" },
    pisces: {},
  },
};
