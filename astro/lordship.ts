/**
 * Lordship analyzer: which houses each graha rules for the ascendant,
 * house-group membership, functional nature and yoga karaka.
 */

import { ConfigurationError } from "./errors.js";
import {
  GRAHA_IDS,
  HOUSE_NUMBERS,
  RASI_IDS,
  byGraha,
  rasiAt,
  rasiIndex,
  type GrahaId,
  type HouseNumber,
  type RasiId,
} from "./reference/ids.js";
import { rulerOf, type ReferenceTables } from "./reference/referenceTables.js";
import {
  LORDSHIP_POLICY_V1,
  type HouseGroup,
  type LordshipPolicyV1,
} from "./policy/lordshipPolicy.v1.js";

export type FunctionalNature = "yoga_karaka" | "benefic" | "neutral" | "malefic";

export interface GrahaLordship {
  graha: GrahaId;
  houses_ruled: HouseNumber[];
  groups: HouseGroup[];
  functional_nature: FunctionalNature;
  placed_in_house: HouseNumber;
  combust: boolean;
}

export interface HouseLord {
  house: HouseNumber;
  rasi: RasiId;
  lord: GrahaId;
  lord_house: HouseNumber;
  /** Derived: true iff the lord itself is combust. */
  lord_combust: boolean;
}

export interface LordshipTable {
  ascendant_rasi: RasiId;
  house_lords: HouseLord[];
  grahas: GrahaLordship[];
  yoga_karakas: GrahaId[];
}

/** Houses each graha rules when `ascendantRasi` rises. */
export function housesRuledBy(
  ascendantRasi: RasiId,
  tables: ReferenceTables
): Record<GrahaId, HouseNumber[]> {
  const start = rasiIndex(ascendantRasi);
  const ruled = new Map<GrahaId, HouseNumber[]>();
  for (const house of HOUSE_NUMBERS) {
    const lord = rulerOf(tables, rasiAt(start + house - 1));
    ruled.set(lord, [...(ruled.get(lord) ?? []), house]);
  }
  return byGraha((graha) => ruled.get(graha) ?? []);
}

function intersects(houses: readonly HouseNumber[], group: readonly HouseNumber[]): boolean {
  return houses.some((house) => group.includes(house));
}

export function groupsFor(
  houses: readonly HouseNumber[],
  policy: LordshipPolicyV1 = LORDSHIP_POLICY_V1
): HouseGroup[] {
  const order: HouseGroup[] = ["kendra", "trikona", "dusthana", "upachaya", "maraka"];
  return order.filter((group) => intersects(houses, policy.house_groups[group]));
}

export function isYogaKaraka(
  houses: readonly HouseNumber[],
  policy: LordshipPolicyV1 = LORDSHIP_POLICY_V1
): boolean {
  return (
    intersects(houses, policy.yoga_karaka.kendra) && intersects(houses, policy.yoga_karaka.trikona)
  );
}

function isConflicted(houses: readonly HouseNumber[], policy: LordshipPolicyV1): boolean {
  const { kendra, trikona, dusthana } = policy.house_groups;
  return (
    (intersects(houses, kendra) || intersects(houses, trikona)) && intersects(houses, dusthana)
  );
}

export function functionalNature(
  graha: GrahaId,
  ascendantRasi: RasiId,
  houses: readonly HouseNumber[],
  policy: LordshipPolicyV1 = LORDSHIP_POLICY_V1
): FunctionalNature {
  if (houses.length === 0) return "neutral";
  if (isYogaKaraka(houses, policy)) return "yoga_karaka";

  const { kendra, trikona, dusthana } = policy.house_groups;
  const good = intersects(houses, kendra) || intersects(houses, trikona);
  const bad = intersects(houses, dusthana);

  if (good && bad) {
    const resolved = policy.conflicted_lord_overrides[ascendantRasi][graha];
    if (!resolved) {
      throw new ConfigurationError(
        `No functional-nature override for ${graha} with ${ascendantRasi} ascendant`
      );
    }
    return resolved;
  }
  if (good) return "benefic";
  if (bad) return "malefic";
  return intersects(houses, policy.malefic_leftover_houses) ? "malefic" : "neutral";
}

/**
 * Every conflicted lordship for every ascendant must have an override.
 */
export function validateLordshipPolicy(policy: LordshipPolicyV1, tables: ReferenceTables): void {
  const missing: string[] = [];
  for (const ascendant of RASI_IDS) {
    const ruled = housesRuledBy(ascendant, tables);
    for (const graha of GRAHA_IDS) {
      const houses = ruled[graha];
      if (isYogaKaraka(houses, policy) || !isConflicted(houses, policy)) continue;
      if (!policy.conflicted_lord_overrides[ascendant][graha]) {
        missing.push(`${ascendant}:${graha}`);
      }
    }
  }
  if (missing.length) {
    throw new ConfigurationError(
      `Lordship policy ${policy.lordship_policy_version} lacks overrides for ${missing.join(", ")}`
    );
  }
}

export function yogaKarakasFor(
  ascendantRasi: RasiId,
  tables: ReferenceTables,
  policy: LordshipPolicyV1 = LORDSHIP_POLICY_V1
): GrahaId[] {
  const ruled = housesRuledBy(ascendantRasi, tables);
  return GRAHA_IDS.filter((graha) => isYogaKaraka(ruled[graha], policy));
}

export function analyzeLordship(params: {
  ascendantRasi: RasiId;
  bhavas: ReadonlyArray<{ number: HouseNumber; rasi: RasiId; lord: GrahaId }>;
  grahaHouses: Readonly<Record<GrahaId, HouseNumber>>;
  combust: Readonly<Record<GrahaId, boolean>>;
  tables: ReferenceTables;
  policy?: LordshipPolicyV1;
}): LordshipTable {
  const policy = params.policy ?? LORDSHIP_POLICY_V1;
  const ruled = housesRuledBy(params.ascendantRasi, params.tables);

  const grahas = GRAHA_IDS.map((graha) => ({
    graha,
    houses_ruled: ruled[graha],
    groups: groupsFor(ruled[graha], policy),
    functional_nature: functionalNature(graha, params.ascendantRasi, ruled[graha], policy),
    placed_in_house: params.grahaHouses[graha],
    combust: params.combust[graha],
  }));

  return {
    ascendant_rasi: params.ascendantRasi,
    house_lords: params.bhavas.map((bhava) => ({
      house: bhava.number,
      rasi: bhava.rasi,
      lord: bhava.lord,
      lord_house: params.grahaHouses[bhava.lord],
      lord_combust: params.combust[bhava.lord],
    })),
    grahas,
    yoga_karakas: grahas
      .filter((entry) => entry.functional_nature === "yoga_karaka")
      .map((entry) => entry.graha),
  };
}
