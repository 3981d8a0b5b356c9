/**
 * Dignity engine (Panchadha Maitri).
 *
 * Precedence: exaltation sign, debilitation sign, moolatrikona range,
 * own sign, then the compound (natural + temporary) relationship with
 * the ruler of the occupied rasi.
 */

import { houseDistance } from "./houses.js";
import {
  GRAHA_IDS,
  type GrahaId,
  type HouseNumber,
  type NaturalRelationship,
  type RasiId,
} from "./reference/ids.js";
import {
  naturalRelationship,
  rulerOf,
  type ReferenceTables,
} from "./reference/referenceTables.js";

export type CompoundRelationship =
  | "great_friend"
  | "friend"
  | "neutral"
  | "enemy"
  | "great_enemy";

export type DignityStatus =
  | "exalted"
  | "moolatrikona"
  | "own_sign"
  | CompoundRelationship
  | "debilitated";

export type TemporaryRelationship = "friend" | "enemy";

export const DIGNITY_SCORES: Readonly<Record<DignityStatus, number>> = {
  exalted: 9,
  moolatrikona: 8,
  own_sign: 7,
  great_friend: 6,
  friend: 5,
  neutral: 4,
  enemy: 3,
  great_enemy: 2,
  debilitated: 1,
};

export interface Dignity {
  status: DignityStatus;
  score: number;
  /** Ruler of the occupied rasi; the relationship below is with this graha. */
  rasi_lord: GrahaId;
  relationship_with_lord: CompoundRelationship | "self";
  /** Exalted or debilitated within EXACT_DIGNITY_ORB_DEG of the deep point. */
  exact: boolean;
}

export const EXACT_DIGNITY_ORB_DEG = 1;

const TEMPORARY_FRIEND_DISTANCES: ReadonlySet<number> = new Set([2, 3, 4, 10, 11, 12]);

export function temporaryRelationship(
  fromHouse: HouseNumber,
  toHouse: HouseNumber
): TemporaryRelationship {
  return TEMPORARY_FRIEND_DISTANCES.has(houseDistance(fromHouse, toHouse)) ? "friend" : "enemy";
}

const COMPOUND_TABLE: Readonly<
  Record<NaturalRelationship, Record<TemporaryRelationship, CompoundRelationship>>
> = {
  friend: { friend: "great_friend", enemy: "neutral" },
  neutral: { friend: "friend", enemy: "enemy" },
  enemy: { friend: "neutral", enemy: "great_enemy" },
};

export function compoundRelationship(
  natural: NaturalRelationship,
  temporary: TemporaryRelationship
): CompoundRelationship {
  return COMPOUND_TABLE[natural][temporary];
}

/** Graha → house, when the dignity is evaluated inside a chart. */
export type HouseLookup = Readonly<Record<GrahaId, HouseNumber>>;

function relationshipWith(
  graha: GrahaId,
  other: GrahaId,
  tables: ReferenceTables,
  houses?: HouseLookup
): CompoundRelationship | "self" {
  const natural = naturalRelationship(tables, graha, other);
  if (natural === "self") return "self";
  if (!houses) return natural;
  return compoundRelationship(natural, temporaryRelationship(houses[graha], houses[other]));
}

/**
 * Dignity of `graha` placed in `rasi`. Without `houses` the relationship
 * with the rasi lord falls back to the natural one.
 */
export function dignity(
  graha: GrahaId,
  rasi: RasiId,
  options: { degree_in_rasi?: number; houses?: HouseLookup; tables: ReferenceTables }
): Dignity {
  const { tables } = options;
  const ref = tables.grahas[graha];
  const lord = rulerOf(tables, rasi);
  const relationship = relationshipWith(graha, lord, tables, options.houses);
  const degree = options.degree_in_rasi;
  const result = (status: DignityStatus, exact = false): Dignity => ({
    status,
    score: DIGNITY_SCORES[status],
    rasi_lord: lord,
    relationship_with_lord: relationship,
    exact,
  });

  // The debilitation point sits at the same degree as the exaltation point.
  const deep = ref.exaltation.degree;
  const atDeepPoint =
    deep !== null && degree !== undefined && Math.abs(degree - deep) <= EXACT_DIGNITY_ORB_DEG;
  if (ref.exaltation.rasi === rasi) return result("exalted", atDeepPoint);
  if (ref.debilitation === rasi) return result("debilitated", atDeepPoint);

  const mt = ref.moolatrikona;
  if (mt && mt.rasi === rasi && degree !== undefined && degree >= mt.from_deg && degree < mt.to_deg) {
    return result("moolatrikona");
  }
  if (ref.own_signs.includes(rasi)) return result("own_sign");

  // A graha never reaches this point in a sign it rules.
  return result(relationship === "self" ? "own_sign" : relationship);
}

export interface MaitriEntry {
  graha: GrahaId;
  other: GrahaId;
  natural: NaturalRelationship;
  temporary: TemporaryRelationship;
  compound: CompoundRelationship;
}

/** Panchadha Maitri for every ordered pair of distinct grahas. */
export function maitriMatrix(houses: HouseLookup, tables: ReferenceTables): MaitriEntry[] {
  const entries: MaitriEntry[] = [];
  for (const graha of GRAHA_IDS) {
    for (const other of GRAHA_IDS) {
      const natural = naturalRelationship(tables, graha, other);
      if (natural === "self") continue;
      const temporary = temporaryRelationship(houses[graha], houses[other]);
      entries.push({
        graha,
        other,
        natural,
        temporary,
        compound: compoundRelationship(natural, temporary),
      });
    }
  }
  return entries;
}
