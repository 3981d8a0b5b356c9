/**
 * Yoga detection: Raj, Dhana and Parivartana.
 *
 * Every detection returns its participants, houses and connection so
 * reports can explain it. Pairs are unordered and reported once, with
 * grahas in enumeration order.
 */

import { mutuallyAspect, type GrahaAspect } from "./drishti.js";
import {
  GRAHA_IDS,
  type GrahaId,
  type HouseNumber,
  type RasiId,
} from "./reference/ids.js";
import {
  LORDSHIP_POLICY_V1,
  type LordshipPolicyV1,
} from "./policy/lordshipPolicy.v1.js";
import type { ReferenceTables } from "./reference/referenceTables.js";

export type YogaCategory = "Raj" | "Dhana" | "Parivartana";
export type YogaConnection = "conjunction" | "mutual_aspect" | "exchange";

export interface YogaRecord {
  name: string;
  category: YogaCategory;
  grahas: GrahaId[];
  houses: HouseNumber[];
  connection: YogaConnection;
  explanation: string;
}

export interface YogaGraha {
  graha: GrahaId;
  rasi: RasiId;
  house: HouseNumber;
}

export interface YogaInput {
  grahas: readonly YogaGraha[];
  housesRuled: Readonly<Record<GrahaId, readonly HouseNumber[]>>;
  grahaAspects: readonly GrahaAspect[];
  tables: ReferenceTables;
  policy?: LordshipPolicyV1;
}

const DHANA_PRIMARY: readonly HouseNumber[] = [2, 11];
const DHANA_SUPPORT: readonly HouseNumber[] = [2, 11, 5, 9];

function pairs(grahas: readonly YogaGraha[]): Array<[YogaGraha, YogaGraha]> {
  const sorted = [...grahas].sort(
    (a, b) => GRAHA_IDS.indexOf(a.graha) - GRAHA_IDS.indexOf(b.graha)
  );
  const out: Array<[YogaGraha, YogaGraha]> = [];
  sorted.forEach((a, i) => {
    for (const b of sorted.slice(i + 1)) out.push([a, b]);
  });
  return out;
}

function ruledList(houses: readonly HouseNumber[]): string {
  return houses.join(", ");
}

function title(graha: GrahaId, tables: ReferenceTables): string {
  return tables.grahas[graha].name;
}

function ruledIn(houses: readonly HouseNumber[], group: readonly HouseNumber[]): HouseNumber[] {
  return houses.filter((house) => group.includes(house));
}

export function detectRajYogas(input: YogaInput): YogaRecord[] {
  const { kendra, trikona } = (input.policy ?? LORDSHIP_POLICY_V1).house_groups;
  const out: YogaRecord[] = [];

  for (const [a, b] of pairs(input.grahas)) {
    const aRuled = input.housesRuled[a.graha];
    const bRuled = input.housesRuled[b.graha];
    const qualifies =
      (ruledIn(aRuled, kendra).length > 0 && ruledIn(bRuled, trikona).length > 0) ||
      (ruledIn(bRuled, kendra).length > 0 && ruledIn(aRuled, trikona).length > 0);
    if (!qualifies) continue;

    let connection: YogaConnection | null = null;
    if (a.house === b.house) connection = "conjunction";
    else if (mutuallyAspect(input.grahaAspects, a.graha, b.graha)) connection = "mutual_aspect";
    if (!connection) continue;

    const link =
      connection === "conjunction" ? `conjunct in house ${a.house}` : "in mutual aspect";
    out.push({
      name: "Raj Yoga",
      category: "Raj",
      grahas: [a.graha, b.graha],
      houses: [a.house, b.house],
      connection,
      explanation:
        `${title(a.graha, input.tables)} (lord of ${ruledList(aRuled)}) and ` +
        `${title(b.graha, input.tables)} (lord of ${ruledList(bRuled)}) join kendra and trikona lordship, ${link}`,
    });
  }
  return out;
}

function rulesSignOf(input: YogaInput, ruler: GrahaId, occupant: YogaGraha): boolean {
  return input.tables.rasis[occupant.rasi].ruler === ruler;
}

function exchanged(input: YogaInput, a: YogaGraha, b: YogaGraha): boolean {
  return rulesSignOf(input, b.graha, a) && rulesSignOf(input, a.graha, b);
}

function dhanaLinked(aRuled: readonly HouseNumber[], bRuled: readonly HouseNumber[]): boolean {
  return ruledIn(aRuled, DHANA_PRIMARY).some((primary) =>
    ruledIn(bRuled, DHANA_SUPPORT).some((support) => support !== primary)
  );
}

export function detectDhanaYogas(input: YogaInput): YogaRecord[] {
  const out: YogaRecord[] = [];

  for (const [a, b] of pairs(input.grahas)) {
    const aRuled = input.housesRuled[a.graha];
    const bRuled = input.housesRuled[b.graha];
    if (!dhanaLinked(aRuled, bRuled) && !dhanaLinked(bRuled, aRuled)) continue;

    let connection: YogaConnection | null = null;
    if (a.house === b.house) connection = "conjunction";
    else if (exchanged(input, a, b)) connection = "exchange";
    if (!connection) continue;

    const link =
      connection === "conjunction" ? `conjunct in house ${a.house}` : "exchange signs";
    out.push({
      name: "Dhana Yoga",
      category: "Dhana",
      grahas: [a.graha, b.graha],
      houses: [a.house, b.house],
      connection,
      explanation:
        `${title(a.graha, input.tables)} (lord of ${ruledList(aRuled)}) and ` +
        `${title(b.graha, input.tables)} (lord of ${ruledList(bRuled)}) link wealth houses, ${link}`,
    });
  }
  return out;
}

const DAINYA_HOUSES: readonly HouseNumber[] = [6, 8, 12];

export function parivartanaName(houses: readonly HouseNumber[]): string {
  if (houses.some((house) => DAINYA_HOUSES.includes(house))) return "Dainya Parivartana Yoga";
  if (houses.includes(3)) return "Khala Parivartana Yoga";
  return "Maha Parivartana Yoga";
}

export function detectParivartanaYogas(input: YogaInput): YogaRecord[] {
  const out: YogaRecord[] = [];
  for (const [a, b] of pairs(input.grahas)) {
    if (!exchanged(input, a, b)) continue;
    const houses: HouseNumber[] = [a.house, b.house];
    out.push({
      name: parivartanaName(houses),
      category: "Parivartana",
      grahas: [a.graha, b.graha],
      houses,
      connection: "exchange",
      explanation:
        `${title(a.graha, input.tables)} in ${input.tables.rasis[a.rasi].name} and ` +
        `${title(b.graha, input.tables)} in ${input.tables.rasis[b.rasi].name} occupy each other's signs ` +
        `(houses ${a.house} and ${b.house})`,
    });
  }
  return out;
}

export function detectYogas(input: YogaInput): YogaRecord[] {
  return [
    ...detectRajYogas(input),
    ...detectDhanaYogas(input),
    ...detectParivartanaYogas(input),
  ];
}
