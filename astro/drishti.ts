/**
 * Drishti (aspects). Two independent systems, never merged:
 * - graha drishti: house-based, per-graha special aspects
 * - rasi drishti: sign-based, from modality alone
 *
 * No orb is applied; aspects are counted in whole houses.
 */

import { forwardArc } from "./angles.js";
import { houseFrom } from "./houses.js";
import {
  RASI_IDS,
  rasiIndex,
  type GrahaId,
  type HouseNumber,
  type Modality,
  type RasiId,
} from "./reference/ids.js";
import type { ReferenceTables } from "./reference/referenceTables.js";

export type DrishtiType = "full" | "special";

/** House distances (inclusive count) each graha aspects besides the 7th. */
export const SPECIAL_ASPECTS: Readonly<Record<GrahaId, readonly number[]>> = {
  sun: [],
  moon: [],
  mars: [4, 8],
  mercury: [],
  jupiter: [5, 9],
  venus: [],
  saturn: [3, 10],
  rahu: [],
  ketu: [],
};

const FULL_ASPECT_DISTANCE = 7;

export interface HouseAspect {
  source: GrahaId;
  source_house: HouseNumber;
  target_house: HouseNumber;
  distance: number;
  type: DrishtiType;
}

export interface GrahaAspect {
  source: GrahaId;
  target: GrahaId;
  distance: number;
  type: DrishtiType;
  /** Forward arc from source to target longitude, degrees [0, 360). */
  arc_deg: number;
}

export interface RasiAspect {
  source: RasiId;
  target: RasiId;
}

export interface AspectPoint {
  graha: GrahaId;
  house: HouseNumber;
  longitude: number;
}

/**
 * Houses aspected by one graha, ordered by distance. A special aspect
 * landing on the same house as the full aspect replaces it.
 */
export function aspectedHouses(graha: GrahaId, fromHouse: HouseNumber): HouseAspect[] {
  const byHouse = new Map<HouseNumber, HouseAspect>();
  const add = (distance: number, type: DrishtiType) => {
    const target = houseFrom(fromHouse, distance);
    const existing = byHouse.get(target);
    if (existing && existing.type === "special") return;
    byHouse.set(target, {
      source: graha,
      source_house: fromHouse,
      target_house: target,
      distance,
      type,
    });
  };

  add(FULL_ASPECT_DISTANCE, "full");
  for (const distance of SPECIAL_ASPECTS[graha]) {
    add(distance, "special");
  }

  return [...byHouse.values()].sort((a, b) => a.distance - b.distance);
}

export function computeHouseAspects(points: readonly AspectPoint[]): HouseAspect[] {
  return points.flatMap((point) => aspectedHouses(point.graha, point.house));
}

/**
 * Graha A aspects graha B when B's house is among A's aspected houses.
 */
export function computeGrahaAspects(points: readonly AspectPoint[]): GrahaAspect[] {
  const result: GrahaAspect[] = [];
  for (const source of points) {
    const houses = aspectedHouses(source.graha, source.house);
    for (const target of points) {
      if (target.graha === source.graha) continue;
      const hit = houses.find((aspect) => aspect.target_house === target.house);
      if (!hit) continue;
      result.push({
        source: source.graha,
        target: target.graha,
        distance: hit.distance,
        type: hit.type,
        arc_deg: forwardArc(source.longitude, target.longitude),
      });
    }
  }
  return result;
}

export function aspects(
  list: readonly GrahaAspect[],
  source: GrahaId,
  target: GrahaId
): boolean {
  return list.some((aspect) => aspect.source === source && aspect.target === target);
}

export function mutuallyAspect(list: readonly GrahaAspect[], a: GrahaId, b: GrahaId): boolean {
  return aspects(list, a, b) && aspects(list, b, a);
}

const RASI_DRISHTI_TARGET: Readonly<Record<Modality, Modality>> = {
  movable: "fixed",
  fixed: "movable",
  dual: "dual",
};

function adjacent(a: RasiId, b: RasiId): boolean {
  const diff = Math.abs(rasiIndex(a) - rasiIndex(b));
  return diff === 1 || diff === 11;
}

/** Signs aspected by `source` under rasi drishti. */
export function rasiAspectTargets(source: RasiId, tables: ReferenceTables): RasiId[] {
  const wanted = RASI_DRISHTI_TARGET[tables.rasis[source].modality];
  return RASI_IDS.filter(
    (target) =>
      target !== source && tables.rasis[target].modality === wanted && !adjacent(source, target)
  );
}

export function computeRasiAspects(tables: ReferenceTables): RasiAspect[] {
  return RASI_IDS.flatMap((source) =>
    rasiAspectTargets(source, tables).map((target) => ({ source, target }))
  );
}
