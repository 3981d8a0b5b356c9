/**
 * Bhava construction.
 *
 * House systems are a closed set of variants with one handler each.
 * Both shipped variants are equal-span; the partition check after
 * construction holds for any variant added later.
 */

import { forwardArc, normalizeDegrees } from "./angles.js";
import { CalculationInvariantError, ConfigurationError } from "./errors.js";
import {
  HOUSE_NUMBERS,
  HOUSE_SYSTEMS,
  houseAt,
  rasiAt,
  type GrahaId,
  type HouseNumber,
  type HouseSystemName,
  type RasiId,
} from "./reference/ids.js";
import { bhavaSignification, rulerOf, type ReferenceTables } from "./reference/referenceTables.js";

export interface HouseSystemHandler {
  /** Cusp of house 1; later cusps follow in 30° steps. */
  firstCusp(ascendant: number): number;
  houseOf(longitude: number, ascendant: number): HouseNumber;
}

const HOUSE_SYSTEM_HANDLERS: Readonly<Record<HouseSystemName, HouseSystemHandler>> = {
  Equal: {
    firstCusp: (ascendant) => normalizeDegrees(ascendant),
    houseOf: (longitude, ascendant) =>
      houseAt(1 + Math.min(11, Math.floor(forwardArc(ascendant, longitude) / 30))),
  },
  WholeSign: {
    firstCusp: (ascendant) => Math.floor(normalizeDegrees(ascendant) / 30) * 30,
    houseOf: (longitude, ascendant) => {
      const from = Math.floor(normalizeDegrees(ascendant) / 30);
      const to = Math.floor(normalizeDegrees(longitude) / 30);
      return houseAt(1 + ((to - from + 12) % 12));
    },
  },
};

export function resolveHouseSystem(name: string): HouseSystemName {
  const match = HOUSE_SYSTEMS.find((candidate) => candidate === name);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported house system "${name}"; expected one of ${HOUSE_SYSTEMS.join(", ")}`
    );
  }
  return match;
}

export function houseSystemHandler(name: HouseSystemName): HouseSystemHandler {
  return HOUSE_SYSTEM_HANDLERS[name];
}

export function equalHouseCusps(ascendant: number): number[] {
  return HOUSE_NUMBERS.map((n) => normalizeDegrees(ascendant + (n - 1) * 30));
}

/** Half-width of the junction zone around each cusp. */
export const SANDHI_HALF_WIDTH_DEG = 2;

export interface BhavaRecord {
  number: HouseNumber;
  cusp: number;
  /** Midpoint between this cusp and the next. */
  madhya: number;
  sandhi: { start: number; end: number };
  rasi: RasiId;
  occupants: GrahaId[];
  lord: GrahaId;
  name: string;
  sanskrit: string;
  karakas: GrahaId[];
  significations: string[];
  body_parts: string[];
}

/**
 * Spans between consecutive cusps must each be 30° and together cover
 * the full circle.
 */
export function assertHousePartition(cusps: readonly number[]): void {
  const spans = cusps.map((cusp, i) => {
    return forwardArc(cusp, cusps[(i + 1) % cusps.length]);
  });
  const total = spans.reduce((sum, span) => sum + span, 0);
  const badSpan = spans.findIndex((span) => Math.abs(span - 30) > 1e-9);
  if (cusps.length !== 12 || badSpan !== -1 || Math.abs(total - 360) > 1e-6) {
    throw new CalculationInvariantError("House cusps do not partition the ecliptic", {
      cusps: [...cusps],
      spans,
      total,
    });
  }
}

export function buildBhavas(params: {
  ascendant: number;
  houseSystem: HouseSystemName;
  grahaHouses: ReadonlyArray<{ graha: GrahaId; house: HouseNumber }>;
  tables: ReferenceTables;
}): BhavaRecord[] {
  const handler = houseSystemHandler(params.houseSystem);
  const first = handler.firstCusp(params.ascendant);
  const ascRasiIndex = Math.floor(normalizeDegrees(params.ascendant) / 30);
  const cusps = HOUSE_NUMBERS.map((n) => normalizeDegrees(first + (n - 1) * 30));
  assertHousePartition(cusps);

  return HOUSE_NUMBERS.map((number, i) => {
    const rasi = rasiAt(ascRasiIndex + number - 1);
    const signification = bhavaSignification(params.tables, number);
    const cusp = cusps[i];
    return {
      number,
      cusp,
      madhya: normalizeDegrees(cusp + forwardArc(cusp, cusps[(i + 1) % 12]) / 2),
      sandhi: {
        start: normalizeDegrees(cusp - SANDHI_HALF_WIDTH_DEG),
        end: normalizeDegrees(cusp + SANDHI_HALF_WIDTH_DEG),
      },
      rasi,
      occupants: params.grahaHouses
        .filter((entry) => entry.house === number)
        .map((entry) => entry.graha),
      lord: rulerOf(params.tables, rasi),
      name: signification.name,
      sanskrit: signification.sanskrit,
      karakas: [...signification.karakas],
      significations: [...signification.significations],
      body_parts: [...signification.body_parts],
    };
  });
}

/** Cyclic house distance from `from` to `to`, counted inclusively (same house = 1). */
export function houseDistance(from: HouseNumber, to: HouseNumber): number {
  return ((to - from + 12) % 12) + 1;
}

/** House `distance` counted inclusively from `from`. */
export function houseFrom(from: HouseNumber, distance: number): HouseNumber {
  return houseAt(((from - 1 + distance - 1) % 12) + 1);
}
