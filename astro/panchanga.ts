/**
 * Panchanga at the birth instant: tithi, nakshatra, nitya yoga, karana
 * and vara. Vara is the weekday at local mean time, not from sunrise.
 */

import { forwardArc, normalizeDegrees } from "./angles.js";
import { CalculationInvariantError } from "./errors.js";
import type { NakshatraPlacement } from "./graha.js";
import type { GrahaId } from "./reference/ids.js";
import type { ReferenceTables } from "./reference/referenceTables.js";

export type Paksha = "shukla" | "krishna";

export interface Panchanga {
  tithi: { number: number; name: string; paksha: Paksha };
  nakshatra: NakshatraPlacement;
  yoga: { number: number; name: string };
  karana: { number: number; name: string };
  vara: { number: number; name: string; lord: GrahaId };
}

function pick<T>(list: readonly T[], index: number, label: string): T {
  const value = list[index];
  if (value === undefined) {
    throw new CalculationInvariantError(`${label} index out of range`, { index });
  }
  return value;
}

export function karanaName(halfTithi: number, tables: ReferenceTables): string {
  const { movable_karanas, fixed_karanas } = tables.panchanga;
  if (halfTithi === 0) return fixed_karanas.first;
  if (halfTithi >= 57) return pick(fixed_karanas.last_three, halfTithi - 57, "Karana");
  return pick(movable_karanas, (halfTithi - 1) % 7, "Karana");
}

export function computePanchanga(params: {
  instant: Date;
  longitude: number;
  sunLongitude: number;
  moonLongitude: number;
  moonNakshatra: NakshatraPlacement;
  tables: ReferenceTables;
}): Panchanga {
  const { tables } = params;
  const elongation = forwardArc(params.sunLongitude, params.moonLongitude);

  const tithiIndex = Math.min(29, Math.floor(elongation / 12));
  const yogaIndex = Math.min(
    26,
    Math.floor(normalizeDegrees(params.sunLongitude + params.moonLongitude) / (360 / 27))
  );
  const halfTithi = Math.min(59, Math.floor(elongation / 6));

  const localMeanMs = params.instant.getTime() + (params.longitude / 15) * 3_600_000;
  const weekday = new Date(localMeanMs).getUTCDay();
  const vara = pick(tables.panchanga.varas, weekday, "Vara");

  return {
    tithi: {
      number: tithiIndex + 1,
      name: pick(tables.panchanga.tithis, tithiIndex, "Tithi"),
      paksha: tithiIndex < 15 ? "shukla" : "krishna",
    },
    nakshatra: params.moonNakshatra,
    yoga: {
      number: yogaIndex + 1,
      name: pick(tables.panchanga.nitya_yogas, yogaIndex, "Yoga"),
    },
    karana: { number: halfTithi + 1, name: karanaName(halfTithi, tables) },
    vara: { number: weekday + 1, name: vara.name, lord: vara.lord },
  };
}
