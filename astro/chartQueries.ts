/**
 * Read-only query surface over a finished chart.
 */

import { roundTo } from "./angles.js";
import { CalculationInvariantError } from "./errors.js";
import { STRENGTH_POLICY_V1, type StrengthCategory, type StrengthPolicyV1 } from "./policy/strengthPolicy.v1.js";
import type { GrahaId, RasiId } from "./reference/ids.js";
import type { Bhava, Chart, ChartAspects, GrahaPosition } from "./schemas/chart.schema.js";
import { categorize } from "./strength.js";

export interface AscendantView {
  longitude: number;
  rasi: RasiId;
  degree: number;
  nakshatra: string;
  pada: number;
}

export function getAscendant(chart: Chart): AscendantView {
  return {
    longitude: chart.ascendant.longitude,
    rasi: chart.ascendant.rasi,
    degree: chart.ascendant.degree_in_rasi,
    nakshatra: chart.ascendant.nakshatra.name,
    pada: chart.ascendant.nakshatra.pada,
  };
}

export function getGrahaPositions(chart: Chart): readonly GrahaPosition[] {
  return chart.grahas;
}

export function getGrahaPosition(chart: Chart, graha: GrahaId): GrahaPosition {
  const found = chart.grahas.find((entry) => entry.graha === graha);
  if (!found) {
    throw new CalculationInvariantError(`Chart has no position for ${graha}`);
  }
  return found;
}

export function getBhavas(chart: Chart): readonly Bhava[] {
  return chart.bhavas;
}

export function getBhava(chart: Chart, house: number): Bhava {
  const found = chart.bhavas.find((bhava) => bhava.number === house);
  if (!found) {
    throw new RangeError(`House must be 1–12, got ${house}`);
  }
  return found;
}

export function getAspects(chart: Chart): ChartAspects {
  return chart.aspects;
}

export interface ChartSummary {
  ascendant: AscendantView;
  moon_rasi: RasiId;
  sun_rasi: RasiId;
  strongest_bhavas: number[];
  weakest_bhavas: number[];
  exalted: GrahaId[];
  moolatrikona: GrahaId[];
  own_sign: GrahaId[];
  debilitated: GrahaId[];
  combust: GrahaId[];
  /** Nodes are always retrograde and are left out. */
  retrograde: GrahaId[];
  yoga_karakas: GrahaId[];
  yogas: string[];
  overall_strength: { score: number; category: StrengthCategory };
}

function housesWithScore(chart: Chart, pick: (scores: number[]) => number): number[] {
  const scores = chart.bhavas.map((bhava) => bhava.strength.score);
  const target = pick(scores);
  return chart.bhavas
    .filter((bhava) => bhava.strength.score === target)
    .map((bhava) => bhava.number);
}

export function getChartSummary(
  chart: Chart,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): ChartSummary {
  const withStatus = (status: GrahaPosition["dignity"]["status"]) =>
    chart.grahas.filter((g) => g.dignity.status === status).map((g) => g.graha);
  const overall = roundTo(
    chart.bhavas.reduce((sum, bhava) => sum + bhava.strength.score, 0) / chart.bhavas.length,
    4
  );

  return {
    ascendant: getAscendant(chart),
    moon_rasi: getGrahaPosition(chart, "moon").rasi,
    sun_rasi: getGrahaPosition(chart, "sun").rasi,
    strongest_bhavas: housesWithScore(chart, (scores) => Math.max(...scores)),
    weakest_bhavas: housesWithScore(chart, (scores) => Math.min(...scores)),
    exalted: withStatus("exalted"),
    moolatrikona: withStatus("moolatrikona"),
    own_sign: withStatus("own_sign"),
    debilitated: withStatus("debilitated"),
    combust: chart.grahas.filter((g) => g.combust).map((g) => g.graha),
    retrograde: chart.grahas
      .filter((g) => g.retrograde && g.graha !== "rahu" && g.graha !== "ketu")
      .map((g) => g.graha),
    yoga_karakas: chart.lordship.yoga_karakas,
    yogas: chart.yogas.map((yoga) => yoga.name),
    overall_strength: { score: overall, category: categorize(overall, policy) },
  };
}
