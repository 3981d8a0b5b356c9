/**
 * Chart aggregator.
 *
 * Pure and synchronous: tropical positions from the ephemeris plus the
 * normalized birth input become one frozen Chart. The async boundary
 * (ephemeris calls, logging) lives in computeChart.
 */

import { normalizeDegrees } from "./angles.js";
import { ayanamsaForJulianDay } from "./ayanamsa.js";
import { computeCharaKarakas } from "./charaKaraka.js";
import { computeCombustion } from "./combustion.js";
import {
  ascendantLongitude,
  localSiderealTime,
  meanObliquity,
  midheavenLongitude,
} from "./coordinates.js";
import { dignity, maitriMatrix } from "./dignity.js";
import {
  computeGrahaAspects,
  computeHouseAspects,
  computeRasiAspects,
} from "./drishti.js";
import { getEngineContext, type EngineContext } from "./engineContext.js";
import { CalculationInvariantError } from "./errors.js";
import { deepFreeze } from "./freeze.js";
import { buildGrahaPlacements, findPlacement, placeLongitude } from "./graha.js";
import { buildBhavas, houseSystemHandler } from "./houses.js";
import { julianDay } from "./julianDate.js";
import { analyzeLordship, groupsFor } from "./lordship.js";
import { computePanchanga } from "./panchanga.js";
import { byGraha, type EphemerisBody, type GrahaId, type HouseNumber } from "./reference/ids.js";
import type { NormalizedBirthInput } from "./schemas/birthInput.schema.js";
import {
  CHART_SCHEMA_VERSION,
  ChartSchema,
  type Chart,
  type ChartDraft,
} from "./schemas/chart.schema.js";
import { computeHouseStrengths, computePlanetStrengths } from "./strength.js";
import { vargaSigns } from "./vargas.js";
import { detectYogas } from "./yogas.js";

export interface TropicalPosition {
  longitude: number;
  retrograde: boolean;
}

export interface AssembleChartInput {
  birth: NormalizedBirthInput;
  tropical: Readonly<Record<EphemerisBody, TropicalPosition>>;
  /** Provider-supplied obliquity; the mean-obliquity polynomial otherwise. */
  obliquity?: number;
  ephemerisName: string;
}

interface SiderealFrame {
  ascendant_sidereal?: number;
  sidereal_positions?: Record<string, number>;
}

export function assembleChart(
  input: AssembleChartInput,
  context: EngineContext = getEngineContext()
): Chart {
  const { birth, tropical } = input;
  const { tables } = context;

  const jd = julianDay(birth.instant);
  const ayanamsa = ayanamsaForJulianDay(jd, birth.ayanamsa);
  const obliquity = input.obliquity ?? meanObliquity(jd);
  const lst = localSiderealTime(birth.instant, birth.longitude);
  const ascendantTropical = ascendantLongitude(lst, birth.latitude, obliquity);
  const midheavenTropical = midheavenLongitude(lst, obliquity);
  const sidereal = (lon: number) => normalizeDegrees(lon - ayanamsa);
  const fortuneTropical = normalizeDegrees(
    ascendantTropical + tropical.moon.longitude - tropical.sun.longitude
  );

  // Filled in as it is computed, for the invariant error context.
  const siderealFrame: SiderealFrame = {};
  const chartContext = (): Record<string, unknown> => ({
    input: { ...birth, instant: birth.utc_instant },
    julian_day: jd,
    ayanamsa_deg: ayanamsa,
    obliquity_deg: obliquity,
    ascendant_tropical: ascendantTropical,
    tropical_positions: tropical,
    ...siderealFrame,
    ephemeris: input.ephemerisName,
  });

  try {
    const ascendant = sidereal(ascendantTropical);
    siderealFrame.ascendant_sidereal = ascendant;
    const placements = buildGrahaPlacements(
      {
        sun: { longitude: sidereal(tropical.sun.longitude), retrograde: tropical.sun.retrograde },
        moon: { longitude: sidereal(tropical.moon.longitude), retrograde: tropical.moon.retrograde },
        mars: { longitude: sidereal(tropical.mars.longitude), retrograde: tropical.mars.retrograde },
        mercury: {
          longitude: sidereal(tropical.mercury.longitude),
          retrograde: tropical.mercury.retrograde,
        },
        jupiter: {
          longitude: sidereal(tropical.jupiter.longitude),
          retrograde: tropical.jupiter.retrograde,
        },
        venus: { longitude: sidereal(tropical.venus.longitude), retrograde: tropical.venus.retrograde },
        saturn: {
          longitude: sidereal(tropical.saturn.longitude),
          retrograde: tropical.saturn.retrograde,
        },
        rahu: { longitude: sidereal(tropical.rahu.longitude), retrograde: true },
      },
      tables
    );
    siderealFrame.sidereal_positions = Object.fromEntries(
      placements.map((p) => [p.graha, p.longitude])
    );

    const handler = houseSystemHandler(birth.house_system);
    const houses: Record<GrahaId, HouseNumber> = byGraha((graha) =>
      handler.houseOf(findPlacement(placements, graha).longitude, ascendant)
    );
    const grahaHouses = placements.map((p) => ({ graha: p.graha, house: houses[p.graha] }));

    const bhavas = buildBhavas({
      ascendant,
      houseSystem: birth.house_system,
      grahaHouses,
      tables,
    });

    const aspectPoints = placements.map((p) => ({
      graha: p.graha,
      house: houses[p.graha],
      longitude: p.longitude,
    }));
    const houseAspects = computeHouseAspects(aspectPoints);
    const grahaAspects = computeGrahaAspects(aspectPoints);

    const sun = findPlacement(placements, "sun");
    const moon = findPlacement(placements, "moon");
    const combustion = computeCombustion(placements, sun.longitude, context.combustionPolicy);
    const combust = byGraha((graha) => findPlacement(combustion, graha).combust);

    const dignities = byGraha((graha) => {
      const placement = findPlacement(placements, graha);
      return dignity(graha, placement.rasi, {
        degree_in_rasi: placement.degree_in_rasi,
        houses,
        tables,
      });
    });

    const ascendantPoint = placeLongitude(ascendant, tables);
    const lordship = analyzeLordship({
      ascendantRasi: ascendantPoint.rasi,
      bhavas,
      grahaHouses: houses,
      combust,
      tables,
      policy: context.lordshipPolicy,
    });

    const strengthGrahas = placements.map((p) => ({
      graha: p.graha,
      longitude: p.longitude,
      house: houses[p.graha],
      dignity_score: dignities[p.graha].score,
      combust: combust[p.graha],
    }));
    const houseStrengths = computeHouseStrengths({
      bhavas,
      grahas: strengthGrahas,
      houseAspects,
      policy: context.strengthPolicy,
      lordship: context.lordshipPolicy,
    });
    const planetStrengths = computePlanetStrengths({
      grahas: strengthGrahas,
      grahaAspects,
      policy: context.strengthPolicy,
      lordship: context.lordshipPolicy,
    });

    const yogas = detectYogas({
      grahas: placements.map((p) => ({ graha: p.graha, rasi: p.rasi, house: houses[p.graha] })),
      housesRuled: byGraha(
        (graha) => findPlacement(lordship.grahas, graha).houses_ruled
      ),
      grahaAspects,
      tables,
      policy: context.lordshipPolicy,
    });

    const draft: ChartDraft = {
      input: {
        utc_instant: birth.utc_instant,
        latitude: birth.latitude,
        longitude: birth.longitude,
        ayanamsa: birth.ayanamsa,
        house_system: birth.house_system,
      },
      meta: {
        schema_version: CHART_SCHEMA_VERSION,
        ephemeris: input.ephemerisName,
        julian_day: jd,
        ayanamsa_deg: ayanamsa,
        obliquity_deg: obliquity,
        local_sidereal_time_hours: lst,
        policies: {
          strength: context.strengthPolicy.strength_policy_version,
          lordship: context.lordshipPolicy.lordship_policy_version,
          combustion: context.combustionPolicy.combustion_policy_version,
        },
      },
      ascendant: { tropical_longitude: ascendantTropical, ...ascendantPoint },
      midheaven: {
        tropical_longitude: midheavenTropical,
        ...placeLongitude(sidereal(midheavenTropical), tables),
      },
      part_of_fortune: {
        tropical_longitude: fortuneTropical,
        ...placeLongitude(sidereal(fortuneTropical), tables),
      },
      grahas: placements.map((p) => ({
        graha: p.graha,
        tropical_longitude: normalizeDegrees(
          p.graha === "ketu" ? tropical.rahu.longitude + 180 : tropical[p.graha].longitude
        ),
        longitude: p.longitude,
        rasi: p.rasi,
        degree_in_rasi: p.degree_in_rasi,
        nakshatra: p.nakshatra,
        house: houses[p.graha],
        retrograde: p.retrograde,
        combust: combust[p.graha],
        dignity: dignities[p.graha],
        vargas: vargaSigns(p.longitude),
      })),
      bhavas: bhavas.map((bhava) => {
        const strength = findHouse(houseStrengths, bhava.number);
        return {
          ...bhava,
          lord_combust: combust[bhava.lord],
          classification: groupsFor([bhava.number], context.lordshipPolicy),
          strength: { score: strength.score, category: strength.category },
        };
      }),
      aspects: {
        graha_to_house: houseAspects,
        graha_to_graha: grahaAspects,
        rasi: computeRasiAspects(tables),
      },
      combustion,
      maitri: maitriMatrix(houses, tables),
      lordship,
      strengths: { houses: houseStrengths, planets: planetStrengths },
      yogas,
      chara_karakas: computeCharaKarakas(placements),
      panchanga: computePanchanga({
        instant: birth.instant,
        longitude: birth.longitude,
        sunLongitude: sun.longitude,
        moonLongitude: moon.longitude,
        moonNakshatra: moon.nakshatra,
        tables,
      }),
    };

    const parsed = ChartSchema.safeParse(draft);
    if (!parsed.success) {
      throw new CalculationInvariantError("Assembled chart does not match ChartSchema", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return deepFreeze(parsed.data);
  } catch (err) {
    if (err instanceof CalculationInvariantError) {
      throw new CalculationInvariantError(err.message, { ...err.context, ...chartContext() });
    }
    throw err;
  }
}

function findHouse<T extends { house: HouseNumber }>(list: readonly T[], house: HouseNumber): T {
  const found = list.find((entry) => entry.house === house);
  if (!found) {
    throw new CalculationInvariantError(`No strength computed for house ${house}`);
  }
  return found;
}
