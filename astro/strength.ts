/**
 * Strength analyzer: weighted house and planet strength.
 * Weights and component values come from the strength policy.
 */

import { z } from "zod";
import { forwardArc, roundTo } from "./angles.js";
import type { GrahaAspect, HouseAspect } from "./drishti.js";
import { ConfigurationError } from "./errors.js";
import {
  LORDSHIP_POLICY_V1,
  type LordshipPolicyV1,
} from "./policy/lordshipPolicy.v1.js";
import {
  STRENGTH_POLICY_V1,
  type StrengthCategory,
  type StrengthPolicyV1,
} from "./policy/strengthPolicy.v1.js";
import { byGraha, type GrahaId, type HouseNumber } from "./reference/ids.js";

export type NaturalNature = "benefic" | "malefic";

export interface HouseStrength {
  house: HouseNumber;
  score: number;
  category: StrengthCategory;
  components: {
    base: number;
    occupants: number;
    aspects: number;
    lord: number;
    combustion: number;
  };
}

export interface PlanetStrength {
  graha: GrahaId;
  score: number;
  category: StrengthCategory;
  components: {
    dignity: number;
    placement: number;
    aspects: number;
    combustion: number;
  };
}

export interface StrengthGraha {
  graha: GrahaId;
  longitude: number;
  house: HouseNumber;
  dignity_score: number;
  combust: boolean;
}

const WeightsSchema = z
  .record(z.string(), z.number().min(0).max(1))
  .refine(
    (weights) => Math.abs(Object.values(weights).reduce((sum, w) => sum + w, 0) - 1) < 1e-9,
    { message: "weights must sum to 1" }
  );

const StrengthPolicySchema = z.object({
  strength_policy_version: z.string().min(1),
  house_weights: WeightsSchema,
  planet_weights: WeightsSchema,
  house_base: z.record(z.string(), z.number().min(0).max(1)),
  empty_house_occupants: z.number().min(0).max(1),
  aspect_neutral: z.number().min(0).max(1),
  aspect_step: z.number().min(0).max(1),
  lord_placement_adjustment: z.number().min(0).max(1),
  category_thresholds: z
    .array(z.object({ category: z.string(), min: z.number().min(0).max(1) }))
    .min(1)
    .refine((list) => list.every((entry, i) => i === 0 || entry.min < (list[i - 1]?.min ?? 1)), {
      message: "category thresholds must be strictly descending",
    })
    .refine((list) => list[list.length - 1]?.min === 0, {
      message: "last category threshold must be 0",
    }),
});

export function validateStrengthPolicy(policy: StrengthPolicyV1): void {
  const result = StrengthPolicySchema.safeParse(policy);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Strength policy ${policy.strength_policy_version} is invalid: ${issues}`
    );
  }
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function categorize(
  score: number,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): StrengthCategory {
  const match = policy.category_thresholds.find((entry) => score >= entry.min);
  return match ? match.category : "very_weak";
}

/** Dignity score 1–9 mapped onto [0, 1]. */
export function dignityComponent(score: number): number {
  return clamp01((score - 1) / 8);
}

export function houseBase(
  house: HouseNumber,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1,
  lordship: LordshipPolicyV1 = LORDSHIP_POLICY_V1
): number {
  const groups = lordship.house_groups;
  if (house === 1) return policy.house_base.lagna;
  if (groups.kendra.includes(house) || groups.trikona.includes(house)) {
    return policy.house_base.kendra_or_trikona;
  }
  // 6 is both dusthana and upachaya; dusthana wins.
  if (groups.dusthana.includes(house)) return policy.house_base.dusthana;
  if (groups.upachaya.includes(house)) return policy.house_base.upachaya;
  return policy.house_base.other;
}

const ALWAYS_MALEFIC: ReadonlySet<GrahaId> = new Set(["sun", "mars", "saturn", "rahu", "ketu"]);

/**
 * Natural benefic/malefic. The Moon is benefic while waxing; Mercury is
 * benefic unless it shares a house with a natural malefic.
 */
export function naturalNatures(grahas: readonly StrengthGraha[]): Record<GrahaId, NaturalNature> {
  const get = (id: GrahaId) => grahas.find((entry) => entry.graha === id);
  const sun = get("sun");
  const moon = get("moon");
  const moonWaxing = sun && moon ? forwardArc(sun.longitude, moon.longitude) < 180 : true;

  const base = (graha: GrahaId): NaturalNature => {
    if (ALWAYS_MALEFIC.has(graha)) return "malefic";
    if (graha === "moon") return moonWaxing ? "benefic" : "malefic";
    return "benefic";
  };

  const mercury = get("mercury");
  const mercuryAfflicted =
    mercury !== undefined &&
    grahas.some(
      (entry) =>
        entry.graha !== "mercury" && entry.house === mercury.house && base(entry.graha) === "malefic"
    );

  return byGraha((graha) => (graha === "mercury" && mercuryAfflicted ? "malefic" : base(graha)));
}

function aspectComponent(
  sources: readonly GrahaId[],
  natures: Readonly<Record<GrahaId, NaturalNature>>,
  policy: StrengthPolicyV1
): number {
  const delta = sources.reduce(
    (sum, source) => sum + (natures[source] === "benefic" ? policy.aspect_step : -policy.aspect_step),
    0
  );
  return clamp01(policy.aspect_neutral + delta);
}

function lordComponent(
  lord: StrengthGraha,
  policy: StrengthPolicyV1,
  lordship: LordshipPolicyV1
): number {
  const groups = lordship.house_groups;
  let adjustment = 0;
  if (groups.kendra.includes(lord.house) || groups.trikona.includes(lord.house)) {
    adjustment = policy.lord_placement_adjustment;
  } else if (groups.dusthana.includes(lord.house)) {
    adjustment = -policy.lord_placement_adjustment;
  }
  return clamp01(dignityComponent(lord.dignity_score) + adjustment);
}

export function computeHouseStrengths(params: {
  bhavas: ReadonlyArray<{ number: HouseNumber; occupants: readonly GrahaId[]; lord: GrahaId }>;
  grahas: readonly StrengthGraha[];
  houseAspects: readonly HouseAspect[];
  policy?: StrengthPolicyV1;
  lordship?: LordshipPolicyV1;
}): HouseStrength[] {
  const policy = params.policy ?? STRENGTH_POLICY_V1;
  const lordship = params.lordship ?? LORDSHIP_POLICY_V1;
  const natures = naturalNatures(params.grahas);
  const weights = policy.house_weights;
  const find = (id: GrahaId): StrengthGraha | undefined =>
    params.grahas.find((entry) => entry.graha === id);

  return params.bhavas.map((bhava) => {
    const occupantScores = bhava.occupants.flatMap((id) => {
      const entry = find(id);
      return entry ? [dignityComponent(entry.dignity_score)] : [];
    });
    const occupants = occupantScores.length
      ? occupantScores.reduce((sum, v) => sum + v, 0) / occupantScores.length
      : policy.empty_house_occupants;

    const aspectSources = params.houseAspects
      .filter((aspect) => aspect.target_house === bhava.number)
      .map((aspect) => aspect.source);
    const aspects = aspectComponent(aspectSources, natures, policy);

    const lord = find(bhava.lord);
    const lordScore = lord ? lordComponent(lord, policy, lordship) : 0;
    const combustion = lord && lord.combust ? 0 : 1;
    const base = houseBase(bhava.number, policy, lordship);

    const score = roundTo(
      weights.base * base +
        weights.occupants * occupants +
        weights.aspects * aspects +
        weights.lord * lordScore +
        weights.combustion * combustion,
      4
    );

    return {
      house: bhava.number,
      score,
      category: categorize(score, policy),
      components: {
        base,
        occupants: roundTo(occupants, 4),
        aspects: roundTo(aspects, 4),
        lord: roundTo(lordScore, 4),
        combustion,
      },
    };
  });
}

export function computePlanetStrengths(params: {
  grahas: readonly StrengthGraha[];
  grahaAspects: readonly GrahaAspect[];
  policy?: StrengthPolicyV1;
  lordship?: LordshipPolicyV1;
}): PlanetStrength[] {
  const policy = params.policy ?? STRENGTH_POLICY_V1;
  const lordship = params.lordship ?? LORDSHIP_POLICY_V1;
  const natures = naturalNatures(params.grahas);
  const weights = policy.planet_weights;

  return params.grahas.map((entry) => {
    const dignity = dignityComponent(entry.dignity_score);
    const placement = houseBase(entry.house, policy, lordship);
    const aspectSources = params.grahaAspects
      .filter((aspect) => aspect.target === entry.graha)
      .map((aspect) => aspect.source);
    const aspects = aspectComponent(aspectSources, natures, policy);
    const combustion = entry.combust ? 0 : 1;

    const score = roundTo(
      weights.dignity * dignity +
        weights.placement * placement +
        weights.aspects * aspects +
        weights.combustion * combustion,
      4
    );

    return {
      graha: entry.graha,
      score,
      category: categorize(score, policy),
      components: {
        dignity: roundTo(dignity, 4),
        placement,
        aspects: roundTo(aspects, 4),
        combustion,
      },
    };
  });
}
