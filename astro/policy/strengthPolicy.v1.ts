/**
 * Strength Policy v1
 *
 * Weights and component values for house (bhava) and planet (graha)
 * strength. Every component is scored in [0, 1]; weights within each
 * group sum to 1 so the final score is also in [0, 1].
 */

export type StrengthCategory = "very_strong" | "strong" | "moderate" | "weak" | "very_weak";

export interface HouseStrengthWeights {
  /** Inherent strength of the house by group */
  base: number;
  /** Mean dignity of occupants */
  occupants: number;
  /** Benefic minus malefic aspects received */
  aspects: number;
  /** Lord dignity adjusted for lord placement */
  lord: number;
  /** Lord free of combustion */
  combustion: number;
}

export interface PlanetStrengthWeights {
  dignity: number;
  placement: number;
  aspects: number;
  combustion: number;
}

export interface StrengthPolicyV1 {
  strength_policy_version: string;
  house_weights: HouseStrengthWeights;
  planet_weights: PlanetStrengthWeights;
  house_base: {
    lagna: number;
    kendra_or_trikona: number;
    upachaya: number;
    dusthana: number;
    other: number;
  };
  /** Occupant component for an empty house */
  empty_house_occupants: number;
  /** Aspect component starts here and moves by `aspect_step` per aspect */
  aspect_neutral: number;
  aspect_step: number;
  /** Added to lord component when the lord sits in a kendra/trikona, subtracted in a dusthana */
  lord_placement_adjustment: number;
  /** Lower bounds, checked in order */
  category_thresholds: Array<{ category: StrengthCategory; min: number }>;
}

export const STRENGTH_POLICY_V1: StrengthPolicyV1 = {
  strength_policy_version: "strength_v1",
  house_weights: {
    base: 0.15,
    occupants: 0.25,
    aspects: 0.2,
    lord: 0.3,
    combustion: 0.1,
  },
  planet_weights: {
    dignity: 0.5,
    placement: 0.2,
    aspects: 0.15,
    combustion: 0.15,
  },
  house_base: {
    lagna: 1.0,
    kendra_or_trikona: 0.8,
    upachaya: 0.6,
    dusthana: 0.2,
    other: 0.5,
  },
  empty_house_occupants: 0.5,
  aspect_neutral: 0.5,
  aspect_step: 0.1,
  lord_placement_adjustment: 0.2,
  category_thresholds: [
    { category: "very_strong", min: 0.8 },
    { category: "strong", min: 0.6 },
    { category: "moderate", min: 0.4 },
    { category: "weak", min: 0.2 },
    { category: "very_weak", min: 0 },
  ],
};
