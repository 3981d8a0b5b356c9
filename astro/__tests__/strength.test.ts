import { describe, expect, it } from "vitest";
import { STRENGTH_POLICY_V1 } from "../policy/strengthPolicy.v1.js";
import {
  categorize,
  computeHouseStrengths,
  computePlanetStrengths,
  dignityComponent,
  houseBase,
  naturalNatures,
  validateStrengthPolicy,
  type StrengthGraha,
} from "../strength.js";
import { ConfigurationError } from "../errors.js";

const JUPITER_IN_LAGNA: StrengthGraha = {
  graha: "jupiter",
  longitude: 95,
  house: 1,
  dignity_score: 9,
  combust: false,
};

describe("strength policy", () => {
  it("accepts the shipped policy", () => {
    expect(() => validateStrengthPolicy(STRENGTH_POLICY_V1)).not.toThrow();
  });

  it("rejects weights that do not sum to 1", () => {
    expect(() =>
      validateStrengthPolicy({
        ...STRENGTH_POLICY_V1,
        planet_weights: { dignity: 0.6, placement: 0.2, aspects: 0.15, combustion: 0.15 },
      })
    ).toThrow(ConfigurationError);
  });

  it("categorizes by descending lower bounds", () => {
    expect(categorize(0.8)).toBe("very_strong");
    expect(categorize(0.7999)).toBe("strong");
    expect(categorize(0.4)).toBe("moderate");
    expect(categorize(0.1)).toBe("very_weak");
  });
});

describe("strength components", () => {
  it("maps dignity scores onto [0, 1]", () => {
    expect(dignityComponent(9)).toBe(1);
    expect(dignityComponent(5)).toBe(0.5);
    expect(dignityComponent(1)).toBe(0);
  });

  it("scores houses by group with lagna highest", () => {
    expect(houseBase(1)).toBe(1);
    expect(houseBase(4)).toBe(0.8);
    expect(houseBase(9)).toBe(0.8);
    expect(houseBase(3)).toBe(0.6);
    expect(houseBase(11)).toBe(0.6);
    expect(houseBase(8)).toBe(0.2);
    expect(houseBase(12)).toBe(0.2);
    expect(houseBase(2)).toBe(0.5);
  });

  it("scores the sixth house as a dusthana although it is also upachaya", () => {
    expect(houseBase(6)).toBe(STRENGTH_POLICY_V1.house_base.dusthana);
    expect(houseBase(6)).toBe(0.2);
  });

  it("treats a waning Moon and an afflicted Mercury as malefic", () => {
    const natures = naturalNatures([
      { graha: "sun", longitude: 10, house: 3, dignity_score: 4, combust: false },
      { graha: "moon", longitude: 200, house: 9, dignity_score: 4, combust: false },
      { graha: "mercury", longitude: 20, house: 3, dignity_score: 4, combust: true },
    ]);
    expect(natures.moon).toBe("malefic");
    expect(natures.mercury).toBe("malefic");
    expect(natures.jupiter).toBe("benefic");
    expect(natures.rahu).toBe("malefic");
  });

  it("treats a waxing Moon as benefic", () => {
    const natures = naturalNatures([
      { graha: "sun", longitude: 10, house: 3, dignity_score: 4, combust: false },
      { graha: "moon", longitude: 100, house: 6, dignity_score: 4, combust: false },
    ]);
    expect(natures.moon).toBe("benefic");
    expect(natures.mercury).toBe("benefic");
  });
});

describe("computeHouseStrengths", () => {
  const [first, second] = computeHouseStrengths({
    bhavas: [
      { number: 1, occupants: ["jupiter"], lord: "jupiter" },
      { number: 2, occupants: [], lord: "jupiter" },
    ],
    grahas: [JUPITER_IN_LAGNA],
    houseAspects: [
      { source: "saturn", source_house: 7, target_house: 1, distance: 7, type: "full" },
    ],
  });

  it("weighs occupants, aspects, lord and combustion", () => {
    expect(first?.components).toEqual({
      base: 1,
      occupants: 1,
      aspects: 0.4,
      lord: 1,
      combustion: 1,
    });
    expect(first?.score).toBe(0.88);
    expect(first?.category).toBe("very_strong");
  });

  it("uses the neutral values for an empty, unaspected house", () => {
    expect(second?.components).toEqual({
      base: 0.5,
      occupants: 0.5,
      aspects: 0.5,
      lord: 1,
      combustion: 1,
    });
    expect(second?.score).toBe(0.7);
    expect(second?.category).toBe("strong");
  });
});

describe("computePlanetStrengths", () => {
  it("combines dignity, placement, aspects and combustion", () => {
    const [strength] = computePlanetStrengths({ grahas: [JUPITER_IN_LAGNA], grahaAspects: [] });
    expect(strength).toEqual({
      graha: "jupiter",
      score: 0.925,
      category: "very_strong",
      components: { dignity: 1, placement: 1, aspects: 0.5, combustion: 1 },
    });
  });

  it("zeroes the combustion component for a combust graha", () => {
    const [strength] = computePlanetStrengths({
      grahas: [{ ...JUPITER_IN_LAGNA, combust: true }],
      grahaAspects: [],
    });
    expect(strength?.components.combustion).toBe(0);
    expect(strength?.score).toBe(0.775);
  });
});
