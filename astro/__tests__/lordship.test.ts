import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import {
  functionalNature,
  groupsFor,
  housesRuledBy,
  validateLordshipPolicy,
  yogaKarakasFor,
} from "../lordship.js";
import { LORDSHIP_POLICY_V1 } from "../policy/lordshipPolicy.v1.js";
import { GRAHA_IDS } from "../reference/ids.js";
import { getReferenceTables } from "../reference/referenceTables.js";

const tables = getReferenceTables();

describe("lordship", () => {
  it("assigns each house to the ruler of its sign", () => {
    const ruled = housesRuledBy("virgo", tables);
    expect(ruled.mercury).toEqual([1, 10]);
    expect(ruled.saturn).toEqual([5, 6]);
    expect(ruled.moon).toEqual([11]);
    expect(ruled.rahu).toEqual([]);
    expect(ruled.ketu).toEqual([]);
  });

  it("lists house groups in fixed order", () => {
    expect(groupsFor([1, 10])).toEqual(["kendra", "trikona", "upachaya"]);
    expect(groupsFor([2, 7])).toEqual(["kendra", "maraka"]);
  });

  it("finds the classical yoga karakas", () => {
    expect(yogaKarakasFor("taurus", tables)).toEqual(["saturn"]);
    expect(yogaKarakasFor("libra", tables)).toEqual(["saturn"]);
    expect(yogaKarakasFor("cancer", tables)).toEqual(["mars"]);
    expect(yogaKarakasFor("leo", tables)).toEqual(["mars"]);
    expect(yogaKarakasFor("capricorn", tables)).toEqual(["venus"]);
    expect(yogaKarakasFor("aquarius", tables)).toEqual(["venus"]);
    expect(yogaKarakasFor("virgo", tables)).toEqual([]);
  });

  it("derives functional natures for a Virgo ascendant", () => {
    const ruled = housesRuledBy("virgo", tables);
    const natures = Object.fromEntries(
      GRAHA_IDS.map((graha) => [graha, functionalNature(graha, "virgo", ruled[graha])])
    );
    expect(natures).toEqual({
      sun: "malefic",
      moon: "malefic",
      mars: "malefic",
      mercury: "benefic",
      jupiter: "benefic",
      venus: "benefic",
      saturn: "neutral",
      rahu: "neutral",
      ketu: "neutral",
    });
  });

  it("requires an override for every conflicted lord", () => {
    expect(() => validateLordshipPolicy(LORDSHIP_POLICY_V1, tables)).not.toThrow();

    const incomplete = {
      ...LORDSHIP_POLICY_V1,
      conflicted_lord_overrides: { ...LORDSHIP_POLICY_V1.conflicted_lord_overrides, virgo: {} },
    };
    expect(() => validateLordshipPolicy(incomplete, tables)).toThrow(
      "Lordship policy lordship_v1 lacks overrides for virgo:saturn"
    );
    expect(() => functionalNature("saturn", "virgo", [5, 6], incomplete)).toThrow(
      ConfigurationError
    );
  });
});
