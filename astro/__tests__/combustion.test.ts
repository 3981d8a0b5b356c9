import { describe, expect, it } from "vitest";
import {
  combustionOrb,
  computeCombustion,
  isCombust,
  validateCombustionPolicy,
} from "../combustion.js";
import { ConfigurationError } from "../errors.js";
import { COMBUSTION_POLICY_V1 } from "../policy/combustionPolicy.v1.js";

describe("combustion", () => {
  it("never marks the Sun or the nodes combust", () => {
    for (const graha of ["sun", "rahu", "ketu"] as const) {
      expect(combustionOrb(graha, false)).toBeNull();
      expect(isCombust(graha, 0)).toBe(false);
    }
  });

  it("uses a strict comparison against the orb", () => {
    expect(isCombust("mars", 16.99)).toBe(true);
    expect(isCombust("mars", 17)).toBe(false);
  });

  it("switches to the retrograde orb for Mercury and Venus", () => {
    expect(isCombust("mercury", 13, false)).toBe(true);
    expect(isCombust("mercury", 13, true)).toBe(false);
    expect(isCombust("venus", 9, false)).toBe(true);
    expect(isCombust("venus", 9, true)).toBe(false);
  });

  it("never turns combust as the distance grows", () => {
    let previous = true;
    for (let distance = 0; distance <= 30; distance += 0.5) {
      const current = isCombust("saturn", distance);
      if (!previous) expect(current).toBe(false);
      previous = current;
    }
  });

  it("measures the shortest arc to the Sun", () => {
    const [flag] = computeCombustion(
      [{ graha: "moon", longitude: 355, retrograde: false }],
      5
    );
    expect(flag?.distance_from_sun).toBeCloseTo(10, 9);
    expect(flag?.orb_deg).toBe(12);
    expect(flag?.combust).toBe(true);
  });

  it("rejects a policy with an invalid orb", () => {
    expect(() => validateCombustionPolicy(COMBUSTION_POLICY_V1)).not.toThrow();
    expect(() =>
      validateCombustionPolicy({
        ...COMBUSTION_POLICY_V1,
        orbs: { ...COMBUSTION_POLICY_V1.orbs, venus: { direct_deg: -1, retrograde_deg: 8 } },
      })
    ).toThrow(ConfigurationError);
  });
});
