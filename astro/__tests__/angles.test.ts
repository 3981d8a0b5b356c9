import { describe, expect, it } from "vitest";
import { angularSeparation, forwardArc, normalizeDegrees } from "../angles.js";

describe("normalizeDegrees", () => {
  it("maps any longitude into [0, 360) and is idempotent", () => {
    const samples = [-1080.5, -720, -360, -359.5, -0.25, 0, 0.5, 179.9, 359.999, 360, 725.25, 10_000];
    for (const value of samples) {
      const once = normalizeDegrees(value);
      expect(once).toBeGreaterThanOrEqual(0);
      expect(once).toBeLessThan(360);
      expect(normalizeDegrees(once)).toBe(once);
    }
  });

  it("handles negative modulo without going below zero", () => {
    expect(normalizeDegrees(-30)).toBe(330);
    expect(normalizeDegrees(-360)).toBe(0);
    expect(normalizeDegrees(370)).toBe(10);
  });
});

describe("angularSeparation", () => {
  it("returns the shortest arc across 0°", () => {
    expect(angularSeparation(355, 5)).toBe(10);
    expect(angularSeparation(5, 355)).toBe(10);
    expect(angularSeparation(0, 180)).toBe(180);
  });
});

describe("forwardArc", () => {
  it("measures from source to target in the zodiacal direction", () => {
    expect(forwardArc(350, 10)).toBe(20);
    expect(forwardArc(10, 350)).toBe(340);
    expect(forwardArc(42, 42)).toBe(0);
  });
});
