import { describe, expect, it } from "vitest";
import { buildGrahaPlacements, findPlacement, placeLongitude } from "../graha.js";
import { getReferenceTables } from "../reference/referenceTables.js";

const tables = getReferenceTables();

describe("placeLongitude", () => {
  it("places 0° at Aries 0, Ashwini pada 1", () => {
    const p = placeLongitude(0, tables);
    expect(p.rasi).toBe("aries");
    expect(p.degree_in_rasi).toBe(0);
    expect(p.nakshatra).toEqual({ index: 0, name: "Ashwini", lord: "ketu", pada: 1 });
  });

  it("places the last arc of the zodiac in Revati pada 4", () => {
    const p = placeLongitude(359.99, tables);
    expect(p.rasi).toBe("pisces");
    expect(p.nakshatra.name).toBe("Revati");
    expect(p.nakshatra.pada).toBe(4);
  });

  it("steps pada every 3°20′", () => {
    expect(placeLongitude(3.4, tables).nakshatra.pada).toBe(2);
    expect(placeLongitude(6.7, tables).nakshatra.pada).toBe(3);
    expect(placeLongitude(10.1, tables).nakshatra.pada).toBe(4);
    expect(placeLongitude(13.4, tables).nakshatra).toEqual({
      index: 1,
      name: "Bharani",
      lord: "venus",
      pada: 1,
    });
  });

  it("normalizes before deriving anything", () => {
    const p = placeLongitude(-30, tables);
    expect(p.longitude).toBe(330);
    expect(p.rasi).toBe("pisces");
    expect(p.degree_in_rasi).toBe(0);
  });
});

describe("buildGrahaPlacements", () => {
  const input = {
    sun: { longitude: 30.5, retrograde: false },
    moon: { longitude: 100, retrograde: false },
    mars: { longitude: 200, retrograde: false },
    mercury: { longitude: 40, retrograde: true },
    jupiter: { longitude: 70, retrograde: false },
    venus: { longitude: 350, retrograde: false },
    saturn: { longitude: 270, retrograde: true },
    rahu: { longitude: 290, retrograde: false },
  };
  const placements = buildGrahaPlacements(input, tables);

  it("returns the nine grahas in enumeration order", () => {
    expect(placements.map((p) => p.graha)).toEqual([
      "sun",
      "moon",
      "mars",
      "mercury",
      "jupiter",
      "venus",
      "saturn",
      "rahu",
      "ketu",
    ]);
  });

  it("keeps Rahu and Ketu exactly 180° apart, both retrograde", () => {
    const rahu = findPlacement(placements, "rahu");
    const ketu = findPlacement(placements, "ketu");
    expect(Math.abs(rahu.longitude - ketu.longitude) % 360).toBe(180);
    expect(ketu.longitude).toBe(110);
    expect(rahu.retrograde).toBe(true);
    expect(ketu.retrograde).toBe(true);
  });

  it("keeps the provider's retrograde flag for other grahas", () => {
    expect(findPlacement(placements, "mercury").retrograde).toBe(true);
    expect(findPlacement(placements, "sun").retrograde).toBe(false);
  });
});
