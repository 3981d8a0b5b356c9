import { describe, expect, it } from "vitest";
import { computeCharaKarakas } from "../charaKaraka.js";
import { vargaSigns } from "../vargas.js";

describe("vargaSigns", () => {
  it("starts every division from Aries at 0°", () => {
    expect(vargaSigns(0)).toEqual({
      d1: "aries",
      d2: "leo",
      d3: "aries",
      d9: "aries",
      d12: "aries",
    });
  });

  it("divides an earth sign from Capricorn", () => {
    expect(vargaSigns(45)).toEqual({
      d1: "taurus",
      d2: "leo",
      d3: "virgo",
      d9: "taurus",
      d12: "scorpio",
    });
  });

  it("ends Pisces vargottama in the navamsa", () => {
    expect(vargaSigns(359.9)).toEqual({
      d1: "pisces",
      d2: "leo",
      d3: "scorpio",
      d9: "pisces",
      d12: "aquarius",
    });
  });
});

describe("computeCharaKarakas", () => {
  it("ranks by degree with Rahu reversed and Ketu excluded", () => {
    const karakas = computeCharaKarakas([
      { graha: "sun", degree_in_rasi: 10 },
      { graha: "moon", degree_in_rasi: 25 },
      { graha: "mars", degree_in_rasi: 10 },
      { graha: "mercury", degree_in_rasi: 20 },
      { graha: "jupiter", degree_in_rasi: 15 },
      { graha: "venus", degree_in_rasi: 2 },
      { graha: "saturn", degree_in_rasi: 28 },
      { graha: "rahu", degree_in_rasi: 1 },
      { graha: "ketu", degree_in_rasi: 29.5 },
    ]);
    expect(karakas.map((k) => [k.code, k.graha])).toEqual([
      ["AK", "rahu"],
      ["AmK", "saturn"],
      ["BK", "moon"],
      ["MK", "mercury"],
      ["PiK", "jupiter"],
      ["PK", "sun"],
      ["GK", "mars"],
      ["DK", "venus"],
    ]);
    expect(karakas[0]).toEqual({
      code: "AK",
      name: "Atmakaraka",
      graha: "rahu",
      effective_degree: 29,
    });
  });
});
