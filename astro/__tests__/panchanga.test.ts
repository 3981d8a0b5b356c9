import { describe, expect, it } from "vitest";
import { placeLongitude } from "../graha.js";
import { computePanchanga, karanaName } from "../panchanga.js";
import { getReferenceTables } from "../reference/referenceTables.js";

const tables = getReferenceTables();
// 2024-01-07 is a Sunday.
const SUNDAY_MIDNIGHT_UTC = new Date("2024-01-07T00:00:00Z");

function panchanga(sunLongitude: number, moonLongitude: number, longitude = 0) {
  return computePanchanga({
    instant: SUNDAY_MIDNIGHT_UTC,
    longitude,
    sunLongitude,
    moonLongitude,
    moonNakshatra: placeLongitude(moonLongitude, tables).nakshatra,
    tables,
  });
}

describe("computePanchanga", () => {
  it("opens the lunar month at new moon", () => {
    const result = panchanga(0, 0.5);
    expect(result.tithi).toEqual({ number: 1, name: "Pratipada", paksha: "shukla" });
    expect(result.karana).toEqual({ number: 1, name: "Kimstughna" });
    expect(result.yoga).toEqual({ number: 1, name: "Vishkambha" });
    expect(result.nakshatra.name).toBe("Ashwini");
  });

  it("wraps the elongation across 0° Aries", () => {
    const result = panchanga(10, 355);
    expect(result.tithi).toEqual({ number: 29, name: "Chaturdashi", paksha: "krishna" });
    expect(result.karana).toEqual({ number: 58, name: "Shakuni" });
    expect(result.yoga).toEqual({ number: 1, name: "Vishkambha" });
  });

  it("takes the weekday at local mean time", () => {
    expect(panchanga(0, 0.5).vara).toEqual({ number: 1, name: "Ravivara", lord: "sun" });
    expect(panchanga(0, 0.5, -30).vara).toEqual({ number: 7, name: "Shanivara", lord: "saturn" });
  });
});

describe("karanaName", () => {
  it("cycles the seven movable karanas between the fixed ones", () => {
    expect(karanaName(1, tables)).toBe("Bava");
    expect(karanaName(7, tables)).toBe("Vishti");
    expect(karanaName(8, tables)).toBe("Bava");
    expect(karanaName(56, tables)).toBe("Vishti");
    expect(karanaName(59, tables)).toBe("Naga");
  });
});
