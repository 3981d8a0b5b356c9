/**
 * Closed identifier sets. Enumeration order is significant: occupant lists,
 * yoga participants and tie-breaks all follow it.
 */

export const GRAHA_IDS = [
  "sun",
  "moon",
  "mars",
  "mercury",
  "jupiter",
  "venus",
  "saturn",
  "rahu",
  "ketu",
] as const;

export type GrahaId = (typeof GRAHA_IDS)[number];

/** Grahas whose positions come from the ephemeris; ketu is derived. */
export const EPHEMERIS_BODIES = [
  "sun",
  "moon",
  "mars",
  "mercury",
  "jupiter",
  "venus",
  "saturn",
  "rahu",
] as const;

export type EphemerisBody = (typeof EPHEMERIS_BODIES)[number];

export const RASI_IDS = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export type RasiId = (typeof RASI_IDS)[number];

export const AYANAMSA_NAMES = ["Lahiri", "Raman", "Krishnamurti"] as const;
export type AyanamsaName = (typeof AYANAMSA_NAMES)[number];

export const HOUSE_SYSTEMS = ["Equal", "WholeSign"] as const;
export type HouseSystemName = (typeof HOUSE_SYSTEMS)[number];

export const ELEMENTS = ["fire", "earth", "air", "water"] as const;
export type Element = (typeof ELEMENTS)[number];

export const MODALITIES = ["movable", "fixed", "dual"] as const;
export type Modality = (typeof MODALITIES)[number];

export const RELATIONSHIPS = ["friend", "neutral", "enemy"] as const;
export type NaturalRelationship = (typeof RELATIONSHIPS)[number];

export type HouseNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export const HOUSE_NUMBERS: readonly HouseNumber[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

export function rasiAt(index: number): RasiId {
  const id = RASI_IDS[((index % 12) + 12) % 12];
  if (id === undefined) {
    throw new RangeError(`Invalid rasi index: ${index}`);
  }
  return id;
}

export function rasiIndex(rasi: RasiId): number {
  return RASI_IDS.indexOf(rasi);
}

export function houseAt(n: number): HouseNumber {
  const house = HOUSE_NUMBERS[((((n - 1) % 12) + 12) % 12)];
  if (house === undefined) {
    throw new RangeError(`Invalid house number: ${n}`);
  }
  return house;
}

export function isGrahaId(value: string): value is GrahaId {
  return GRAHA_IDS.some((id) => id === value);
}

/** Build a record keyed by every graha, in enumeration order. */
export function byGraha<V>(fn: (id: GrahaId) => V): Record<GrahaId, V> {
  return {
    sun: fn("sun"),
    moon: fn("moon"),
    mars: fn("mars"),
    mercury: fn("mercury"),
    jupiter: fn("jupiter"),
    venus: fn("venus"),
    saturn: fn("saturn"),
    rahu: fn("rahu"),
    ketu: fn("ketu"),
  };
}

/** Build a record keyed by every rasi, in zodiacal order. */
export function byRasi<V>(fn: (id: RasiId) => V): Record<RasiId, V> {
  return {
    aries: fn("aries"),
    taurus: fn("taurus"),
    gemini: fn("gemini"),
    cancer: fn("cancer"),
    leo: fn("leo"),
    virgo: fn("virgo"),
    libra: fn("libra"),
    scorpio: fn("scorpio"),
    sagittarius: fn("sagittarius"),
    capricorn: fn("capricorn"),
    aquarius: fn("aquarius"),
    pisces: fn("pisces"),
  };
}
