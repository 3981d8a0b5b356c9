/**
 * Divisional signs (vargas) by the Parashara rules: D2 hora, D3 drekkana,
 * D9 navamsa, D12 dwadasamsa.
 */

import { normalizeDegrees } from "./angles.js";
import { rasiAt, type RasiId } from "./reference/ids.js";

export interface VargaSigns {
  d1: RasiId;
  d2: RasiId;
  d3: RasiId;
  d9: RasiId;
  d12: RasiId;
}

function split(longitude: number): { rasi: number; degree: number } {
  const lon = normalizeDegrees(longitude);
  const rasi = Math.min(11, Math.floor(lon / 30));
  return { rasi, degree: lon - rasi * 30 };
}

/** Odd signs: first half Leo (Sun), second Cancer (Moon); even signs reversed. */
export function horaSign(longitude: number): RasiId {
  const { rasi, degree } = split(longitude);
  const oddSign = rasi % 2 === 0;
  const firstHalf = degree < 15;
  return oddSign === firstHalf ? "leo" : "cancer";
}

/** 1st, 5th and 9th from the sign for each 10° part. */
export function drekkanaSign(longitude: number): RasiId {
  const { rasi, degree } = split(longitude);
  const part = Math.min(2, Math.floor(degree / 10));
  return rasiAt(rasi + 4 * part);
}

/** Counting starts from Aries, Capricorn, Libra, Cancer for fire, earth, air, water signs. */
const NAVAMSA_START = [0, 9, 6, 3] as const;

export function navamsaSign(longitude: number): RasiId {
  const { rasi, degree } = split(longitude);
  const part = Math.min(8, Math.floor(degree / (30 / 9)));
  return rasiAt(NAVAMSA_START[rasi % 4] + part);
}

export function dwadasamsaSign(longitude: number): RasiId {
  const { rasi, degree } = split(longitude);
  return rasiAt(rasi + Math.min(11, Math.floor(degree / 2.5)));
}

export function vargaSigns(longitude: number): VargaSigns {
  return {
    d1: rasiAt(split(longitude).rasi),
    d2: horaSign(longitude),
    d3: drekkanaSign(longitude),
    d9: navamsaSign(longitude),
    d12: dwadasamsaSign(longitude),
  };
}
