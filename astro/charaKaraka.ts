/**
 * Chara karakas (eight-karaka scheme). Ketu is excluded; Rahu counts
 * backwards within its rasi. Ties keep graha enumeration order.
 */

import { GRAHA_IDS, type GrahaId } from "./reference/ids.js";

export const CHARA_KARAKA_CODES = ["AK", "AmK", "BK", "MK", "PiK", "PK", "GK", "DK"] as const;
export type CharaKarakaCode = (typeof CHARA_KARAKA_CODES)[number];

const KARAKA_NAMES: Readonly<Record<CharaKarakaCode, string>> = {
  AK: "Atmakaraka",
  AmK: "Amatyakaraka",
  BK: "Bhratrukaraka",
  MK: "Matrukaraka",
  PiK: "Pitrukaraka",
  PK: "Putrakaraka",
  GK: "Gnatikaraka",
  DK: "Darakaraka",
};

export interface CharaKaraka {
  code: CharaKarakaCode;
  name: string;
  graha: GrahaId;
  /** Degree used for ranking. */
  effective_degree: number;
}

export function computeCharaKarakas(
  placements: ReadonlyArray<{ graha: GrahaId; degree_in_rasi: number }>
): CharaKaraka[] {
  const ranked = placements
    .filter((entry) => entry.graha !== "ketu")
    .map((entry) => ({
      graha: entry.graha,
      effective_degree: entry.graha === "rahu" ? 30 - entry.degree_in_rasi : entry.degree_in_rasi,
    }))
    .sort(
      (a, b) =>
        b.effective_degree - a.effective_degree ||
        GRAHA_IDS.indexOf(a.graha) - GRAHA_IDS.indexOf(b.graha)
    );

  return CHARA_KARAKA_CODES.flatMap((code, i) => {
    const entry = ranked[i];
    return entry ? [{ code, name: KARAKA_NAMES[code], ...entry }] : [];
  });
}
