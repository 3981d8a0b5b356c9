import { z } from "zod";
import { resolveAyanamsa } from "../ayanamsa.js";
import { InputError } from "../errors.js";
import { resolveHouseSystem } from "../houses.js";
import type { AyanamsaName, HouseSystemName } from "../reference/ids.js";

/**
 * Birth input contract. The instant must carry an explicit UTC offset;
 * timezone resolution happens upstream.
 */

const ISO_INSTANT =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|([+-])(\d{2}):(\d{2}))$/;

const MAX_OFFSET_MINUTES = 14 * 60;
const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function daysInMonth(year: number, month: number): number {
  const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  if (month === 2 && leap) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Date.parse rolls impossible fields forward (Feb 31 → Mar 3), so every
 * calendar and offset field is checked before the string becomes a Date.
 */
export function instantIssue(value: string): string | undefined {
  const match = ISO_INSTANT.exec(value);
  if (!match) return "expected ISO-8601 instant with explicit offset";
  const [, y, mo, d, h, mi, s, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);

  if (month < 1 || month > 12) return `month ${month} out of range`;
  if (day < 1 || day > daysInMonth(year, month)) return `day ${day} does not exist in ${y}-${mo}`;
  if (Number(h) > 23 || Number(mi) > 59 || Number(s ?? 0) > 59) return "time of day out of range";
  if (sign !== undefined) {
    const offsetMinutes = Number(oh) * 60 + Number(om);
    if (Number(om) > 59 || offsetMinutes > MAX_OFFSET_MINUTES) {
      return `UTC offset ${sign}${oh}:${om} out of range (max ±14:00)`;
    }
  }
  if (!Number.isFinite(Date.parse(value))) return "not a valid calendar instant";
  return undefined;
}

export const BirthInputSchema = z.object({
  utc_instant: z.string().superRefine((value, ctx) => {
    const issue = instantIssue(value);
    if (issue) ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
  }),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  ayanamsa: z.string(),
  house_system: z.string(),
});

export type BirthInput = z.input<typeof BirthInputSchema>;

export interface NormalizedBirthInput {
  instant: Date;
  /** UTC, millisecond precision, `Z` suffix. */
  utc_instant: string;
  latitude: number;
  longitude: number;
  ayanamsa: AyanamsaName;
  house_system: HouseSystemName;
}

/**
 * Structural problems raise InputError; unknown variant names raise
 * ConfigurationError.
 */
export function parseBirthInput(raw: unknown): NormalizedBirthInput {
  const result = BirthInputSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new InputError(`Invalid birth input: ${issues.join("; ")}`, issues);
  }

  const input = result.data;
  const instant = new Date(input.utc_instant);
  return {
    instant,
    utc_instant: instant.toISOString(),
    latitude: input.latitude,
    longitude: input.longitude,
    ayanamsa: resolveAyanamsa(input.ayanamsa),
    house_system: resolveHouseSystem(input.house_system),
  };
}
