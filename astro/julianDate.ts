import { InputError } from "./errors.js";

export const J2000 = 2451545.0;

/**
 * Julian Day for a UTC instant (Gregorian calendar, Meeus ch. 7).
 */
export function julianDay(instant: Date): number {
  const time = instant.getTime();
  if (!Number.isFinite(time)) {
    throw new InputError("Invalid UTC instant");
  }

  let year = instant.getUTCFullYear();
  let month = instant.getUTCMonth() + 1;
  const dayFraction =
    (instant.getUTCHours() +
      instant.getUTCMinutes() / 60 +
      instant.getUTCSeconds() / 3600 +
      instant.getUTCMilliseconds() / 3_600_000) /
    24;
  const day = instant.getUTCDate() + dayFraction;

  if (month <= 2) {
    year -= 1;
    month += 12;
  }
  const a = Math.floor(year / 100);
  const b = 2 - a + Math.floor(a / 4);

  return (
    Math.floor(365.25 * (year + 4716)) +
    Math.floor(30.6001 * (month + 1)) +
    day +
    b -
    1524.5
  );
}

export function julianCenturiesSinceJ2000(jd: number): number {
  return (jd - J2000) / 36525;
}
