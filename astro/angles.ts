/**
 * Pure angle helpers.
 * Layer 0: geometry only.
 */

export function normalizeDegrees(value: number): number {
  return ((value % 360) + 360) % 360;
}

/** Shortest arc between two longitudes, in [0, 180]. */
export function angularSeparation(lon1: number, lon2: number): number {
  const diff = Math.abs(normalizeDegrees(lon1) - normalizeDegrees(lon2));
  return Math.min(diff, 360 - diff);
}

/** Forward arc from `from` to `to`, in [0, 360). */
export function forwardArc(from: number, to: number): number {
  return normalizeDegrees(to - from);
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function radToDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}

export function roundTo(value: number, places: number): number {
  return Number(value.toFixed(places));
}
