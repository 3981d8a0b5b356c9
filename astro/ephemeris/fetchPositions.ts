/**
 * Queries the provider for every ephemeris body at one instant.
 * This is the only I/O boundary of a chart computation and the only
 * place a timeout applies.
 */

import { z } from "zod";
import type { TropicalPosition } from "../assembleChart.js";
import { EphemerisError, isChartEngineError } from "../errors.js";
import { EPHEMERIS_BODIES, type EphemerisBody } from "../reference/ids.js";
import type { EphemerisProvider } from "./provider.js";

export const DEFAULT_EPHEMERIS_TIMEOUT_MS = 5000;

const PositionRecordSchema = z.object({
  tropical_longitude_deg: z.number(),
  is_retrograde: z.boolean(),
});

export interface FetchedPositions {
  positions: Record<EphemerisBody, TropicalPosition>;
  obliquity?: number;
}

async function withTimeout<T>(label: string, timeoutMs: number, run: () => T | Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new EphemerisError(label, `timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  try {
    return await Promise.race([Promise.resolve().then(run), timeout]);
  } catch (err) {
    if (isChartEngineError(err)) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new EphemerisError(label, message, err);
  } finally {
    clearTimeout(timer);
  }
}

async function fetchBody(
  provider: EphemerisProvider,
  body: EphemerisBody,
  instant: Date,
  timeoutMs: number
): Promise<TropicalPosition> {
  const raw: unknown = await withTimeout(body, timeoutMs, () => provider.position(body, instant));
  const parsed = PositionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new EphemerisError(body, `invalid position record (${issues})`);
  }
  const position = parsed.data;
  const longitude = position.tropical_longitude_deg;
  if (!Number.isFinite(longitude) || longitude < 0 || longitude >= 360) {
    throw new EphemerisError(body, `longitude out of range: ${longitude}`);
  }
  return { longitude, retrograde: position.is_retrograde };
}

export async function fetchTropicalPositions(
  provider: EphemerisProvider,
  instant: Date,
  options: { timeoutMs?: number } = {}
): Promise<FetchedPositions> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_EPHEMERIS_TIMEOUT_MS;

  const [sun, moon, mars, mercury, jupiter, venus, saturn, rahu] = await Promise.all(
    EPHEMERIS_BODIES.map((body) => fetchBody(provider, body, instant, timeoutMs))
  );

  let obliquity: number | undefined;
  const readObliquity = provider.obliquity?.bind(provider);
  if (readObliquity) {
    obliquity = await withTimeout("obliquity", timeoutMs, () => readObliquity(instant));
    if (obliquity !== undefined && !(Number.isFinite(obliquity) && obliquity > 22 && obliquity < 25)) {
      throw new EphemerisError("obliquity", `obliquity out of range: ${obliquity}`);
    }
  }

  return {
    positions: { sun, moon, mars, mercury, jupiter, venus, saturn, rahu },
    obliquity,
  };
}
