/**
 * Async orchestrator: validate input, query the ephemeris, assemble the
 * chart. Failures are logged and rethrown; a partial chart is never
 * returned.
 */

import { chartLogHelpers } from "../logging/chartLog.js";
import { assembleChart } from "./assembleChart.js";
import { getEngineContext, type EngineContext } from "./engineContext.js";
import { CalculationInvariantError, describeError } from "./errors.js";
import { fetchTropicalPositions } from "./ephemeris/fetchPositions.js";
import type { EphemerisProvider } from "./ephemeris/provider.js";
import { parseBirthInput } from "./schemas/birthInput.schema.js";
import type { Chart } from "./schemas/chart.schema.js";

export interface ComputeChartOptions {
  provider: EphemerisProvider;
  timeoutMs?: number;
  context?: EngineContext;
}

export async function computeChart(rawInput: unknown, options: ComputeChartOptions): Promise<Chart> {
  const startedAt = Date.now();
  const ephemeris = options.provider.name;
  let utcInstant: string | undefined;

  try {
    const birth = parseBirthInput(rawInput);
    utcInstant = birth.utc_instant;
    const context = options.context ?? getEngineContext();

    chartLogHelpers.computeStarted({
      utc_instant: birth.utc_instant,
      ayanamsa: birth.ayanamsa,
      house_system: birth.house_system,
      ephemeris,
    });

    const fetched = await fetchTropicalPositions(options.provider, birth.instant, {
      timeoutMs: options.timeoutMs,
    });
    const chart = assembleChart(
      {
        birth,
        tropical: fetched.positions,
        obliquity: fetched.obliquity,
        ephemerisName: ephemeris,
      },
      context
    );

    chartLogHelpers.computeSucceeded({
      utc_instant: birth.utc_instant,
      ephemeris,
      duration_ms: Date.now() - startedAt,
      yoga_count: chart.yogas.length,
    });
    return chart;
  } catch (err) {
    if (err instanceof CalculationInvariantError) {
      chartLogHelpers.invariantViolated({ error_message: err.message, context: err.context });
    }
    chartLogHelpers.computeFailed({
      utc_instant: utcInstant,
      ephemeris,
      duration_ms: Date.now() - startedAt,
      ...describeError(err),
    });
    throw err;
  }
}
