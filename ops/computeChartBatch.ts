/**
 * Batch chart computation over a bounded in-process pool.
 *
 * Each chart is independent: a failure is recorded against its index and
 * the rest continue, unless `failFast` is set. Aborting the signal stops
 * new charts from starting; charts already running finish or fail whole.
 * `concurrency` and `failFast` fall back to CHART_BATCH_CONCURRENCY and
 * CHART_BATCH_FAIL_FAST.
 */

import { computeChart } from "../astro/computeChart.js";
import type { EngineContext } from "../astro/engineContext.js";
import { describeError } from "../astro/errors.js";
import type { EphemerisProvider } from "../astro/ephemeris/provider.js";
import type { Chart } from "../astro/schemas/chart.schema.js";
import { loadBatchDefaults } from "../config/engineConfig.js";
import { chartLogHelpers } from "../logging/chartLog.js";

export type BatchResult =
  | { index: number; status: "ok"; chart: Chart }
  | { index: number; status: "failed"; error_code: string; error_message: string }
  | { index: number; status: "cancelled" };

export interface BatchOptions {
  provider: EphemerisProvider;
  concurrency?: number;
  signal?: AbortSignal;
  failFast?: boolean;
  timeoutMs?: number;
  context?: EngineContext;
}

export async function computeChartBatch(
  inputs: readonly unknown[],
  options: BatchOptions
): Promise<BatchResult[]> {
  const startedAt = Date.now();
  const defaults =
    options.concurrency === undefined || options.failFast === undefined
      ? loadBatchDefaults()
      : undefined;
  const concurrency = Math.max(
    1,
    Math.floor(options.concurrency ?? defaults?.batchConcurrency ?? 1)
  );
  const failFast = options.failFast ?? defaults?.batchFailFast ?? false;
  const results = Array.from({ length: inputs.length }, (): BatchResult | undefined => undefined);

  const internal = new AbortController();
  const stopped = () => internal.signal.aborted || (options.signal?.aborted ?? false);

  chartLogHelpers.batchStarted({ batch_size: inputs.length, concurrency, fail_fast: failFast });

  let next = 0;
  const worker = async (): Promise<void> => {
    while (!stopped()) {
      const index = next;
      next += 1;
      if (index >= inputs.length) return;

      try {
        const chart = await computeChart(inputs[index], {
          provider: options.provider,
          timeoutMs: options.timeoutMs,
          context: options.context,
        });
        results[index] = { index, status: "ok", chart };
      } catch (err) {
        const { error_code, error_message } = describeError(err);
        results[index] = { index, status: "failed", error_code, error_message };
        chartLogHelpers.batchItemFailed({ index, error_code, error_message });
        if (failFast && !internal.signal.aborted) {
          internal.abort();
          chartLogHelpers.batchCancelled({
            reason: `fail_fast after item ${index}`,
            remaining: Math.max(0, inputs.length - next),
          });
        }
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, inputs.length) }, () => worker()));

  if (options.signal?.aborted && !internal.signal.aborted) {
    chartLogHelpers.batchCancelled({
      reason: "aborted",
      remaining: results.filter((result) => result === undefined).length,
    });
  }

  const finished: BatchResult[] = results.map(
    (result, index) => result ?? { index, status: "cancelled" }
  );
  chartLogHelpers.batchCompleted({
    batch_size: inputs.length,
    ok: finished.filter((r) => r.status === "ok").length,
    failed: finished.filter((r) => r.status === "failed").length,
    cancelled: finished.filter((r) => r.status === "cancelled").length,
    duration_ms: Date.now() - startedAt,
  });
  return finished;
}
