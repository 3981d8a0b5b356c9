/**
 * Structured logging for chart computation and batch events.
 *
 * Emits JSON logs with consistent structure for observability.
 */

export type ChartLogEvent =
  | "chart.compute.started"
  | "chart.compute.succeeded"
  | "chart.compute.failed"
  | "chart.invariant.violated"
  | "batch.started"
  | "batch.item.failed"
  | "batch.completed"
  | "batch.cancelled";

export type ChartLogData = {
  event: ChartLogEvent;
  utc_instant?: string;
  ayanamsa?: string;
  house_system?: string;
  ephemeris?: string;
  duration_ms?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown; // Allow additional fields
};

/**
 * Emit a structured log entry, one JSON line per event.
 */
export function chartLog(data: ChartLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const chartLogHelpers = {
  computeStarted(params: {
    utc_instant: string;
    ayanamsa: string;
    house_system: string;
    ephemeris: string;
  }): void {
    chartLog({ event: "chart.compute.started", ...params });
  },

  computeSucceeded(params: {
    utc_instant: string;
    ephemeris: string;
    duration_ms: number;
    yoga_count: number;
  }): void {
    chartLog({ event: "chart.compute.succeeded", ...params });
  },

  computeFailed(params: {
    utc_instant?: string;
    ephemeris: string;
    duration_ms: number;
    error_code: string;
    error_message: string;
  }): void {
    chartLog({ event: "chart.compute.failed", ...params });
  },

  invariantViolated(params: { error_message: string; context: Record<string, unknown> }): void {
    chartLog({
      event: "chart.invariant.violated",
      error_code: "calculation_invariant_error",
      ...params,
    });
  },

  batchStarted(params: { batch_size: number; concurrency: number; fail_fast: boolean }): void {
    chartLog({ event: "batch.started", ...params });
  },

  batchItemFailed(params: { index: number; error_code: string; error_message: string }): void {
    chartLog({ event: "batch.item.failed", ...params });
  },

  batchCompleted(params: {
    batch_size: number;
    ok: number;
    failed: number;
    cancelled: number;
    duration_ms: number;
  }): void {
    chartLog({ event: "batch.completed", ...params });
  },

  batchCancelled(params: { reason: string; remaining: number }): void {
    chartLog({ event: "batch.cancelled", ...params });
  },
};
