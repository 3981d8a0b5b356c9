/**
 * Error model for chart construction.
 *
 * Every failure carries a stable `code` so batch results and logs can be
 * grouped without parsing messages.
 */

export type ChartErrorCode =
  | "input_error"
  | "configuration_error"
  | "ephemeris_error"
  | "calculation_invariant_error";

export class ChartEngineError extends Error {
  constructor(
    public readonly code: ChartErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ChartEngineError";
  }
}

/** Malformed or out-of-range birth instant or coordinates. */
export class InputError extends ChartEngineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super("input_error", message);
    this.name = "InputError";
  }
}

/** Unknown ayanamsa, house system, or an incomplete reference table/policy. */
export class ConfigurationError extends ChartEngineError {
  constructor(message: string) {
    super("configuration_error", message);
    this.name = "ConfigurationError";
  }
}

export class EphemerisError extends ChartEngineError {
  constructor(
    public readonly body: string,
    message: string,
    cause?: unknown
  ) {
    super("ephemeris_error", `Ephemeris failed for ${body}: ${message}`, { cause });
    this.name = "EphemerisError";
  }
}

/** Always a defect, never caused by the caller. */
export class CalculationInvariantError extends ChartEngineError {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super("calculation_invariant_error", message);
    this.name = "CalculationInvariantError";
  }
}

export function isChartEngineError(err: unknown): err is ChartEngineError {
  return err instanceof ChartEngineError;
}

export function describeError(err: unknown): { error_code: string; error_message: string } {
  if (isChartEngineError(err)) {
    return { error_code: err.code, error_message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { error_code: "unexpected_error", error_message: message };
}
