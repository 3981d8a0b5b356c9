export * from "./errors.js";
export * from "./reference/ids.js";
export { getReferenceTables, buildReferenceTables, readReferenceData } from "./reference/referenceTables.js";
export type { ReferenceTables } from "./reference/referenceTables.js";
export { normalizeDegrees, angularSeparation } from "./angles.js";
export { julianDay } from "./julianDate.js";
export { ayanamsaForJulianDay, resolveAyanamsa } from "./ayanamsa.js";
export {
  toSiderealLongitude,
  localSiderealTime,
  ascendantLongitude,
  midheavenLongitude,
  meanObliquity,
} from "./coordinates.js";
export { resolveHouseSystem, equalHouseCusps } from "./houses.js";
export { dignity, DIGNITY_SCORES } from "./dignity.js";
export type { Dignity, DignityStatus } from "./dignity.js";
export { isCombust } from "./combustion.js";
export { createEngineContext, getEngineContext } from "./engineContext.js";
export type { EngineContext } from "./engineContext.js";
export { assembleChart } from "./assembleChart.js";
export { computeChart } from "./computeChart.js";
export type { ComputeChartOptions } from "./computeChart.js";
export {
  getAscendant,
  getGrahaPositions,
  getGrahaPosition,
  getBhavas,
  getBhava,
  getAspects,
  getChartSummary,
} from "./chartQueries.js";
export type { ChartSummary, AscendantView } from "./chartQueries.js";
export { parseBirthInput, BirthInputSchema } from "./schemas/birthInput.schema.js";
export type { BirthInput, NormalizedBirthInput } from "./schemas/birthInput.schema.js";
export { ChartSchema, CHART_SCHEMA_VERSION } from "./schemas/chart.schema.js";
export type { Chart, Bhava, GrahaPosition, ChartAspects } from "./schemas/chart.schema.js";
export type { EphemerisProvider, EphemerisPosition } from "./ephemeris/provider.js";
export { SwissEphemerisProvider } from "./ephemeris/swisseph.js";
export { TableEphemerisProvider } from "./ephemeris/tableProvider.js";
