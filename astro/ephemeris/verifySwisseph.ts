// Dev-only diagnostic to validate the Swiss Ephemeris binding and data path.
import "dotenv/config";

import { loadEngineConfig } from "../../config/engineConfig.js";
import { julianDay } from "../julianDate.js";
import { SwissEphemerisProvider } from "./swisseph.js";

const config = loadEngineConfig();
const ephePath = config.ephemeris.kind === "swisseph" ? config.ephemeris.ephePath : undefined;
const provider = new SwissEphemerisProvider({ ephePath });

const instant = new Date("2025-12-17T12:00:00Z");
const sun = provider.position("sun", instant);
const rahu = provider.position("rahu", instant);

console.log(`[${provider.name}] OK`);
console.log(`JD: ${julianDay(instant)}`);
console.log(`Sun: ${sun.tropical_longitude_deg.toFixed(2)}°  retrograde: ${sun.is_retrograde}`);
console.log(`Rahu (mean): ${rahu.tropical_longitude_deg.toFixed(2)}°`);
