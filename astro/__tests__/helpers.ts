import path from "node:path";
import { fileURLToPath } from "node:url";
import { TableEphemerisProvider } from "../ephemeris/tableProvider.js";

const here = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURE_TABLE_PATH = path.join(here, "fixtures", "ephemeris-table.json");

export function fixtureProvider(): TableEphemerisProvider {
  return TableEphemerisProvider.fromFile(FIXTURE_TABLE_PATH);
}

export const DELHI_1990 = {
  utc_instant: "1990-05-15T09:00:00Z",
  latitude: 28.6139,
  longitude: 77.209,
  ayanamsa: "Lahiri",
  house_system: "Equal",
};
