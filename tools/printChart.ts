// DEV TOOL: developer diagnostic, not a user CLI.
import "dotenv/config";

import { getChartSummary } from "../astro/chartQueries.js";
import { computeChart } from "../astro/computeChart.js";
import { createEphemerisProvider, loadEngineConfig } from "../config/engineConfig.js";

function usage() {
  console.error(
    "Usage: tsx tools/printChart.ts <ISO instant> <lat> <lon> [ayanamsa] [house system]"
  );
}

async function main() {
  const [instant, lat, lon, ayanamsa, houseSystem] = process.argv.slice(2);
  if (!instant || lat === undefined || lon === undefined) {
    usage();
    process.exit(1);
  }

  const config = loadEngineConfig();
  const provider = createEphemerisProvider(config.ephemeris);

  const chart = await computeChart(
    {
      utc_instant: instant,
      latitude: Number(lat),
      longitude: Number(lon),
      ayanamsa: ayanamsa ?? "Lahiri",
      house_system: houseSystem ?? "Equal",
    },
    { provider, timeoutMs: config.ephemerisTimeoutMs }
  );

  console.log(JSON.stringify(getChartSummary(chart), null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
