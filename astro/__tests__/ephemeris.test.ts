import { describe, expect, it } from "vitest";
import { ConfigurationError, EphemerisError } from "../errors.js";
import { fetchTropicalPositions } from "../ephemeris/fetchPositions.js";
import type { EphemerisPosition, EphemerisProvider } from "../ephemeris/provider.js";
import { TableEphemerisProvider } from "../ephemeris/tableProvider.js";
import type { EphemerisBody } from "../reference/ids.js";
import { fixtureProvider } from "./helpers.js";

const J2000 = new Date("2000-01-01T12:00:00Z");

class StubProvider implements EphemerisProvider {
  readonly name = "stub";
  constructor(
    private readonly respond: (body: EphemerisBody) => EphemerisPosition | Promise<EphemerisPosition>
  ) {}

  position(body: EphemerisBody): EphemerisPosition | Promise<EphemerisPosition> {
    return this.respond(body);
  }
}

const direct = (longitude: number): EphemerisPosition => ({
  tropical_longitude_deg: longitude,
  is_retrograde: false,
});

describe("TableEphemerisProvider", () => {
  it("serves positions keyed by the exact instant", () => {
    const provider = fixtureProvider();
    expect(provider.name).toBe("table:test-fixture");
    expect(provider.position("saturn", J2000)).toEqual({
      tropical_longitude_deg: 40.4,
      is_retrograde: true,
    });
    expect(provider.obliquity(J2000)).toBe(23.4393);
    expect(provider.obliquity(new Date("1990-05-15T09:00:00Z"))).toBeUndefined();
  });

  it("fails for an instant it does not hold", () => {
    expect(() => fixtureProvider().position("sun", new Date("2001-01-01T00:00:00Z"))).toThrow(
      "Ephemeris failed for sun: No table entry for 2001-01-01T00:00:00.000Z"
    );
  });

  it("rejects a malformed table", () => {
    expect(() => new TableEphemerisProvider({ entries: [{ utc_instant: "soon" }] })).toThrow(
      ConfigurationError
    );
  });
});

describe("fetchTropicalPositions", () => {
  it("collects every body and the provider obliquity", async () => {
    const fetched = await fetchTropicalPositions(fixtureProvider(), J2000);
    expect(fetched.obliquity).toBe(23.4393);
    expect(fetched.positions.rahu).toEqual({ longitude: 125.1, retrograde: true });
    expect(Object.keys(fetched.positions)).toHaveLength(8);
  });

  it("leaves obliquity undefined for providers without it", async () => {
    const fetched = await fetchTropicalPositions(new StubProvider(() => direct(10)), J2000);
    expect(fetched.obliquity).toBeUndefined();
  });

  it("rejects a longitude outside [0, 360)", async () => {
    const provider = new StubProvider((body) => direct(body === "moon" ? 360 : 10));
    await expect(fetchTropicalPositions(provider, J2000)).rejects.toThrow(
      "Ephemeris failed for moon: longitude out of range: 360"
    );
  });

  it("rejects a position record of the wrong shape", async () => {
    const decode = (text: string): EphemerisPosition => JSON.parse(text);
    const missing = new StubProvider((body) => (body === "mars" ? decode("null") : direct(10)));
    await expect(fetchTropicalPositions(missing, J2000)).rejects.toThrow(
      "Ephemeris failed for mars: invalid position record ((root): Expected object, received null)"
    );

    const mistyped = new StubProvider((body) =>
      body === "mars"
        ? decode('{"tropical_longitude_deg": 12.5, "is_retrograde": "yes"}')
        : direct(10)
    );
    const failure = fetchTropicalPositions(mistyped, J2000);
    await expect(failure).rejects.toBeInstanceOf(EphemerisError);
    await expect(failure).rejects.toThrow(
      "Ephemeris failed for mars: invalid position record (is_retrograde: Expected boolean, received string)"
    );
  });

  it("wraps provider failures in EphemerisError", async () => {
    const provider = new StubProvider(() => {
      throw new Error("data file missing");
    });
    const failure = fetchTropicalPositions(provider, J2000);
    await expect(failure).rejects.toBeInstanceOf(EphemerisError);
    await expect(failure).rejects.toThrow("Ephemeris failed for sun: data file missing");
  });

  it("times out a provider that never answers", async () => {
    const provider = new StubProvider(() => new Promise<EphemerisPosition>(() => undefined));
    await expect(fetchTropicalPositions(provider, J2000, { timeoutMs: 10 })).rejects.toThrow(
      "Ephemeris failed for sun: timed out after 10ms"
    );
  });
});
