import { describe, expect, it } from "vitest";
import { housesRuledBy } from "../lordship.js";
import { GRAHA_IDS, houseAt, rasiIndex, type GrahaId, type RasiId } from "../reference/ids.js";
import { getReferenceTables } from "../reference/referenceTables.js";
import {
  detectDhanaYogas,
  detectParivartanaYogas,
  detectRajYogas,
  detectYogas,
  parivartanaName,
  type YogaGraha,
  type YogaInput,
} from "../yogas.js";

const tables = getReferenceTables();
const ARIES_RULED = housesRuledBy("aries", tables);

function input(grahas: YogaGraha[]): YogaInput {
  return { grahas, housesRuled: ARIES_RULED, grahaAspects: [], tables };
}

/** A graha placed in `rasi` under an aries ascendant. */
function placed(graha: GrahaId, rasi: RasiId): YogaGraha {
  return { graha, rasi, house: houseAt(rasiIndex(rasi) + 1) };
}

function ownSign(graha: GrahaId): RasiId {
  const [first] = tables.grahas[graha].own_signs;
  if (!first) throw new Error(`${graha} rules no sign`);
  return first;
}

const SIGN_LORDS = GRAHA_IDS.filter((graha) => graha !== "rahu" && graha !== "ketu");

describe("parivartana", () => {
  it("detects a sign exchange once, in enumeration order", () => {
    const yogas = detectYogas(
      input([
        { graha: "venus", rasi: "aries", house: 1 },
        { graha: "mars", rasi: "taurus", house: 2 },
      ])
    );
    expect(yogas).toEqual([
      {
        name: "Maha Parivartana Yoga",
        category: "Parivartana",
        grahas: ["mars", "venus"],
        houses: [2, 1],
        connection: "exchange",
        explanation: "Mars in Taurus and Venus in Aries occupy each other's signs (houses 2 and 1)",
      },
    ]);
  });

  it("names the exchange by the houses involved", () => {
    expect(parivartanaName([1, 5])).toBe("Maha Parivartana Yoga");
    expect(parivartanaName([3, 9])).toBe("Khala Parivartana Yoga");
    expect(parivartanaName([3, 8])).toBe("Dainya Parivartana Yoga");
    expect(parivartanaName([12, 4])).toBe("Dainya Parivartana Yoga");
  });

  it("finds every exchange exactly once whichever graha is listed first", () => {
    for (const x of SIGN_LORDS) {
      for (const y of SIGN_LORDS) {
        if (x === y) continue;
        const a = placed(x, ownSign(y));
        const b = placed(y, ownSign(x));
        const forward = detectParivartanaYogas(input([a, b]));
        expect(forward).toHaveLength(1);
        expect(detectParivartanaYogas(input([b, a]))).toEqual(forward);
      }
    }
  });

  it("needs both grahas in each other's signs", () => {
    for (const x of SIGN_LORDS) {
      for (const y of SIGN_LORDS) {
        if (x === y) continue;
        const oneSided = [placed(x, ownSign(y)), placed(y, ownSign(y))];
        expect(detectParivartanaYogas(input(oneSided))).toEqual([]);
      }
    }
  });
});

describe("raj yoga", () => {
  it("joins a kendra lord and a trikona lord in conjunction", () => {
    const yogas = detectRajYogas(
      input([
        { graha: "moon", rasi: "capricorn", house: 10 },
        { graha: "sun", rasi: "capricorn", house: 10 },
      ])
    );
    expect(yogas).toEqual([
      {
        name: "Raj Yoga",
        category: "Raj",
        grahas: ["sun", "moon"],
        houses: [10, 10],
        connection: "conjunction",
        explanation:
          "Sun (lord of 5) and Moon (lord of 4) join kendra and trikona lordship, conjunct in house 10",
      },
    ]);
  });

  it("needs a connection between the lords", () => {
    expect(
      detectRajYogas(
        input([
          { graha: "sun", rasi: "capricorn", house: 10 },
          { graha: "moon", rasi: "aquarius", house: 11 },
        ])
      )
    ).toEqual([]);
  });
});

describe("dhana yoga", () => {
  it("links a wealth-house lord with a supporting lord", () => {
    const yogas = detectDhanaYogas(
      input([
        { graha: "venus", rasi: "leo", house: 5 },
        { graha: "jupiter", rasi: "leo", house: 5 },
      ])
    );
    expect(yogas).toHaveLength(1);
    expect(yogas[0]).toMatchObject({
      name: "Dhana Yoga",
      grahas: ["jupiter", "venus"],
      houses: [5, 5],
      connection: "conjunction",
    });
  });

  it("links lords that exchange signs", () => {
    const yogas = detectDhanaYogas(
      input([placed("saturn", "sagittarius"), placed("jupiter", "capricorn")])
    );
    expect(yogas).toEqual([
      {
        name: "Dhana Yoga",
        category: "Dhana",
        grahas: ["jupiter", "saturn"],
        houses: [10, 9],
        connection: "exchange",
        explanation:
          "Jupiter (lord of 9, 12) and Saturn (lord of 10, 11) link wealth houses, exchange signs",
      },
    ]);
  });

  it("ignores a wealth lord with no connection", () => {
    expect(
      detectDhanaYogas(input([placed("saturn", "aquarius"), placed("jupiter", "capricorn")]))
    ).toEqual([]);
  });
});
