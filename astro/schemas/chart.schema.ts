import { z } from "zod";
import { AYANAMSA_NAMES, GRAHA_IDS, HOUSE_SYSTEMS, RASI_IDS, RELATIONSHIPS } from "../reference/ids.js";

/**
 * Zod schema for the assembled chart.
 *
 * Notes on versioning:
 * - v1.0.0: initial shape. No generation timestamp is stored, so identical
 *   inputs yield identical charts.
 */

export const CHART_SCHEMA_VERSION = "1.0.0";

const GrahaIdSchema = z.enum(GRAHA_IDS);
const RasiIdSchema = z.enum(RASI_IDS);
const HouseSchema = z.number().int().min(1).max(12);
const LongitudeSchema = z.number().min(0).lt(360);
const DegreeInRasiSchema = z.number().min(0).lt(30);
const UnitScoreSchema = z.number().min(0).max(1);

const COMPOUND = ["great_friend", "friend", "neutral", "enemy", "great_enemy"] as const;
const DIGNITY_STATUSES = ["exalted", "moolatrikona", "own_sign", ...COMPOUND, "debilitated"] as const;
const RELATIONSHIP_WITH_LORD = [...COMPOUND, "self"] as const;
const STRENGTH_CATEGORIES = ["very_strong", "strong", "moderate", "weak", "very_weak"] as const;
const HOUSE_GROUPS = ["kendra", "trikona", "dusthana", "upachaya", "maraka"] as const;

const NakshatraSchema = z.object({
  index: z.number().int().min(0).max(26),
  name: z.string().min(1),
  lord: GrahaIdSchema,
  pada: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
});

const PointSchema = z.object({
  tropical_longitude: LongitudeSchema,
  longitude: LongitudeSchema,
  rasi: RasiIdSchema,
  degree_in_rasi: DegreeInRasiSchema,
  nakshatra: NakshatraSchema,
});

const DignitySchema = z.object({
  status: z.enum(DIGNITY_STATUSES),
  score: z.number().int().min(1).max(9),
  rasi_lord: GrahaIdSchema,
  relationship_with_lord: z.enum(RELATIONSHIP_WITH_LORD),
  exact: z.boolean(),
});

const GrahaPositionSchema = PointSchema.extend({
  graha: GrahaIdSchema,
  house: HouseSchema,
  retrograde: z.boolean(),
  combust: z.boolean(),
  dignity: DignitySchema,
  vargas: z.object({
    d1: RasiIdSchema,
    d2: RasiIdSchema,
    d3: RasiIdSchema,
    d9: RasiIdSchema,
    d12: RasiIdSchema,
  }),
});

const StrengthSummarySchema = z.object({
  score: UnitScoreSchema,
  category: z.enum(STRENGTH_CATEGORIES),
});

const BhavaSchema = z.object({
  number: HouseSchema,
  cusp: LongitudeSchema,
  madhya: LongitudeSchema,
  sandhi: z.object({ start: LongitudeSchema, end: LongitudeSchema }),
  rasi: RasiIdSchema,
  occupants: z.array(GrahaIdSchema),
  lord: GrahaIdSchema,
  lord_combust: z.boolean(),
  name: z.string().min(1),
  sanskrit: z.string().min(1),
  karakas: z.array(GrahaIdSchema),
  significations: z.array(z.string()),
  body_parts: z.array(z.string()),
  classification: z.array(z.enum(HOUSE_GROUPS)),
  strength: StrengthSummarySchema,
});

const DrishtiTypeSchema = z.enum(["full", "special"]);

const AspectsSchema = z.object({
  graha_to_house: z.array(
    z.object({
      source: GrahaIdSchema,
      source_house: HouseSchema,
      target_house: HouseSchema,
      distance: z.number().int().min(1).max(12),
      type: DrishtiTypeSchema,
    })
  ),
  graha_to_graha: z.array(
    z.object({
      source: GrahaIdSchema,
      target: GrahaIdSchema,
      distance: z.number().int().min(1).max(12),
      type: DrishtiTypeSchema,
      arc_deg: LongitudeSchema,
    })
  ),
  rasi: z.array(z.object({ source: RasiIdSchema, target: RasiIdSchema })),
});

const CombustionSchema = z.object({
  graha: GrahaIdSchema,
  distance_from_sun: z.number().min(0).max(180),
  orb_deg: z.number().positive().nullable(),
  combust: z.boolean(),
});

const MaitriSchema = z.object({
  graha: GrahaIdSchema,
  other: GrahaIdSchema,
  natural: z.enum(RELATIONSHIPS),
  temporary: z.enum(["friend", "enemy"]),
  compound: z.enum(COMPOUND),
});

const LordshipSchema = z.object({
  ascendant_rasi: RasiIdSchema,
  house_lords: z.array(
    z.object({
      house: HouseSchema,
      rasi: RasiIdSchema,
      lord: GrahaIdSchema,
      lord_house: HouseSchema,
      lord_combust: z.boolean(),
    })
  ),
  grahas: z.array(
    z.object({
      graha: GrahaIdSchema,
      houses_ruled: z.array(HouseSchema),
      groups: z.array(z.enum(HOUSE_GROUPS)),
      functional_nature: z.enum(["yoga_karaka", "benefic", "neutral", "malefic"]),
      placed_in_house: HouseSchema,
      combust: z.boolean(),
    })
  ),
  yoga_karakas: z.array(GrahaIdSchema),
});

const StrengthsSchema = z.object({
  houses: z.array(
    StrengthSummarySchema.extend({
      house: HouseSchema,
      components: z.object({
        base: UnitScoreSchema,
        occupants: UnitScoreSchema,
        aspects: UnitScoreSchema,
        lord: UnitScoreSchema,
        combustion: UnitScoreSchema,
      }),
    })
  ),
  planets: z.array(
    StrengthSummarySchema.extend({
      graha: GrahaIdSchema,
      components: z.object({
        dignity: UnitScoreSchema,
        placement: UnitScoreSchema,
        aspects: UnitScoreSchema,
        combustion: UnitScoreSchema,
      }),
    })
  ),
});

const YogaSchema = z.object({
  name: z.string().min(1),
  category: z.enum(["Raj", "Dhana", "Parivartana"]),
  grahas: z.array(GrahaIdSchema).min(2),
  houses: z.array(HouseSchema).min(1),
  connection: z.enum(["conjunction", "mutual_aspect", "exchange"]),
  explanation: z.string().min(1),
});

const CharaKarakaSchema = z.object({
  code: z.enum(["AK", "AmK", "BK", "MK", "PiK", "PK", "GK", "DK"]),
  name: z.string().min(1),
  graha: GrahaIdSchema,
  effective_degree: z.number().min(0).max(30),
});

const PanchangaSchema = z.object({
  tithi: z.object({
    number: z.number().int().min(1).max(30),
    name: z.string().min(1),
    paksha: z.enum(["shukla", "krishna"]),
  }),
  nakshatra: NakshatraSchema,
  yoga: z.object({ number: z.number().int().min(1).max(27), name: z.string().min(1) }),
  karana: z.object({ number: z.number().int().min(1).max(60), name: z.string().min(1) }),
  vara: z.object({
    number: z.number().int().min(1).max(7),
    name: z.string().min(1),
    lord: GrahaIdSchema,
  }),
});

const MetaSchema = z.object({
  schema_version: z.literal(CHART_SCHEMA_VERSION),
  ephemeris: z.string().min(1),
  julian_day: z.number().positive(),
  ayanamsa_deg: z.number().finite(),
  obliquity_deg: z.number().finite(),
  local_sidereal_time_hours: z.number().min(0).lt(24),
  policies: z.object({
    strength: z.string(),
    lordship: z.string(),
    combustion: z.string(),
  }),
});

export const ChartSchema = z.object({
  input: z.object({
    utc_instant: z.string(),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    ayanamsa: z.enum(AYANAMSA_NAMES),
    house_system: z.enum(HOUSE_SYSTEMS),
  }),
  meta: MetaSchema,
  ascendant: PointSchema,
  midheaven: PointSchema,
  /** Ascendant + Moon - Sun */
  part_of_fortune: PointSchema,
  grahas: z.array(GrahaPositionSchema).length(9),
  bhavas: z.array(BhavaSchema).length(12),
  aspects: AspectsSchema,
  combustion: z.array(CombustionSchema).length(9),
  maitri: z.array(MaitriSchema),
  lordship: LordshipSchema,
  strengths: StrengthsSchema,
  yogas: z.array(YogaSchema),
  chara_karakas: z.array(CharaKarakaSchema),
  panchanga: PanchangaSchema,
});

export type ChartDraft = z.input<typeof ChartSchema>;
export type Chart = z.infer<typeof ChartSchema>;
export type GrahaPosition = Chart["grahas"][number];
export type Bhava = Chart["bhavas"][number];
export type ChartAspects = Chart["aspects"];
export type ChartPoint = Chart["ascendant"];
