import { z } from "zod";
import {
  ELEMENTS,
  GRAHA_IDS,
  MODALITIES,
  RASI_IDS,
  RELATIONSHIPS,
} from "../reference/ids.js";

/**
 * Zod schemas for the static reference tables under astro/reference/data.
 * Shape only; completeness across graha × rasi is checked by the loader.
 */

const GrahaIdSchema = z.enum(GRAHA_IDS);
const RasiIdSchema = z.enum(RASI_IDS);

export const RasiRecordSchema = z.object({
  id: RasiIdSchema,
  name: z.string().min(1),
  sanskrit: z.string().min(1),
  element: z.enum(ELEMENTS),
  modality: z.enum(MODALITIES),
  ruler: GrahaIdSchema,
});

export const GrahaRecordSchema = z.object({
  id: GrahaIdSchema,
  name: z.string().min(1),
  sanskrit: z.string().min(1),
  exaltation: z.object({
    rasi: RasiIdSchema,
    degree: z.number().min(0).max(30).nullable(),
  }),
  debilitation: RasiIdSchema,
  moolatrikona: z
    .object({
      rasi: RasiIdSchema,
      from_deg: z.number().min(0).max(30),
      to_deg: z.number().min(0).max(30),
    })
    .refine((mt) => mt.from_deg < mt.to_deg, {
      message: "moolatrikona range must be non-empty",
    })
    .nullable(),
  own_signs: z.array(RasiIdSchema),
  natural_relationships: z.record(GrahaIdSchema, z.enum(RELATIONSHIPS)),
});

export const NakshatraRecordSchema = z.object({
  index: z.number().int().min(0).max(26),
  name: z.string().min(1),
  lord: GrahaIdSchema,
});

export const BhavaSignificationSchema = z.object({
  number: z.number().int().min(1).max(12),
  name: z.string().min(1),
  sanskrit: z.string().min(1),
  karakas: z.array(GrahaIdSchema).min(1),
  significations: z.array(z.string().min(1)).min(1),
  body_parts: z.array(z.string().min(1)),
});

export const PanchangaNamesSchema = z.object({
  tithis: z.array(z.string().min(1)).length(30),
  nitya_yogas: z.array(z.string().min(1)).length(27),
  movable_karanas: z.array(z.string().min(1)).length(7),
  fixed_karanas: z.object({
    first: z.string().min(1),
    last_three: z.array(z.string().min(1)).length(3),
  }),
  varas: z
    .array(z.object({ name: z.string().min(1), lord: GrahaIdSchema }))
    .length(7),
});

export type RasiRecord = z.infer<typeof RasiRecordSchema>;
export type GrahaRecord = z.infer<typeof GrahaRecordSchema>;
export type NakshatraRecord = z.infer<typeof NakshatraRecordSchema>;
export type BhavaSignification = z.infer<typeof BhavaSignificationSchema>;
export type PanchangaNames = z.infer<typeof PanchangaNamesSchema>;
