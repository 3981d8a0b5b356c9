/**
 * Placeholder ephemeris backed by a lookup table of precomputed tropical
 * positions, keyed by exact UTC instant.
 */

import fs from "node:fs";
import { z } from "zod";
import { ConfigurationError, EphemerisError } from "../errors.js";
import type { EphemerisBody } from "../reference/ids.js";
import type { EphemerisPosition, EphemerisProvider } from "./provider.js";

const TablePositionSchema = z.object({
  longitude: z.number(),
  retrograde: z.boolean(),
});

const TableEntrySchema = z.object({
  utc_instant: z.string().refine((v) => Number.isFinite(Date.parse(v)), "invalid instant"),
  obliquity_deg: z.number().finite().optional(),
  positions: z.object({
    sun: TablePositionSchema,
    moon: TablePositionSchema,
    mars: TablePositionSchema,
    mercury: TablePositionSchema,
    jupiter: TablePositionSchema,
    venus: TablePositionSchema,
    saturn: TablePositionSchema,
    rahu: TablePositionSchema,
  }),
});

export const EphemerisTableSchema = z.object({
  name: z.string().min(1).default("table"),
  entries: z.array(TableEntrySchema),
});

export type EphemerisTable = z.input<typeof EphemerisTableSchema>;
type TableEntry = z.infer<typeof TableEntrySchema>;

function instantKey(instant: Date): string {
  return instant.toISOString();
}

export class TableEphemerisProvider implements EphemerisProvider {
  readonly name: string;
  private readonly entries: ReadonlyMap<string, TableEntry>;

  constructor(table: unknown) {
    const parsed = EphemerisTableSchema.safeParse(table);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`Ephemeris table is invalid: ${issues}`);
    }
    this.name = `table:${parsed.data.name}`;
    this.entries = new Map(
      parsed.data.entries.map((entry) => [instantKey(new Date(entry.utc_instant)), entry])
    );
  }

  static fromFile(filePath: string): TableEphemerisProvider {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read ephemeris table ${filePath}: ${message}`);
    }
    return new TableEphemerisProvider(raw);
  }

  private entryFor(body: string, utcInstant: Date): TableEntry {
    const entry = this.entries.get(instantKey(utcInstant));
    if (!entry) {
      throw new EphemerisError(body, `No table entry for ${instantKey(utcInstant)}`);
    }
    return entry;
  }

  position(body: EphemerisBody, utcInstant: Date): EphemerisPosition {
    const position = this.entryFor(body, utcInstant).positions[body];
    return {
      tropical_longitude_deg: position.longitude,
      is_retrograde: position.retrograde,
    };
  }

  /** `undefined` when the entry carries no obliquity. */
  obliquity(utcInstant: Date): number | undefined {
    return this.entryFor("obliquity", utcInstant).obliquity_deg;
  }
}
