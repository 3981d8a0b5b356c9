/**
 * Static reference tables: rasis, graha dignities and natural relationships,
 * nakshatras, bhava significations and panchanga names.
 *
 * Loaded once from JSON, validated with zod, checked for completeness,
 * then frozen. A defect in the data raises ConfigurationError at load,
 * never during a chart computation.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { deepFreeze } from "../freeze.js";
import {
  BhavaSignificationSchema,
  GrahaRecordSchema,
  NakshatraRecordSchema,
  PanchangaNamesSchema,
  RasiRecordSchema,
  type BhavaSignification,
  type GrahaRecord,
  type NakshatraRecord,
  type PanchangaNames,
  type RasiRecord,
} from "../schemas/referenceTables.schema.js";
import {
  RASI_IDS,
  byGraha,
  byRasi,
  rasiIndex,
  type GrahaId,
  type NaturalRelationship,
  type RasiId,
} from "./ids.js";

export interface RawReferenceData {
  rasis: unknown;
  grahas: unknown;
  nakshatras: unknown;
  bhavas: unknown;
  panchanga: unknown;
}

export interface GrahaReference extends Omit<GrahaRecord, "natural_relationships"> {
  natural_relationships: Record<GrahaId, NaturalRelationship | "self">;
  /** Rasis this graha rules, derived from the rasi table. */
  rules: RasiId[];
}

export interface ReferenceTables {
  rasiList: readonly RasiRecord[];
  rasis: Readonly<Record<RasiId, RasiRecord>>;
  grahas: Readonly<Record<GrahaId, GrahaReference>>;
  nakshatras: readonly NakshatraRecord[];
  bhavas: readonly BhavaSignification[];
  panchanga: PanchangaNames;
}

const DATA_FILES = {
  rasis: "rasis.json",
  grahas: "grahas.json",
  nakshatras: "nakshatras.json",
  bhavas: "bhavas.json",
  panchanga: "panchanga.json",
} as const;

function defaultDataDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const beside = path.join(here, "data");
  if (fs.existsSync(beside)) return beside;
  // Compiled output under dist/ reads the source data directory.
  return path.resolve(here, "../../../astro/reference/data");
}

export function readReferenceData(dataDir: string = defaultDataDir()): RawReferenceData {
  const read = (file: string): unknown => {
    const fullPath = path.join(dataDir, file);
    try {
      return JSON.parse(fs.readFileSync(fullPath, "utf8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read reference table ${fullPath}: ${message}`);
    }
  };
  return {
    rasis: read(DATA_FILES.rasis),
    grahas: read(DATA_FILES.grahas),
    nakshatras: read(DATA_FILES.nakshatras),
    bhavas: read(DATA_FILES.bhavas),
    panchanga: read(DATA_FILES.panchanga),
  };
}

function parseTable<T>(label: string, schema: z.ZodType<T>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Reference table ${label} is invalid: ${issues}`);
  }
  return result.data;
}

function indexRasis(list: RasiRecord[]): Record<RasiId, RasiRecord> {
  if (list.length !== RASI_IDS.length) {
    throw new ConfigurationError(`Rasi table must list 12 rasis, found ${list.length}`);
  }
  return byRasi((id) => {
    const record = list[rasiIndex(id)];
    if (!record || record.id !== id) {
      throw new ConfigurationError(
        `Rasi table out of order at position ${rasiIndex(id)}: expected ${id}, found ${record?.id ?? "nothing"}`
      );
    }
    return record;
  });
}

function indexGrahas(
  list: GrahaRecord[],
  rasis: Record<RasiId, RasiRecord>
): Record<GrahaId, GrahaReference> {
  for (const record of list) {
    if (list.filter((other) => other.id === record.id).length > 1) {
      throw new ConfigurationError(`Graha table lists ${record.id} more than once`);
    }
  }

  return byGraha((id) => {
    const record = list.find((candidate) => candidate.id === id);
    if (!record) {
      throw new ConfigurationError(`Graha table is missing ${id}`);
    }

    const natural = byGraha((other): NaturalRelationship | "self" => {
      if (other === id) {
        if (record.natural_relationships[other] !== undefined) {
          throw new ConfigurationError(`Graha ${id} must not list a relationship with itself`);
        }
        return "self";
      }
      const relation = record.natural_relationships[other];
      if (relation === undefined) {
        throw new ConfigurationError(`Graha ${id} has no natural relationship with ${other}`);
      }
      return relation;
    });

    const rules = RASI_IDS.filter((rasi) => rasis[rasi].ruler === id);
    const ownMismatch =
      record.own_signs.length !== rules.length ||
      record.own_signs.some((rasi) => !rules.includes(rasi));
    if (ownMismatch) {
      throw new ConfigurationError(
        `Graha ${id} own signs [${record.own_signs.join(", ")}] disagree with rasi rulers [${rules.join(", ")}]`
      );
    }
    if (record.exaltation.rasi === record.debilitation) {
      throw new ConfigurationError(`Graha ${id} is exalted and debilitated in the same rasi`);
    }

    return {
      id: record.id,
      name: record.name,
      sanskrit: record.sanskrit,
      exaltation: record.exaltation,
      debilitation: record.debilitation,
      moolatrikona: record.moolatrikona,
      own_signs: record.own_signs,
      natural_relationships: natural,
      rules,
    };
  });
}

function checkNakshatras(list: NakshatraRecord[]): NakshatraRecord[] {
  if (list.length !== 27) {
    throw new ConfigurationError(`Nakshatra table must list 27 nakshatras, found ${list.length}`);
  }
  list.forEach((record, i) => {
    if (record.index !== i) {
      throw new ConfigurationError(`Nakshatra table out of order at position ${i}`);
    }
  });
  return list;
}

function checkBhavas(list: BhavaSignification[]): BhavaSignification[] {
  if (list.length !== 12 || list.some((record, i) => record.number !== i + 1)) {
    throw new ConfigurationError("Bhava table must list houses 1 through 12 in order");
  }
  return list;
}

/**
 * Validate raw table data and build the frozen lookup structure.
 */
export function buildReferenceTables(raw: RawReferenceData): ReferenceTables {
  const rasiList = parseTable("rasis", z.array(RasiRecordSchema), raw.rasis);
  const rasis = indexRasis(rasiList);
  const grahas = indexGrahas(
    parseTable("grahas", z.array(GrahaRecordSchema), raw.grahas),
    rasis
  );
  const nakshatras = checkNakshatras(
    parseTable("nakshatras", z.array(NakshatraRecordSchema), raw.nakshatras)
  );
  const bhavas = checkBhavas(parseTable("bhavas", z.array(BhavaSignificationSchema), raw.bhavas));
  const panchanga = parseTable("panchanga", PanchangaNamesSchema, raw.panchanga);

  return deepFreeze({ rasiList, rasis, grahas, nakshatras, bhavas, panchanga });
}

let cached: ReferenceTables | undefined;

/**
 * Process-wide tables, loaded on first use and shared read-only afterwards.
 */
export function getReferenceTables(): ReferenceTables {
  if (!cached) {
    cached = buildReferenceTables(readReferenceData());
  }
  return cached;
}

export function naturalRelationship(
  tables: ReferenceTables,
  graha: GrahaId,
  other: GrahaId
): NaturalRelationship | "self" {
  return tables.grahas[graha].natural_relationships[other];
}

export function rulerOf(tables: ReferenceTables, rasi: RasiId): GrahaId {
  return tables.rasis[rasi].ruler;
}

export function bhavaSignification(tables: ReferenceTables, house: number): BhavaSignification {
  const record = tables.bhavas[house - 1];
  if (!record) {
    throw new RangeError(`No signification for house ${house}`);
  }
  return record;
}
