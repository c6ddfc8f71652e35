import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

const DEFAULT_DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../data');

export const DISTRICT_MAPPING_FILE = 'prague-districts.json';
export const DISTRICT_STATS_FILE = 'district-stats.json';

const districtMappingSchema = z.record(z.string(), z.array(z.string().min(1)));

const rawDistrictStatsSchema = z.object({
  avg_price_per_sqm_czk: z.number().positive(),
  price_change_percent: z.number(),
  price_category: z.enum(['premium', 'high', 'medium']),
  population: z.number().int().min(0),
  violent_crimes: z.number().min(0),
  burglaries: z.number().min(0),
  fires: z.number().min(0),
  amenities: z.number().min(0)
});

const rawStatsTableSchema = z.record(z.string(), rawDistrictStatsSchema);

export type DistrictMapping = z.infer<typeof districtMappingSchema>;
export type RawDistrictStats = z.infer<typeof rawDistrictStatsSchema>;

export const districtStatsSchema = z.object({
  district: z.string(),
  avg_price_per_sqm: z.number(),
  price_change_percent: z.number(),
  price_category: rawDistrictStatsSchema.shape.price_category,
  // Per-capita rates scaled so the highest district is 1.0.
  violent_crime_rate: z.number(),
  burglary_rate: z.number(),
  fire_rate: z.number(),
  amenity_index: z.number()
});

export type DistrictStats = z.infer<typeof districtStatsSchema>;

export interface DistrictReference {
  resolveDistrict(name: string): string | null;
  getStats(district: string): DistrictStats | null;
  neighborhoodsIn(district: string): readonly string[];
  listDistricts(): readonly string[];
  listNeighborhoods(): readonly string[];
}

const NUMBERED_DISTRICT = /^(?:praha|prague)\s*-?\s*(\d{1,2})$/i;

function districtNumber(district: string): number {
  const match = /(\d+)\s*$/.exec(district);
  return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
}

function perCapita(count: number, population: number): number {
  return population > 0 ? count / population : 0;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

type CountKey = 'violent_crimes' | 'burglaries' | 'fires' | 'amenities';

function normalizedRates(raw: Record<string, RawDistrictStats>, key: CountKey): Map<string, number> {
  const ratios = new Map<string, number>();
  for (const [district, stats] of Object.entries(raw)) {
    ratios.set(district, perCapita(stats[key], stats.population));
  }
  const max = Math.max(0, ...ratios.values());
  const out = new Map<string, number>();
  for (const [district, ratio] of ratios) {
    out.set(district, max > 0 ? round4(ratio / max) : 0);
  }
  return out;
}

/**
 * Builds the frozen neighborhood/district lookup. A neighborhood listed under
 * several districts resolves to the first one in the mapping.
 */
export function createDistrictReference(mapping: DistrictMapping, rawStats: Record<string, RawDistrictStats>): DistrictReference {
  const byNeighborhood = new Map<string, string>();
  const byDistrict = new Map<string, readonly string[]>();

  for (const [district, neighborhoods] of Object.entries(mapping)) {
    byDistrict.set(district, Object.freeze([...neighborhoods]));
    for (const neighborhood of neighborhoods) {
      const key = neighborhood.trim().toLowerCase();
      if (!byNeighborhood.has(key)) byNeighborhood.set(key, district);
    }
  }

  const violent = normalizedRates(rawStats, 'violent_crimes');
  const burglary = normalizedRates(rawStats, 'burglaries');
  const fire = normalizedRates(rawStats, 'fires');
  const amenity = normalizedRates(rawStats, 'amenities');

  const stats = new Map<string, DistrictStats>();
  for (const [district, raw] of Object.entries(rawStats)) {
    stats.set(
      district,
      Object.freeze({
        district,
        avg_price_per_sqm: raw.avg_price_per_sqm_czk,
        price_change_percent: raw.price_change_percent,
        price_category: raw.price_category,
        violent_crime_rate: violent.get(district) ?? 0,
        burglary_rate: burglary.get(district) ?? 0,
        fire_rate: fire.get(district) ?? 0,
        amenity_index: amenity.get(district) ?? 0
      })
    );
  }

  const districts = Object.freeze(
    [...new Set([...byDistrict.keys(), ...stats.keys()])].sort((a, b) => districtNumber(a) - districtNumber(b))
  );
  const neighborhoods = Object.freeze(
    [...new Set(Object.values(mapping).flat())].sort((a, b) => a.localeCompare(b, 'cs'))
  );

  return Object.freeze({
    resolveDistrict(name: string) {
      const trimmed = name.trim();
      if (!trimmed) return null;

      const numbered = NUMBERED_DISTRICT.exec(trimmed);
      if (numbered) {
        const district = `Prague ${Number(numbered[1])}`;
        return byDistrict.has(district) || stats.has(district) ? district : null;
      }
      return byNeighborhood.get(trimmed.toLowerCase()) ?? null;
    },
    getStats(district: string) {
      return stats.get(district) ?? null;
    },
    neighborhoodsIn(district: string) {
      return byDistrict.get(district) ?? [];
    },
    listDistricts() {
      return districts;
    },
    listNeighborhoods() {
      return neighborhoods;
    }
  });
}

function readJsonFile<T>(file: string, schema: z.ZodType<T>): T {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, { encoding: 'utf8' }));
  const result = schema.safeParse(parsed);
  if (!result.success) throw ValidationError.fromZod(path.basename(file), result.error);
  return result.data;
}

/** Reads both reference tables once; throws if either is missing or malformed. */
export function loadDistrictReference(dir: string = DEFAULT_DATA_DIR): DistrictReference {
  const mapping = readJsonFile(path.join(dir, DISTRICT_MAPPING_FILE), districtMappingSchema);
  const rawStats = readJsonFile(path.join(dir, DISTRICT_STATS_FILE), rawStatsTableSchema);
  const reference = createDistrictReference(mapping, rawStats);

  console.info('[districts] reference loaded', {
    dir,
    districts: reference.listDistricts().length,
    neighborhoods: reference.listNeighborhoods().length
  });
  return reference;
}
