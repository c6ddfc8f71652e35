import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { JsonObject } from '../types.js';
import { toJsonObject } from './sanitize.js';

export const MAX_FINDINGS = 20;
export const MAX_FINDING_QUOTE_LENGTH = 200;
export const MAX_EXPLANATION_LENGTH = 300;
export const MAX_SUMMARY_LENGTH = 200;
export const MIN_DESCRIPTION_LENGTH = 10;
export const MIN_YEAR_BUILT = 1800;
export const MAX_YEAR_BUILT = 2030;

export const severitySchema = z.enum(['critical', 'medium', 'low']);

export const listingSchema = z.object({
  listing_id: z.string().min(1).describe('Stable listing identifier derived from the source URL'),
  listing_url: z.string().url().nullish(),

  property_address: z.string(),
  city: z.string(),
  state: z.string(),
  zip_code: z.string(),

  bedrooms: z.number().int().min(0),
  bathrooms: z.number().min(0).describe('Can be decimal for half-baths'),
  square_meters: z.number().int().min(0).nullish(),
  lot_size: z.number().int().min(0).nullish().describe('Lot size in square meters'),
  year_built: z.number().int().min(MIN_YEAR_BUILT).max(MAX_YEAR_BUILT).nullish(),

  property_type: z.string().nullish().describe('e.g. Apartment, House, Villa'),
  stories: z.number().int().min(1).nullish(),
  garage_spaces: z.number().int().min(0).nullish(),

  list_price: z.number().positive().describe('Asking price in CZK'),

  has_pool: z.boolean().nullish(),
  has_garage: z.boolean().nullish(),
  has_basement: z.boolean().nullish(),
  has_fireplace: z.boolean().nullish(),

  description: z
    .string()
    .min(MIN_DESCRIPTION_LENGTH)
    .describe('The full text description written by the seller or realtor'),

  realtor_name: z.string().nullish(),
  realtor_agency: z.string().nullish(),
  listing_date: z.string().date().nullish()
});

export const inconsistencyFindingSchema = z.object({
  field_name: z.string().min(1).describe("Which listing field is implicated, e.g. 'bedrooms'"),
  description_says: z.string().max(MAX_FINDING_QUOTE_LENGTH),
  listing_data_says: z.string().max(MAX_FINDING_QUOTE_LENGTH),
  severity: severitySchema,
  explanation: z.string().max(MAX_EXPLANATION_LENGTH)
});

export const provenanceSchema = z.enum(['genuine', 'fallback']);

const consistencyResultShape = z.object({
  listing_id: z.string().min(1),
  property_address: z.string(),
  checked_at: z.string().datetime({ offset: true }),
  total_inconsistencies: z.number().int().min(0),
  is_consistent: z.boolean(),
  findings: z.array(inconsistencyFindingSchema).max(MAX_FINDINGS),
  summary: z.string().max(MAX_SUMMARY_LENGTH).describe('One-line summary of the check'),
  provenance: provenanceSchema
});

export const consistencyResultSchema = consistencyResultShape.superRefine((result, ctx) => {
  if (result.total_inconsistencies !== result.findings.length) {
    ctx.addIssue({
      code: 'custom',
      path: ['total_inconsistencies'],
      message: `Must equal the number of findings (${result.findings.length})`
    });
  }
  if (result.is_consistent !== (result.total_inconsistencies === 0)) {
    ctx.addIssue({
      code: 'custom',
      path: ['is_consistent'],
      message: 'Must be true exactly when there are no inconsistencies'
    });
  }
});

export type Severity = z.infer<typeof severitySchema>;
export type Provenance = z.infer<typeof provenanceSchema>;
export type Listing = z.infer<typeof listingSchema>;
export type InconsistencyFinding = z.infer<typeof inconsistencyFindingSchema>;
export type ConsistencyResult = z.infer<typeof consistencyResultSchema>;

export type Validated<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

export function validateListing(data: unknown): Validated<Listing> {
  const parsed = listingSchema.safeParse(data);
  if (!parsed.success) return { ok: false, error: ValidationError.fromZod('listing', parsed.error) };
  return { ok: true, value: parsed.data };
}

export function createListing(data: unknown): Listing {
  const validated = validateListing(data);
  if (!validated.ok) throw validated.error;
  return validated.value;
}

function withCheckedAt(data: unknown): unknown {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return data;
  if ('checked_at' in data && data.checked_at !== undefined) return data;
  return { ...data, checked_at: new Date().toISOString() };
}

/** `checked_at` defaults to the time of construction when absent. */
export function validateConsistencyResult(data: unknown): Validated<ConsistencyResult> {
  const parsed = consistencyResultSchema.safeParse(withCheckedAt(data));
  if (!parsed.success) {
    return { ok: false, error: ValidationError.fromZod('consistency result', parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

export function createConsistencyResult(data: unknown): ConsistencyResult {
  const validated = validateConsistencyResult(data);
  if (!validated.ok) throw validated.error;
  return validated.value;
}

export function listingJsonSchema(): JsonObject {
  return toJsonObject(z.toJSONSchema(listingSchema));
}

/** Schema the model answers with; provenance and checked_at are set by the caller. */
export function consistencyJsonSchema(): JsonObject {
  return toJsonObject(z.toJSONSchema(consistencyResultShape.omit({ provenance: true, checked_at: true })));
}
