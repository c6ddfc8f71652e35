import { collectHints, resolveListPrice } from '../lib/extract.js';
import type { ExtractionHints } from '../lib/extract.js';
import { parseJsonObject } from '../lib/json.js';
import { listingIdFromUrl } from '../lib/listingId.js';
import { locationText } from '../lib/scraped.js';
import { truncate } from '../lib/text.js';
import {
  MAX_YEAR_BUILT,
  MIN_DESCRIPTION_LENGTH,
  MIN_YEAR_BUILT,
  listingJsonSchema,
  validateListing
} from '../schemas/listing.js';
import type { Listing } from '../schemas/listing.js';
import { sanitizeJsonSchema } from '../schemas/sanitize.js';
import type { CompletionMessage, CompletionService, Outcome, PipelineSettings, ScrapedProperty } from '../types.js';
import { fail, succeed } from '../types.js';

const MAX_SYNTHESIZED_DESCRIPTION_LENGTH = 300;
const DEFAULT_BEDROOMS = 1;
const DEFAULT_BATHROOMS = 1;

export interface ConversionOptions {
  completions: CompletionService;
  settings: PipelineSettings;
}

export interface RepairContext {
  property: ScrapedProperty;
  listingId: string;
  hints: ExtractionHints;
  settings: PipelineSettings;
}

const SYSTEM_PROMPT =
  'You are a real estate data extraction assistant. You convert scraped Czech property ' +
  'listings into structured JSON that matches the given schema exactly.';

export function buildConversionMessages(property: ScrapedProperty, listingId: string): CompletionMessage[] {
  const schema = sanitizeJsonSchema(listingJsonSchema());
  const location = property.location;

  const prompt = `Convert this scraped property listing into the structured listing format.

Listing ID: ${listingId}
URL: ${property.url}
Title: ${property.title ?? 'N/A'}
Description: ${property.description ?? 'N/A'}
Price: ${property.priceText ?? 'N/A'}
Location: ${locationText(location) ?? 'N/A'}
Street: ${location.street ?? 'N/A'}
Property details: ${JSON.stringify(property.propertyDetails)}
Attributes: ${JSON.stringify(property.attributes)}
Amenities: ${JSON.stringify(property.amenities)}

Target JSON schema:
${JSON.stringify(schema)}

Constraints:
- listing_id must be exactly "${listingId}" and listing_url must be the URL above.
- list_price must be greater than zero, in CZK, as a plain number without separators.
- description must be at least ${MIN_DESCRIPTION_LENGTH} characters; use the original description text.
- bedrooms must be a whole number of zero or more; for a disposition like "3+kk" or "3+1" use 3.
- bathrooms must be zero or more; halves are allowed.
- square_meters and lot_size must be whole numbers of zero or more, or null.
- year_built must be between ${MIN_YEAR_BUILT} and ${MAX_YEAR_BUILT}, or null when unknown.
- stories must be at least 1, or null; garage_spaces must be zero or more, or null.
- has_pool, has_garage, has_basement and has_fireplace must be true, false, or null when not stated.
- property_address, city, state and zip_code must always be strings; state is the country.
- Use null for every other unknown value. Respond with JSON only.`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt }
  ];
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function synthesizeDescription(fragment: string | undefined, context: RepairContext): string {
  const { property } = context;
  if (property.title && property.title.length >= MIN_DESCRIPTION_LENGTH) return property.title;

  const subject = property.title ?? locationText(property.location) ?? 'this property';
  const detail = fragment?.trim() ? ` ${fragment.trim()}` : '';
  return truncate(`Property listing for ${subject}.${detail}`, MAX_SYNTHESIZED_DESCRIPTION_LENGTH);
}

/**
 * Restores the listing invariants on a parsed model response. Returns a new
 * record; fields the model got right are left alone.
 */
export function repairListingPayload(
  payload: Record<string, unknown>,
  context: RepairContext
): Record<string, unknown> {
  const { property, hints, settings } = context;
  const repaired: Record<string, unknown> = { ...payload };

  // Identity always comes from the source URL.
  repaired.listing_id = context.listingId;
  if (/^https?:\/\//i.test(property.url)) repaired.listing_url = property.url;
  else if (typeof repaired.listing_url !== 'string') repaired.listing_url = null;

  repaired.property_address =
    nonEmptyString(repaired.property_address) ??
    ([property.location.street, locationText(property.location)].filter(Boolean).join(', ') ||
      property.title ||
      property.url);
  repaired.city = nonEmptyString(repaired.city) ?? property.location.city ?? 'Unknown';
  repaired.state = nonEmptyString(repaired.state) ?? settings.defaultState;
  repaired.zip_code = nonEmptyString(repaired.zip_code) ?? settings.defaultZipCode;

  const listPrice = repaired.list_price;
  if (typeof listPrice !== 'number' || !Number.isFinite(listPrice) || listPrice <= 0) {
    const resolved = resolveListPrice(
      {
        price: hints.price,
        pricePerSqm: hints.pricePerSqm,
        squareMeters: hints.squareMeters ?? (isNonNegativeNumber(repaired.square_meters) ? repaired.square_meters : undefined)
      },
      settings.minListPrice
    );
    console.warn('[conversion] repaired list_price', {
      listingId: context.listingId,
      received: listPrice ?? null,
      value: resolved.value,
      source: resolved.source
    });
    repaired.list_price = resolved.value;
  }

  const description = repaired.description;
  if (typeof description !== 'string' || description.trim().length < MIN_DESCRIPTION_LENGTH) {
    const fragment = typeof description === 'string' ? description : property.description;
    repaired.description = synthesizeDescription(fragment, context);
  }

  if (!isNonNegativeNumber(repaired.bedrooms)) {
    repaired.bedrooms = hints.bedrooms ?? DEFAULT_BEDROOMS;
  }
  if (!isNonNegativeNumber(repaired.bathrooms)) {
    repaired.bathrooms = DEFAULT_BATHROOMS;
  }

  const yearBuilt = repaired.year_built;
  if (
    yearBuilt !== undefined &&
    yearBuilt !== null &&
    (typeof yearBuilt !== 'number' || yearBuilt < MIN_YEAR_BUILT || yearBuilt > MAX_YEAR_BUILT)
  ) {
    repaired.year_built = null;
  }

  return repaired;
}

/**
 * Scraped property -> validated Listing. Every failure (transport, refusal,
 * unusable JSON, invariants still broken after repair) comes back as
 * `{ ok: false }`.
 */
export async function convertToListing(property: ScrapedProperty, options: ConversionOptions): Promise<Outcome<Listing>> {
  const { completions, settings } = options;
  const listingId = listingIdFromUrl(property.url);
  const hints = collectHints(property);

  const response = await completions.complete({
    messages: buildConversionMessages(property, listingId),
    model: settings.model,
    temperature: settings.temperature,
    responseSchema: { name: 'listing', schema: sanitizeJsonSchema(listingJsonSchema()) }
  });
  if (!response.ok) {
    console.warn('[conversion] completion unavailable', { listingId, reason: response.reason });
    return fail(response.reason);
  }

  const payload = parseJsonObject(response.value);
  if (!payload.ok) {
    console.warn('[conversion] unusable completion', { listingId, reason: payload.reason });
    return fail(payload.reason);
  }

  const repaired = repairListingPayload(payload.value, { property, listingId, hints, settings });
  const validated = validateListing(repaired);
  if (!validated.ok) {
    console.error('[conversion] listing failed validation after repair', {
      listingId,
      issues: validated.error.issues
    });
    return fail(validated.error.message);
  }

  console.info('[conversion] listing converted', { listingId });
  return succeed(validated.value);
}
