import { z } from 'zod';
import type { Env } from '../env.js';
import { errorMessage } from '../errors.js';
import { normalizeScrapedProperty } from '../lib/scraped.js';
import { districtStatsSchema } from '../reference/districts.js';
import type { DistrictReference } from '../reference/districts.js';
import type { ConsistencyResult, Listing } from '../schemas/listing.js';
import type { CompletionService, Outcome, PipelineSettings, ScrapedProperty } from '../types.js';
import { checkConsistency } from './consistency.js';
import { convertToListing } from './conversion.js';
import { buildFallbackResult } from './fallback.js';

export interface PipelineDeps {
  completions: CompletionService;
  districts: DistrictReference;
  settings: PipelineSettings;
}

export interface ListingCheckInput {
  url: string;
  // What the scraper produced for this URL, or why it could not.
  scraped: Outcome<unknown>;
}

export const districtEnrichmentSchema = z.object({
  neighborhood: z.string(),
  district: z.string(),
  stats: districtStatsSchema.nullable()
});

export type DistrictEnrichment = z.infer<typeof districtEnrichmentSchema>;

export interface ListingCheckReport {
  url: string;
  property: ScrapedProperty | null;
  listing: Listing | null;
  result: ConsistencyResult;
  district: DistrictEnrichment | null;
}

export function pipelineSettingsFromEnv(env: Env): PipelineSettings {
  return {
    model: env.LLM_MODEL,
    temperature: env.LLM_TEMPERATURE,
    minListPrice: env.MIN_LIST_PRICE_CZK,
    defaultState: env.DEFAULT_STATE,
    defaultZipCode: env.DEFAULT_ZIP_CODE
  };
}

/**
 * Picks the district for a scraped property. The scraped district name is
 * tried first ("Strašnice"), then the city when it is a numbered form such
 * as "Praha 10".
 */
export function enrichDistrict(property: ScrapedProperty, districts: DistrictReference): DistrictEnrichment | null {
  const candidates = [property.location.district, property.location.city];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const district = districts.resolveDistrict(candidate);
    if (district) {
      return { neighborhood: candidate, district, stats: districts.getStats(district) };
    }
  }
  return null;
}

async function checkScrapedProperty(property: ScrapedProperty, deps: PipelineDeps): Promise<Omit<ListingCheckReport, 'url' | 'property' | 'district'>> {
  const options = { completions: deps.completions, settings: deps.settings };

  const converted = await convertToListing(property, options);
  if (!converted.ok) {
    return {
      listing: null,
      result: buildFallbackResult({
        url: property.url,
        reason: `Conversion failed: ${converted.reason}`,
        title: property.title,
        description: property.description,
        price: property.priceText
      })
    };
  }

  const listing = converted.value;
  const checked = await checkConsistency(listing, options);
  if (!checked.ok) {
    return {
      listing,
      result: buildFallbackResult({
        url: property.url,
        listingId: listing.listing_id,
        reason: `Consistency check failed: ${checked.reason}`,
        propertyAddress: listing.property_address,
        title: property.title,
        description: listing.description,
        price: property.priceText ?? String(listing.list_price)
      })
    };
  }

  return { listing, result: checked.value };
}

/**
 * Runs one URL through conversion and the consistency check. Always yields
 * exactly one result; any stage that fails is replaced by a fallback result
 * naming the failure.
 */
export async function runListingCheck(input: ListingCheckInput, deps: PipelineDeps): Promise<ListingCheckReport> {
  const { url, scraped } = input;

  if (!scraped.ok) {
    console.warn('[pipeline] scrape failed, using fallback', { url, reason: scraped.reason });
    return {
      url,
      property: null,
      listing: null,
      result: buildFallbackResult({ url, reason: `Scraping failed: ${scraped.reason}` }),
      district: null
    };
  }

  const property = normalizeScrapedProperty(scraped.value, url);
  const district = enrichDistrict(property, deps.districts);

  try {
    const { listing, result } = await checkScrapedProperty(property, deps);
    console.info('[pipeline] listing checked', {
      url,
      listingId: result.listing_id,
      provenance: result.provenance,
      inconsistencies: result.total_inconsistencies,
      district: district?.district ?? null
    });
    return { url, property, listing, result, district };
  } catch (err) {
    // Stages report failures as values; anything thrown here is a bug.
    console.error('[pipeline] unexpected error', { url, error: errorMessage(err) });
    return {
      url,
      property,
      listing: null,
      result: buildFallbackResult({
        url: property.url,
        reason: `Unexpected error: ${errorMessage(err)}`,
        title: property.title,
        description: property.description,
        price: property.priceText
      }),
      district
    };
  }
}
