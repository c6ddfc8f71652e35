import { vi } from 'vitest';
import { createDistrictReference } from '../src/reference/districts.js';
import type { DistrictReference } from '../src/reference/districts.js';
import type { Listing } from '../src/schemas/listing.js';
import type { CompletionService, Outcome, PipelineSettings } from '../src/types.js';

export const TEST_URL = 'https://x/974793-a';
export const TEST_LISTING_ID = 'PRG-E18224CEF223';

export const TEST_TITLE = 'Prodej bytu 3+kk 57 m², Hostýnská, Praha - Strašnice';

export const TEST_DESCRIPTION =
  'Nabízíme k prodeji světlý byt 3+kk o výměře 57 m² ve třetím patře cihlového domu v klidné části Strašnic nedaleko parku.';

export const testSettings: PipelineSettings = {
  model: 'test-model',
  temperature: 0,
  minListPrice: 1_000_000,
  defaultState: 'Czech Republic',
  defaultZipCode: '00000'
};

/** Raw scraper output for one bezrealitky-style listing page. */
export function sampleScrapedProperty(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    url: TEST_URL,
    title: TEST_TITLE,
    price: '8 499 000 Kč',
    description: TEST_DESCRIPTION,
    ...overrides
  };
}

export function sampleListing(overrides: Partial<Listing> = {}): Listing {
  return {
    listing_id: TEST_LISTING_ID,
    listing_url: TEST_URL,
    property_address: 'Hostýnská, Praha - Strašnice',
    city: 'Praha',
    state: 'Czech Republic',
    zip_code: '00000',
    bedrooms: 3,
    bathrooms: 1,
    square_meters: 57,
    lot_size: null,
    year_built: null,
    property_type: 'Apartment',
    stories: null,
    garage_spaces: null,
    list_price: 8_499_000,
    has_pool: null,
    has_garage: false,
    has_basement: true,
    has_fireplace: null,
    description: TEST_DESCRIPTION,
    realtor_name: null,
    realtor_agency: null,
    listing_date: null,
    ...overrides
  };
}

/** What a well-behaved model answers to the conversion prompt. */
export function modelListingPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...sampleListing(), ...overrides };
}

export function modelConsistencyPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    listing_id: TEST_LISTING_ID,
    property_address: 'Hostýnská, Praha - Strašnice',
    checked_at: '2026-03-01T10:00:00.000Z',
    total_inconsistencies: 1,
    is_consistent: false,
    findings: [
      {
        field_name: 'has_basement',
        description_says: 'No mention of a cellar',
        listing_data_says: 'has_basement: yes',
        severity: 'low',
        explanation: 'The structured data lists a basement the description never mentions'
      }
    ],
    summary: 'Found 1 minor inconsistency',
    ...overrides
  };
}

/** Completion service answering with the given outcomes, in order. */
export function stubCompletions(...responses: Array<Outcome<string>>) {
  const complete = vi.fn<CompletionService['complete']>();
  for (const response of responses) complete.mockResolvedValueOnce(response);
  return { complete } satisfies CompletionService;
}

export function ok(payload: Record<string, unknown>): Outcome<string> {
  return { ok: true, value: JSON.stringify(payload) };
}

export function testDistricts(): DistrictReference {
  return createDistrictReference(
    {
      'Prague 1': ['Staré Město', 'Nové Město'],
      'Prague 2': ['Nové Město', 'Vinohrady'],
      'Prague 10': ['Strašnice', 'Vršovice']
    },
    {
      'Prague 1': {
        avg_price_per_sqm_czk: 194_400,
        price_change_percent: -4.2,
        price_category: 'premium',
        population: 1000,
        violent_crimes: 20,
        burglaries: 5,
        fires: 2,
        amenities: 10
      },
      'Prague 10': {
        avg_price_per_sqm_czk: 127_800,
        price_change_percent: 2.6,
        price_category: 'medium',
        population: 2000,
        violent_crimes: 10,
        burglaries: 20,
        fires: 2,
        amenities: 10
      }
    }
  );
}
