import { describe, expect, it } from 'vitest';
import { validateConsistencyResult } from '../src/schemas/listing.js';
import { buildFallbackResult } from '../src/services/fallback.js';
import { TEST_LISTING_ID, TEST_URL } from './fixtures.js';

describe('buildFallbackResult', () => {
  it('produces a valid result from nothing but an empty URL', () => {
    const result = buildFallbackResult({ url: '', reason: '' });

    expect(validateConsistencyResult(result).ok).toBe(true);
    expect(result.listing_id).toBe('PRG-D41D8CD98F00');
    expect(result.property_address).toBe('Unknown address');
    expect(result.findings.length).toBeGreaterThan(0);
    expect(result.summary).toBe('Fallback result (Consistency check unavailable): 2 placeholder findings');
  });

  it('names the failure reason and marks the result as fallback', () => {
    const result = buildFallbackResult({ url: TEST_URL, reason: 'Scraping failed: HTTP 403' });

    expect(result.listing_id).toBe(TEST_LISTING_ID);
    expect(result.property_address).toBe(TEST_URL);
    expect(result.provenance).toBe('fallback');
    expect(result.is_consistent).toBe(false);
    expect(result.total_inconsistencies).toBe(2);
    expect(result.findings.map((f) => [f.field_name, f.severity])).toEqual([
      ['description', 'medium'],
      ['price', 'low']
    ]);
    expect(result.findings[0].explanation).toBe('Fallback result generated: Scraping failed: HTTP 403');
    expect(result.findings[1].explanation).toBe('Price could not be verified: Scraping failed: HTTP 403');
  });

  it('quotes the scraped fragments it was given', () => {
    const result = buildFallbackResult({
      url: TEST_URL,
      reason: 'Conversion failed',
      title: 'Prodej bytu 2+1',
      description: 'd'.repeat(150),
      price: '5 200 000 Kč'
    });

    expect(result.property_address).toBe('Prodej bytu 2+1');
    expect(result.findings[0].description_says).toBe(`${'d'.repeat(100)}...`);
    expect(result.findings[0].listing_data_says).toBe('Title: Prodej bytu 2+1, Price: 5 200 000 Kč');
    expect(result.findings[1].description_says).toBe('5 200 000 Kč');
  });

  it('keeps a supplied listing id and address', () => {
    const result = buildFallbackResult({
      url: TEST_URL,
      reason: 'x',
      listingId: 'PRG-000000000001',
      propertyAddress: 'Hostýnská, Praha - Strašnice'
    });
    expect(result.listing_id).toBe('PRG-000000000001');
    expect(result.property_address).toBe('Hostýnská, Praha - Strašnice');
  });

  it('keeps every text field within its limit for long reasons', () => {
    const result = buildFallbackResult({ url: TEST_URL, reason: 'r'.repeat(1000) });
    expect(validateConsistencyResult(result).ok).toBe(true);
    expect(result.summary).toHaveLength(200);
    expect(result.findings[0].explanation).toHaveLength(300);
  });
});
