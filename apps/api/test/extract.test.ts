import { describe, expect, it } from 'vitest';
import {
  collectHints,
  extractArea,
  extractFloat,
  extractInt,
  parseCzkAmount,
  parseDisposition,
  resolveListPrice
} from '../src/lib/extract.js';
import { normalizeScrapedProperty } from '../src/lib/scraped.js';
import { sampleScrapedProperty } from './fixtures.js';

describe('extractInt / extractFloat', () => {
  it('reads the first run of digits', () => {
    expect(extractInt('57 m²')).toBe(57);
    expect(extractInt('3+kk')).toBe(3);
    expect(extractInt('Price: 8 499 000 Kč')).toBe(8);
  });

  it('returns undefined when there is no number', () => {
    expect(extractInt('')).toBeUndefined();
    expect(extractInt(undefined)).toBeUndefined();
    expect(extractInt('bez čísla')).toBeUndefined();
    expect(extractFloat('n/a')).toBeUndefined();
  });

  it('accepts dot and comma decimals', () => {
    expect(extractFloat('57.5 m²')).toBe(57.5);
    expect(extractFloat('57,5 m²')).toBe(57.5);
    expect(extractFloat('Podlaží 4')).toBe(4);
  });
});

describe('parseCzkAmount', () => {
  it('strips Czech group separators and the currency suffix', () => {
    expect(parseCzkAmount('8 499 000 Kč')).toBe(8_499_000);
    expect(parseCzkAmount('8\u00a0499\u00a0000\u00a0Kč')).toBe(8_499_000);
    expect(parseCzkAmount('8\u2009499\u2009000 CZK')).toBe(8_499_000);
    expect(parseCzkAmount('2 950 000,- Kč')).toBe(2_950_000);
  });

  it('ignores everything after the currency marker', () => {
    expect(parseCzkAmount('149 105 Kč / m2')).toBe(149_105);
  });

  it('treats dotted groups as thousands', () => {
    expect(parseCzkAmount('8.499.000 Kč')).toBe(8_499_000);
  });

  it('rejects text without a positive amount', () => {
    expect(parseCzkAmount('Cena na vyžádání')).toBeUndefined();
    expect(parseCzkAmount('0 Kč')).toBeUndefined();
    expect(parseCzkAmount('')).toBeUndefined();
  });
});

describe('extractArea / parseDisposition', () => {
  it('reads square meters in both spellings', () => {
    expect(extractArea('Prodej bytu 3+kk 57 m²')).toBe(57);
    expect(extractArea('Užitná plocha 74,6 m2')).toBe(75);
    expect(extractArea('57 metrů')).toBeUndefined();
  });

  it('maps dispositions to room counts', () => {
    expect(parseDisposition('3+kk')).toBe(3);
    expect(parseDisposition('Byt 2+1, Brno')).toBe(2);
    expect(parseDisposition('Garáž 18 m²')).toBeUndefined();
  });
});

describe('resolveListPrice', () => {
  it('prefers the parsed price', () => {
    expect(resolveListPrice({ price: 8_499_000, pricePerSqm: 100, squareMeters: 50 }, 1_000_000)).toEqual({
      value: 8_499_000,
      source: 'price_text'
    });
  });

  it('falls back to rate times area, then the floor', () => {
    expect(resolveListPrice({ pricePerSqm: 149_105, squareMeters: 57 }, 1_000_000)).toEqual({
      value: 8_498_985,
      source: 'per_sqm'
    });
    expect(resolveListPrice({ pricePerSqm: 149_105 }, 1_000_000)).toEqual({ value: 1_000_000, source: 'floor' });
  });
});

describe('collectHints', () => {
  it('pulls disposition, area and price from the title and price text', () => {
    const property = normalizeScrapedProperty(sampleScrapedProperty());
    expect(collectHints(property)).toEqual({
      bedrooms: 3,
      squareMeters: 57,
      price: 8_499_000,
      pricePerSqm: undefined
    });
  });

  it('prefers property details over attributes and the title', () => {
    const property = normalizeScrapedProperty(
      sampleScrapedProperty({
        price: undefined,
        attributes: { Dispozice: '2+1', 'Cena za jednotku': '149 105 Kč / m2' },
        propertyDetails: { disposition: '4+kk', area: '90 m²' }
      })
    );
    expect(collectHints(property)).toEqual({
      bedrooms: 4,
      squareMeters: 90,
      price: undefined,
      pricePerSqm: 149_105
    });
  });
});
