import type { ScrapedProperty } from '../types.js';

// Separators used in Czech number formatting: space, no-break space,
// thin space, narrow no-break space and zero-width space.
const GROUP_SEPARATORS = /[\s\u00a0\u2009\u202f\u200b]/g;

export function extractInt(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = /\d+/.exec(text);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

export function extractFloat(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = /\d+(?:[.,]\d+)?/.exec(text);
  if (!match) return undefined;
  const n = Number(match[0].replace(',', '.'));
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parses Czech-formatted money ("8 499 000 Kč", "149 105 Kč / m2",
 * "2 950 000,- Kč"). Anything after the currency marker is ignored.
 */
export function parseCzkAmount(text: string | null | undefined): number | undefined {
  if (!text) return undefined;

  const amountPart = text.split(/kč|czk|,-/i)[0] ?? '';
  const compact = amountPart.replace(GROUP_SEPARATORS, '').replace(/[^\d.,]/g, '');
  if (!/\d/.test(compact)) return undefined;

  let normalized: string;
  if (/^\d{1,3}(\.\d{3})+$/.test(compact)) {
    // "8.499.000" uses dots as group separators.
    normalized = compact.replace(/\./g, '');
  } else {
    normalized = compact.replace(',', '.');
  }

  const n = Number(normalized);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function extractArea(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = /(\d+(?:[.,]\d+)?)\s*m(?:²|2)/i.exec(text);
  if (!match) return undefined;
  const n = Number(match[1].replace(',', '.'));
  return Number.isFinite(n) ? Math.round(n) : undefined;
}

/** "3+kk" and "3+1" both mean three rooms. */
export function parseDisposition(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = /(?:^|[^\d])(\d)\s*\+\s*(?:kk|1)\b/i.exec(text);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export interface PriceInputs {
  price?: number;
  pricePerSqm?: number;
  squareMeters?: number;
}

export type PriceSource = 'price_text' | 'per_sqm' | 'floor';

export function resolveListPrice(inputs: PriceInputs, floor: number): { value: number; source: PriceSource } {
  if (typeof inputs.price === 'number' && inputs.price > 0) {
    return { value: inputs.price, source: 'price_text' };
  }
  if (
    typeof inputs.pricePerSqm === 'number' &&
    typeof inputs.squareMeters === 'number' &&
    inputs.pricePerSqm > 0 &&
    inputs.squareMeters > 0
  ) {
    return { value: inputs.pricePerSqm * inputs.squareMeters, source: 'per_sqm' };
  }
  return { value: floor, source: 'floor' };
}

export interface ExtractionHints {
  bedrooms?: number;
  squareMeters?: number;
  price?: number;
  pricePerSqm?: number;
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((v) => v !== undefined);
}

/**
 * Best-effort values pulled straight from the scraped text. These are only
 * used to repair a model response, never as primary output.
 */
export function collectHints(property: ScrapedProperty): ExtractionHints {
  const { attributes, propertyDetails, title } = property;

  const bedrooms = firstDefined(
    parseDisposition(propertyDetails.disposition),
    parseDisposition(attributes['Dispozice']),
    parseDisposition(title)
  );

  const squareMeters = firstDefined(
    extractArea(propertyDetails.area),
    extractArea(attributes['Užitná plocha']),
    extractArea(title)
  );

  const pricePerSqm = firstDefined(
    parseCzkAmount(propertyDetails.pricePerM2),
    parseCzkAmount(attributes['Cena za jednotku'])
  );

  return {
    bedrooms,
    squareMeters,
    price: parseCzkAmount(property.priceText),
    pricePerSqm
  };
}
