import type { ScrapedLocation, ScrapedProperty } from '../types.js';
import { normalizeWhitespace } from './text.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  if (typeof v !== 'string') return undefined;
  const trimmed = normalizeWhitespace(v);
  return trimmed.length > 0 ? trimmed : undefined;
}

function getNested(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}

function stringEntries(obj: Record<string, unknown> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!obj) return out;
  for (const [key, value] of Object.entries(obj)) {
    if (typeof value === 'string' && value.trim()) out[key] = normalizeWhitespace(value);
    else if (typeof value === 'number' && Number.isFinite(value)) out[key] = String(value);
  }
  return out;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === 'string')
    .map(normalizeWhitespace)
    .filter((v) => v.length > 0);
}

/** "Praha - Strašnice" -> { city: "Praha", district: "Strašnice" } */
function splitCityDistrict(text: string): ScrapedLocation {
  const match = /^(.+?)\s+[-–]\s+(.+)$/.exec(text);
  if (!match) return { full: text, city: text };
  return { full: text, city: match[1].trim(), district: match[2].trim() };
}

function locationFromTitle(title: string): ScrapedLocation {
  // Portal titles end with "…, <street>, <city> - <district>".
  const parts = title.split(',').map(normalizeWhitespace).filter(Boolean);
  if (parts.length < 2) return {};

  const tail = parts[parts.length - 1];
  if (!/\s[-–]\s/.test(tail)) return {};

  const location = splitCityDistrict(tail);
  if (parts.length >= 3 && !/m²|m2|\+kk|\+1/i.test(parts[parts.length - 2])) {
    location.street = parts[parts.length - 2];
  }
  return location;
}

function resolveLocation(raw: unknown, title: string | undefined): ScrapedLocation {
  if (typeof raw === 'string' && raw.trim()) {
    return splitCityDistrict(normalizeWhitespace(raw));
  }

  if (isRecord(raw)) {
    const location: ScrapedLocation = {
      full: getString(raw, 'full'),
      city: getString(raw, 'city'),
      district: getString(raw, 'district'),
      street: getString(raw, 'street')
    };
    if (location.full && (!location.city || !location.district)) {
      const split = splitCityDistrict(location.full);
      location.city = location.city ?? split.city;
      location.district = location.district ?? split.district;
    }
    if (location.full || location.city || location.district || location.street) return location;
  }

  return title ? locationFromTitle(title) : {};
}

/**
 * Resolves the scraper's loosely shaped mapping into explicit optional
 * fields. Non-string values are dropped rather than stringified.
 */
export function normalizeScrapedProperty(raw: unknown, fallbackUrl = ''): ScrapedProperty {
  const data = isRecord(raw) ? raw : {};
  const title = getString(data, 'title');

  return {
    url: getString(data, 'url') ?? fallbackUrl,
    title,
    description: getString(data, 'description'),
    priceText: getString(data, 'price'),
    location: resolveLocation(data.location, title),
    attributes: stringEntries(getNested(data, 'attributes')),
    propertyDetails: stringEntries(getNested(data, 'propertyDetails')),
    amenities: stringList(data.amenities)
  };
}

export function locationText(location: ScrapedLocation): string | undefined {
  if (location.full) return location.full;
  if (location.city && location.district) return `${location.city} - ${location.district}`;
  return location.city ?? location.district;
}
