/**
 * Result of a fallible pipeline stage. Failures carry a human-readable
 * reason that ends up in fallback findings and logs.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: string): Outcome<T> {
  return { ok: false, reason };
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type CompletionRole = 'system' | 'user';

export interface CompletionMessage {
  role: CompletionRole;
  content: string;
}

export interface CompletionRequest {
  messages: CompletionMessage[];
  model: string;
  temperature: number;
  // When set, the provider is asked for a strict JSON-schema response.
  responseSchema?: {
    name: string;
    schema: JsonObject;
  };
}

export interface CompletionService {
  /** Resolves to the raw response text; never rejects. */
  complete(request: CompletionRequest): Promise<Outcome<string>>;
}

export interface ScrapedLocation {
  full?: string;
  city?: string;
  district?: string;
  street?: string;
}

/** Scraper output after shape normalization. */
export interface ScrapedProperty {
  url: string;
  title?: string;
  description?: string;
  priceText?: string;
  location: ScrapedLocation;
  attributes: Record<string, string>;
  propertyDetails: Record<string, string>;
  amenities: string[];
}

export interface PipelineSettings {
  model: string;
  temperature: number;
  minListPrice: number;
  defaultState: string;
  defaultZipCode: string;
}
