import type { Outcome } from '../types.js';
import { fail, succeed } from '../types.js';
import { isRecord } from './scraped.js';

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text.trim());
  return fenced ? fenced[1] : text.trim();
}

/** Parses a model response that should hold one JSON object. */
export function parseJsonObject(text: string): Outcome<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return fail(`Response was not valid JSON: ${detail}`);
  }
  if (!isRecord(parsed)) return fail('Response JSON was not an object');
  return succeed(parsed);
}
