import { parseJsonObject } from '../lib/json.js';
import { isRecord } from '../lib/scraped.js';
import { truncate } from '../lib/text.js';
import {
  MAX_EXPLANATION_LENGTH,
  MAX_FINDINGS,
  MAX_FINDING_QUOTE_LENGTH,
  MAX_SUMMARY_LENGTH,
  consistencyJsonSchema,
  validateConsistencyResult
} from '../schemas/listing.js';
import type { ConsistencyResult, Listing, Severity } from '../schemas/listing.js';
import { sanitizeJsonSchema } from '../schemas/sanitize.js';
import type { CompletionMessage, CompletionService, Outcome, PipelineSettings } from '../types.js';
import { fail, succeed } from '../types.js';

export const MAX_PROMPT_DESCRIPTION_LENGTH = 2000;

export interface ConsistencyOptions {
  completions: CompletionService;
  settings: PipelineSettings;
}

const SYSTEM_PROMPT =
  'You are a real estate data quality analyst. You compare a listing description with its ' +
  'structured data and report every contradiction between them.';

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'unknown';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return String(value);
}

export function buildConsistencyMessages(listing: Listing): CompletionMessage[] {
  const { description, ...facts } = listing;
  const structured = Object.entries(facts)
    .map(([key, value]) => `- ${key}: ${formatValue(value)}`)
    .join('\n');

  const prompt = `Check this listing for inconsistencies between the description and the structured data.

Structured data:
${structured}

Description:
${truncate(description, MAX_PROMPT_DESCRIPTION_LENGTH)}

Look for mismatches in size/area, number of rooms, bedrooms and bathrooms, property type,
features (pool, garage, basement, fireplace), price, condition and year built.

Rules:
- Report at most ${MAX_FINDINGS} findings, most severe first.
- description_says and listing_data_says must each be at most ${MAX_FINDING_QUOTE_LENGTH} characters.
- explanation must be at most ${MAX_EXPLANATION_LENGTH} characters.
- severity is "critical" for a direct contradiction, "medium" for a notable discrepancy, "low" for a minor one.
- listing_id must be "${listing.listing_id}" and property_address must be "${listing.property_address}".
- total_inconsistencies must equal the number of findings; is_consistent is true only when there are none.
- summary is one line of at most ${MAX_SUMMARY_LENGTH} characters.
Respond with JSON only.`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt }
  ];
}

const FINDING_TEXT_DEFAULTS = [
  ['field_name', 'unknown', Number.POSITIVE_INFINITY],
  ['description_says', 'N/A', MAX_FINDING_QUOTE_LENGTH],
  ['listing_data_says', 'N/A', MAX_FINDING_QUOTE_LENGTH],
  ['explanation', 'No explanation provided', MAX_EXPLANATION_LENGTH]
] as const;

function repairSeverity(value: unknown): Severity {
  const severity = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return severity === 'critical' || severity === 'low' ? severity : 'medium';
}

// Missing text gets a placeholder and an unknown severity becomes "medium",
// so one malformed finding never discards the rest of the answer.
function repairFinding(raw: unknown): Record<string, unknown> | null {
  if (!isRecord(raw)) return null;
  const finding: Record<string, unknown> = { ...raw };

  for (const [key, placeholder, max] of FINDING_TEXT_DEFAULTS) {
    const value = finding[key];
    const text = typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
    finding[key] = text ? truncate(text, max) : placeholder;
  }
  finding.severity = repairSeverity(finding.severity);
  return finding;
}

function synthesizeSummary(count: number): string {
  if (count === 0) return 'No inconsistencies found';
  return `Found ${count} ${count === 1 ? 'inconsistency' : 'inconsistencies'} between the description and the listing data`;
}

/**
 * Restores the result invariants on a parsed model response. Counts are
 * always recomputed from the findings; the model's own tally is ignored.
 */
export function repairConsistencyPayload(payload: Record<string, unknown>, listing: Listing): Record<string, unknown> {
  const repaired: Record<string, unknown> = { ...payload };

  if (repaired.listing_id !== listing.listing_id) {
    if (repaired.listing_id !== undefined && repaired.listing_id !== null) {
      console.warn('[consistency] model echoed a different listing_id', {
        listingId: listing.listing_id,
        received: repaired.listing_id
      });
    }
    repaired.listing_id = listing.listing_id;
  }
  if (typeof repaired.property_address !== 'string' || !repaired.property_address.trim()) {
    repaired.property_address = listing.property_address;
  }
  // The check time is ours; whatever the model echoed is discarded.
  repaired.checked_at = new Date().toISOString();

  const rawFindings = Array.isArray(repaired.findings) ? repaired.findings : [];
  const findings = rawFindings
    .map(repairFinding)
    .filter((f): f is Record<string, unknown> => f !== null)
    .slice(0, MAX_FINDINGS);
  repaired.findings = findings;

  if (repaired.total_inconsistencies !== findings.length) {
    console.warn('[consistency] reported count disagreed with findings', {
      listingId: listing.listing_id,
      reported: repaired.total_inconsistencies ?? null,
      actual: findings.length
    });
  }
  repaired.total_inconsistencies = findings.length;
  repaired.is_consistent = findings.length === 0;

  const summary = repaired.summary;
  repaired.summary =
    typeof summary === 'string' && summary.trim()
      ? truncate(summary.trim(), MAX_SUMMARY_LENGTH)
      : synthesizeSummary(findings.length);

  repaired.provenance = 'genuine';
  return repaired;
}

/**
 * Listing -> ConsistencyResult via the completion service. Returns
 * `{ ok: false }` when the model is unavailable or its answer cannot be
 * repaired into a valid result; the caller decides on the fallback.
 */
export async function checkConsistency(listing: Listing, options: ConsistencyOptions): Promise<Outcome<ConsistencyResult>> {
  const { completions, settings } = options;
  const listingId = listing.listing_id;

  const response = await completions.complete({
    messages: buildConsistencyMessages(listing),
    model: settings.model,
    temperature: settings.temperature,
    responseSchema: { name: 'consistency_result', schema: sanitizeJsonSchema(consistencyJsonSchema()) }
  });
  if (!response.ok) {
    console.warn('[consistency] completion unavailable', { listingId, reason: response.reason });
    return fail(response.reason);
  }

  const payload = parseJsonObject(response.value);
  if (!payload.ok) {
    console.warn('[consistency] unusable completion', { listingId, reason: payload.reason });
    return fail(payload.reason);
  }

  const validated = validateConsistencyResult(repairConsistencyPayload(payload.value, listing));
  if (!validated.ok) {
    console.error('[consistency] result failed validation after repair', {
      listingId,
      issues: validated.error.issues
    });
    return fail(validated.error.message);
  }

  console.info('[consistency] check completed', {
    listingId,
    inconsistencies: validated.value.total_inconsistencies
  });
  return succeed(validated.value);
}
