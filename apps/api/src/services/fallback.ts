import { listingIdFromUrl } from '../lib/listingId.js';
import { truncate } from '../lib/text.js';
import { MAX_EXPLANATION_LENGTH, MAX_FINDING_QUOTE_LENGTH, MAX_SUMMARY_LENGTH } from '../schemas/listing.js';
import type { ConsistencyResult, InconsistencyFinding } from '../schemas/listing.js';

export interface FallbackInput {
  url: string;
  reason: string;
  propertyAddress?: string;
  title?: string;
  description?: string;
  price?: string;
  // Lets a converted listing keep its id even if the URL is unavailable.
  listingId?: string;
}

function excerpt(description: string | undefined): string {
  if (!description) return 'N/A';
  return description.length > 100 ? `${description.slice(0, 100)}...` : description;
}

/**
 * Deterministic stand-in for a consistency result when the model could not
 * be consulted. Its findings name the reason, and provenance is "fallback".
 */
export function buildFallbackResult(input: FallbackInput): ConsistencyResult {
  const url = typeof input.url === 'string' ? input.url : '';
  const reason = input.reason.trim() || 'Consistency check unavailable';
  const price = input.price?.trim() || undefined;

  const findings: InconsistencyFinding[] = [
    {
      field_name: 'description',
      description_says: truncate(excerpt(input.description), MAX_FINDING_QUOTE_LENGTH),
      listing_data_says: truncate(`Title: ${input.title ?? 'N/A'}, Price: ${price ?? 'N/A'}`, MAX_FINDING_QUOTE_LENGTH),
      severity: 'medium',
      explanation: truncate(`Fallback result generated: ${reason}`, MAX_EXPLANATION_LENGTH)
    },
    {
      field_name: 'price',
      description_says: truncate(price ?? 'Price not specified in description', MAX_FINDING_QUOTE_LENGTH),
      listing_data_says: truncate(`Structured price: ${price ?? 'N/A'}`, MAX_FINDING_QUOTE_LENGTH),
      severity: 'low',
      explanation: truncate(`Price could not be verified: ${reason}`, MAX_EXPLANATION_LENGTH)
    }
  ];

  return {
    listing_id: input.listingId ?? listingIdFromUrl(url),
    property_address: input.propertyAddress || input.title || url || 'Unknown address',
    checked_at: new Date().toISOString(),
    total_inconsistencies: findings.length,
    is_consistent: false,
    findings,
    summary: truncate(`Fallback result (${reason}): ${findings.length} placeholder findings`, MAX_SUMMARY_LENGTH),
    provenance: 'fallback'
  };
}
