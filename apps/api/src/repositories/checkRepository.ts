import admin from 'firebase-admin';
import { getFirestore } from '../firebase.js';
import { validateConsistencyResult, validateListing } from '../schemas/listing.js';
import type { ConsistencyResult, Listing, Provenance } from '../schemas/listing.js';
import { districtEnrichmentSchema } from '../services/pipeline.js';
import type { DistrictEnrichment, ListingCheckReport } from '../services/pipeline.js';

const LISTINGS = 'listings';
const CHECKS = 'checks';

export interface StoredCheck {
  checkId: string;
  listingId: string;
  url: string;
  listing: Listing | null;
  result: ConsistencyResult;
  district: DistrictEnrichment | null;
  createdAt?: string;
}

export interface CheckSummary {
  listingId: string;
  url: string;
  propertyAddress: string;
  checkId?: string;
  isConsistent?: boolean;
  totalInconsistencies?: number;
  provenance?: Provenance;
  summary?: string;
  updatedAt?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function stripUndefined(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripUndefined);
  if (isPlainObject(value)) return omitUndefined(value);
  return value;
}

// Firestore rejects undefined field values anywhere in a document.
function omitUndefined(obj: Record<string, unknown>): admin.firestore.DocumentData {
  const out: admin.firestore.DocumentData = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) out[key] = stripUndefined(value);
  }
  return out;
}

function tsToIso(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value instanceof admin.firestore.Timestamp) return value.toDate().toISOString();
  return undefined;
}

function stringField(data: admin.firestore.DocumentData, key: string): string | undefined {
  const value: unknown = data[key];
  return typeof value === 'string' ? value : undefined;
}

function readDistrict(value: unknown): DistrictEnrichment | null {
  const parsed = districtEnrichmentSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Stores the latest Listing on `listings/{listing_id}` and appends the
 * ConsistencyResult under its `checks` subcollection, in one batch.
 */
export async function saveListingCheck(report: ListingCheckReport): Promise<{ listingId: string; checkId: string }> {
  const db = getFirestore();
  const now = admin.firestore.Timestamp.now();
  const { result } = report;

  const listingRef = db.collection(LISTINGS).doc(result.listing_id);
  const checkRef = listingRef.collection(CHECKS).doc();
  const batch = db.batch();

  batch.set(
    listingRef,
    omitUndefined({
      listingId: result.listing_id,
      url: report.url,
      propertyAddress: result.property_address,
      // A failed conversion leaves the previously stored listing in place.
      ...(report.listing ? { listing: report.listing } : {}),
      latestCheck: {
        checkId: checkRef.id,
        isConsistent: result.is_consistent,
        totalInconsistencies: result.total_inconsistencies,
        provenance: result.provenance,
        summary: result.summary
      },
      updatedAt: now
    }),
    { merge: true }
  );

  batch.set(
    checkRef,
    omitUndefined({
      listingId: result.listing_id,
      url: report.url,
      listing: report.listing,
      result,
      district: report.district,
      createdAt: now
    })
  );

  await batch.commit();
  return { listingId: result.listing_id, checkId: checkRef.id };
}

export async function getLatestCheck(listingId: string): Promise<StoredCheck | null> {
  const db = getFirestore();
  const snap = await db
    .collection(LISTINGS)
    .doc(listingId)
    .collection(CHECKS)
    .orderBy('createdAt', 'desc')
    .limit(1)
    .get();

  const doc = snap.docs[0];
  if (!doc) return null;
  const data = doc.data();

  const result = validateConsistencyResult(data.result);
  if (!result.ok) {
    console.warn('[checks] stored result failed validation', { listingId, checkId: doc.id, error: result.error.message });
    return null;
  }
  const listing = data.listing ? validateListing(data.listing) : null;

  return {
    checkId: doc.id,
    listingId,
    url: stringField(data, 'url') ?? '',
    listing: listing?.ok ? listing.value : null,
    result: result.value,
    district: readDistrict(data.district),
    createdAt: tsToIso(data.createdAt)
  };
}

export async function listRecentChecks(limit = 10): Promise<CheckSummary[]> {
  const db = getFirestore();
  const snap = await db.collection(LISTINGS).orderBy('updatedAt', 'desc').limit(limit).get();

  return snap.docs.map((d) => {
    const data = d.data();
    const latest: unknown = data.latestCheck;
    const check: Record<string, unknown> = isPlainObject(latest) ? latest : {};
    return {
      listingId: d.id,
      url: stringField(data, 'url') ?? '',
      propertyAddress: stringField(data, 'propertyAddress') ?? '',
      checkId: typeof check.checkId === 'string' ? check.checkId : undefined,
      isConsistent: typeof check.isConsistent === 'boolean' ? check.isConsistent : undefined,
      totalInconsistencies: typeof check.totalInconsistencies === 'number' ? check.totalInconsistencies : undefined,
      provenance: check.provenance === 'genuine' || check.provenance === 'fallback' ? check.provenance : undefined,
      summary: typeof check.summary === 'string' ? check.summary : undefined,
      updatedAt: tsToIso(data.updatedAt)
    };
  });
}
