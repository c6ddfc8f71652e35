import { createHash } from 'node:crypto';

export const LISTING_ID_PREFIX = 'PRG-';

/** `PRG-` followed by 12 upper-case hex characters of the URL's MD5 digest. */
export function listingIdFromUrl(url: string): string {
  const digest = createHash('md5').update(url, 'utf8').digest('hex');
  return `${LISTING_ID_PREFIX}${digest.slice(0, 12).toUpperCase()}`;
}
