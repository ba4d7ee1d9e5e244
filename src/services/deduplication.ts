import { CandidateSummary, Listing } from '../types/job';
import { parseIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';

/**
 * Picks the more recently published of two versions of the same listing
 * Ties keep the existing (first-seen) version
 */
export function selectLatestVersion(existing: Listing, candidate: Listing): Listing {
  const existingDate = parseIsoDate(existing.publishedAt);
  const candidateDate = parseIsoDate(candidate.publishedAt);
  return candidateDate > existingDate ? candidate : existing;
}

/**
 * Merges listings by trimmed reference number
 * Listings without a reference number are skipped entirely
 */
export function deduplicateListings(listings: readonly Listing[]): Map<string, Listing> {
  const deduped = new Map<string, Listing>();
  let skipped = 0;

  for (const listing of listings) {
    const refnr = listing.refnr.trim();
    if (!refnr) {
      skipped++;
      continue;
    }

    const current = deduped.get(refnr);
    deduped.set(refnr, current ? selectLatestVersion(current, listing) : listing);
  }

  logger.debug(`Deduplication complete`, {
    total: listings.length,
    unique: deduped.size,
    skippedWithoutRefnr: skipped,
  });

  return deduped;
}

export function toCandidateSummary(listing: Listing): CandidateSummary {
  return {
    title: listing.title,
    profession: listing.profession,
    employer: listing.employer,
    refnr: listing.refnr,
    locality: listing.locality,
    region: listing.region,
    distanceKm: listing.distanceKm,
    publishedAt: parseIsoDate(listing.publishedAt),
    queryTerm: listing.queryTerm,
  };
}
