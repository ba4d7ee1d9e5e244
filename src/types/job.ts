/**
 * Domain records for the Jobsuche pipeline
 * Raw API payloads are normalized into these shapes at the source boundary
 */

/**
 * Query parameters sent to the search endpoint, in request order
 */
export type SearchQueryParams = Record<string, string>;

/**
 * Optional filters of the search endpoint
 * Empty values are left out of the request
 */
export interface SearchFilters {
  offerType: string;
  tempAgency: string;
  placementService: string;
  employer: string;
  occupationField: string;
}

export interface SearchPageQuery {
  term: string;
  location: string;
  radiusKm: number;
  sinceDays: number;
  pageSize: number;
  page: number;
  filters: SearchFilters;
}

/**
 * One listing as returned by the search endpoint
 * `refnr` is the dedup key and may be empty
 */
export interface Listing {
  refnr: string;
  title: string;
  profession: string;
  employer: string;
  locality: string;
  region: string;
  distanceKm: string;
  publishedAt: string;
  query: SearchQueryParams;
  queryTerm: string;
}

export interface SearchPage {
  listings: Listing[];
  totalResults: number;
}

/**
 * Compact projection of a listing for the shortlist stage
 */
export interface CandidateSummary {
  title: string;
  profession: string;
  employer: string;
  refnr: string;
  locality: string;
  region: string;
  distanceKm: string;
  publishedAt: string;
  queryTerm: string;
}

export interface AggregationResult {
  generatedAt: string;
  source: 'jobsuche-api';
  queryTerms: string[];
  queryCount: number;
  rawResultCount: number;
  dedupedCount: number;
  candidateCount: number;
  candidates: CandidateSummary[];
}

/**
 * Result of fetching one detail page
 * An empty description means the listing is no longer live
 */
export interface DetailContext {
  detailUrl: string;
  httpStatus: number;
  error: string;
  description: string;
  publishedAt: string;
  modifiedAt: string;
  contractDuration: string;
  workLocations: string[];
}

export interface DeepDiveCandidate {
  refnr: string;
  title: string;
  employer: string;
  locality: string;
  description: string;
  detailUrl: string;
  contractDuration: string;
}

export interface JobMatch {
  title: string;
  employer: string;
  location: string;
  refnr: string;
  reason: string;
  detailUrl: string;
}

/**
 * Persisted record of a past suggestion, usually `{date, company, role, refnr}`
 * The file is edited by hand as well, so entries are kept as written
 */
export type HistoryEntry = Record<string, unknown>;

export interface SuggestionToLog {
  company?: string;
  role?: string;
  refnr?: string;
}
