import { JobSearchSource } from '../sources/base';
import { AggregationResult, Listing, SearchFilters } from '../types/job';
import { describeError, logger } from '../utils/logger';
import { deduplicateListings, toCandidateSummary } from './deduplication';

export const PAGE_SIZE = 100;

export interface AggregateOptions {
  terms: string[];
  location: string;
  radiusKm: number;
  sinceDays: number;
  filters: SearchFilters;
}

/**
 * Drives the search source over every term and page,
 * then merges duplicates into one candidate list
 */
export class JobAggregator {
  constructor(
    private source: JobSearchSource,
    private now: () => Date = () => new Date()
  ) {}

  async aggregate(options: AggregateOptions): Promise<AggregationResult> {
    const terms = options.terms.length > 0 ? options.terms : [''];
    const rawListings: Listing[] = [];
    let queryCount = 0;

    logger.info(`Executing API search`, {
      terms,
      location: options.location,
      radiusKm: options.radiusKm,
      sinceDays: options.sinceDays,
    });

    for (const term of terms) {
      let page = 1;
      let totalPages: number | null = null;

      // Pages are sequential: the page count is only known after page 1
      while (true) {
        let listings: Listing[];
        let totalResults: number;
        try {
          ({ listings, totalResults } = await this.source.fetchPage({
            term,
            location: options.location,
            radiusKm: options.radiusKm,
            sinceDays: options.sinceDays,
            pageSize: PAGE_SIZE,
            page,
            filters: options.filters,
          }));
          queryCount++;
        } catch (error) {
          logger.warn(`Query failed term='${term}' page=${page}`, { error: describeError(error) });
          break;
        }

        rawListings.push(...listings);
        if (totalPages === null) {
          totalPages = Math.max(1, Math.ceil(totalResults / PAGE_SIZE));
        }
        if (page >= totalPages) break;
        page++;
      }
    }

    const deduped = deduplicateListings(rawListings);
    const candidates = Array.from(deduped.values(), toCandidateSummary);

    logger.info(`Found ${candidates.length} unique candidates from the API search`, {
      queries: queryCount,
      rawResults: rawListings.length,
    });

    return {
      generatedAt: this.now().toISOString().replace(/\.\d{3}Z$/, 'Z'),
      source: 'jobsuche-api',
      queryTerms: terms,
      queryCount,
      rawResultCount: rawListings.length,
      dedupedCount: deduped.size,
      candidateCount: candidates.length,
      candidates,
    };
  }
}
