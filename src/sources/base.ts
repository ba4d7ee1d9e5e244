import { DetailContext, SearchPage, SearchPageQuery } from '../types/job';

/**
 * Paginated listing search
 * Failures propagate; the caller decides whether to skip or retry
 */
export interface JobSearchSource {
  readonly name: string;

  fetchPage(query: SearchPageQuery): Promise<SearchPage>;
}

/**
 * Single-listing detail lookup
 * Implementations never throw: failures are reported through `DetailContext.error`
 */
export interface JobDetailSource {
  fetchDetail(refnr: string): Promise<DetailContext>;
}
