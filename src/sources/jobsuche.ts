import { z } from 'zod';
import { JobDetailSource, JobSearchSource } from './base';
import { extractEmbeddedState } from './embedded-state';
import {
  DetailContext,
  Listing,
  SearchPage,
  SearchPageQuery,
  SearchQueryParams,
} from '../types/job';
import { parseIsoDate } from '../utils/dates';
import { DEFAULT_TIMEOUT_MS, getJson, HttpClient } from '../utils/http';
import { describeError, logger } from '../utils/logger';

/**
 * Jobsuche API adapter (Bundesagentur für Arbeit)
 * Search goes through the JSON API, details are read from the public job page
 */
export const SEARCH_API_URL = 'https://rest.arbeitsagentur.de/jobboerse/jobsuche-service/pc/v4/jobs';
export const DETAIL_PAGE_URL = 'https://www.arbeitsagentur.de/jobsuche/jobdetail/';

export const API_HEADERS: Record<string, string> = {
  'X-API-Key': 'jobboerse-jobsuche',
  'User-Agent': 'job-alert-agent/1.0',
};

const optionalText = z.string().nullish().catch(undefined);

const RawListingSchema = z.object({
  refnr: optionalText,
  titel: optionalText,
  beruf: optionalText,
  arbeitgeber: optionalText,
  aktuelleVeroeffentlichungsdatum: optionalText,
  arbeitsort: z
    .object({
      ort: optionalText,
      region: optionalText,
      entfernung: z.union([z.string(), z.number()]).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
});

const SearchResponseSchema = z.object({
  stellenangebote: z.array(RawListingSchema).nullish(),
  maxErgebnisse: z.union([z.number(), z.string()]).nullish(),
});

const LocationSchema = z
  .object({
    adresse: z
      .object({ plz: optionalText, ort: optionalText })
      .nullish()
      .catch(undefined),
  })
  .catch({});

const DetailStateSchema = z.object({
  jobdetail: z
    .object({
      stellenangebotsBeschreibung: optionalText,
      datumErsteVeroeffentlichung: optionalText,
      aenderungsdatum: optionalText,
      vertragsdauer: optionalText,
      stellenlokationen: z.array(LocationSchema).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
});

type RawListing = z.infer<typeof RawListingSchema>;

export function buildSearchParams(query: SearchPageQuery): SearchQueryParams {
  const params: SearchQueryParams = {
    wo: query.location,
    umkreis: String(query.radiusKm),
    veroeffentlichtseit: String(query.sinceDays),
    size: String(query.pageSize),
    page: String(query.page),
  };

  // Optional filters only when they have values
  const optional: Array<[string, string]> = [
    ['angebotsart', query.filters.offerType],
    ['zeitarbeit', query.filters.tempAgency],
    ['pav', query.filters.placementService],
    ['arbeitgeber', query.filters.employer],
    ['berufsfeld', query.filters.occupationField],
    ['was', query.term],
  ];
  for (const [key, value] of optional) {
    if (value) params[key] = value;
  }

  return params;
}

export function buildDetailUrl(refnr: string): string {
  return `${DETAIL_PAGE_URL}${encodeURIComponent(refnr)}`;
}

function parseTotalResults(value: number | string | null | undefined, fallback: number): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : value;
  return parsed && !isNaN(parsed) ? parsed : fallback;
}

function normalizeListing(raw: RawListing, params: SearchQueryParams, term: string): Listing {
  const distance = raw.arbeitsort?.entfernung;
  return {
    refnr: raw.refnr ?? '',
    title: raw.titel ?? '',
    profession: raw.beruf ?? '',
    employer: raw.arbeitgeber ?? '',
    locality: raw.arbeitsort?.ort ?? '',
    region: raw.arbeitsort?.region ?? '',
    distanceKm: distance === null || distance === undefined ? '' : String(distance),
    publishedAt: raw.aktuelleVeroeffentlichungsdatum ?? '',
    query: { ...params },
    queryTerm: term,
  };
}

function emptyDetail(detailUrl: string): DetailContext {
  return {
    detailUrl,
    httpStatus: 0,
    error: '',
    description: '',
    publishedAt: '',
    modifiedAt: '',
    contractDuration: '',
    workLocations: [],
  };
}

/**
 * Turns the embedded page state into a detail context
 * Unexpected shapes produce empty fields, never an error
 */
export function parseDetailPage(detailUrl: string, status: number, html: string): DetailContext {
  const out = emptyDetail(detailUrl);
  out.httpStatus = status;

  const parsed = DetailStateSchema.safeParse(extractEmbeddedState(html));
  const detail = parsed.success ? parsed.data.jobdetail : undefined;
  if (!detail) return out;

  out.description = detail.stellenangebotsBeschreibung ?? '';
  out.publishedAt = parseIsoDate(detail.datumErsteVeroeffentlichung);
  out.modifiedAt = parseIsoDate(detail.aenderungsdatum);
  out.contractDuration = detail.vertragsdauer ?? '';

  for (const location of detail.stellenlokationen ?? []) {
    const plz = location.adresse?.plz ?? '';
    const ort = location.adresse?.ort ?? '';
    if (plz || ort) {
      out.workLocations.push(`${plz} ${ort}`.trim());
    }
  }

  return out;
}

export class JobsucheSource implements JobSearchSource, JobDetailSource {
  readonly name = 'jobsuche-api';

  constructor(
    private http: HttpClient,
    private timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  async fetchPage(query: SearchPageQuery): Promise<SearchPage> {
    const params = buildSearchParams(query);
    const url = `${SEARCH_API_URL}?${new URLSearchParams(params).toString()}`;

    logger.debug(`Querying ${this.name}`, { term: query.term, page: query.page });

    const payload = SearchResponseSchema.parse(
      await getJson(this.http, url, { headers: API_HEADERS, timeoutMs: this.timeoutMs })
    );
    const listings = (payload.stellenangebote ?? []).map(raw =>
      normalizeListing(raw, params, query.term)
    );

    return {
      listings,
      totalResults: parseTotalResults(payload.maxErgebnisse, listings.length),
    };
  }

  async fetchDetail(refnr: string): Promise<DetailContext> {
    const detailUrl = buildDetailUrl(refnr);

    let status: number;
    let html: string;
    try {
      const response = await this.http.getText(detailUrl, { timeoutMs: this.timeoutMs });
      status = response.status;
      html = response.body;
    } catch (error) {
      logger.warn(`Detail fetch failed for ${refnr}`, { error: describeError(error) });
      return { ...emptyDetail(detailUrl), error: describeError(error) };
    }

    return parseDetailPage(detailUrl, status, html);
  }
}
