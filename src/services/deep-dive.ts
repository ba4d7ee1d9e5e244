import { JobDetailSource } from '../sources/base';
import { buildDetailUrl } from '../sources/jobsuche';
import { CandidateSummary, DeepDiveCandidate, DetailContext } from '../types/job';
import { DEFAULT_POOL_SIZE, mapWithConcurrency } from '../utils/concurrency';
import { describeError, logger } from '../utils/logger';

/**
 * Fetches full descriptions for shortlisted candidates
 * A failed fetch keeps the candidate with empty detail fields
 */
export class DeepDiveFetcher {
  constructor(
    private details: JobDetailSource,
    private poolSize: number = DEFAULT_POOL_SIZE
  ) {}

  async fetchDeepDive(
    summaries: readonly CandidateSummary[],
    shortlist: readonly string[]
  ): Promise<DeepDiveCandidate[]> {
    const wanted = new Set(shortlist);
    const jobsToFetch = summaries.filter(job => wanted.has(job.refnr));

    logger.info(`Fetching full details for ${jobsToFetch.length} shortlisted candidates`, {
      poolSize: this.poolSize,
    });

    const results = await mapWithConcurrency(jobsToFetch, this.poolSize, job =>
      this.details.fetchDetail(job.refnr)
    );

    return jobsToFetch.map((job, index) => {
      const result = results[index];
      let detail: Pick<DetailContext, 'description' | 'detailUrl' | 'contractDuration'>;
      if (result.status === 'fulfilled') {
        detail = result.value;
      } else {
        logger.warn(`Detail fetch failed for ${job.refnr}`, { error: describeError(result.reason) });
        detail = { description: '', detailUrl: buildDetailUrl(job.refnr), contractDuration: '' };
      }

      return {
        refnr: job.refnr,
        title: job.title,
        employer: job.employer,
        locality: job.locality,
        description: detail.description,
        detailUrl: detail.detailUrl,
        contractDuration: detail.contractDuration,
      };
    });
  }
}
