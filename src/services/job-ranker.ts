import { z } from 'zod';
import { StructuredCompletionClient } from '../llm/client';
import { buildSelectionPrompt, buildShortlistPrompt } from '../llm/prompts';
import { AggregationResult, DeepDiveCandidate, JobMatch } from '../types/job';
import { describeError, logger } from '../utils/logger';

export const ShortlistSchema = z.object({
  shortlistedRefnrs: z
    .array(z.string())
    .describe('Every job refnr that could even remotely fit based on the summary'),
});

export const JobMatchSchema = z.object({
  title: z.string(),
  employer: z.string(),
  location: z.string(),
  refnr: z.string().describe('The refnr of the job posting'),
  reason: z.string().describe("Short explanation of why the job fits the candidate's profile"),
  detailUrl: z.string(),
});

export const SelectionSchema = z.object({
  topJobs: z.array(JobMatchSchema),
});

/**
 * Raised when an LLM stage keeps failing; the run cannot continue without it
 */
export class LlmStageError extends Error {
  constructor(
    readonly stage: string,
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`${stage} failed after ${attempts} attempts: ${describeError(lastError)}`);
    this.name = 'LlmStageError';
  }
}

/**
 * Two-stage relevance filtering: a generous shortlist on summaries,
 * then a strict selection on full descriptions
 */
export class JobRanker {
  constructor(
    private llm: StructuredCompletionClient,
    private maxAttempts: number = 3
  ) {}

  async shortlist(
    summary: AggregationResult,
    candidateProfile: string,
    pastSuggestions: string
  ): Promise<string[]> {
    logger.info('Stage 1: shortlisting candidates from summary data');

    const prompt = buildShortlistPrompt(candidateProfile, pastSuggestions, summary.candidates);
    const response = await this.withRetries('Stage 1', () =>
      this.llm.complete(prompt, ShortlistSchema, 'shortlist')
    );

    logger.info(`Stage 1 shortlisted ${response.shortlistedRefnrs.length} candidates`);
    return response.shortlistedRefnrs;
  }

  async selectBestMatches(
    candidateProfile: string,
    candidates: readonly DeepDiveCandidate[]
  ): Promise<JobMatch[]> {
    logger.info('Stage 2: evaluating full descriptions to select the best matches');

    const prompt = buildSelectionPrompt(candidateProfile, candidates);
    const response = await this.withRetries('Stage 2', () =>
      this.llm.complete(prompt, SelectionSchema, 'selection')
    );

    logger.info(`Stage 2 selected ${response.topJobs.length} jobs`);
    return response.topJobs;
  }

  private async withRetries<T>(stage: string, call: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await call();
      } catch (error) {
        lastError = error;
        logger.error(`Error in ${stage} (attempt ${attempt})`, error);
      }
    }
    throw new LlmStageError(stage, this.maxAttempts, lastError);
  }
}
