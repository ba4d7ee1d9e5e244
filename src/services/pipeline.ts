import { SuggestionHistoryRepository } from '../db/history';
import { SearchFilters } from '../types/job';
import { logger } from '../utils/logger';
import { DeepDiveFetcher } from './deep-dive';
import { JobAggregator } from './job-aggregator';
import { JobRanker } from './job-ranker';
import { NotificationDispatcher } from './notification-dispatcher';
import { readCandidateProfile, summarizePastSuggestions } from './profile-context';
import { ReportRenderer, WrittenReports } from './report-renderer';

export type RunOutcome =
  | { status: 'no-shortlist' }
  | { status: 'no-details' }
  | { status: 'no-selection' }
  | { status: 'reported'; matchCount: number; reports: WrittenReports; notificationsSent: number };

export interface PipelineDependencies {
  aggregator: JobAggregator;
  ranker: JobRanker;
  deepDive: DeepDiveFetcher;
  history: SuggestionHistoryRepository;
  renderer: ReportRenderer;
  notifier: NotificationDispatcher | null;
}

export interface PipelineSettings {
  search: {
    terms: string[];
    location: string;
    radiusKm: number;
    sinceDays: number;
    filters: SearchFilters;
  };
  candidateProfilePath: string;
}

/**
 * Fetch, filter via LLM, report, remember
 * Empty stage results end the run without an error
 */
export class JobSearchPipeline {
  constructor(
    private deps: PipelineDependencies,
    private settings: PipelineSettings
  ) {}

  async run(): Promise<RunOutcome> {
    const summary = await this.deps.aggregator.aggregate(this.settings.search);

    const candidateProfile = await readCandidateProfile(this.settings.candidateProfilePath);
    const pastJobs = await this.deps.history.pruneInactive();
    const pastSuggestions = summarizePastSuggestions(pastJobs);

    const shortlist = await this.deps.ranker.shortlist(summary, candidateProfile, pastSuggestions);
    if (shortlist.length === 0) {
      logger.info('No candidates found in Stage 1');
      return { status: 'no-shortlist' };
    }

    const deepDiveCandidates = await this.deps.deepDive.fetchDeepDive(summary.candidates, shortlist);
    if (deepDiveCandidates.length === 0) {
      logger.info('No details could be fetched for shortlisted candidates');
      return { status: 'no-details' };
    }

    const finalJobs = await this.deps.ranker.selectBestMatches(candidateProfile, deepDiveCandidates);
    if (finalJobs.length === 0) {
      logger.info('No candidates selected in Stage 2');
      return { status: 'no-selection' };
    }

    const reports = await this.deps.renderer.writeReports(finalJobs);

    let notificationsSent = 0;
    if (this.deps.notifier) {
      try {
        notificationsSent = await this.deps.notifier.sendMatches(finalJobs);
      } catch (error) {
        logger.error('Notification delivery failed', error);
      }
    }

    await this.deps.history.append(
      finalJobs.map(job => ({ company: job.employer, role: job.title, refnr: job.refnr }))
    );

    return { status: 'reported', matchCount: finalJobs.length, reports, notificationsSent };
  }
}
