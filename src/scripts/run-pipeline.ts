import { loadConfig, loadProjectEnvironment } from '../config';
import { SuggestionHistoryRepository } from '../db/history';
import { OpenAIStructuredClient } from '../llm/client';
import { DeepDiveFetcher } from '../services/deep-dive';
import { JobAggregator } from '../services/job-aggregator';
import { JobRanker } from '../services/job-ranker';
import { createNotificationDispatcher } from '../services/notification-dispatcher';
import { JobSearchPipeline } from '../services/pipeline';
import { ReportRenderer } from '../services/report-renderer';
import { JobsucheSource } from '../sources/jobsuche';
import { NodeFetchHttpClient } from '../utils/http';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Daily job search run
 * Exits non-zero when a stage fails fatally
 */
async function main() {
  const startTime = Date.now();

  try {
    loadProjectEnvironment();
    const config = loadConfig();
    setLogLevel(config.logLevel);

    logger.info('Configuration loaded', {
      terms: config.search.terms,
      location: config.search.location,
      radiusKm: config.search.radiusKm,
      sinceDays: config.search.sinceDays,
      model: config.llm.model,
      telegram: config.telegram ? 'enabled' : 'disabled',
    });

    const jobsuche = new JobsucheSource(new NodeFetchHttpClient());
    const llm = new OpenAIStructuredClient({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });

    const pipeline = new JobSearchPipeline(
      {
        aggregator: new JobAggregator(jobsuche),
        ranker: new JobRanker(llm, config.llm.maxAttempts),
        deepDive: new DeepDiveFetcher(jobsuche),
        history: new SuggestionHistoryRepository(config.paths.pastSuggestions, jobsuche),
        renderer: new ReportRenderer(config.paths.reportTemplate, config.paths.reportsDir),
        notifier: createNotificationDispatcher(config),
      },
      {
        search: config.search,
        candidateProfilePath: config.paths.candidateProfile,
      }
    );

    const outcome = await pipeline.run();

    logger.info('Job search run completed', {
      outcome: outcome.status,
      duration: `${Date.now() - startTime}ms`,
    });
    process.exit(0);
  } catch (error) {
    logger.error('Job search run failed', error, { duration: `${Date.now() - startTime}ms` });
    process.exit(1);
  }
}

void main();
