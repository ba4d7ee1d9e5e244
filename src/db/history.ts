import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { JobDetailSource } from '../sources/base';
import { HistoryEntry, SuggestionToLog } from '../types/job';
import { DEFAULT_POOL_SIZE, mapWithConcurrency } from '../utils/concurrency';
import { formatMinuteTimestamp } from '../utils/dates';
import { describeError, logger } from '../utils/logger';

const HistoryEntrySchema = z.record(z.unknown());

const MISSING = 'N/A';

/**
 * Past suggestions stored as a JSON array
 * Every write replaces the whole file; calls on one instance are serialized
 */
export class SuggestionHistoryRepository {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private filePath: string,
    private details: JobDetailSource,
    private now: () => Date = () => new Date(),
    private poolSize: number = DEFAULT_POOL_SIZE
  ) {}

  /**
   * Drops entries whose listing no longer resolves to a live detail page
   * Returns the surviving entries in file order
   */
  pruneInactive(): Promise<HistoryEntry[]> {
    return this.exclusive(async () => {
      const pastJobs = await this.load();
      logger.info(`Verifying ${pastJobs.length} past suggestions for availability`);

      const results = await mapWithConcurrency(pastJobs, this.poolSize, async job => {
        const refnr = typeof job.refnr === 'string' ? job.refnr.trim() : '';
        if (!refnr) return false;
        const detail = await this.details.fetchDetail(refnr);
        return detail.description.length > 0;
      });

      const activeJobs = pastJobs.filter((job, index) => {
        const result = results[index];
        if (result.status === 'rejected') {
          logger.warn(`Liveness check failed for ${job.refnr}`, { error: describeError(result.reason) });
          return false;
        }
        return result.value;
      });

      logger.info(
        `Kept ${activeJobs.length} active past jobs, removed ${pastJobs.length - activeJobs.length}`
      );

      await this.save(activeJobs);
      return activeJobs;
    });
  }

  append(matches: readonly SuggestionToLog[]): Promise<void> {
    return this.exclusive(async () => {
      const timestamp = formatMinuteTimestamp(this.now());
      const pastJobs = await this.load();

      for (const match of matches) {
        pastJobs.push({
          date: timestamp,
          company: match.company ?? MISSING,
          role: match.role ?? MISSING,
          refnr: match.refnr ?? MISSING,
        });
      }

      await this.save(pastJobs);
      logger.info(`Logged ${matches.length} new suggestions to ${this.filePath}`);
    });
  }

  /**
   * Missing or malformed files read as an empty history
   * Object entries are kept untouched whatever their field types
   */
  async load(): Promise<HistoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Ignoring malformed history file ${this.filePath}`, { error: describeError(error) });
      return [];
    }

    if (!Array.isArray(parsed)) {
      logger.warn(`History file ${this.filePath} does not hold an array, ignoring it`);
      return [];
    }

    const entries: HistoryEntry[] = [];
    for (const item of parsed) {
      const result = HistoryEntrySchema.safeParse(item);
      if (result.success) {
        entries.push(result.data);
      } else {
        logger.debug(`Dropping history entry that is not an object`, { entry: item });
      }
    }
    return entries;
  }

  private async save(entries: HistoryEntry[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf-8');
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation, operation);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
