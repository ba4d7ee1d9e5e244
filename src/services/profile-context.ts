import { readFile } from 'fs/promises';
import { DEFAULT_PROFILE } from '../config';
import { HistoryEntry } from '../types/job';
import { logger } from '../utils/logger';

export async function readCandidateProfile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn(`Candidate profile not found at ${path}, using the default instruction`);
      return DEFAULT_PROFILE;
    }
    throw error;
  }
}

/**
 * Condenses past suggestions for the shortlist prompt
 * Only company, role and refnr are sent to keep the prompt small
 */
export function summarizePastSuggestions(pastJobs: readonly HistoryEntry[]): string {
  if (pastJobs.length === 0) return 'None';

  return JSON.stringify(
    pastJobs.map(job => ({
      company: job.company,
      role: job.role,
      refnr: job.refnr,
    }))
  );
}
