import { join } from 'path';
import { writeFile, mkdir } from 'fs/promises';
import { ReportRenderer } from '../services/report-renderer';
import { JobMatch } from '../types/job';
import { logger } from '../utils/logger';

const PLACEHOLDER_JOBS: JobMatch[] = [
  {
    title: 'Data Engineer (m/w/d) Statistics Platform',
    employer: 'Example Statistics Office',
    location: 'Berlin',
    refnr: '10000-0000000001-S',
    reason: 'Hands-on data work on an internal database with import/export pipelines, permanent contract, located in Berlin.',
    detailUrl: 'https://www.arbeitsagentur.de/jobsuche/',
  },
  {
    title: 'Linux System Administrator (m/w/d) Archive Systems',
    employer: 'Example Pension Fund',
    location: 'Berlin (or Potsdam)',
    refnr: '10000-0000000002-S',
    reason: 'Public sector, permanent, strongly technical: Linux servers, monitoring and automation of a digital archive.',
    detailUrl: 'https://www.arbeitsagentur.de/jobsuche/',
  },
];

/**
 * Renders the HTML report template with placeholder matches
 */
async function preview() {
  try {
    const rootDir = process.cwd();
    const reportsDir = join(rootDir, 'reports');
    const renderer = new ReportRenderer(join(rootDir, 'templates', 'report.hbs'), reportsDir);

    const html = await renderer.renderHtml(PLACEHOLDER_JOBS);
    const previewPath = join(reportsDir, 'preview.html');
    await mkdir(reportsDir, { recursive: true });
    await writeFile(previewPath, html, 'utf-8');

    logger.info(`Generated preview at ${previewPath}`);
    process.exit(0);
  } catch (error) {
    logger.error('Preview generation failed', error);
    process.exit(1);
  }
}

void preview();
