import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import Handlebars from 'handlebars';
import type { TemplateDelegate } from 'handlebars';
import { JobMatch } from '../types/job';
import { formatFileTimestamp } from '../utils/dates';
import { logger } from '../utils/logger';

export interface WrittenReports {
  markdownPath: string;
  htmlPath: string;
}

export function renderMarkdown(jobs: readonly JobMatch[]): string {
  let content = '# Job Search Report\n\n';
  content += `Here are the ${jobs.length} best matching jobs found for your profile today.\n\n`;

  jobs.forEach((job, index) => {
    content += `## ${index + 1}. ${job.title}\n`;
    content += `**Employer:** ${job.employer}\n`;
    content += `**Location:** ${job.location}\n`;
    content += `**Link:** [Job listing](${job.detailUrl})\n\n`;
    content += `**Why this role fits:**\n${job.reason}\n\n`;
    content += '---\n\n';
  });

  return content;
}

/**
 * Renders final matches into Markdown and HTML files named by run timestamp
 */
export class ReportRenderer {
  private template: TemplateDelegate | null = null;

  constructor(
    private templatePath: string,
    private reportsDir: string
  ) {}

  async renderHtml(jobs: readonly JobMatch[]): Promise<string> {
    if (!this.template) {
      const source = await readFile(this.templatePath, 'utf-8');
      this.template = Handlebars.compile(source);
    }
    return this.template({ jobCount: jobs.length, jobs });
  }

  async writeReports(jobs: readonly JobMatch[], generatedAt: Date = new Date()): Promise<WrittenReports> {
    const timestamp = formatFileTimestamp(generatedAt);
    const markdownPath = join(this.reportsDir, `job_report_${timestamp}.md`);
    const htmlPath = join(this.reportsDir, `job_report_${timestamp}.html`);

    const html = await this.renderHtml(jobs);

    await mkdir(this.reportsDir, { recursive: true });
    await writeFile(markdownPath, renderMarkdown(jobs), 'utf-8');
    await writeFile(htmlPath, html, 'utf-8');

    logger.info(`Generated Markdown report at ${markdownPath}`);
    logger.info(`Generated HTML report at ${htmlPath}`);

    return { markdownPath, htmlPath };
  }
}
