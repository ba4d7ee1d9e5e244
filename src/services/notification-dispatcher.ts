import Handlebars from 'handlebars';
import TelegramBot from 'node-telegram-bot-api';
import { Config } from '../config';
import { JobMatch } from '../types/job';
import { logger } from '../utils/logger';

/**
 * The part of the Telegram bot the dispatcher needs
 */
export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<unknown>;
}

/**
 * Delivers final matches to a Telegram chat
 * Individual message failures are logged and skipped
 */
export class NotificationDispatcher {
  constructor(
    private sender: MessageSender,
    private chatId: string
  ) {}

  /**
   * Returns number of successfully sent notifications
   */
  async sendMatches(jobs: readonly JobMatch[]): Promise<number> {
    let sentCount = 0;

    for (const job of jobs) {
      try {
        await this.sender.sendMessage(this.chatId, this.formatJobMessage(job), {
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        });
        sentCount++;
      } catch (error) {
        logger.error(`Failed to send notification`, error, { refnr: job.refnr });
        // Partial failures are acceptable
      }
    }

    logger.info(`Sent ${sentCount} of ${jobs.length} notifications`);
    return sentCount;
  }

  formatJobMessage(job: JobMatch): string {
    return [
      `🔍 <b>${escapeHtml(job.title)}</b>`,
      `🏢 ${escapeHtml(job.employer)}`,
      `📍 ${escapeHtml(job.location)}`,
      '',
      escapeHtml(job.reason),
      '',
      `🔗 <a href="${escapeHtml(job.detailUrl)}">View job</a>`,
    ].join('\n');
  }
}

// Telegram's HTML mode accepts the numeric entities Handlebars emits
function escapeHtml(text: string): string {
  return Handlebars.escapeExpression(text);
}

/**
 * Returns null when Telegram delivery is not configured
 */
export function createNotificationDispatcher(config: Config): NotificationDispatcher | null {
  if (!config.telegram) return null;

  const bot = new TelegramBot(config.telegram.botToken, { polling: false });
  return new NotificationDispatcher(bot, config.telegram.chatId);
}
