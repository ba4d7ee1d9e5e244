/**
 * Configuration management
 * All behavior is driven by environment variables, optionally loaded from .env files
 */
import { existsSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import dotenv from 'dotenv';
import { SearchFilters } from '../types/job';
import { LogLevel, logger, parseLogLevel } from '../utils/logger';

export interface Config {
  // Search
  search: {
    terms: string[];
    location: string;
    radiusKm: number;
    sinceDays: number;
    filters: SearchFilters;
  };

  // LLM
  llm: {
    apiKey: string;
    model: string;
    timeoutMs: number;
    maxAttempts: number;
  };

  // Files
  paths: {
    candidateProfile: string;
    pastSuggestions: string;
    reportsDir: string;
    reportTemplate: string;
  };

  // Optional Telegram delivery
  telegram?: {
    botToken: string;
    chatId: string;
  };

  logLevel: LogLevel;
}

export const DEFAULT_PROFILE = 'Find relevant IT jobs.';

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseString(value: string | undefined, defaultValue: string): string {
  return value === undefined ? defaultValue : value.trim();
}

/**
 * Splits a value the way a POSIX shell splits words:
 * `"Data Engineer" Python` yields two terms
 */
export function parseQuotedList(value: string | undefined): string[] {
  if (!value) return [];

  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];

    if (quote === "'") {
      if (char === "'") quote = null;
      else current += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && (value[i + 1] === '"' || value[i + 1] === '\\')) {
        current += value[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inWord = true;
    } else if (char === '\\' && i + 1 < value.length) {
      current += value[++i];
      inWord = true;
    } else if (/\s/.test(char)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += char;
      inWord = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated quote in search terms: ${value}`);
  }
  if (inWord) words.push(current);
  return words;
}

function resolvePath(override: string | undefined, rootDir: string, fallback: string): string {
  if (!override) return join(rootDir, fallback);
  const expanded = override.startsWith('~') ? join(homedir(), override.slice(1)) : override;
  return isAbsolute(expanded) ? expanded : resolve(rootDir, expanded);
}

/**
 * Loads `.env` and the search config file into the environment
 * Variables already set in the environment win
 */
export function loadProjectEnvironment(rootDir: string = process.cwd()): void {
  const env = process.env;
  const envPath = resolvePath(env.JOB_ALERT_ENV_FILE, rootDir, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }

  const searchConfigPath = resolvePath(
    env.JOB_ALERT_SEARCH_CONFIG_FILE,
    rootDir,
    join('config', 'job_search_config.env')
  );
  if (existsSync(searchConfigPath)) {
    dotenv.config({ path: searchConfigPath });
  } else {
    logger.warn(`Search config not found at ${searchConfigPath}. Using built-in defaults.`);
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  rootDir: string = process.cwd()
): Config {
  const requiredEnvVars = ['OPENAI_API_KEY'];

  for (const envVar of requiredEnvVars) {
    if (!env[envVar]) {
      throw new Error(`Missing required environment variable: ${envVar}`);
    }
  }

  const terms = parseQuotedList(env.SEARCH_TERMS);
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  const chatId = env.TELEGRAM_CHAT_ID?.trim();

  return {
    search: {
      terms: terms.length > 0 ? terms : [''],
      location: parseString(env.SEARCH_WHERE, 'Berlin'),
      radiusKm: parseNumber(env.SEARCH_RADIUS_KM, 40),
      sinceDays: parseNumber(env.SEARCH_DAYS, 1),
      filters: {
        offerType: parseString(env.SEARCH_OFFER_TYPE, '1'),
        tempAgency: parseString(env.SEARCH_TEMP_AGENCY, 'false'),
        placementService: parseString(env.SEARCH_PLACEMENT_SERVICE, 'false'),
        employer: parseString(env.SEARCH_EMPLOYER, ''),
        occupationField: parseString(env.SEARCH_OCCUPATION_FIELD, ''),
      },
    },
    llm: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: parseString(env.LLM_MODEL, 'gpt-4o-mini') || 'gpt-4o-mini',
      timeoutMs: 120_000,
      maxAttempts: 3,
    },
    paths: {
      candidateProfile: resolvePath(
        env.JOB_ALERT_CANDIDATE_PROFILE_FILE,
        rootDir,
        join('config', 'candidate_profile.md')
      ),
      pastSuggestions: resolvePath(
        env.JOB_ALERT_PAST_SUGGESTIONS_FILE,
        rootDir,
        join('data', 'past_job_suggestions.json')
      ),
      reportsDir: resolvePath(env.JOB_ALERT_REPORTS_DIR, rootDir, 'reports'),
      reportTemplate: join(rootDir, 'templates', 'report.hbs'),
    },
    telegram: botToken && chatId ? { botToken, chatId } : undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
