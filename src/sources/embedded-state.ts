import { load } from 'cheerio';

/**
 * Returns the JSON object serialized into the page's `ng-state` script tag
 * A missing tag, malformed JSON or a non-object payload yields `{}`
 */
export function extractEmbeddedState(html: string): Record<string, unknown> {
  const $ = load(html);
  const script = $('script#ng-state').first();
  if (script.length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(script.text());
  } catch {
    return {};
  }

  return isRecord(parsed) ? parsed : {};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
