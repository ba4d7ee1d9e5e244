import fetch from 'node-fetch';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Minimal GET client used by the Jobsuche sources
 * Implementations throw on transport failures and non-2xx statuses
 */
export interface HttpClient {
  getText(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP Error ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export class NodeFetchHttpClient implements HttpClient {
  async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await fetch(url, {
      headers: options.headers,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    return { status: response.status, body: await response.text() };
  }
}

export async function getJson(
  client: HttpClient,
  url: string,
  options?: HttpRequestOptions
): Promise<unknown> {
  const { body } = await client.getText(url, options);
  return JSON.parse(body);
}
