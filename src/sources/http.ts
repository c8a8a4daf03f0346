import fetch from 'node-fetch';
import { HttpError } from '../utils/errors';

const DEFAULT_TIMEOUT_MS = 30000;
const BODY_SNIPPET_LENGTH = 200;

export interface FetchJsonOptions {
  /** Non-positive values fall back to the default; node-fetch reads 0 as no timeout */
  timeoutMs?: number;
}

/**
 * GETs a URL and parses the body as JSON.
 * Throws HttpError on non-2xx; network, timeout and parse errors propagate.
 */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const timeout =
    options.timeoutMs !== undefined && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
  const response = await fetch(url, {
    headers: { accept: 'application/json' },
    timeout,
  });

  if (!response.ok) {
    const body = await response.text();
    throw new HttpError({
      status: response.status,
      statusText: response.statusText,
      url,
      bodySnippet: body ? body.slice(0, BODY_SNIPPET_LENGTH) : undefined,
    });
  }

  const data: unknown = await response.json();
  return data;
}
