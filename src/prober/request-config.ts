import type { AxiosRequestConfig } from 'axios';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DEFAULT_REFERER = 'https://www.google.com/';

export function browserHeaders(): Record<string, string> {
  return {
    'User-Agent': DEFAULT_USER_AGENT,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Referer': DEFAULT_REFERER,
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };
}

/**
 * Request config for one probe. Every status is a response, not an error;
 * the body is only buffered as text when a pattern has to be matched.
 */
export function getRequestConfig(signal: AbortSignal, readBody: boolean): AxiosRequestConfig {
  return {
    signal,
    headers: browserHeaders(),
    responseType: readBody ? 'text' : 'stream',
    responseEncoding: 'utf8',
    validateStatus: () => true,
    maxRedirects: 5,
  };
}
