import { MalformedInputError } from '../errors.js';

const URL_REGEX = /^(?<protocol>[a-z][a-z0-9+.-]*:\/\/)?(?<host>[^:/ ]+)(?::(?<port>[0-9]*))?(?:\/(?<path>.*))?$/i;

/**
 * Turns a loosely written `[scheme://]host[:port][/path]` into an absolute URL
 * with explicit scheme and port, e.g. `foo.com:8080/health` becomes
 * `http://foo.com:8080/health`. Trailing slashes are dropped.
 *
 * With `expandNakedDomain`, a host with fewer than two dots gets a `www.` prefix.
 */
export function normalizeUrl(raw: string, expandNakedDomain = false): string {
  const input = raw.trim();
  const match = URL_REGEX.exec(input);
  const groups = match?.groups;
  if (!groups || !groups['host']) {
    throw new MalformedInputError(raw, 'no host found');
  }

  let host = groups['host'];
  let protocol = groups['protocol']?.slice(0, -'://'.length).toLowerCase() ?? '';
  let port = groups['port'] ? parseInt(groups['port'], 10) : null;
  const path = groups['path'] ?? '';

  if (expandNakedDomain && host.split('.').length - 1 < 2) {
    host = `www.${host}`;
  }

  if (port === null && !protocol) {
    protocol = 'https';
    port = 443;
  } else if (port !== null && !protocol) {
    protocol = port === 443 ? 'https' : 'http';
  } else if (port === null) {
    port = protocol === 'https' ? 443 : 80;
  }

  const url = `${protocol}://${host}:${port}/${path}`;
  return url.replace(/\/+$/, '');
}
