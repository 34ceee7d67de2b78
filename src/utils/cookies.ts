import { isDomainMatch } from './url.js';

/** Cookie as produced by a cookie source. `expires` is in epoch seconds, -1 for session cookies. */
export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
}

const NETSCAPE_HEADER = '# Netscape HTTP Cookie File';
const SESSION_COOKIE_LIFETIME = 365 * 24 * 60 * 60;
const COOKIE_ATTRIBUTES = new Set(['domain', 'path', 'expires', 'max-age', 'secure', 'httponly', 'samesite', 'priority', 'partitioned']);

export const cookieMatchesDomain = (cookie: BrowserCookie, domain: string): boolean =>
  isDomainMatch(cookie.domain.replace(/^\./, ''), domain);

/**
 * Serializes cookies into the Netscape cookie-jar format read by yt-dlp and curl.
 * Session cookies are written with an expiry one year ahead so the jar does not
 * discard them on load.
 */
export function toNetscapeCookieFile(cookies: readonly BrowserCookie[], nowMs: number = Date.now()): string {
  const fallbackExpiry = Math.floor(nowMs / 1000) + SESSION_COOKIE_LIFETIME;
  const lines = cookies.map((cookie) => {
    const domain = cookie.httpOnly ? `#HttpOnly_${cookie.domain}` : cookie.domain;
    const includeSubdomains = cookie.domain.startsWith('.') ? 'TRUE' : 'FALSE';
    const expires = cookie.expires > 0 ? Math.floor(cookie.expires) : fallbackExpiry;
    return [
      domain,
      includeSubdomains,
      cookie.path || '/',
      cookie.secure ? 'TRUE' : 'FALSE',
      String(expires),
      cookie.name,
      cookie.value,
    ].join('\t');
  });

  return [NETSCAPE_HEADER, '', ...lines, ''].join('\n');
}

/**
 * Parses one Set-Cookie header value. Cookies without a Domain attribute are
 * host-only and take `host` as their domain.
 */
export function parseSetCookie(header: string, host: string, nowMs: number = Date.now()): BrowserCookie | null {
  const [pair, ...attributes] = header.split(';');
  const separator = pair.indexOf('=');
  if (separator <= 0) return null;

  const cookie: BrowserCookie = {
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
    domain: host,
    path: '/',
    expires: -1,
    httpOnly: false,
    secure: false,
  };
  if (!cookie.name) return null;

  let maxAge: number | undefined;
  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=');
    const key = rawKey.trim().toLowerCase();
    const value = rest.join('=').trim();

    switch (key) {
      case 'domain':
        if (value) cookie.domain = `.${value.replace(/^\./, '')}`;
        break;
      case 'path':
        if (value.startsWith('/')) cookie.path = value;
        break;
      case 'expires': {
        const parsed = Date.parse(value);
        if (!Number.isNaN(parsed)) cookie.expires = Math.floor(parsed / 1000);
        break;
      }
      case 'max-age': {
        const seconds = parseInt(value, 10);
        if (!Number.isNaN(seconds)) maxAge = seconds;
        break;
      }
      case 'secure':
        cookie.secure = true;
        break;
      case 'httponly':
        cookie.httpOnly = true;
        break;
    }
  }

  // Max-Age wins over Expires
  if (maxAge !== undefined) {
    cookie.expires = Math.floor(nowMs / 1000) + maxAge;
  }

  return cookie;
}

/**
 * Turns the cookie string yt-dlp attaches to a format
 * (`a=1; Domain=.tiktok.com; Path=/; Secure; b=2; ...`) into a name/value map.
 * A `Secure` flag is recorded as `<name>_secure: true` for the cookie before it;
 * other attributes are dropped.
 */
export function parseCookieHeader(header: string | null | undefined): Record<string, string | boolean> | null {
  if (!header) return null;

  const cookies: Record<string, string | boolean> = {};
  let current: string | null = null;
  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    const name = (separator === -1 ? part : part.slice(0, separator)).trim();
    if (!name) continue;
    if (separator === -1) {
      if (name.toLowerCase() === 'secure' && current !== null) cookies[`${current}_secure`] = true;
      continue;
    }
    if (COOKIE_ATTRIBUTES.has(name.toLowerCase())) continue;
    current = name;
    cookies[name] = part.slice(separator + 1).trim();
  }

  return Object.keys(cookies).length > 0 ? cookies : null;
}
