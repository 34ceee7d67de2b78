const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export type CookieSourceKind = 'browser' | 'http';

const cookieSource = (process.env.COOKIE_SOURCE || 'browser').toLowerCase();

export const env = {
  PORT: parseInt(process.env.PORT || '8001', 10),
  HOST: process.env.HOST || '0.0.0.0',
  COOKIE_FILE: process.env.COOKIE_FILE || 'cookies.txt',
  COOKIE_MAX_AGE: parseInt(process.env.COOKIE_MAX_AGE || '43200', 10),
  COOKIE_ENTRY_URL: process.env.COOKIE_ENTRY_URL || 'https://www.tiktok.com/',
  COOKIE_DOMAIN: process.env.COOKIE_DOMAIN || 'tiktok.com',
  COOKIE_SOURCE: cookieSource,
  BROWSER_EXECUTABLE_PATH: process.env.BROWSER_EXECUTABLE_PATH || '/usr/bin/chromium',
  BROWSER_TIMEOUT: parseInt(process.env.BROWSER_TIMEOUT || '60', 10),
  EXTRACT_TIMEOUT: parseInt(process.env.EXTRACT_TIMEOUT || '120', 10),
  YT_DLP_PATH: process.env.YT_DLP_PATH || 'yt-dlp',
  USER_AGENT: process.env.USER_AGENT || DEFAULT_USER_AGENT,
  SUPPORTED_DOMAINS: (process.env.SUPPORTED_DOMAINS || 'tiktok.com')
    .split(',')
    .map((domain) => domain.trim().toLowerCase())
    .filter(Boolean),
} as const;

export const isCookieSourceKind = (value: string): value is CookieSourceKind =>
  value === 'browser' || value === 'http';

// Validate numeric and enumerated environment variables
const positiveIntegers = {
  PORT: env.PORT,
  COOKIE_MAX_AGE: env.COOKIE_MAX_AGE,
  BROWSER_TIMEOUT: env.BROWSER_TIMEOUT,
  EXTRACT_TIMEOUT: env.EXTRACT_TIMEOUT,
};

for (const [name, value] of Object.entries(positiveIntegers)) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} environment variable must be a positive integer`);
  }
}

if (!isCookieSourceKind(env.COOKIE_SOURCE)) {
  throw new Error("COOKIE_SOURCE environment variable must be 'browser' or 'http'");
}
