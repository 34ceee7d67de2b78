import puppeteer, { TimeoutError as NavigationTimeoutError } from 'puppeteer-core';
import type { CookieSourceKind } from '../config/env.js';
import { type BrowserCookie, parseSetCookie } from '../utils/cookies.js';
import { CookieGenerationError, TimeoutError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Something able to hand out a fresh set of session cookies for the platform.
 */
export interface CookieSource {
  readonly name: string;
  fetch(): Promise<BrowserCookie[]>;
}

export interface CookieSourceOptions {
  entryUrl: string;
  userAgent: string;
  timeoutMs: number;
}

// The slice of puppeteer's Browser and Page used here
export interface AutomationPage {
  setUserAgent(userAgent: string): Promise<void>;
  goto(url: string, options: { waitUntil: 'networkidle2'; timeout: number }): Promise<unknown>;
  cookies(): Promise<BrowserCookie[]>;
}

export interface AutomationBrowser {
  newPage(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<AutomationBrowser>;

export const launchChromium =
  (executablePath: string, timeoutMs: number): BrowserLauncher =>
  () =>
    puppeteer.launch({
      executablePath,
      headless: true,
      timeout: timeoutMs,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
    });

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Opens the platform's guest entry page in headless Chromium and collects the
 * cookies it assigns. The browser is always closed before returning.
 */
export class BrowserCookieSource implements CookieSource {
  public readonly name = 'browser';

  constructor(
    private readonly options: CookieSourceOptions,
    private readonly launch: BrowserLauncher,
  ) {}

  public async fetch(): Promise<BrowserCookie[]> {
    const { entryUrl, userAgent, timeoutMs } = this.options;

    let browser: AutomationBrowser;
    try {
      browser = await this.launch();
    } catch (error) {
      throw new CookieGenerationError(`Failed to launch browser: ${describeError(error)}`, { cause: error });
    }

    try {
      const page = await browser.newPage();
      await page.setUserAgent(userAgent);
      logger.debug(`Opening ${entryUrl}`, { source: this.name });
      await page.goto(entryUrl, { waitUntil: 'networkidle2', timeout: timeoutMs });

      const cookies = await page.cookies();
      if (cookies.length === 0) {
        throw new CookieGenerationError(`No cookies were set by ${entryUrl}`);
      }

      return cookies.map(({ name, value, domain, path, expires, httpOnly, secure }) => ({
        name,
        value,
        domain,
        path,
        expires,
        httpOnly,
        secure,
      }));
    } catch (error) {
      if (error instanceof CookieGenerationError) throw error;
      if (error instanceof NavigationTimeoutError) {
        throw new TimeoutError(`Navigation to ${entryUrl} timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw new CookieGenerationError(`Browser session on ${entryUrl} failed: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      try {
        await browser.close();
      } catch (error) {
        logger.warn(`Failed to close browser: ${describeError(error)}`, { source: this.name });
      }
    }
  }
}

export interface CookieResponse {
  status: number;
  headers: { get(name: string): string | null; getSetCookie(): string[] };
}

export type CookieFetcher = (
  url: string,
  init: { headers: Record<string, string>; redirect: 'manual'; signal: AbortSignal },
) => Promise<CookieResponse>;

const MAX_REDIRECTS = 5;

const isRedirect = (status: number): boolean => status >= 300 && status < 400;

/**
 * Requests the entry page over plain HTTP and keeps the cookies from its
 * Set-Cookie headers. Redirects are followed one hop at a time so cookies set
 * along the way are collected and sent on. Lighter than the browser, but only
 * sees cookies the server sets directly.
 */
export class HttpCookieSource implements CookieSource {
  public readonly name = 'http';

  constructor(
    private readonly options: CookieSourceOptions,
    private readonly fetcher: CookieFetcher = (url, init) => fetch(url, init),
  ) {}

  public async fetch(): Promise<BrowserCookie[]> {
    const { entryUrl, userAgent } = this.options;
    const signal = AbortSignal.timeout(this.options.timeoutMs);
    const jar = new Map<string, BrowserCookie>();

    let url = entryUrl;
    for (let hop = 0; ; hop++) {
      const headers: Record<string, string> = {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      };
      if (jar.size > 0) {
        headers.Cookie = [...jar.values()].map(({ name, value }) => `${name}=${value}`).join('; ');
      }
      const response = await this.request(url, headers, signal);

      const host = new URL(url).hostname;
      for (const header of response.headers.getSetCookie()) {
        const cookie = parseSetCookie(header, host);
        if (cookie) jar.set(`${cookie.domain};${cookie.path};${cookie.name}`, cookie);
      }

      const location = response.headers.get('location');
      if (!isRedirect(response.status) || location === null) {
        if (response.status >= 400) {
          throw new CookieGenerationError(`${url} answered with HTTP ${response.status}`);
        }
        break;
      }
      if (hop >= MAX_REDIRECTS) {
        throw new CookieGenerationError(`Too many redirects from ${entryUrl}`);
      }
      url = new URL(location, url).toString();
    }

    if (jar.size === 0) {
      throw new CookieGenerationError(`No cookies were set by ${entryUrl}`);
    }
    return [...jar.values()];
  }

  private async request(url: string, headers: Record<string, string>, signal: AbortSignal): Promise<CookieResponse> {
    try {
      return await this.fetcher(url, { headers, redirect: 'manual', signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TimeoutError(`Request to ${url} timed out after ${this.options.timeoutMs}ms`, { cause: error });
      }
      throw new CookieGenerationError(`Request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

export const createCookieSource = (
  kind: CookieSourceKind,
  options: CookieSourceOptions & { executablePath: string },
): CookieSource => {
  switch (kind) {
    case 'browser':
      return new BrowserCookieSource(options, launchChromium(options.executablePath, options.timeoutMs));
    case 'http':
      return new HttpCookieSource(options);
  }
};
