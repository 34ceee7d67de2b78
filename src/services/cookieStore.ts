import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { type BrowserCookie, cookieMatchesDomain, toNetscapeCookieFile } from '../utils/cookies.js';
import { AppError, CookieGenerationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { CookieSource } from './cookieSource.js';

export interface CookieStore {
  /** Path of a usable cookie file, regenerating it first when missing, stale or forced. */
  get(forceRefresh?: boolean): Promise<string>;
  /** Regenerates the cookie file unconditionally. */
  refresh(): Promise<string>;
}

export interface FileCookieStoreOptions {
  filePath: string;
  maxAgeMs: number;
  domain: string;
  timeoutMs: number;
  now?: () => number;
}

/**
 * Keeps a single Netscape cookie file on disk fresh. Regeneration is
 * single-flight: callers arriving while one is running share its result.
 */
export class FileCookieStore implements CookieStore {
  private inflight: Promise<string> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly source: CookieSource,
    private readonly options: FileCookieStoreOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  public get path(): string {
    return this.options.filePath;
  }

  public async get(forceRefresh = false): Promise<string> {
    if (this.inflight) return this.inflight;
    if (forceRefresh) return this.refresh();

    const age = await this.fileAge();
    if (age === null) {
      logger.info(`Cookie file ${this.path} is missing, generating`, { source: this.source.name });
      return this.refresh();
    }
    if (age > this.options.maxAgeMs) {
      logger.info(`Cookie file ${this.path} is stale (${Math.round(age / 1000)}s old), regenerating`, {
        source: this.source.name,
      });
      return this.refresh();
    }

    return this.path;
  }

  public refresh(): Promise<string> {
    if (!this.inflight) {
      this.inflight = this.regenerate().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async fileAge(): Promise<number | null> {
    try {
      const stats = await stat(this.path);
      return this.now() - stats.mtimeMs;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  private async regenerate(): Promise<string> {
    const started = this.now();
    let cookies: BrowserCookie[];
    try {
      cookies = await withTimeout(this.source.fetch(), this.options.timeoutMs, 'Cookie generation');
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new CookieGenerationError(
        `Cookie generation failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const matching = cookies.filter((cookie) => cookieMatchesDomain(cookie, this.options.domain));
    if (matching.length === 0) {
      throw new CookieGenerationError(`No session cookies for ${this.options.domain} were produced`);
    }

    await this.writeAtomically(toNetscapeCookieFile(matching, this.now()));
    logger.info(`Wrote ${matching.length} cookies to ${this.path} in ${this.now() - started}ms`, {
      source: this.source.name,
    });
    return this.path;
  }

  private async writeAtomically(contents: string): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, contents, { encoding: 'utf8', mode: 0o600 });
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new CookieGenerationError(
        `Failed to write cookie file ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
