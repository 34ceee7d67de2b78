import type { ExtractionRequest, ExtractionResult } from '../types/index.js';
import { ExtractionError, InvalidRequestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isSupportedPlatform, isValidUrl } from '../utils/url.js';
import type { CookieStore } from './cookieStore.js';
import type { Extractor, RawMediaInfo } from './extractor.js';
import { filterFormats } from './formats.js';

/**
 * Resolves a video URL into its metadata and the list of streams callers can use.
 */
export class MetadataService {
  constructor(
    private readonly cookies: CookieStore,
    private readonly extractor: Extractor,
    private readonly supportedDomains?: readonly string[],
  ) {}

  public async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const videoUrl = request.videoUrl.trim();
    this.validate(videoUrl);

    const cookieFile = await this.cookies.get(request.refreshCookies ?? false);
    const info = await this.extractor.resolve(videoUrl, { cookieFile });

    const result = this.buildResult(info, request.noWatermark ?? false);
    logger.debug(`Resolved ${videoUrl} to ${result.formats.length} formats`);
    return result;
  }

  private validate(videoUrl: string): void {
    if (!videoUrl) {
      throw new InvalidRequestError('video_url must not be empty');
    }
    if (!isValidUrl(videoUrl)) {
      throw new InvalidRequestError('video_url must be a valid http(s) URL');
    }
    if (!isSupportedPlatform(videoUrl, this.supportedDomains)) {
      throw new InvalidRequestError('video_url is not a supported TikTok URL');
    }
  }

  private buildResult(info: RawMediaInfo, noWatermark: boolean): ExtractionResult {
    const formats = filterFormats(info.formats ?? [], { noWatermark });
    if (formats.length === 0) {
      throw new ExtractionError('No playable formats found for this video');
    }

    return {
      platform: info.extractor_key ?? 'TikTok',
      title: info.title ?? 'Unknown Title',
      duration: info.duration ?? null,
      thumbnail: info.thumbnail ?? null,
      formats,
    };
  }
}
