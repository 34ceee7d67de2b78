import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TIKTOK_URL, loadFixture } from '../../services/__tests__/fixtures/index.js';
import type { CookieStore } from '../../services/cookieStore.js';
import type { Extractor } from '../../services/extractor.js';
import { MetadataService } from '../../services/metadata.js';
import { CookieGenerationError, ExtractionError, TimeoutError } from '../../utils/errors.js';
import { createApp } from '../index.js';

const COOKIE_PATH = '/tmp/cookies.txt';
const fixture = loadFixture('tiktok-info');

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  const get = vi.fn<CookieStore['get']>();
  const resolve = vi.fn<Extractor['resolve']>();

  beforeEach(async () => {
    get.mockReset().mockResolvedValue(COOKIE_PATH);
    resolve.mockReset().mockResolvedValue(fixture);

    const store: CookieStore = { get, refresh: async () => COOKIE_PATH };
    const app = createApp(new MetadataService(store, { resolve }));

    server = await new Promise<Server>((done) => {
      const listening = app.listen(0, '127.0.0.1', () => done(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((done) => server.close(() => done()));
  });

  const extract = (query: string) => fetch(`${baseUrl}/extract/?${query}`);

  it('answers the health check', async () => {
    const response = await fetch(`${baseUrl}/`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('returns metadata and formats', async () => {
    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}&no_watermark=true`);

    expect(response.status).toBe(200);
    expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    expect(await response.json()).toMatchObject({
      platform: 'TikTok',
      title: 'Test clip',
      duration: 15.2,
      thumbnail: 'https://p16.example.com/cover.jpeg',
      formats: [
        { format_id: 'play_addr_h264-1080p', resolution: '1080x1920', has_video: true, ext: 'mp4' },
        { format_id: 'bytevc1_720p', file_size: 2500000 },
        { format_id: 'audio', resolution: 'audio only', has_video: false, file_size: null },
        { format_id: 'play_addr_webm', ext: 'webm' },
      ],
    });
    expect(get).toHaveBeenCalledWith(false);
  });

  it('serves the route without the trailing slash', async () => {
    const response = await fetch(`${baseUrl}/extract?video_url=${encodeURIComponent(TIKTOK_URL)}`);
    expect(response.status).toBe(200);
  });

  it('reads boolean flags case-insensitively', async () => {
    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}&refresh_cookies=TRUE`);

    expect(response.status).toBe(200);
    expect(get).toHaveBeenCalledWith(true);
  });

  it.each([
    ['', 'video_url is required'],
    ['video_url=', 'video_url must not be empty'],
    ['video_url=a&video_url=b', 'video_url must be a single string'],
    ['video_url=not-a-url', 'video_url must be a valid http(s) URL'],
    [`video_url=${encodeURIComponent('https://www.youtube.com/watch?v=abc')}`, 'video_url is not a supported TikTok URL'],
    [`video_url=${encodeURIComponent(TIKTOK_URL)}&no_watermark=maybe`, 'no_watermark must be a boolean'],
  ])('rejects %j with 400', async (query, detail) => {
    const response = await extract(query);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail });
    expect(resolve).not.toHaveBeenCalled();
  });

  it('answers engine rejections with 400', async () => {
    resolve.mockRejectedValueOnce(new ExtractionError('Error processing video: Unsupported URL'));

    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Error processing video: Unsupported URL' });
  });

  it('answers cookie failures with 500', async () => {
    get.mockRejectedValueOnce(new CookieGenerationError('No cookies were set by https://www.tiktok.com/'));

    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: 'No cookies were set by https://www.tiktok.com/' });
  });

  it('answers timeouts with 504', async () => {
    resolve.mockRejectedValueOnce(new TimeoutError('Extraction timed out after 1000ms'));

    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}`);

    expect(response.status).toBe(504);
    expect(await response.json()).toEqual({ detail: 'Extraction timed out after 1000ms' });
  });

  it('hides unexpected faults behind a generic 500', async () => {
    resolve.mockRejectedValueOnce(new Error('kaboom'));

    const response = await extract(`video_url=${encodeURIComponent(TIKTOK_URL)}`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: 'Internal server error' });
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/download`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Not Found' });
  });
});
