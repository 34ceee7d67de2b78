import { describe, expect, it } from 'vitest';
import { AUDIO_ONLY, filterFormats, normalizeResolution, toFormatDescriptor } from '../formats.js';
import { loadFixture } from './fixtures/index.js';

const info = loadFixture('tiktok-info');
const formats = info.formats ?? [];

describe('filterFormats', () => {
  it('keeps MP4 video and audio-only streams in engine order', () => {
    const ids = filterFormats(formats).map((format) => format.format_id);
    expect(ids).toEqual(['download', 'play_addr_h264-1080p', 'bytevc1_720p', 'audio']);
  });

  it('drops manifests, images and non-MP4 video', () => {
    const ids = filterFormats(formats).map((format) => format.format_id);
    expect(ids).not.toContain('hls-720');
    expect(ids).not.toContain('cover');
    expect(ids).not.toContain('play_addr_webm');
  });

  it('drops watermarked video and keeps unwatermarked video of any container when asked', () => {
    const ids = filterFormats(formats, { noWatermark: true }).map((format) => format.format_id);
    expect(ids).toEqual(['play_addr_h264-1080p', 'bytevc1_720p', 'audio', 'play_addr_webm']);
  });

  it('passes watermarked video through when nothing else is offered', () => {
    const onlyWatermarked = formats.filter((format) => format.format_id === 'download' || format.format_id === 'audio');
    const ids = filterFormats(onlyWatermarked, { noWatermark: true }).map((format) => format.format_id);
    expect(ids).toEqual(['download', 'audio']);
  });

  it('drops entries without a url', () => {
    expect(filterFormats([{ format_id: 'x', ext: 'mp4', vcodec: 'h264', acodec: 'aac' }])).toEqual([]);
  });

  it('treats missing codecs as unknown rather than absent', () => {
    const descriptors = filterFormats([
      { format_id: 'play', url: 'https://v16.example.com/play.mp4', ext: 'mp4', width: 720, height: 1280 },
      { format_id: 'download', url: 'https://v16.example.com/download.mp4', ext: 'mp4' },
      { format_id: 'h264', url: 'https://v16.example.com/h264.mp4', ext: 'mp4', vcodec: 'h264' },
      { format_id: 'music', url: 'https://v16.example.com/music.m4a', ext: 'm4a' },
    ]);

    expect(
      descriptors.map(({ format_id, has_audio, has_video, audio_codec, resolution }) => [
        format_id,
        has_audio,
        has_video,
        audio_codec,
        resolution,
      ]),
    ).toEqual([
      ['play', true, true, null, '720x1280'],
      ['download', true, true, null, null],
      ['h264', true, true, null, null],
      ['music', true, false, null, AUDIO_ONLY],
    ]);
  });

  it('is idempotent over the same input', () => {
    expect(filterFormats(formats, { noWatermark: true })).toEqual(filterFormats(formats, { noWatermark: true }));
    expect(filterFormats(formats)).toEqual(filterFormats(formats));
  });
});

describe('toFormatDescriptor', () => {
  it('describes a video stream', () => {
    const [, direct] = filterFormats(formats);
    expect(direct).toEqual({
      format_id: 'play_addr_h264-1080p',
      resolution: '1080x1920',
      url: 'https://v16.example.com/h264-1080.mp4',
      has_audio: true,
      has_video: true,
      bitrate: 2100,
      audio_codec: 'aac',
      ext: 'mp4',
      file_size: 5242880,
      cookies: { tt_chain_token: 'chain-token', tt_chain_token_secure: true },
    });
  });

  it('describes an audio-only stream with unknown size as null', () => {
    const audio = filterFormats(formats).find((format) => format.format_id === 'audio');
    expect(audio).toEqual({
      format_id: 'audio',
      resolution: AUDIO_ONLY,
      url: 'https://v16.example.com/music.m4a',
      has_audio: true,
      has_video: false,
      bitrate: 128,
      audio_codec: 'mp4a.40.2',
      ext: 'm4a',
      file_size: null,
      cookies: null,
    });
  });

  it('falls back to the approximate file size', () => {
    const hevc = filterFormats(formats).find((format) => format.format_id === 'bytevc1_720p');
    expect(hevc?.file_size).toBe(2500000);
  });

  it('keeps a reported zero size as zero', () => {
    const descriptor = toFormatDescriptor({
      url: 'https://v16.example.com/empty.mp4',
      ext: 'mp4',
      vcodec: 'h264',
      acodec: 'none',
      filesize: 0,
    });
    expect(descriptor.file_size).toBe(0);
    expect(descriptor.has_audio).toBe(false);
    expect(descriptor.audio_codec).toBeNull();
    expect(descriptor.bitrate).toBeNull();
  });
});

describe('normalizeResolution', () => {
  it('labels streams without video as audio only', () => {
    expect(normalizeResolution({ vcodec: 'none', acodec: 'aac', width: 1080, height: 1920 })).toBe('audio only');
  });

  it('renders width by height for video', () => {
    expect(normalizeResolution({ vcodec: 'h264', width: 1080, height: 1920 })).toBe('1080x1920');
  });

  it('falls back to the engine label, then null', () => {
    expect(normalizeResolution({ vcodec: 'h264', resolution: '720p' })).toBe('720p');
    expect(normalizeResolution({ vcodec: 'h264' })).toBeNull();
  });

  it('treats known dimensions as video when no codec is reported', () => {
    expect(normalizeResolution({ width: 576, height: 1024 })).toBe('576x1024');
  });
});
