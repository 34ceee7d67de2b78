import type { FormatDescriptor } from '../types/index.js';
import { parseCookieHeader } from '../utils/cookies.js';
import type { RawFormat } from './extractor.js';

export const AUDIO_ONLY = 'audio only';

// MP4 family containers TikTok serves playable video in
const PLAYABLE_VIDEO_EXTENSIONS = new Set(['mp4', 'm4v', 'mov']);
const MANIFEST_PROTOCOLS = new Set(['m3u8', 'm3u8_native', 'http_dash_segments']);

type DeliverableFormat = RawFormat & { url: string };

export interface FilterOptions {
  noWatermark?: boolean;
}

// Containers that never carry a video track
const AUDIO_EXTENSIONS = new Set(['m4a', 'mp3', 'aac', 'opus', 'ogg', 'oga', 'wav', 'flac']);

// A missing codec means the engine could not tell, not that the track is absent
const isUnknownCodec = (codec: string | null | undefined): boolean => codec == null || codec === '';

const hasVideoTrack = (format: RawFormat): boolean => {
  if (!isUnknownCodec(format.vcodec)) return format.vcodec !== 'none';
  if (format.width && format.height) return true;
  return !AUDIO_EXTENSIONS.has((format.ext ?? '').toLowerCase());
};

const hasAudioTrack = (format: RawFormat): boolean => format.acodec !== 'none';

const isWatermarked = (format: RawFormat): boolean => /\bwatermarked\b/i.test(format.format_note ?? '');

const isManifest = (url: string, protocol: string | null | undefined): boolean =>
  /\.m3u8(\?|$)/i.test(url) || MANIFEST_PROTOCOLS.has(protocol ?? '');

const isDeliverable = (format: RawFormat): format is DeliverableFormat =>
  typeof format.url === 'string' && format.url !== '' && !isManifest(format.url, format.protocol);

const isPlayableVideo = (format: RawFormat): boolean =>
  hasVideoTrack(format) && PLAYABLE_VIDEO_EXTENSIONS.has((format.ext ?? '').toLowerCase());

const isAudioOnly = (format: RawFormat): boolean => hasAudioTrack(format) && !hasVideoTrack(format);

const isCleanVideo = (format: RawFormat): boolean => hasVideoTrack(format) && !isWatermarked(format);

export function normalizeResolution(format: RawFormat): string | null {
  if (!hasVideoTrack(format)) return AUDIO_ONLY;
  if (format.width && format.height) return `${format.width}x${format.height}`;
  if (format.resolution && format.resolution !== AUDIO_ONLY) return format.resolution;
  return null;
}

export function toFormatDescriptor(format: DeliverableFormat): FormatDescriptor {
  const hasAudio = hasAudioTrack(format);
  return {
    format_id: format.format_id ?? null,
    resolution: normalizeResolution(format),
    url: format.url,
    has_audio: hasAudio,
    has_video: hasVideoTrack(format),
    bitrate: format.abr ?? format.tbr ?? null,
    audio_codec: hasAudio ? format.acodec || null : null,
    ext: format.ext ?? null,
    file_size: format.filesize ?? format.filesize_approx ?? null,
    cookies: parseCookieHeader(format.cookies),
  };
}

/**
 * Reduces the engine's format list to playable MP4-family video and audio-only
 * streams, in the engine's order.
 *
 * With `noWatermark`, unwatermarked video is kept whatever its container, and
 * watermarked video is dropped as long as an unwatermarked alternative survives.
 * When the engine only offers watermarked video it is returned as is.
 */
export function filterFormats(formats: readonly RawFormat[], options: FilterOptions = {}): FormatDescriptor[] {
  const { noWatermark = false } = options;

  let kept = formats
    .filter(isDeliverable)
    .filter((format) => isPlayableVideo(format) || isAudioOnly(format) || (noWatermark && isCleanVideo(format)));

  if (noWatermark && kept.some(isCleanVideo)) {
    kept = kept.filter((format) => !(hasVideoTrack(format) && isWatermarked(format)));
  }

  return kept.map(toFormatDescriptor);
}
