export interface ExtractionRequest {
  videoUrl: string;
  noWatermark?: boolean;
  refreshCookies?: boolean;
}

export interface FormatDescriptor {
  format_id: string | null;
  resolution: string | null; // 'WxH', the engine's label, or 'audio only'
  url: string;
  has_audio: boolean;
  has_video: boolean;
  bitrate: number | null; // kbit/s
  audio_codec: string | null;
  ext: string | null;
  file_size: number | null; // bytes
  cookies: Record<string, string | boolean> | null;
}

export interface ExtractionResult {
  platform: string;
  title: string;
  duration: number | null;
  thumbnail: string | null;
  formats: FormatDescriptor[];
}

export interface ErrorResponse {
  detail: string;
}
