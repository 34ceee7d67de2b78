import { exec } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { ExtractionError, InternalError, TimeoutError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const execAsync = promisify(exec);

// yt-dlp info dicts for a single TikTok post easily exceed exec's 1MB default
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();

export const rawFormatSchema = z.object({
  format_id: optionalString,
  format_note: optionalString,
  url: optionalString,
  protocol: optionalString,
  ext: optionalString,
  vcodec: optionalString,
  acodec: optionalString,
  width: optionalNumber,
  height: optionalNumber,
  resolution: optionalString,
  abr: optionalNumber,
  tbr: optionalNumber,
  filesize: optionalNumber,
  filesize_approx: optionalNumber,
  cookies: optionalString,
});

export const rawMediaInfoSchema = z.object({
  id: optionalString,
  title: optionalString,
  duration: optionalNumber,
  thumbnail: optionalString,
  extractor_key: optionalString,
  formats: z.array(rawFormatSchema).nullish(),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;
export type RawMediaInfo = z.infer<typeof rawMediaInfoSchema>;

export interface ResolveOptions {
  cookieFile: string;
}

/**
 * The media-extraction engine: turns a post URL into its raw metadata and
 * candidate formats.
 */
export interface Extractor {
  resolve(url: string, options: ResolveOptions): Promise<RawMediaInfo>;
}

export type CommandRunner = (
  command: string,
  options: { timeout: number; maxBuffer: number; killSignal: NodeJS.Signals },
) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = (command, options) => execAsync(command, options);

interface ExecFailure extends Error {
  code?: number | string | null;
  killed?: boolean;
  stderr?: string;
}

const isExecFailure = (error: unknown): error is ExecFailure =>
  error instanceof Error && ('stderr' in error || 'killed' in error);

/**
 * Escapes a string for shell usage
 */
export function shellEscape(str: string): string {
  return `'${str.replace(/'/g, "'\\''")}'`;
}

/**
 * Picks the most useful line of yt-dlp's stderr, preferring its `ERROR:` line.
 */
export function describeYtDlpFailure(stderr: string | undefined, fallback: string): string {
  const lines = (stderr ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  const errorLine = lines.find((line) => line.startsWith('ERROR:'));
  const message = errorLine ?? lines[lines.length - 1];
  return message ? message.replace(/^ERROR:\s*/, '') : fallback;
}

export interface YtDlpExtractorOptions {
  binary: string;
  userAgent: string;
  timeoutMs: number;
}

export class YtDlpExtractor implements Extractor {
  constructor(
    private readonly options: YtDlpExtractorOptions,
    private readonly run: CommandRunner = runCommand,
  ) {}

  public buildCommand(url: string, { cookieFile }: ResolveOptions): string {
    return [
      shellEscape(this.options.binary),
      '--dump-single-json',
      '--no-download',
      '--no-playlist',
      '--no-warnings',
      `--cookies ${shellEscape(cookieFile)}`,
      `--user-agent ${shellEscape(this.options.userAgent)}`,
      '--',
      shellEscape(url),
    ].join(' ');
  }

  public async resolve(url: string, options: ResolveOptions): Promise<RawMediaInfo> {
    const command = this.buildCommand(url, options);
    const { timeoutMs } = this.options;

    let stdout: string;
    try {
      ({ stdout } = await this.run(command, {
        timeout: timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        killSignal: 'SIGKILL',
      }));
    } catch (error) {
      if (isExecFailure(error) && error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
        throw new InternalError('yt-dlp output exceeded the buffer limit', { cause: error });
      }
      if (isExecFailure(error) && error.code === 127) {
        throw new InternalError(`yt-dlp binary not found: ${this.options.binary}`, { cause: error });
      }
      if (isExecFailure(error) && error.killed) {
        throw new TimeoutError(`Extraction timed out after ${timeoutMs}ms`, { cause: error });
      }
      if (isExecFailure(error) && error.stderr !== undefined) {
        throw new ExtractionError(`Error processing video: ${describeYtDlpFailure(error.stderr, error.message)}`, {
          cause: error,
        });
      }
      throw new InternalError(`Failed to run yt-dlp: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (error) {
      throw new InternalError('yt-dlp returned malformed JSON', { cause: error });
    }

    const parsed = rawMediaInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new InternalError(`Unexpected yt-dlp output: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, {
        cause: parsed.error,
      });
    }

    logger.debug(`yt-dlp returned ${parsed.data.formats?.length ?? 0} formats for ${url}`);
    return parsed.data;
  }
}
