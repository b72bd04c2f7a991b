/**
 * FFmpeg Wrapper
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { ErrorCode, ClipsenseError, errorMessage } from '../types/index.js';
import { normalizeLanguageCode } from '../utils/language.js';
import { logger } from '../utils/logger.js';
import type { CallOptions } from './types.js';

const execFileAsync = promisify(execFile);

/** Default timeout for probing and audio extraction (ms) */
export const FFMPEG_TIMEOUT_MS = 120_000;

export interface MediaInfo {
  durationSeconds: number;
  hasAudio: boolean;
  title?: string;
  languageCode?: string;
}

const ProbeSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
      tags: z.record(z.string()).optional(),
    })
    .optional(),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        tags: z.record(z.string()).optional(),
      })
    )
    .default([]),
});

export class FFmpegWrapper {
  private ffmpegPath: string;
  private ffprobePath: string;

  constructor(ffmpegPath?: string) {
    this.ffmpegPath = ffmpegPath || process.env.FFMPEG_PATH || 'ffmpeg';
    this.ffprobePath = this.ffmpegPath.replace(/ffmpeg$/, 'ffprobe');
  }

  /**
   * Check that ffmpeg is installed
   */
  static async checkInstallation(): Promise<boolean> {
    try {
      await execFileAsync(process.env.FFMPEG_PATH || 'ffmpeg', ['-version'], { timeout: 5_000 });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Extract the audio track to mp3
   */
  async extractAudio(videoPath: string, outputPath: string, options: CallOptions = {}): Promise<void> {
    try {
      logger.debug(`Extracting audio: ${videoPath} -> ${outputPath}`);

      await execFileAsync(
        this.ffmpegPath,
        ['-i', videoPath, '-vn', '-acodec', 'libmp3lame', '-q:a', '2', '-y', outputPath],
        { encoding: 'utf8', timeout: options.timeoutMs ?? FFMPEG_TIMEOUT_MS, signal: options.signal }
      );
    } catch (error) {
      throw new ClipsenseError(
        ErrorCode.SOURCE_UNAVAILABLE,
        `Error while extracting audio: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Container metadata via ffprobe
   */
  async probe(videoPath: string, options: CallOptions = {}): Promise<MediaInfo> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(
        this.ffprobePath,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', videoPath],
        { encoding: 'utf8', timeout: options.timeoutMs ?? FFMPEG_TIMEOUT_MS, signal: options.signal }
      ));
    } catch (error) {
      throw new ClipsenseError(
        ErrorCode.SOURCE_UNAVAILABLE,
        `Error while reading video metadata: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    return this.parseProbe(stdout);
  }

  parseProbe(stdout: string): MediaInfo {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new ClipsenseError(ErrorCode.SOURCE_UNAVAILABLE, 'Error while reading video metadata: invalid ffprobe output');
    }

    const result = ProbeSchema.safeParse(raw);
    if (!result.success) {
      throw new ClipsenseError(ErrorCode.SOURCE_UNAVAILABLE, 'Error while reading video metadata: unexpected ffprobe output');
    }

    const { format, streams } = result.data;
    const audioStream = streams.find((s) => s.codec_type === 'audio');
    const duration = parseFloat(format?.duration ?? '0');

    return {
      durationSeconds: Number.isFinite(duration) ? duration : 0,
      hasAudio: audioStream !== undefined,
      title: format?.tags?.title || undefined,
      languageCode: normalizeLanguageCode(audioStream?.tags?.language) || undefined,
    };
  }
}
