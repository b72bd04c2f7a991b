/**
 * YouTube Provider - yt-dlp wrapper
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import * as path from 'path';
import { z } from 'zod';
import { AudioAsset, ErrorCode, ClipsenseError, errorMessage } from '../types/index.js';
import { isValidYouTubeUrl } from '../utils/url.js';
import { normalizeLanguageCode } from '../utils/language.js';
import { logger } from '../utils/logger.js';
import type { CallOptions } from './types.js';

const execFileAsync = promisify(execFile);

/** Default timeout for audio downloads (ms) */
export const YTDLP_DOWNLOAD_TIMEOUT_MS = 300_000;

const YtDlpInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  language: z.string().nullish(),
});

export type YtDlpInfo = z.infer<typeof YtDlpInfoSchema>;

export class YouTubeProvider {
  private ytdlpPath: string;

  constructor(ytdlpPath?: string) {
    this.ytdlpPath = ytdlpPath || process.env.YT_DLP_PATH || 'yt-dlp';
  }

  /**
   * Check that yt-dlp is installed
   */
  static async checkInstallation(): Promise<boolean> {
    try {
      await execFileAsync(process.env.YT_DLP_PATH || 'yt-dlp', ['--version'], { timeout: 5_000 });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Download the best audio track as mp3 and return it with the video's metadata
   */
  async downloadAudio(url: string, outputDir: string, options: CallOptions = {}): Promise<AudioAsset> {
    if (!isValidYouTubeUrl(url)) {
      throw new ClipsenseError(ErrorCode.INVALID_URL, `Invalid YouTube URL: ${url}`);
    }

    const template = path.join(outputDir, 'audio.%(ext)s');
    const audioPath = path.join(outputDir, 'audio.mp3');

    try {
      logger.debug(`Downloading audio: ${url}`);
      const { stdout } = await execFileAsync(
        this.ytdlpPath,
        [
          '-f',
          'bestaudio/best',
          '-x',
          '--audio-format',
          'mp3',
          '--audio-quality',
          '192K',
          '--no-playlist',
          '--no-warnings',
          '--dump-json',
          '--no-simulate',
          '-o',
          template,
          url,
        ],
        {
          encoding: 'utf8',
          maxBuffer: 32 * 1024 * 1024,
          timeout: options.timeoutMs ?? YTDLP_DOWNLOAD_TIMEOUT_MS,
          signal: options.signal,
        }
      );

      const info = this.parseInfo(stdout);
      logger.debug(`Audio downloaded: ${audioPath}`, { id: info.id, title: info.title });

      return {
        audioPath,
        title: info.title ?? undefined,
        durationSeconds: info.duration ?? undefined,
        languageCode: normalizeLanguageCode(info.language) || undefined,
      };
    } catch (error) {
      if (error instanceof ClipsenseError) throw error;
      const message = errorMessage(error);
      if (message.includes('Video unavailable') || message.includes('Private video')) {
        throw new ClipsenseError(
          ErrorCode.SOURCE_UNAVAILABLE,
          `Error while downloading audio: video is private or unavailable`,
          error instanceof Error ? error : undefined
        );
      }
      throw new ClipsenseError(
        ErrorCode.SOURCE_UNAVAILABLE,
        `Error while downloading audio: ${message}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * yt-dlp prints one JSON object per line; the last line describes the downloaded video
   */
  parseInfo(stdout: string): YtDlpInfo {
    const lines = stdout
      .trim()
      .split('\n')
      .filter((line) => line.trim().startsWith('{'));
    const last = lines[lines.length - 1];
    if (!last) {
      throw new ClipsenseError(ErrorCode.SOURCE_UNAVAILABLE, 'Error while downloading audio: no video information returned');
    }

    const result = YtDlpInfoSchema.safeParse(JSON.parse(last));
    if (!result.success) {
      throw new ClipsenseError(ErrorCode.SOURCE_UNAVAILABLE, 'Error while downloading audio: unreadable video information');
    }
    return result.data;
  }
}
