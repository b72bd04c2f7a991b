/**
 * Routes a VideoInput to yt-dlp (remote) or ffmpeg (upload)
 */

import * as path from 'path';
import { AudioAsset, ErrorCode, ClipsenseError, VideoInput } from '../types/index.js';
import { baseNameWithoutExt } from '../utils/file.js';
import { logger } from '../utils/logger.js';
import { FFmpegWrapper } from './ffmpeg.js';
import { YouTubeProvider } from './youtube.js';
import type { AudioSource, CallOptions } from './types.js';

export class MediaAudioSource implements AudioSource {
  constructor(
    private youtube: YouTubeProvider = new YouTubeProvider(),
    private ffmpeg: FFmpegWrapper = new FFmpegWrapper()
  ) {}

  async acquire(input: VideoInput, workDir: string, options: CallOptions = {}): Promise<AudioAsset> {
    if (input.kind === 'remote') {
      return this.youtube.downloadAudio(input.url, workDir, options);
    }

    const info = await this.ffmpeg.probe(input.path, options);
    if (!info.hasAudio) {
      throw new ClipsenseError(ErrorCode.SOURCE_UNAVAILABLE, 'Audio not found: the video has no audio stream');
    }

    const audioPath = path.join(workDir, 'audio.mp3');
    await this.ffmpeg.extractAudio(input.path, audioPath, options);
    logger.debug(`Audio extracted: ${audioPath}`, { duration: info.durationSeconds });

    return {
      audioPath,
      title: info.title ?? baseNameWithoutExt(input.path),
      durationSeconds: info.durationSeconds,
      languageCode: info.languageCode,
    };
  }
}
