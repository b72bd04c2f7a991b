/**
 * Whisper Provider - OpenAI Whisper API
 */

import OpenAI from 'openai';
import * as fs from 'fs';
import { z } from 'zod';
import { ErrorCode, ClipsenseError, TranscriptionResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toProviderError } from './errors.js';
import type { CallOptions, TranscriptionProvider } from './types.js';

export interface WhisperProviderOptions {
  model?: string;
  maxRetries?: number;
}

const VerboseTranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
});

export class WhisperProvider implements TranscriptionProvider {
  private client: OpenAI;
  private model: string;
  private static COST_PER_MINUTE = 0.006; // USD

  constructor(apiKey?: string, options: WhisperProviderOptions = {}) {
    const key = apiKey || process.env.OPENAI_API_KEY;
    if (!key) {
      throw new ClipsenseError(
        ErrorCode.API_KEY_MISSING,
        'An OpenAI API key is required. Set the OPENAI_API_KEY environment variable.'
      );
    }
    this.client = new OpenAI({ apiKey: key, maxRetries: options.maxRetries ?? 2 });
    this.model = options.model ?? 'whisper-1';
  }

  /**
   * Speech to text; `language` is the name Whisper reports (e.g. "english")
   */
  async transcribe(audioPath: string, options: CallOptions = {}): Promise<TranscriptionResult> {
    try {
      logger.debug(`Whisper transcription started: ${audioPath}`);

      const response = await this.client.audio.transcriptions.create(
        {
          file: fs.createReadStream(audioPath),
          model: this.model,
          response_format: 'verbose_json',
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );

      const parsed = VerboseTranscriptionSchema.safeParse(response);
      if (!parsed.success) {
        throw new ClipsenseError(
          ErrorCode.TRANSCRIPTION_UNAVAILABLE,
          'Error transcribing audio: unexpected transcription response'
        );
      }

      logger.debug(`Whisper transcription finished: ${parsed.data.text.length} characters`, {
        language: parsed.data.language,
      });

      return {
        text: parsed.data.text,
        language: parsed.data.language ?? '',
      };
    } catch (error) {
      throw toProviderError(error, ErrorCode.TRANSCRIPTION_UNAVAILABLE, 'Error transcribing audio', options);
    }
  }

  /**
   * Cost estimate
   */
  static estimateCost(durationSeconds: number): number {
    const minutes = Math.ceil(durationSeconds / 60);
    return minutes * this.COST_PER_MINUTE;
  }

  static formatCost(cost: number): string {
    return `$${cost.toFixed(3)}`;
  }
}
