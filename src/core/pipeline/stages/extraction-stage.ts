/**
 * ExtractionStage - audio, transcript and metadata for the video
 */

import { errorMessage } from '../../../types/index.js';
import { withTempDir } from '../../../utils/file.js';
import { resolveLanguageCode } from '../../../utils/language.js';
import { logger } from '../../../utils/logger.js';
import { assessTranscript, insufficientAudioMessage } from '../audio-gate.js';
import { toVideoInput, WorkflowOutputs, WorkflowState } from '../state.js';
import { advance, halt, StageContext, StageUpdate, WorkflowStage } from '../types.js';

export type ExtractionOutput = Pick<WorkflowOutputs, 'transcript' | 'title' | 'durationSeconds' | 'languageCode'>;

export class ExtractionStage implements WorkflowStage<never, ExtractionOutput> {
  readonly name = 'extraction';
  readonly requires = [] as const;

  async run(state: WorkflowState, context: StageContext): Promise<StageUpdate<ExtractionOutput>> {
    const { providers, settings, signal } = context;
    const input = toVideoInput(state);

    try {
      return await withTempDir('clipsense-extract-', async (workDir) => {
        const asset = await providers.audioSource.acquire(input, workDir, {
          signal,
          timeoutMs: settings.timeouts.downloadMs,
        });

        const transcription = await providers.transcriber.transcribe(asset.audioPath, {
          signal,
          timeoutMs: settings.timeouts.transcriptionMs,
        });

        const assessment = assessTranscript(transcription.text);
        if (!assessment.sufficient) {
          logger.warn('Transcript below minimum', {
            words: assessment.wordCount,
            characters: assessment.charCount,
          });
          return halt('failed', insufficientAudioMessage(assessment));
        }

        logger.debug(`Transcript accepted: ${assessment.wordCount} words`);

        return advance('extracted', {
          transcript: assessment.text,
          title: asset.title ?? '',
          durationSeconds: Math.max(0, Math.round(asset.durationSeconds ?? 0)),
          languageCode: resolveLanguageCode(asset.languageCode, transcription.language),
        });
      });
    } catch (error) {
      logger.warn('Extraction failed', { reason: errorMessage(error) });
      return halt('failed', errorMessage(error));
    }
  }
}
