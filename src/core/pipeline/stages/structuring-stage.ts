/**
 * StructuringStage - three key points and the final result
 */

import { AnalysisResult, errorMessage, KeyPoints } from '../../../types/index.js';
import { truncateText } from '../../../utils/text.js';
import { logger } from '../../../utils/logger.js';
import { KEY_POINTS_SYSTEM_PROMPT, keyPointsUserPrompt } from '../../../providers/prompts.js';
import { WithFields, WorkflowOutputs } from '../state.js';
import { advance, halt, StageContext, StageUpdate, WorkflowStage } from '../types.js';
import { KeyPointsResponseSchema } from './schemas.js';

type StructuringInput = 'transcript' | 'sentiment' | 'sentimentScore' | 'tone';

export type StructuringOutput = Pick<WorkflowOutputs, 'keyPoints' | 'finalResult'>;

/**
 * Compose the external result from the analysis state
 */
export function buildFinalResult(state: WithFields<Exclude<StructuringInput, 'transcript'>>, keyPoints: KeyPoints): AnalysisResult {
  return {
    video_metadata: {
      title: state.title ?? '',
      duration_seconds: state.durationSeconds ?? 0,
      language_code: state.languageCode ?? '',
    },
    analysis: {
      sentiment: state.sentiment,
      sentiment_score: state.sentimentScore,
      tone: state.tone,
      key_points: keyPoints,
    },
  };
}

export class StructuringStage implements WorkflowStage<StructuringInput, StructuringOutput> {
  readonly name = 'structuring';
  readonly requires = ['transcript', 'sentiment', 'sentimentScore', 'tone'] as const;

  async run(state: WithFields<StructuringInput>, context: StageContext): Promise<StageUpdate<StructuringOutput>> {
    const transcript = truncateText(state.transcript, context.settings.maxTranscriptChars);

    try {
      logger.debug(`Key point extraction started: ${transcript.length} characters`);
      const result = await context.providers.reasoner.generate(
        {
          task: 'key points',
          system: KEY_POINTS_SYSTEM_PROMPT,
          user: keyPointsUserPrompt(transcript, state),
          schema: KeyPointsResponseSchema,
        },
        { signal: context.signal, timeoutMs: context.settings.timeouts.reasoningMs }
      );

      return advance('success', {
        keyPoints: result.key_points,
        finalResult: buildFinalResult(state, result.key_points),
      });
    } catch (error) {
      logger.warn('Key point extraction failed', { reason: errorMessage(error) });
      return halt('failed', `Error structuring key points: ${errorMessage(error)}`);
    }
  }
}
