/**
 * SentimentStage - sentiment label, score and tone of the transcript
 */

import { errorMessage } from '../../../types/index.js';
import { truncateText } from '../../../utils/text.js';
import { logger } from '../../../utils/logger.js';
import { SENTIMENT_SYSTEM_PROMPT, sentimentUserPrompt } from '../../../providers/prompts.js';
import { WithFields, WorkflowOutputs } from '../state.js';
import { advance, halt, StageContext, StageUpdate, WorkflowStage } from '../types.js';
import { SentimentResponseSchema } from './schemas.js';

export type SentimentOutput = Pick<WorkflowOutputs, 'sentiment' | 'sentimentScore' | 'tone'>;

export class SentimentStage implements WorkflowStage<'transcript', SentimentOutput> {
  readonly name = 'sentiment';
  readonly requires = ['transcript'] as const;

  async run(state: WithFields<'transcript'>, context: StageContext): Promise<StageUpdate<SentimentOutput>> {
    const transcript = truncateText(state.transcript, context.settings.maxTranscriptChars);

    try {
      logger.debug(`Sentiment analysis started: ${transcript.length} characters`);
      const result = await context.providers.reasoner.generate(
        {
          task: 'sentiment',
          system: SENTIMENT_SYSTEM_PROMPT,
          user: sentimentUserPrompt(transcript),
          schema: SentimentResponseSchema,
        },
        { signal: context.signal, timeoutMs: context.settings.timeouts.reasoningMs }
      );

      return advance('analyzed', {
        sentiment: result.sentiment,
        sentimentScore: result.sentiment_score,
        tone: result.tone,
      });
    } catch (error) {
      logger.warn('Sentiment analysis failed', { reason: errorMessage(error) });
      return halt('failed', `Error analyzing sentiment: ${errorMessage(error)}`);
    }
  }
}
