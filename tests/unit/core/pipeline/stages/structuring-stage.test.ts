jest.mock('../../../../../src/utils/logger.js', () => ({
  logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { buildFinalResult, StructuringStage } from '../../../../../src/core/pipeline/stages/structuring-stage.js';
import { createInitialState } from '../../../../../src/core/pipeline/state.js';
import { createFakeProviders, SAMPLE_KEY_POINTS, TEST_SETTINGS, TEST_VIDEO_URL } from '../../../../helpers/fakes.js';

describe('StructuringStage', () => {
  const stage = new StructuringStage();
  const state = {
    ...createInitialState({ kind: 'remote', url: TEST_VIDEO_URL }),
    transcript: 'A short talk about gardening in small spaces.',
    title: 'Balcony Gardens',
    durationSeconds: 95,
    languageCode: 'en',
    sentiment: 'positive' as const,
    sentimentScore: 0.7,
    tone: 'friendly',
    status: 'analyzed' as const,
  };

  it('requires the transcript and the sentiment fields', () => {
    expect(stage.requires).toEqual(['transcript', 'sentiment', 'sentimentScore', 'tone']);
  });

  it('returns three key points and the final result', async () => {
    const providers = createFakeProviders();

    const update = await stage.run(state, { providers, settings: TEST_SETTINGS });

    expect(update).toEqual({
      status: 'success',
      output: {
        keyPoints: SAMPLE_KEY_POINTS.key_points,
        finalResult: {
          video_metadata: { title: 'Balcony Gardens', duration_seconds: 95, language_code: 'en' },
          analysis: {
            sentiment: 'positive',
            sentiment_score: 0.7,
            tone: 'friendly',
            key_points: SAMPLE_KEY_POINTS.key_points,
          },
        },
      },
    });
  });

  it('sends the prior analysis with the transcript', async () => {
    const providers = createFakeProviders();

    await stage.run(state, { providers, settings: TEST_SETTINGS });

    expect(providers.reasoner.calls[0].user).toBe(
      [
        'Prior analysis: sentiment positive (score 0.7), tone "friendly".',
        '',
        'Extract the 3 most important points from the following text:',
        '',
        'A short talk about gardening in small spaces.',
      ].join('\n')
    );
  });

  it('rejects empty key points', async () => {
    const providers = createFakeProviders({
      replies: { 'key points': { key_points: ['First.', '', 'Third.'] } },
    });

    const update = await stage.run(state, { providers, settings: TEST_SETTINGS });

    expect(update).toEqual({
      status: 'failed',
      errors: [
        'Error structuring key points: invalid key points response (key_points.1: String must contain at least 1 character(s))',
      ],
    });
  });
});

describe('buildFinalResult', () => {
  it('defaults missing metadata', () => {
    const state = {
      ...createInitialState({ kind: 'upload', path: '/tmp/a.mp4' }),
      sentiment: 'neutral' as const,
      sentimentScore: 0.5,
      tone: 'flat',
    };

    expect(buildFinalResult(state, ['a', 'b', 'c'])).toEqual({
      video_metadata: { title: '', duration_seconds: 0, language_code: '' },
      analysis: { sentiment: 'neutral', sentiment_score: 0.5, tone: 'flat', key_points: ['a', 'b', 'c'] },
    });
  });
});
