jest.mock('../../../src/utils/logger.js', () => ({
  logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { VideoAnalyzer, toWorkflowSettings } from '../../../src/core/orchestrator.js';
import { InMemoryAnalysisStore } from '../../../src/api/store/analysis-store.js';
import { ConfigSchema } from '../../../src/types/config.js';
import { createFakeProviders, SAMPLE_KEY_POINTS, TEST_VIDEO_URL } from '../../helpers/fakes.js';

describe('toWorkflowSettings', () => {
  it('takes the transcript limit and stage timeouts from the config', () => {
    const config = ConfigSchema.parse({ ai: { maxTranscriptChars: 800 }, timeouts: { reasoningMs: 10 } });

    expect(toWorkflowSettings(config)).toEqual({
      maxTranscriptChars: 800,
      timeouts: { downloadMs: 300_000, transcriptionMs: 180_000, reasoningMs: 10 },
    });
  });
});

describe('VideoAnalyzer', () => {
  const config = ConfigSchema.parse({});
  let store: InMemoryAnalysisStore;

  beforeEach(() => {
    store = new InMemoryAnalysisStore();
  });

  it('runs the workflow and saves the result', async () => {
    const analyzer = new VideoAnalyzer({ config, providers: createFakeProviders(), repository: store });

    const outcome = await analyzer.analyze({ kind: 'remote', url: TEST_VIDEO_URL });

    expect(outcome.cancelled).toBe(false);
    expect(outcome.state.status).toBe('success');
    expect(outcome.trace.map((t) => t.name)).toEqual(['extraction', 'sentiment', 'structuring']);
    expect(outcome.record).toMatchObject({
      videoUrl: TEST_VIDEO_URL,
      title: 'Morning Habits',
      durationSeconds: 212,
      languageCode: 'en',
      sentiment: 'positive',
      keyPoints: SAMPLE_KEY_POINTS.key_points,
      status: 'success',
    });
    await expect(store.count()).resolves.toBe(1);
  });

  it('saves failed runs', async () => {
    const providers = createFakeProviders({ transcription: { text: 'ok no', language: '' } });
    const analyzer = new VideoAnalyzer({ config, providers, repository: store });

    const outcome = await analyzer.analyze({ kind: 'remote', url: TEST_VIDEO_URL });

    expect(outcome.record?.status).toBe('failed');
    await expect(store.count()).resolves.toBe(1);
  });

  it('does not save cancelled runs', async () => {
    const analyzer = new VideoAnalyzer({ config, providers: createFakeProviders(), repository: store });
    const controller = new AbortController();

    const outcome = await analyzer.analyze(
      { kind: 'remote', url: TEST_VIDEO_URL },
      { signal: controller.signal, onStage: () => controller.abort() }
    );

    expect(outcome.cancelled).toBe(true);
    expect(outcome.record).toBeUndefined();
    expect(outcome.state.errors).toEqual(['Workflow cancelled before sentiment stage']);
    await expect(store.count()).resolves.toBe(0);
  });

  it('rejects when no API key is configured', async () => {
    const analyzer = new VideoAnalyzer({ config, repository: store, apiKey: '' });

    await expect(analyzer.analyze({ kind: 'remote', url: TEST_VIDEO_URL })).rejects.toThrow('OPENAI_API_KEY');
  });
});
