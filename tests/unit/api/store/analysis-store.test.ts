import { InMemoryAnalysisStore, getAnalysisStore, resetAnalysisStore } from '../../../../src/api/store/analysis-store.js';
import { createInitialState } from '../../../../src/core/pipeline/state.js';
import { TEST_VIDEO_URL } from '../../../helpers/fakes.js';

describe('InMemoryAnalysisStore', () => {
  let store: InMemoryAnalysisStore;

  beforeEach(() => {
    store = new InMemoryAnalysisStore();
  });

  it('saves a failed state with null outputs', async () => {
    const state = {
      ...createInitialState({ kind: 'remote', url: TEST_VIDEO_URL }),
      errors: ['Error while downloading audio: video is private or unavailable'],
      status: 'failed' as const,
    };

    const record = await store.save(state);

    expect(record).toMatchObject({
      videoUrl: TEST_VIDEO_URL,
      title: null,
      transcript: null,
      sentiment: null,
      keyPoints: null,
      errors: ['Error while downloading audio: video is private or unavailable'],
      status: 'failed',
    });
    expect(record.createdAt).toBe(record.updatedAt);
    await expect(store.get(record.id)).resolves.toEqual(record);
  });

  it('copies key points and errors', async () => {
    const keyPoints: [string, string, string] = ['a', 'b', 'c'];
    const state = {
      ...createInitialState({ kind: 'remote', url: TEST_VIDEO_URL }),
      keyPoints,
      status: 'success' as const,
    };

    const record = await store.save(state);

    expect(record.keyPoints).toEqual(['a', 'b', 'c']);
    expect(record.keyPoints).not.toBe(keyPoints);
  });

  it('returns copies that cannot change stored records', async () => {
    const state = {
      ...createInitialState({ kind: 'remote', url: TEST_VIDEO_URL }),
      keyPoints: ['a', 'b', 'c'] as const,
      errors: ['first'],
      status: 'success' as const,
    };
    const saved = await store.save(state);
    saved.errors.push('from save');

    const fetched = await store.get(saved.id);
    fetched?.errors.push('from get');
    fetched?.keyPoints?.push('d');
    const { results } = await store.list(1, 10);
    results[0].errors.push('from list');

    const stored = await store.get(saved.id);
    expect(stored?.errors).toEqual(['first']);
    expect(stored?.keyPoints).toEqual(['a', 'b', 'c']);
  });

  it('records rejected requests as failed', async () => {
    const record = await store.saveFailure('not-a-url', ['url: Invalid url']);

    expect(record.status).toBe('failed');
    expect(record.errors).toEqual(['url: Invalid url']);
    expect(record.videoUrl).toBe('not-a-url');
  });

  it('lists newest first with page counts', async () => {
    const ids: string[] = [];
    for (let i = 0; i < 5; i++) {
      ids.push((await store.saveFailure(`video-${i}`, ['x'])).id);
    }

    const first = await store.list(1, 2);
    const last = await store.list(3, 2);

    expect(first.count).toBe(5);
    expect(first.totalPages).toBe(3);
    expect(first.results.map((r) => r.id)).toEqual([ids[4], ids[3]]);
    expect(last.results.map((r) => r.id)).toEqual([ids[0]]);
  });

  it('reports one page when empty', async () => {
    await expect(store.list(1, 10)).resolves.toEqual({ count: 0, page: 1, totalPages: 1, results: [] });
  });

  it('returns undefined for unknown ids', async () => {
    await expect(store.get('missing')).resolves.toBeUndefined();
  });

  it('clears all records', async () => {
    await store.saveFailure('a', ['x']);
    store.clear();
    await expect(store.count()).resolves.toBe(0);
  });
});

describe('getAnalysisStore', () => {
  afterEach(() => resetAnalysisStore());

  it('returns the same instance until reset', () => {
    const first = getAnalysisStore();
    expect(getAnalysisStore()).toBe(first);

    resetAnalysisStore();
    expect(getAnalysisStore()).not.toBe(first);
  });
});
