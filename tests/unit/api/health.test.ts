import { createApp } from '../../../src/api/app.js';
import { InMemoryAnalysisStore } from '../../../src/api/store/analysis-store.js';
import { VideoAnalyzer } from '../../../src/core/orchestrator.js';
import { FFmpegWrapper } from '../../../src/providers/ffmpeg.js';
import { YouTubeProvider } from '../../../src/providers/youtube.js';
import { ConfigSchema } from '../../../src/types/config.js';
import { createFakeProviders } from '../../helpers/fakes.js';

describe('Health Check Routes', () => {
  const config = ConfigSchema.parse({});
  const store = new InMemoryAnalysisStore();
  const app = createApp({
    analyzer: new VideoAnalyzer({ config, providers: createFakeProviders(), repository: store }),
    store,
    config,
    accessLog: false,
  });

  let ffmpegCheck: jest.SpyInstance<Promise<boolean>, []>;
  let ytdlpCheck: jest.SpyInstance<Promise<boolean>, []>;

  beforeEach(() => {
    ffmpegCheck = jest.spyOn(FFmpegWrapper, 'checkInstallation');
    ytdlpCheck = jest.spyOn(YouTubeProvider, 'checkInstallation');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.OPENAI_API_KEY;
  });

  describe('GET /api/v1/health', () => {
    it('should return healthy status when all dependencies are healthy', async () => {
      ffmpegCheck.mockResolvedValue(true);
      ytdlpCheck.mockResolvedValue(true);
      process.env.OPENAI_API_KEY = 'test-key';

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'healthy',
        dependencies: { ffmpeg: 'healthy', ytdlp: 'healthy', openai: 'healthy' },
      });
    });

    it('should return degraded status when the API key is missing', async () => {
      ffmpegCheck.mockResolvedValue(true);
      ytdlpCheck.mockResolvedValue(true);

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'degraded',
        dependencies: { openai: 'unhealthy' },
      });
    });

    it('should return 503 when every dependency is unavailable', async () => {
      ffmpegCheck.mockResolvedValue(false);
      ytdlpCheck.mockRejectedValue(new Error('spawn yt-dlp ENOENT'));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        status: 'unhealthy',
        dependencies: { ffmpeg: 'unhealthy', ytdlp: 'unhealthy', openai: 'unhealthy' },
      });
    });
  });
});

describe('App', () => {
  const config = ConfigSchema.parse({});
  const store = new InMemoryAnalysisStore();
  const app = createApp({
    analyzer: new VideoAnalyzer({ config, providers: createFakeProviders(), repository: store }),
    store,
    config,
    accessLog: false,
  });

  it('describes the API at the root', async () => {
    const res = await app.request('/');

    expect(await res.json()).toMatchObject({
      name: 'clipsense API',
      openapi: '/openapi.json',
      health: '/api/v1/health',
    });
  });

  it('serves the OpenAPI document', async () => {
    const res = await app.request('/openapi.json');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      openapi: '3.0.0',
      info: { title: 'clipsense API' },
      paths: { '/api/v1/analyze/youtube': { post: { summary: 'Analyze a YouTube video' } } },
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found' });
  });
});
