import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { FFmpegWrapper } from '../../providers/ffmpeg.js';
import { YouTubeProvider } from '../../providers/youtube.js';
import { ConfigManager } from '../../utils/config.js';
import { API_VERSION } from '../../constants.js';
import { HealthStatus, HealthStatusSchema } from '../models/analysis.js';

// --- OpenAPI Route Definitions ---

const healthCheckRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  description: 'Check the health status of the API and its dependencies (ffmpeg, yt-dlp, OpenAI API key).',
  responses: {
    200: {
      description: 'Service is healthy or degraded',
      content: { 'application/json': { schema: HealthStatusSchema } },
    },
    503: {
      description: 'Service is unhealthy',
      content: { 'application/json': { schema: HealthStatusSchema } },
    },
  },
});

// --- Route Handlers ---

export function createHealthRoutes(): OpenAPIHono {
  const health = new OpenAPIHono();

  health.openapi(healthCheckRoute, async (c) => {
    // Check all dependencies in parallel
    const [ffmpegOk, ytdlpOk] = await Promise.all([
      FFmpegWrapper.checkInstallation().catch(() => false),
      YouTubeProvider.checkInstallation().catch(() => false),
    ]);

    const dependencies: HealthStatus['dependencies'] = {
      ffmpeg: ffmpegOk ? 'healthy' : 'unhealthy',
      ytdlp: ytdlpOk ? 'healthy' : 'unhealthy',
      openai: ConfigManager.getApiKey() ? 'healthy' : 'unhealthy',
    };

    const healthyCount = Object.values(dependencies).filter((s) => s === 'healthy').length;
    const totalCount = Object.keys(dependencies).length;

    const status: HealthStatus = {
      status: healthyCount === totalCount ? 'healthy' : healthyCount === 0 ? 'unhealthy' : 'degraded',
      version: process.env.npm_package_version || API_VERSION,
      timestamp: new Date().toISOString(),
      dependencies,
    };

    const statusCode = status.status === 'unhealthy' ? 503 : 200;
    return c.json(status, statusCode);
  });

  return health;
}
