import { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';
import { prettyJSON } from 'hono/pretty-json';
import { createAnalyzeRoutes, createHealthRoutes } from './routes/index.js';
import type { AnalyzeRouteDeps } from './routes/index.js';
import { API_PREFIX, API_VERSION } from '../constants.js';
import { logger } from '../utils/logger.js';

export interface AppOptions extends AnalyzeRouteDeps {
  /** Log every request line (default true) */
  accessLog?: boolean;
}

export function createApp(options: AppOptions): OpenAPIHono {
  const app = new OpenAPIHono();

  // Global middleware (applied to all routes)
  if (options.accessLog ?? true) {
    app.use('*', accessLogger());
  }
  app.use('*', prettyJSON());
  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    })
  );

  // Error handler
  app.onError((err, c) => {
    logger.error('Unhandled error', err);
    return c.json(
      {
        error: 'Internal Server Error',
        message: process.env.NODE_ENV === 'development' ? err.message : undefined,
      },
      500
    );
  });

  // Not found handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found' }, 404);
  });

  // Mount routes
  app.route(`${API_PREFIX}/analyze`, createAnalyzeRoutes(options));
  app.route(`${API_PREFIX}/health`, createHealthRoutes());

  // OpenAPI document endpoint (dynamic)
  app.get('/openapi.json', (c) => {
    const host = c.req.header('host');
    const proto = c.req.header('x-forwarded-proto') || (c.req.url.startsWith('https://') ? 'https' : 'http');
    const serverUrl = host ? `${proto}://${host}` : `http://localhost:${options.config.server.port}`;

    const doc = app.getOpenAPIDocument({
      openapi: '3.0.0',
      info: {
        title: 'clipsense API',
        version: process.env.npm_package_version || API_VERSION,
        description:
          'Analyze YouTube or uploaded MP4 videos: transcript, sentiment, tone and three key points.',
        license: {
          name: 'MIT',
        },
      },
      servers: [
        {
          url: serverUrl,
          description: host ? 'Current server' : 'Local development',
        },
      ],
      tags: [
        {
          name: 'Analysis',
          description: 'Video analysis endpoints',
        },
        {
          name: 'Health',
          description: 'Service health checks',
        },
      ],
    });

    return c.json(doc);
  });

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      name: 'clipsense API',
      version: process.env.npm_package_version || API_VERSION,
      openapi: '/openapi.json',
      health: `${API_PREFIX}/health`,
    });
  });

  return app;
}
