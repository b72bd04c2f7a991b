import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import type { Context } from 'hono';
import type { ZodError } from 'zod';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  AnalysisIdParamSchema,
  AnalysisListSchema,
  AnalysisResponseSchema,
  AnalyzeYoutubeRequestSchema,
  ErrorResponseSchema,
  PageQuerySchema,
  toAnalysisResponse,
} from '../models/analysis.js';
import type { AnalysisRepository } from '../store/analysis-store.js';
import type { Analyzer } from '../../core/orchestrator.js';
import type { Config } from '../../types/config.js';
import { errorMessage, UPLOAD_SENTINEL } from '../../types/index.js';
import { UPLOAD_CONTENT_TYPE, UPLOAD_EXTENSION, UPLOAD_FIELD } from '../../constants.js';
import { sanitizeFilename, withTempDir } from '../../utils/file.js';
import { logger } from '../../utils/logger.js';

export interface AnalyzeRouteDeps {
  analyzer: Analyzer;
  store: AnalysisRepository;
  config: Config;
}

/** Shape of a multipart file part */
export interface UploadedFile {
  name: string;
  type: string;
  size: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'type' in value &&
    typeof value.type === 'string' &&
    'size' in value &&
    typeof value.size === 'number' &&
    'arrayBuffer' in value &&
    typeof value.arrayBuffer === 'function'
  );
}

/**
 * Validation messages for an uploaded video, empty when acceptable
 */
export function validateUpload(file: UploadedFile | undefined, maxUploadMb: number): string[] {
  if (!file) return [`${UPLOAD_FIELD}: No file was submitted.`];

  const problems: string[] = [];
  if (file.type && file.type !== UPLOAD_CONTENT_TYPE) {
    problems.push(`${UPLOAD_FIELD}: File must be an MP4 video`);
  }
  if (!file.name.toLowerCase().endsWith(UPLOAD_EXTENSION)) {
    problems.push(`${UPLOAD_FIELD}: File must have ${UPLOAD_EXTENSION} extension`);
  }
  if (file.size > maxUploadMb * 1024 * 1024) {
    problems.push(`${UPLOAD_FIELD}: File exceeds the ${maxUploadMb} MB upload limit`);
  }
  return problems;
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
}

/**
 * Link to another page of the list, or null. Page 1 drops the query parameter.
 */
export function pageLink(requestUrl: string, page: number | null): string | null {
  if (page === null) return null;
  const url = new URL(requestUrl);
  if (page === 1) {
    url.searchParams.delete('page');
  } else {
    url.searchParams.set('page', String(page));
  }
  return url.toString();
}

/**
 * Aborts when the client goes away or the request budget runs out
 */
function requestSignal(c: Context, timeoutMs: number): AbortSignal {
  return AbortSignal.any([c.req.raw.signal, AbortSignal.timeout(timeoutMs)]);
}

async function readVideoUrl(c: Context): Promise<string> {
  try {
    const body: unknown = await c.req.json();
    if (typeof body === 'object' && body !== null && 'video_url' in body && typeof body.video_url === 'string') {
      return body.video_url;
    }
    return '';
  } catch {
    return '';
  }
}

/**
 * 400 for a request that failed validation, recorded with its messages
 */
async function rejectRequest(c: Context, error: ZodError, store: AnalysisRepository) {
  const details = formatIssues(error);
  await store.saveFailure(await readVideoUrl(c), details);
  return c.json({ error: 'Invalid request', details }, 400);
}

// --- OpenAPI Route Definitions ---

const analysisFailedResponse = {
  description: 'Invalid request or analysis failed',
  content: { 'application/json': { schema: ErrorResponseSchema } },
};

const unexpectedErrorResponse = {
  description: 'Unexpected error during analysis',
  content: { 'application/json': { schema: ErrorResponseSchema } },
};

const analyzeYoutubeRoute = createRoute({
  method: 'post',
  path: '/youtube',
  tags: ['Analysis'],
  summary: 'Analyze a YouTube video',
  description:
    'Downloads the audio, transcribes it, classifies sentiment and tone, and extracts three key points. Runs synchronously.',
  request: {
    body: {
      required: true,
      content: { 'application/json': { schema: AnalyzeYoutubeRequestSchema } },
    },
  },
  responses: {
    201: {
      description: 'Analysis created',
      content: { 'application/json': { schema: AnalysisResponseSchema } },
    },
    400: analysisFailedResponse,
    500: unexpectedErrorResponse,
  },
});

const analyzeUploadRoute = createRoute({
  method: 'post',
  path: '/upload',
  tags: ['Analysis'],
  summary: 'Analyze an uploaded MP4 video',
  description: `multipart/form-data with the file in the \`${UPLOAD_FIELD}\` field. Only ${UPLOAD_EXTENSION} files are accepted.`,
  responses: {
    201: {
      description: 'Analysis created',
      content: { 'application/json': { schema: AnalysisResponseSchema } },
    },
    400: analysisFailedResponse,
    500: unexpectedErrorResponse,
  },
});

const listAnalysesRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Analysis'],
  summary: 'List analyses',
  description: 'Stored analyses, newest first.',
  request: { query: PageQuerySchema },
  responses: {
    200: {
      description: 'One page of analyses',
      content: { 'application/json': { schema: AnalysisListSchema } },
    },
    404: {
      description: 'Page out of range',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

const getAnalysisRoute = createRoute({
  method: 'get',
  path: '/{id}',
  tags: ['Analysis'],
  summary: 'Get an analysis',
  request: { params: AnalysisIdParamSchema },
  responses: {
    200: {
      description: 'The analysis',
      content: { 'application/json': { schema: AnalysisResponseSchema } },
    },
    404: {
      description: 'Analysis not found',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

// --- Route Handlers ---

export function createAnalyzeRoutes(deps: AnalyzeRouteDeps): OpenAPIHono {
  const { analyzer, store, config } = deps;
  const analyze = new OpenAPIHono();

  /**
   * POST /analyze/youtube
   * Rejected requests are recorded together with their validation errors.
   */
  analyze.openapi(
    analyzeYoutubeRoute,
    async (c) => {
      const { video_url } = c.req.valid('json');

      try {
        const outcome = await analyzer.analyze(
          { kind: 'remote', url: video_url },
          { signal: requestSignal(c, config.timeouts.requestMs) }
        );

        if (outcome.state.status !== 'success' || !outcome.record) {
          return c.json({ error: 'Video analysis failed', details: [...outcome.state.errors] }, 400);
        }
        return c.json(toAnalysisResponse(outcome.record), 201);
      } catch (error) {
        logger.error('Unexpected error during analysis', error instanceof Error ? error : undefined);
        await store.saveFailure(video_url, [errorMessage(error)]);
        return c.json({ error: 'Unexpected error during analysis', details: errorMessage(error) }, 500);
      }
    },
    (result, c) => {
      if (!result.success) {
        return rejectRequest(c, result.error, store);
      }
    }
  );

  /**
   * POST /analyze/upload
   * The file is written to a temporary directory removed after the run.
   */
  analyze.openapi(analyzeUploadRoute, async (c) => {
    const body = await c.req.parseBody();
    const part: unknown = body[UPLOAD_FIELD];
    const file = isUploadedFile(part) ? part : undefined;

    const problems = validateUpload(file, config.server.maxUploadMb);
    if (!file || problems.length > 0) {
      await store.saveFailure(UPLOAD_SENTINEL, problems);
      return c.json({ error: 'Invalid upload', details: problems }, 400);
    }

    try {
      const outcome = await withTempDir('clipsense-upload-', async (dir) => {
        const videoPath = path.join(dir, sanitizeFilename(file.name));
        await fs.writeFile(videoPath, Buffer.from(await file.arrayBuffer()));
        return analyzer.analyze(
          { kind: 'upload', path: videoPath },
          { signal: requestSignal(c, config.timeouts.requestMs) }
        );
      });

      if (outcome.state.status !== 'success' || !outcome.record) {
        return c.json({ error: 'Video analysis failed', details: [...outcome.state.errors] }, 400);
      }
      return c.json(toAnalysisResponse(outcome.record), 201);
    } catch (error) {
      logger.error('Unexpected error during analysis', error instanceof Error ? error : undefined);
      await store.saveFailure(UPLOAD_SENTINEL, [errorMessage(error)]);
      return c.json({ error: 'Unexpected error during analysis', details: errorMessage(error) }, 500);
    }
  });

  /**
   * GET /analyze?page=N
   */
  analyze.openapi(
    listAnalysesRoute,
    async (c) => {
      const { page } = c.req.valid('query');
      const result = await store.list(page, config.server.pageSize);

      if (page > result.totalPages) {
        return c.json({ error: 'Invalid page.' }, 404);
      }

      return c.json(
        {
          count: result.count,
          next: pageLink(c.req.url, page < result.totalPages ? page + 1 : null),
          previous: pageLink(c.req.url, page > 1 ? page - 1 : null),
          results: result.results.map(toAnalysisResponse),
        },
        200
      );
    },
    (result, c) => {
      if (!result.success) {
        return c.json({ error: 'Invalid page.' }, 404);
      }
    }
  );

  /**
   * GET /analyze/:id
   */
  analyze.openapi(getAnalysisRoute, async (c) => {
    const { id } = c.req.valid('param');
    const record = await store.get(id);

    if (!record) {
      return c.json({ error: 'Not Found' }, 404);
    }
    return c.json(toAnalysisResponse(record), 200);
  });

  return analyze;
}
