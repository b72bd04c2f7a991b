import { z } from '@hono/zod-openapi';
import { SENTIMENTS } from '../../types/index.js';
import { isValidYouTubeUrl } from '../../utils/url.js';
import type { AnalysisRecord } from '../store/analysis-store.js';

// --- Requests ---

export const AnalyzeYoutubeRequestSchema = z
  .object({
    video_url: z
      .string()
      .url()
      .refine(isValidYouTubeUrl, { message: 'URL must be a valid YouTube video URL' })
      .openapi({ example: 'https://www.youtube.com/watch?v=abcdefghijk' }),
  })
  .openapi('AnalyzeYoutubeRequest');

export type AnalyzeYoutubeRequest = z.infer<typeof AnalyzeYoutubeRequestSchema>;

export const AnalysisIdParamSchema = z.object({
  id: z.string().min(1).openapi({ param: { name: 'id', in: 'path' } }),
});

export const PageQuerySchema = z.object({
  page: z.coerce
    .number()
    .int()
    .min(1)
    .default(1)
    .openapi({ param: { name: 'page', in: 'query' }, example: 1 }),
});

// --- Responses ---

export const VideoMetadataSchema = z
  .object({
    title: z.string().nullable(),
    duration_seconds: z.number().int().nullable(),
    language_code: z.string().nullable(),
  })
  .openapi('VideoMetadata');

export const AnalysisSchema = z
  .object({
    sentiment: z.enum(SENTIMENTS).nullable(),
    sentiment_score: z.number().min(0).max(1).nullable(),
    tone: z.string().nullable(),
    key_points: z.array(z.string()).nullable(),
  })
  .openapi('Analysis');

export const AnalysisResponseSchema = z
  .object({
    id: z.string().uuid(),
    video_metadata: VideoMetadataSchema,
    analysis: AnalysisSchema,
  })
  .openapi('AnalysisResponse');

export type AnalysisResponse = z.infer<typeof AnalysisResponseSchema>;

export const AnalysisListSchema = z
  .object({
    count: z.number().int(),
    next: z.string().nullable(),
    previous: z.string().nullable(),
    results: z.array(AnalysisResponseSchema),
  })
  .openapi('AnalysisList');

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    details: z.union([z.array(z.string()), z.string()]).optional(),
  })
  .openapi('ErrorResponse');

const DependencyStatusSchema = z.enum(['healthy', 'unhealthy']);

export const HealthStatusSchema = z
  .object({
    status: z.enum(['healthy', 'degraded', 'unhealthy']),
    version: z.string(),
    timestamp: z.string(),
    dependencies: z.object({
      ffmpeg: DependencyStatusSchema,
      ytdlp: DependencyStatusSchema,
      openai: DependencyStatusSchema,
    }),
  })
  .openapi('HealthStatus');

export type HealthStatus = z.infer<typeof HealthStatusSchema>;

/**
 * External representation of a stored analysis
 */
export function toAnalysisResponse(record: AnalysisRecord): AnalysisResponse {
  return {
    id: record.id,
    video_metadata: {
      title: record.title,
      duration_seconds: record.durationSeconds,
      language_code: record.languageCode,
    },
    analysis: {
      sentiment: record.sentiment,
      sentiment_score: record.sentimentScore,
      tone: record.tone,
      key_points: record.keyPoints,
    },
  };
}
