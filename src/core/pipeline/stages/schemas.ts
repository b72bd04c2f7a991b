/**
 * Response schemas for the reasoning stages
 */

import { z } from 'zod';
import { KeyPoints, SENTIMENTS } from '../../../types/index.js';

export const SentimentResponseSchema = z.object({
  sentiment: z.enum(SENTIMENTS),
  sentiment_score: z.number().min(0).max(1),
  tone: z.string().trim().min(1),
});

export type SentimentResponse = z.infer<typeof SentimentResponseSchema>;

export const KEY_POINT_COUNT = 3;

export const KeyPointsResponseSchema = z.object({
  key_points: z
    .array(z.string().trim().min(1))
    .superRefine((points, ctx) => {
      if (points.length !== KEY_POINT_COUNT) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected exactly ${KEY_POINT_COUNT} key points, received ${points.length}`,
        });
      }
    })
    .transform((points): KeyPoints => [points[0], points[1], points[2]]),
});

export type KeyPointsResponse = z.infer<typeof KeyPointsResponseSchema>;
