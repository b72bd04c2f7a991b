/**
 * Configuration types
 */

import { z } from 'zod';

// ============================================================
// Zod schemas
// ============================================================

export const AIConfigSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0),
  maxTranscriptChars: z.number().int().min(500).max(100_000).default(5000), // longer transcripts are cut
  maxRetries: z.number().int().min(0).max(10).default(2), // OpenAI client retries; the workflow never retries
});

export const WhisperConfigSchema = z.object({
  model: z.string().default('whisper-1'),
});

export const TimeoutConfigSchema = z.object({
  downloadMs: z.number().int().positive().default(300_000),
  transcriptionMs: z.number().int().positive().default(180_000),
  reasoningMs: z.number().int().positive().default(60_000),
  requestMs: z.number().int().positive().default(600_000), // whole HTTP request
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  pageSize: z.number().int().min(1).max(100).default(10),
  maxUploadMb: z.number().min(1).max(2048).default(200),
});

export const LogConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export const ConfigSchema = z.object({
  ai: AIConfigSchema.default({}),
  whisper: WhisperConfigSchema.default({}),
  timeouts: TimeoutConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

/** Config file contents: every section and field optional, no defaults filled in */
export const PartialConfigSchema = z.object({
  ai: AIConfigSchema.partial().optional(),
  whisper: WhisperConfigSchema.partial().optional(),
  timeouts: TimeoutConfigSchema.partial().optional(),
  server: ServerConfigSchema.partial().optional(),
  log: LogConfigSchema.partial().optional(),
});

// ============================================================
// Inferred types
// ============================================================

export type AIConfig = z.infer<typeof AIConfigSchema>;
export type WhisperConfig = z.infer<typeof WhisperConfigSchema>;
export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type PartialConfig = z.infer<typeof PartialConfigSchema>;


// ============================================================
// CLI options
// ============================================================

export interface CLIOptions {
  model?: string;
  timeoutSeconds?: number;
  port?: number;
  verbose?: boolean;
}
