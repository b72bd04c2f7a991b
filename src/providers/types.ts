/**
 * Collaborator contracts consumed by the workflow engine.
 *
 * Implementations report failures by throwing `ClipsenseError`; the stages
 * turn those into workflow errors.
 */

import type { z } from 'zod';
import type { AudioAsset, TranscriptionResult, VideoInput } from '../types/index.js';

/**
 * Per-call controls forwarded to every external call
 */
export interface CallOptions {
  signal?: AbortSignal;
  /** Upper bound for this call; a timeout is reported as `PROVIDER_TIMEOUT` */
  timeoutMs?: number;
}

/**
 * Yields a temporary audio file (inside `workDir`) plus whatever metadata
 * the container or platform exposes. Fails with `SOURCE_UNAVAILABLE`.
 */
export interface AudioSource {
  acquire(input: VideoInput, workDir: string, options?: CallOptions): Promise<AudioAsset>;
}

/**
 * Speech-to-text. Fails with `TRANSCRIPTION_UNAVAILABLE` or `PROVIDER_TIMEOUT`.
 */
export interface TranscriptionProvider {
  transcribe(audioPath: string, options?: CallOptions): Promise<TranscriptionResult>;
}

export interface ReasoningRequest<T> {
  /** Short task name used in logs and error messages */
  task: string;
  system: string;
  user: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Text in, schema-conformant object out. Fails with `SCHEMA_VIOLATION`,
 * `PROVIDER_UNAVAILABLE` or `PROVIDER_TIMEOUT`.
 */
export interface StructuredReasoningProvider {
  generate<T>(request: ReasoningRequest<T>, options?: CallOptions): Promise<T>;
}
