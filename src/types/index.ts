/**
 * Domain types shared by the workflow engine, providers, API and CLI
 */

// ============================================================
// Video input
// ============================================================

/** Placeholder stored in `videoUrl` when the video came from an upload */
export const UPLOAD_SENTINEL = 'local-upload';

export type VideoInput =
  | { kind: 'remote'; url: string }
  | { kind: 'upload'; path: string };

// ============================================================
// Analysis values
// ============================================================

export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

/** Exactly three key points, in order of importance */
export type KeyPoints = readonly [string, string, string];

/**
 * Externally shaped result of a successful run.
 * Keys are snake_case because this object is the HTTP contract.
 */
export interface AnalysisResult {
  video_metadata: {
    title: string;
    duration_seconds: number;
    language_code: string;
  };
  analysis: {
    sentiment: Sentiment;
    sentiment_score: number;
    tone: string;
    key_points: KeyPoints;
  };
}

// ============================================================
// Workflow status
// ============================================================

export type AdvanceStatus = 'extracted' | 'analyzed' | 'success';
export type HaltStatus = 'failed' | 'skipped';
export type WorkflowStatus = 'processing' | AdvanceStatus | HaltStatus;


export function isHaltStatus(status: WorkflowStatus): status is HaltStatus {
  return status === 'failed' || status === 'skipped';
}

// ============================================================
// Collaborator payloads
// ============================================================

export interface AudioAsset {
  audioPath: string;
  title?: string;
  durationSeconds?: number;
  languageCode?: string;
}

export interface TranscriptionResult {
  text: string;
  /** Best-effort language as reported by the provider (name or code) */
  language: string;
}

// ============================================================
// Errors
// ============================================================

export enum ErrorCode {
  INVALID_URL = 'INVALID_URL',
  INVALID_UPLOAD = 'INVALID_UPLOAD',
  INVALID_OPTION = 'INVALID_OPTION',
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  INSUFFICIENT_AUDIO = 'INSUFFICIENT_AUDIO',
  TRANSCRIPTION_UNAVAILABLE = 'TRANSCRIPTION_UNAVAILABLE',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  PROVIDER_TIMEOUT = 'PROVIDER_TIMEOUT',
  SCHEMA_VIOLATION = 'SCHEMA_VIOLATION',
  API_KEY_MISSING = 'API_KEY_MISSING',
  CANCELLED = 'CANCELLED',
}

export class ClipsenseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ClipsenseError';
  }
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
