/**
 * Shared workflow state threaded through every stage.
 *
 * Updates never mutate: `applyUpdate` returns a new record, so a failing
 * stage cannot erase what earlier stages produced.
 */

import {
  AnalysisResult,
  KeyPoints,
  Sentiment,
  UPLOAD_SENTINEL,
  VideoInput,
  WorkflowStatus,
} from '../../types/index.js';
import type { HaltUpdate, StageUpdate } from './types.js';

export interface WorkflowInput {
  /** Remote URL, or `local-upload` for uploaded files */
  readonly videoUrl: string;
  /** Present only for uploads */
  readonly videoPath?: string;
}

/**
 * Every field a stage can produce
 */
export interface WorkflowOutputs {
  transcript: string;
  title: string;
  /** Whole seconds */
  durationSeconds: number;
  /** ISO 639-1, '' when undetected */
  languageCode: string;
  sentiment: Sentiment;
  /** 0 = very negative, 1 = very positive */
  sentimentScore: number;
  tone: string;
  keyPoints: KeyPoints;
  finalResult: AnalysisResult;
}

export type OutputField = keyof WorkflowOutputs;

export interface WorkflowState extends WorkflowInput, Readonly<Partial<WorkflowOutputs>> {
  readonly errors: readonly string[];
  readonly status: WorkflowStatus;
}

/** State known to carry the fields `K` */
export type WithFields<K extends OutputField> = WorkflowState & Readonly<Pick<WorkflowOutputs, K>>;

export function createInitialState(input: VideoInput): WorkflowState {
  if (input.kind === 'upload') {
    return { videoUrl: UPLOAD_SENTINEL, videoPath: input.path, errors: [], status: 'processing' };
  }
  return { videoUrl: input.url, errors: [], status: 'processing' };
}

/**
 * Rebuild the video input a state was created from
 */
export function toVideoInput(state: WorkflowInput): VideoInput {
  return state.videoPath !== undefined
    ? { kind: 'upload', path: state.videoPath }
    : { kind: 'remote', url: state.videoUrl };
}

/**
 * Empty strings, empty lists and NaN count as absent
 */
export function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (typeof value === 'number') return !Number.isNaN(value);
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export function missingFields(state: WorkflowState, fields: readonly OutputField[]): OutputField[] {
  return fields.filter((field) => !isPresent(state[field]));
}

export function hasFields<K extends OutputField>(state: WorkflowState, fields: readonly K[]): state is WithFields<K> {
  return missingFields(state, fields).length === 0;
}

export function isHalt<O extends Partial<WorkflowOutputs>>(update: StageUpdate<O>): update is HaltUpdate {
  return 'errors' in update;
}

/**
 * Merge a stage update: outputs added or overwritten, errors appended
 */
export function applyUpdate(state: WorkflowState, update: StageUpdate): WorkflowState {
  if (isHalt(update)) {
    return { ...state, errors: [...state.errors, ...update.errors], status: update.status };
  }
  return { ...state, ...update.output, status: update.status };
}
