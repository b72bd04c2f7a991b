/**
 * Stage contract for the video analysis workflow.
 * Stages read the shared state and return an update; the controller merges it.
 */

import type { TimeoutConfig } from '../../types/config.js';
import type { AdvanceStatus, HaltStatus, WorkflowStatus } from '../../types/index.js';
import type { AudioSource, StructuredReasoningProvider, TranscriptionProvider } from '../../providers/types.js';
import type { OutputField, WithFields, WorkflowOutputs } from './state.js';

/**
 * Collaborators injected at construction
 */
export interface WorkflowProviders {
  readonly audioSource: AudioSource;
  readonly transcriber: TranscriptionProvider;
  readonly reasoner: StructuredReasoningProvider;
}

export interface WorkflowSettings {
  /** Transcript characters sent to the reasoning provider */
  maxTranscriptChars: number;
  timeouts: Pick<TimeoutConfig, 'downloadMs' | 'transcriptionMs' | 'reasoningMs'>;
}

export interface StageContext {
  readonly providers: WorkflowProviders;
  readonly settings: WorkflowSettings;
  readonly signal?: AbortSignal;
}

export interface AdvanceUpdate<O extends Partial<WorkflowOutputs> = Partial<WorkflowOutputs>> {
  status: AdvanceStatus;
  output: O;
}

export interface HaltUpdate {
  status: HaltStatus;
  errors: readonly [string, ...string[]];
}

export type StageUpdate<O extends Partial<WorkflowOutputs> = Partial<WorkflowOutputs>> = AdvanceUpdate<O> | HaltUpdate;

/**
 * A workflow stage. `requires` lists the state fields that must be present
 * before `run` is called; `run` never throws.
 */
export interface WorkflowStage<
  Req extends OutputField = OutputField,
  O extends Partial<WorkflowOutputs> = Partial<WorkflowOutputs>,
> {
  /** Stage name used in logs, traces and error messages */
  readonly name: string;
  readonly requires: readonly Req[];
  run(state: WithFields<Req>, context: StageContext): Promise<StageUpdate<O>>;
}

export enum Transition {
  Continue = 'continue',
  Halt = 'halt',
}

export interface StageTrace {
  name: string;
  ms: number;
  status: WorkflowStatus;
}

export type StageListener = (trace: StageTrace) => void;

export function advance<O extends Partial<WorkflowOutputs>>(status: AdvanceStatus, output: O): AdvanceUpdate<O> {
  return { status, output };
}

export function halt(status: HaltStatus, error: string, ...more: string[]): HaltUpdate {
  return { status, errors: [error, ...more] };
}
