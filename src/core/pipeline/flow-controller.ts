/**
 * FlowController - runs the stages in order and halts on the first failure
 */

import { errorMessage, isHaltStatus, VideoInput } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { applyUpdate, createInitialState, hasFields, missingFields, WorkflowState } from './state.js';
import {
  halt,
  StageContext,
  StageListener,
  StageTrace,
  StageUpdate,
  Transition,
  WorkflowProviders,
  WorkflowSettings,
  WorkflowStage,
} from './types.js';

export interface FlowControllerOptions {
  providers: WorkflowProviders;
  settings: WorkflowSettings;
  stages: readonly WorkflowStage[];
  onStage?: StageListener;
}

export interface RunOptions {
  signal?: AbortSignal;
  onStage?: StageListener;
}

/**
 * Continue only while no error has been recorded and the status is not terminal
 */
export function evaluateTransition(state: WorkflowState): Transition {
  if (state.errors.length > 0) return Transition.Halt;
  if (state.status === 'success' || isHaltStatus(state.status)) return Transition.Halt;
  return Transition.Continue;
}

export class FlowController {
  private providers: WorkflowProviders;
  private settings: WorkflowSettings;
  private stages: readonly WorkflowStage[];
  private onStage?: StageListener;

  constructor(options: FlowControllerOptions) {
    this.providers = options.providers;
    this.settings = options.settings;
    this.stages = options.stages;
    this.onStage = options.onStage;
  }

  async run(input: VideoInput, options: RunOptions = {}): Promise<WorkflowState> {
    const context: StageContext = {
      providers: this.providers,
      settings: this.settings,
      signal: options.signal,
    };

    let state = createInitialState(input);

    for (const stage of this.stages) {
      const startTime = Date.now();
      const update = await this.step(stage, state, context);
      state = applyUpdate(state, update);

      const trace: StageTrace = { name: stage.name, ms: Date.now() - startTime, status: state.status };
      logger.debug(`[stage] ${trace.name}: ${trace.ms}ms -> ${trace.status}`);
      this.notify(this.onStage, trace);
      this.notify(options.onStage, trace);

      if (evaluateTransition(state) === Transition.Halt) break;
    }

    return state;
  }

  /**
   * Listener failures are logged and never change the run
   */
  private notify(listener: StageListener | undefined, trace: StageTrace): void {
    if (!listener) return;
    try {
      listener(trace);
    } catch (error) {
      logger.warn(`Stage listener failed after ${trace.name} stage`, { reason: errorMessage(error) });
    }
  }

  private async step(stage: WorkflowStage, state: WorkflowState, context: StageContext): Promise<StageUpdate> {
    if (context.signal?.aborted) {
      return halt('failed', `Workflow cancelled before ${stage.name} stage`);
    }

    if (!hasFields(state, stage.requires)) {
      const [first, ...rest] = missingFields(state, stage.requires).map(
        (field) => `No ${field} available for ${stage.name} stage`
      );
      return halt('skipped', first, ...rest);
    }

    try {
      return await stage.run(state, context);
    } catch (error) {
      logger.error(`Unexpected error in ${stage.name} stage`, error instanceof Error ? error : undefined);
      return halt('failed', `Unexpected error in ${stage.name} stage: ${errorMessage(error)}`);
    }
  }
}
