/**
 * VideoAnalyzer - wires configuration, providers and the workflow, and
 * persists each finished run.
 */

import { Config } from '../types/config.js';
import { VideoInput } from '../types/index.js';
import { MediaAudioSource } from '../providers/audio-source.js';
import { WhisperProvider } from '../providers/whisper.js';
import { AIProvider } from '../providers/ai.js';
import { ConfigManager } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { AnalysisRecord, AnalysisRepository, getAnalysisStore } from '../api/store/analysis-store.js';
import { FlowController } from './pipeline/flow-controller.js';
import { createVideoAnalysisWorkflow } from './pipeline/workflow.js';
import { WorkflowState } from './pipeline/state.js';
import { StageListener, StageTrace, WorkflowProviders, WorkflowSettings } from './pipeline/types.js';

export interface AnalyzeOptions {
  signal?: AbortSignal;
  onStage?: StageListener;
}

export interface AnalysisOutcome {
  state: WorkflowState;
  /** Absent when the run was cancelled */
  record?: AnalysisRecord;
  trace: StageTrace[];
  cancelled: boolean;
}

export interface Analyzer {
  analyze(input: VideoInput, options?: AnalyzeOptions): Promise<AnalysisOutcome>;
}

export interface VideoAnalyzerOptions {
  config: Config;
  /** Overrides for any of the default providers */
  providers?: Partial<WorkflowProviders>;
  repository?: AnalysisRepository;
  apiKey?: string;
}

export function toWorkflowSettings(config: Config): WorkflowSettings {
  return {
    maxTranscriptChars: config.ai.maxTranscriptChars,
    timeouts: {
      downloadMs: config.timeouts.downloadMs,
      transcriptionMs: config.timeouts.transcriptionMs,
      reasoningMs: config.timeouts.reasoningMs,
    },
  };
}

export class VideoAnalyzer implements Analyzer {
  private config: Config;
  private overrides: Partial<WorkflowProviders>;
  private repository: AnalysisRepository;
  private apiKey?: string;
  private controller: FlowController | null = null;

  constructor(options: VideoAnalyzerOptions) {
    this.config = options.config;
    this.overrides = options.providers ?? {};
    this.repository = options.repository ?? getAnalysisStore();
    this.apiKey = options.apiKey ?? ConfigManager.getApiKey();
  }

  async analyze(input: VideoInput, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    const controller = this.getController();
    const trace: StageTrace[] = [];

    const state = await controller.run(input, {
      signal: options.signal,
      onStage: (step) => {
        trace.push(step);
        options.onStage?.(step);
      },
    });

    if (options.signal?.aborted) {
      logger.warn('Analysis cancelled; result not saved', { status: state.status });
      return { state, trace, cancelled: true };
    }

    const record = await this.repository.save(state);
    logger.debug(`Analysis saved: ${record.id} (${record.status})`);

    return { state, record, trace, cancelled: false };
  }

  /**
   * Providers are created on first use, so a missing API key surfaces as
   * an analysis error rather than at startup
   */
  private getController(): FlowController {
    if (!this.controller) {
      this.controller = createVideoAnalysisWorkflow(this.createProviders(), toWorkflowSettings(this.config));
    }
    return this.controller;
  }

  private createProviders(): WorkflowProviders {
    const { ai, whisper } = this.config;
    return {
      audioSource: this.overrides.audioSource ?? new MediaAudioSource(),
      transcriber:
        this.overrides.transcriber ??
        new WhisperProvider(this.apiKey, { model: whisper.model, maxRetries: ai.maxRetries }),
      reasoner:
        this.overrides.reasoner ??
        new AIProvider(this.apiKey, { model: ai.model, temperature: ai.temperature, maxRetries: ai.maxRetries }),
    };
  }
}
