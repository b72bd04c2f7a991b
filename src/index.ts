/**
 * clipsense - video sentiment and key-point analysis
 *
 * @example
 * ```typescript
 * import { analyze } from 'clipsense';
 *
 * const { state } = await analyze({ kind: 'remote', url: 'https://youtube.com/watch?v=abcdefghijk' });
 * if (state.status === 'success') {
 *   console.log(state.finalResult);
 * } else {
 *   console.error(state.errors);
 * }
 * ```
 */

// Types
export * from './types/index.js';
export * from './types/config.js';

// Core
export * from './core/pipeline/index.js';
export { VideoAnalyzer, toWorkflowSettings } from './core/orchestrator.js';
export type { Analyzer, AnalyzeOptions, AnalysisOutcome, VideoAnalyzerOptions } from './core/orchestrator.js';

// Providers
export type {
  AudioSource,
  CallOptions,
  ReasoningRequest,
  StructuredReasoningProvider,
  TranscriptionProvider,
} from './providers/types.js';
export { MediaAudioSource } from './providers/audio-source.js';
export { YouTubeProvider } from './providers/youtube.js';
export { FFmpegWrapper } from './providers/ffmpeg.js';
export { WhisperProvider } from './providers/whisper.js';
export { AIProvider } from './providers/ai.js';

// API
export { createApp } from './api/app.js';
export { InMemoryAnalysisStore, getAnalysisStore, resetAnalysisStore } from './api/store/analysis-store.js';
export type { AnalysisRecord, AnalysisRepository } from './api/store/analysis-store.js';

// Utils
export { configManager, ConfigManager } from './utils/config.js';
export { logger, Logger } from './utils/logger.js';

// Convenience functions
import { VideoAnalyzer, AnalyzeOptions, AnalysisOutcome } from './core/orchestrator.js';
import { configManager } from './utils/config.js';
import type { CLIOptions } from './types/config.js';
import type { VideoInput } from './types/index.js';

/**
 * Analyze one video with the effective configuration
 */
export async function analyze(
  input: VideoInput,
  options: AnalyzeOptions & CLIOptions = {}
): Promise<AnalysisOutcome> {
  const { signal, onStage, ...cliOptions } = options;
  const config = await configManager.load(cliOptions);
  const analyzer = new VideoAnalyzer({ config });
  return analyzer.analyze(input, { signal, onStage });
}
