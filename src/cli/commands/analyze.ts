/**
 * Analyze command
 */

import ora from 'ora';
import chalk from 'chalk';
import * as path from 'path';
import { AnalysisOutcome, VideoAnalyzer } from '../../core/orchestrator.js';
import type { WorkflowState } from '../../core/pipeline/state.js';
import { InMemoryAnalysisStore } from '../../api/store/analysis-store.js';
import { WhisperProvider } from '../../providers/whisper.js';
import { configManager } from '../../utils/config.js';
import { fileExists, formatTimestamp } from '../../utils/file.js';
import { isHttpUrl, isValidYouTubeUrl } from '../../utils/url.js';
import { CLIOptions } from '../../types/config.js';
import { ClipsenseError, ErrorCode, VideoInput, errorMessage } from '../../types/index.js';
import { UPLOAD_EXTENSION } from '../../constants.js';

export interface AnalyzeCommandOptions {
  json?: boolean;
  verbose?: boolean;
  model?: string;
  timeout?: string;
}

/**
 * A YouTube URL or a path to a local .mp4 file
 */
export async function resolveVideoInput(source: string): Promise<VideoInput> {
  if (isHttpUrl(source)) {
    if (!isValidYouTubeUrl(source)) {
      throw new ClipsenseError(ErrorCode.INVALID_URL, `Invalid YouTube URL: ${source}`);
    }
    return { kind: 'remote', url: source };
  }

  const filePath = path.resolve(source);
  if (path.extname(filePath).toLowerCase() !== UPLOAD_EXTENSION) {
    throw new ClipsenseError(ErrorCode.INVALID_UPLOAD, `File must have ${UPLOAD_EXTENSION} extension: ${source}`);
  }
  if (!(await fileExists(filePath))) {
    throw new ClipsenseError(ErrorCode.INVALID_UPLOAD, `File not found: ${source}`);
  }
  return { kind: 'upload', path: filePath };
}

export function parseTimeoutSeconds(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ClipsenseError(ErrorCode.INVALID_OPTION, `Invalid timeout: ${value}`);
  }
  return seconds;
}

function printReport(state: WorkflowState, elapsedSeconds: string): void {
  const result = state.finalResult;
  if (!result) return;

  const { video_metadata: meta, analysis } = result;
  console.log(chalk.green('\n✓ Analysis complete!\n'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(`  ${chalk.bold.blue('Title')}     ${meta.title || chalk.gray('(untitled)')}`);
  console.log(`  ${chalk.bold.blue('Duration')}  ${formatTimestamp(meta.duration_seconds)}`);
  console.log(`  ${chalk.bold.blue('Language')}  ${meta.language_code || chalk.gray('unknown')}`);
  console.log(chalk.dim('─'.repeat(50)));
  console.log(`  ${chalk.bold('Sentiment')} ${analysis.sentiment} (${analysis.sentiment_score.toFixed(2)})`);
  console.log(`  ${chalk.bold('Tone')}      ${analysis.tone}`);
  console.log(`  ${chalk.bold('Key points')}`);
  analysis.key_points.forEach((point, i) => {
    console.log(`    ${i + 1}. ${point}`);
  });
  console.log(chalk.dim('─'.repeat(50)));
  console.log(`  ${chalk.bold('Time')}      ${elapsedSeconds}s`);
  if (meta.duration_seconds > 0) {
    const cost = WhisperProvider.estimateCost(meta.duration_seconds);
    console.log(`  ${chalk.bold('Whisper')}   ~${WhisperProvider.formatCost(cost)}`);
  }
  console.log();
}

export async function analyzeCommand(source: string, options: AnalyzeCommandOptions): Promise<void> {
  const spinner = ora({ text: 'Initializing...', isEnabled: !options.json }).start();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const cliOptions: CLIOptions = {
      model: options.model,
      timeoutSeconds: parseTimeoutSeconds(options.timeout),
      verbose: options.verbose,
    };

    spinner.text = 'Loading configuration...';
    const config = await configManager.load(cliOptions);
    const input = await resolveVideoInput(source);

    const analyzer = new VideoAnalyzer({ config, repository: new InMemoryAnalysisStore() });
    const timer = setTimeout(() => controller.abort(), config.timeouts.requestMs);

    spinner.text = 'Extracting audio...';
    const startTime = Date.now();
    const labels: Record<string, string> = {
      extraction: 'Analyzing sentiment...',
      sentiment: 'Extracting key points...',
    };

    let outcome: AnalysisOutcome;
    try {
      outcome = await analyzer.analyze(input, {
        signal: controller.signal,
        onStage: (trace) => {
          spinner.text = labels[trace.name] ?? spinner.text;
        },
      });
    } finally {
      clearTimeout(timer);
    }
    spinner.stop();

    const { state } = outcome;
    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);

    if (options.verbose) {
      for (const step of outcome.trace) {
        console.error(chalk.gray(`  [${step.name}] ${step.ms}ms -> ${step.status}`));
      }
    }

    if (state.status !== 'success') {
      if (options.json) {
        console.log(JSON.stringify({ error: 'Video analysis failed', details: state.errors }, null, 2));
      } else {
        console.error(chalk.red('\n✖ Video analysis failed'));
        for (const message of state.errors) {
          console.error(chalk.red(`  • ${message}`));
        }
      }
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(state.finalResult, null, 2));
    } else {
      printReport(state, elapsedSeconds);
    }
  } catch (error) {
    spinner.stop();
    console.error(chalk.red(`\n✖ Error: ${errorMessage(error)}`));

    if (options.verbose && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }

    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
