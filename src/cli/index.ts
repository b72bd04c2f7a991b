/**
 * CLI entry point
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { configCommand } from './commands/config.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('clipsense')
  .description('Transcribe a video and report its sentiment, tone and three key points')
  .version('0.1.0');

program
  .command('analyze')
  .description('Analyze a YouTube URL or a local .mp4 file')
  .argument('<source>', 'YouTube URL or path to an .mp4 file')
  .option('--json', 'Print the result as JSON')
  .option('--verbose', 'Verbose logging and stage timings')
  .option('-m, --model <name>', 'Chat model used for analysis')
  .option('-t, --timeout <seconds>', 'Abort the analysis after this many seconds')
  .action(analyzeCommand);

// Sub commands
program.addCommand(serveCommand());
program.addCommand(configCommand());

export { program };

export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}
