/**
 * HTTP server command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { startServer, installShutdownHandlers } from '../../api/server.js';
import { errorMessage } from '../../types/index.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      try {
        const port = options.port ? parseInt(options.port, 10) : undefined;
        if (port !== undefined && (Number.isNaN(port) || port <= 0)) {
          console.error(chalk.red(`✖ Invalid port: ${options.port}`));
          process.exitCode = 1;
          return;
        }
        installShutdownHandlers(await startServer(port));
      } catch (error) {
        console.error(chalk.red(`✖ Failed to start server: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
