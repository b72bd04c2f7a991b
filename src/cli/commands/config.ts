/**
 * Config management command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as yaml from 'yaml';
import { ConfigManager, configManager } from '../../utils/config.js';
import { fileExists } from '../../utils/file.js';
import { errorMessage } from '../../types/index.js';

export function configCommand(): Command {
  const config = new Command('config').description('Manage configuration');

  // clipsense config show
  config
    .command('show')
    .description('Show the effective configuration')
    .action(async () => {
      try {
        const currentConfig = await configManager.load();
        console.log(chalk.bold('\nCurrent configuration:\n'));
        console.log(yaml.stringify(currentConfig));
      } catch (error) {
        console.error(chalk.red(`Failed to load configuration: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // clipsense config init
  config
    .command('init')
    .description('Create a configuration file')
    .option('-g, --global', 'Create the global configuration file')
    .action(async (options: { global?: boolean }) => {
      try {
        const configPath = options.global
          ? ConfigManager.getGlobalConfigPath()
          : ConfigManager.getProjectConfigPath();

        if (await fileExists(configPath)) {
          console.log(chalk.yellow(`Configuration file already exists: ${configPath}`));
          return;
        }

        await configManager.createConfigFile(configPath);
      } catch (error) {
        console.error(chalk.red(`Failed to create configuration file: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // clipsense config path
  config
    .command('path')
    .description('Show configuration file locations')
    .action(() => {
      console.log(chalk.bold('\nConfiguration files:\n'));
      console.log(`  Project: ${ConfigManager.getProjectConfigPath()}`);
      console.log(`  Global:  ${ConfigManager.getGlobalConfigPath()}`);
    });

  return config;
}
