/**
 * Configuration manager
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import {
  Config,
  ConfigSchema,
  CLIOptions,
  PartialConfig,
  PartialConfigSchema,
} from '../types/config.js';
import { errorMessage } from '../types/index.js';
import { logger, isLogLevel } from './logger.js';

dotenvConfig();

export class ConfigManager {
  private static instance: ConfigManager;

  private constructor() {}

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Load configuration.
   * Priority: CLI options > environment > project file > global file > defaults
   */
  async load(cliOptions?: CLIOptions): Promise<Config> {
    let config: Config = ConfigSchema.parse({});

    const globalPath = ConfigManager.getGlobalConfigPath();
    if (await this.fileExists(globalPath)) {
      config = this.merge(config, await this.loadYaml(globalPath));
      logger.debug(`Loaded global config: ${globalPath}`);
    }

    const projectPath = ConfigManager.getProjectConfigPath();
    if (await this.fileExists(projectPath)) {
      config = this.merge(config, await this.loadYaml(projectPath));
      logger.debug(`Loaded project config: ${projectPath}`);
    }

    config = this.applyEnv(config, process.env);

    if (cliOptions) {
      config = this.applyCLIOptions(config, cliOptions);
    }

    const validated = ConfigSchema.parse(config);
    logger.setLevel(validated.log.level);

    return validated;
  }

  static getProjectConfigPath(): string {
    return path.join(process.cwd(), 'clipsense.config.yaml');
  }

  static getGlobalConfigPath(): string {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return path.join(home, '.config', 'clipsense', 'config.yaml');
  }

  /**
   * OpenAI key from the environment (`LLM_API_KEY` is accepted as an alias)
   */
  static getApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env.OPENAI_API_KEY || env.LLM_API_KEY || undefined;
  }

  async createConfigFile(filePath: string, config?: PartialConfig): Promise<void> {
    const defaultConfig = ConfigSchema.parse(config || {});
    const yamlContent = yaml.stringify(defaultConfig);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, yamlContent, 'utf-8');
    logger.success(`Config file created: ${filePath}`);
  }

  private async loadYaml(filePath: string): Promise<PartialConfig> {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = yaml.parse(content);
      const result = PartialConfigSchema.safeParse(parsed ?? {});
      if (!result.success) {
        logger.warn(`Ignoring invalid config file: ${filePath}`, { issues: result.error.issues });
        return {};
      }
      return result.data;
    } catch (error) {
      logger.warn(`Failed to read config file: ${filePath}`, { reason: errorMessage(error) });
      return {};
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  merge(base: Config, override: PartialConfig): Config {
    return {
      ai: { ...base.ai, ...override.ai },
      whisper: { ...base.whisper, ...override.whisper },
      timeouts: { ...base.timeouts, ...override.timeouts },
      server: { ...base.server, ...override.server },
      log: { ...base.log, ...override.log },
    };
  }

  applyEnv(config: Config, env: NodeJS.ProcessEnv): Config {
    const result = { ...config };

    if (env.LLM_MODEL_NAME) {
      result.ai = { ...result.ai, model: env.LLM_MODEL_NAME };
    }
    if (env.PORT) {
      const port = parseInt(env.PORT, 10);
      if (!Number.isNaN(port)) {
        result.server = { ...result.server, port };
      }
    }
    if (isLogLevel(env.LOG_LEVEL)) {
      result.log = { ...result.log, level: env.LOG_LEVEL };
    }

    return result;
  }

  applyCLIOptions(config: Config, options: CLIOptions): Config {
    const result = { ...config };

    if (options.model) {
      result.ai = { ...result.ai, model: options.model };
    }
    if (options.timeoutSeconds) {
      result.timeouts = { ...result.timeouts, requestMs: options.timeoutSeconds * 1000 };
    }
    if (options.port) {
      result.server = { ...result.server, port: options.port };
    }
    if (options.verbose) {
      result.log = { ...result.log, level: 'debug' };
    }

    return result;
  }
}

export const configManager = ConfigManager.getInstance();
