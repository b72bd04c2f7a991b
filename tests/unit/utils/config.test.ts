import { ConfigManager } from '../../../src/utils/config.js';
import { ConfigSchema } from '../../../src/types/config.js';

describe('ConfigManager', () => {
  const manager = ConfigManager.getInstance();
  const defaults = ConfigSchema.parse({});

  it('should be a singleton', () => {
    expect(ConfigManager.getInstance()).toBe(manager);
  });

  describe('getApiKey', () => {
    it('should prefer OPENAI_API_KEY', () => {
      expect(ConfigManager.getApiKey({ OPENAI_API_KEY: 'test-key', LLM_API_KEY: 'other-key' })).toBe('test-key');
    });

    it('should accept LLM_API_KEY', () => {
      expect(ConfigManager.getApiKey({ LLM_API_KEY: 'other-key' })).toBe('other-key');
    });

    it('should return undefined for empty values', () => {
      expect(ConfigManager.getApiKey({ OPENAI_API_KEY: '' })).toBeUndefined();
    });
  });

  describe('merge', () => {
    it('should override only the given fields', () => {
      const merged = manager.merge(defaults, { ai: { model: 'custom' }, server: { pageSize: 5 } });

      expect(merged.ai).toEqual({ ...defaults.ai, model: 'custom' });
      expect(merged.server).toEqual({ ...defaults.server, pageSize: 5 });
      expect(merged.timeouts).toEqual(defaults.timeouts);
    });
  });

  describe('applyEnv', () => {
    it('should read model, port and log level', () => {
      const config = manager.applyEnv(defaults, { LLM_MODEL_NAME: 'env-model', PORT: '8080', LOG_LEVEL: 'debug' });

      expect(config.ai.model).toBe('env-model');
      expect(config.server.port).toBe(8080);
      expect(config.log.level).toBe('debug');
    });

    it('should ignore invalid values', () => {
      const config = manager.applyEnv(defaults, { PORT: 'abc', LOG_LEVEL: 'loud' });

      expect(config).toEqual(defaults);
    });
  });

  describe('applyCLIOptions', () => {
    it('should map options onto the config', () => {
      const config = manager.applyCLIOptions(defaults, { model: 'cli-model', timeoutSeconds: 90, verbose: true });

      expect(config.ai.model).toBe('cli-model');
      expect(config.timeouts.requestMs).toBe(90_000);
      expect(config.log.level).toBe('debug');
    });
  });
});
