import { ConfigSchema, PartialConfigSchema, TimeoutConfigSchema } from '../../../src/types/config.js';

describe('Config Schemas', () => {
  describe('ConfigSchema', () => {
    it('should have correct defaults', () => {
      expect(ConfigSchema.parse({})).toEqual({
        ai: { provider: 'openai', model: 'gpt-4o-mini', temperature: 0, maxTranscriptChars: 5000, maxRetries: 2 },
        whisper: { model: 'whisper-1' },
        timeouts: { downloadMs: 300_000, transcriptionMs: 180_000, reasoningMs: 60_000, requestMs: 600_000 },
        server: { port: 3000, pageSize: 10, maxUploadMb: 200 },
        log: { level: 'info' },
      });
    });

    it('should reject a transcript limit below the minimum', () => {
      expect(() => ConfigSchema.parse({ ai: { maxTranscriptChars: 10 } })).toThrow();
    });

    it('should reject an invalid port', () => {
      expect(() => ConfigSchema.parse({ server: { port: 70000 } })).toThrow();
    });
  });

  describe('TimeoutConfigSchema', () => {
    it('should reject non-positive timeouts', () => {
      expect(TimeoutConfigSchema.safeParse({ reasoningMs: 0 }).success).toBe(false);
    });
  });

  describe('PartialConfigSchema', () => {
    it('should not fill in defaults', () => {
      expect(PartialConfigSchema.parse({ ai: { model: 'custom' } })).toEqual({ ai: { model: 'custom' } });
    });
  });
});
