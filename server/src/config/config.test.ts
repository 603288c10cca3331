import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      maxParticipants: 8,
      buffer: { maxDelayMs: 500, confidenceThreshold: 0.8, cleanupDelayMs: 2000 },
      transcripts: { enableInterimResults: true, silenceGapMs: 650 },
      translationTimeoutMs: 3000,
      geminiApiKey: undefined,
      elevenLabsApiKey: undefined,
    });
  });

  it('coerces values and treats blank keys as unset', () => {
    const config = loadConfig({
      PORT: '8080',
      MAX_DELAY_MS: '300',
      CONFIDENCE_THRESHOLD: '0.65',
      ENABLE_INTERIM_RESULTS: '0',
      GEMINI_API_KEY: 'test-key',
      ELEVENLABS_API_KEY: '   ',
    });

    expect(config.port).toBe(8080);
    expect(config.buffer.maxDelayMs).toBe(300);
    expect(config.buffer.confidenceThreshold).toBe(0.65);
    expect(config.transcripts.enableInterimResults).toBe(false);
    expect(config.geminiApiKey).toBe('test-key');
    expect(config.elevenLabsApiKey).toBeUndefined();
  });

  it('rejects out-of-range values with the offending keys', () => {
    try {
      loadConfig({ CONFIDENCE_THRESHOLD: '1.5', MAX_PARTICIPANTS: '1' });
      expect.unreachable('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
        'CONFIDENCE_THRESHOLD',
        'MAX_PARTICIPANTS',
      ]);
    }
  });

  it('warns when segments would be cleaned up before their deadline', () => {
    loadConfig({ MAX_DELAY_MS: '800', SEGMENT_CLEANUP_MS: '400' });

    expect(console.warn).toHaveBeenCalledWith(
      '[Config] SEGMENT_CLEANUP_MS (400) is shorter than MAX_DELAY_MS (800)'
    );
  });
});
