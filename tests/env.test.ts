import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/pipeline/errors';
import { loadConfig } from '../src/pipeline/env';

describe('loadConfig', () => {
  it('applies overrides on top of the environment', () => {
    const config = loadConfig({ outputDir: '/tmp/subs', maxRetries: 5, captionLanguages: ['en'] });
    expect(config.outputDir).toBe('/tmp/subs');
    expect(config.maxRetries).toBe(5);
    expect(config.captionLanguages).toEqual(['en']);
    expect(config.logLevel).toBe('error');
  });

  it('uses the documented defaults', () => {
    const config = loadConfig();
    expect(config.maxUploadBytes).toBe(25 * 1024 * 1024);
    expect(config.chunkSec).toBe(600);
    expect(config.minChunkSec).toBe(1);
    expect(config.transcribeModel).toBe('whisper-1');
  });

  it.each([
    [{ maxRetries: 0 }, 'maxRetries'],
    [{ maxRetries: 1.5 }, 'maxRetries'],
    [{ maxUploadBytes: 0 }, 'maxUploadBytes'],
    [{ chunkSec: -1 }, 'chunkSec'],
    [{ chunkSec: 5, minChunkSec: 10 }, 'minChunkSec'],
    [{ retryBaseMs: -1 }, 'retryBaseMs'],
  ])('rejects %o', (overrides, field) => {
    try {
      loadConfig(overrides);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e).toMatchObject({ details: { field } });
    }
  });
});
