import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { vi, type Mock } from 'vitest';
import type { AudioEncoder } from '../src/pipeline/chunk';
import type { AudioSource } from '../src/pipeline/download';
import { loadConfig, type PipelineConfig } from '../src/pipeline/env';
import type { VideoReference } from '../src/pipeline/types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'yt-transcripts-'));
}

/**
 * Encoder whose output size is proportional to the slice length. Writes a
 * small marker file so chunk paths exist on disk.
 */
export class FakeEncoder implements AudioEncoder {
  calls: Array<{ start: number; duration: number }> = [];

  constructor(
    private readonly totalSec: number,
    private readonly bytesPerSec: number
  ) {}

  async probeDuration(): Promise<number> {
    return this.totalSec;
  }

  async encodeSlice(_audioPath: string, start: number, duration: number, outPath: string): Promise<number> {
    this.calls.push({ start, duration });
    await fs.writeFile(outPath, `slice ${start}+${duration}`);
    return Math.round(duration * this.bytesPerSec);
  }
}

export interface FakeSource extends AudioSource {
  download: Mock<AudioSource['download']>;
}

/** Source that writes a placeholder audio file into the work dir. */
export function fileSource(name: string): FakeSource {
  return {
    name,
    download: vi.fn<AudioSource['download']>(async (videoId, outDir) => {
      await fs.ensureDir(outDir);
      const file = path.join(outDir, `${videoId}.mp3`);
      await fs.writeFile(file, 'fake audio');
      return { ok: true, source: name, path: file };
    }),
  };
}

export function failingSource(name: string, error: string): FakeSource {
  return {
    name,
    download: vi.fn<AudioSource['download']>(async () => ({ ok: false, source: name, error })),
  };
}

export function testConfig(root: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return loadConfig({
    outputDir: path.join(root, 'out'),
    workDir: path.join(root, 'work'),
    saveSubtitle: false,
    keepAudio: false,
    maxRetries: 2,
    retryBaseMs: 0,
    captionLanguages: ['zh-TW'],
    chunkSec: 10,
    minChunkSec: 1,
    maxUploadBytes: 1000,
    transcribeLanguage: null,
    logLevel: 'error',
    logFile: null,
    ...overrides,
  });
}

export const VIDEO: VideoReference = {
  videoId: 'abcDEF12345',
  title: '測試影片標題',
  channelTitle: '測試頻道',
  uploadDate: '20230101',
};
