import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { CaptionsProvider } from '../src/pipeline/captions';
import type { PipelineConfig } from '../src/pipeline/env';
import { CaptionsUnavailableError, MetadataFetchError, TranscriptionApiError } from '../src/pipeline/errors';
import { readSubtitleFile } from '../src/pipeline/export';
import { resolveTranscript, type PipelineDeps } from '../src/pipeline/resolve';
import type { TranscriptionClient } from '../src/pipeline/transcribe';
import type { CaptionLine, TimedText } from '../src/pipeline/types';
import type { MetadataProvider } from '../src/pipeline/ytdlp';
import { FakeEncoder, failingSource, fileSource, makeTempDir, testConfig, VIDEO, type FakeSource } from './helpers';

vi.mock('youtube-transcript', () => ({
  YoutubeTranscript: { fetchTranscript: vi.fn() },
}));

interface Fakes extends PipelineDeps {
  metadata: { fetchMetadata: Mock<MetadataProvider['fetchMetadata']>; listPlaylist: Mock<MetadataProvider['listPlaylist']> };
  captions: { fetch: Mock<CaptionsProvider['fetch']> };
  audioSources: FakeSource[];
  encoder: FakeEncoder;
  transcriber: { transcribe: Mock<TranscriptionClient['transcribe']> };
}

const NO_CAPTIONS = new CaptionsUnavailableError('Transcript is disabled on this video', 'disabled');
const LINES: CaptionLine[] = [
  { text: '大家好', start: 0.5, duration: 2, lang: 'zh-TW' },
  { text: '歡迎收看', start: 2.5, duration: 1.5, lang: 'zh-TW' },
];

function fakes(): Fakes {
  return {
    metadata: {
      fetchMetadata: vi.fn<MetadataProvider['fetchMetadata']>(async () => VIDEO),
      listPlaylist: vi.fn<MetadataProvider['listPlaylist']>(async () => []),
    },
    captions: { fetch: vi.fn<CaptionsProvider['fetch']>(async () => LINES) },
    audioSources: [fileSource('yt-dlp')],
    // 20 seconds at 10 bytes/s: two 10s chunks under the 1000 byte limit
    encoder: new FakeEncoder(20, 10),
    transcriber: { transcribe: vi.fn<TranscriptionClient['transcribe']>(async () => []) },
  };
}

let root: string;
let config: PipelineConfig;

beforeEach(async () => {
  root = await makeTempDir();
  config = testConfig(root);
});

afterEach(async () => {
  await fs.remove(root);
});

describe('resolveTranscript', () => {
  it('uses captions when they exist and never downloads audio', async () => {
    const deps = fakes();

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result).toEqual({
      ok: true,
      video: VIDEO,
      savedPath: undefined,
      transcript: {
        videoId: 'abcDEF12345',
        title: '測試影片標題',
        channelTitle: '測試頻道',
        uploadDate: '20230101',
        source: 'captions',
        language: 'zh-TW',
        segments: [
          { text: '大家好', start: 0.5, duration: 2 },
          { text: '歡迎收看', start: 2.5, duration: 1.5 },
        ],
      },
    });
    expect(deps.metadata.fetchMetadata).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abcDEF12345');
    expect(deps.captions.fetch).toHaveBeenCalledWith('abcDEF12345', 'zh-TW');
    expect(deps.audioSources[0].download).not.toHaveBeenCalled();
    expect(deps.transcriber.transcribe).not.toHaveBeenCalled();
  });

  it('falls back to chunked transcription and joins chunks in order', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);
    const first: TimedText[] = [
      { text: '第一段', start: 0, end: 4 },
      { text: '第二段', start: 4, end: 10 },
    ];
    const second: TimedText[] = [{ text: '第三段', start: 0, end: 6 }];
    deps.transcriber.transcribe.mockResolvedValueOnce(first).mockResolvedValueOnce(second);

    const result = await resolveTranscript('abcDEF12345', config, deps);

    if (!result.ok) throw new Error(`unexpected failure: ${result.error}`);
    expect(result.transcript.source).toBe('transcription');
    expect(result.transcript.language).toBeUndefined();
    expect(result.transcript.segments).toEqual([
      { text: '第一段', start: 0, duration: 4 },
      { text: '第二段', start: 4, duration: 6 },
      { text: '第三段', start: 10, duration: 6 },
    ]);
    expect(deps.audioSources[0].download).toHaveBeenCalledWith('abcDEF12345', config.workDir);
    // Downloaded audio and chunk files are cleaned up
    expect(await fs.readdir(config.workDir)).toEqual([]);
  });

  it('keeps the downloaded audio when asked to', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);

    await resolveTranscript('abcDEF12345', { ...config, keepAudio: true }, deps);

    expect(await fs.readdir(config.workDir)).toEqual(['abcDEF12345.mp3']);
  });

  it('treats caption lookup errors as a miss', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(new Error('socket hang up'));

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result.ok).toBe(true);
    expect(deps.transcriber.transcribe).toHaveBeenCalledTimes(2);
  });

  it('retries metadata up to maxRetries and reports the metadata stage', async () => {
    const deps = fakes();
    deps.metadata.fetchMetadata.mockRejectedValue(new MetadataFetchError('HTTP Error 503'));

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(deps.metadata.fetchMetadata).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      ok: false,
      video: { videoId: 'abcDEF12345' },
      stage: 'metadata',
      code: 'METADATA_FETCH_FAILED',
      error: 'HTTP Error 503',
    });
    expect(deps.captions.fetch).not.toHaveBeenCalled();
  });

  it('reports the audio_download stage when every source fails', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);
    deps.audioSources = [failingSource('yt-dlp', 'HTTP Error 403'), failingSource('http', 'HTTP 500')];

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result).toEqual({
      ok: false,
      video: VIDEO,
      stage: 'audio_download',
      code: 'AUDIO_DOWNLOAD_FAILED',
      error: 'No audio source could download abcDEF12345:\n[yt-dlp] HTTP Error 403\n[http] HTTP 500',
    });
    expect(deps.transcriber.transcribe).not.toHaveBeenCalled();
  });

  it('uses the secondary audio source when the first fails', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);
    const secondary = fileSource('http');
    deps.audioSources = [failingSource('yt-dlp', 'HTTP Error 403'), secondary];

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result.ok).toBe(true);
    expect(secondary.download).toHaveBeenCalledTimes(1);
  });

  it('reports how many chunks finished before a transcription error', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);
    deps.transcriber.transcribe
      .mockResolvedValueOnce([{ text: 'ok', start: 0, end: 1 }])
      .mockRejectedValueOnce(new TranscriptionApiError('Rate limit reached', 429));

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result).toEqual({
      ok: false,
      video: VIDEO,
      stage: 'chunk_transcribe',
      code: 'TRANSCRIPTION_API_ERROR',
      error: 'Rate limit reached',
      completedChunks: 1,
    });
    expect(await fs.readdir(config.workDir)).toEqual([]);
  });

  it('fails with CHUNK_TOO_SMALL when no slice fits the upload limit', async () => {
    const deps = fakes();
    deps.captions.fetch.mockRejectedValue(NO_CAPTIONS);
    deps.encoder = new FakeEncoder(20, 100000);

    const result = await resolveTranscript('abcDEF12345', config, deps);

    expect(result).toMatchObject({ ok: false, stage: 'chunk_transcribe', code: 'CHUNK_TOO_SMALL', completedChunks: 0 });
    expect(deps.transcriber.transcribe).not.toHaveBeenCalled();
  });

  it('saves the subtitle file when enabled', async () => {
    const deps = fakes();

    const result = await resolveTranscript('abcDEF12345', { ...config, saveSubtitle: true }, deps);

    const expected = path.join(config.outputDir, '測試頻道', '20230101_abcDEF12345.json');
    expect(result).toMatchObject({ ok: true, savedPath: expected });
    expect(await readSubtitleFile(expected)).toEqual({
      channel_id: '測試頻道',
      video_title: '測試影片標題',
      transcript: [
        { text: '大家好', start: 0.5, duration: 2 },
        { text: '歡迎收看', start: 2.5, duration: 1.5 },
      ],
    });
  });

  it('still succeeds when the subtitle file cannot be written', async () => {
    const deps = fakes();
    // A regular file where the output directory should be
    await fs.writeFile(config.outputDir, 'not a directory');

    const result = await resolveTranscript('abcDEF12345', { ...config, saveSubtitle: true }, deps);

    expect(result.ok).toBe(true);
    expect(result).toMatchObject({ savedPath: undefined });
  });
});
