/**
 * YouTube transcript pipeline
 *
 * Captions first; otherwise downloaded audio, chunked under the
 * transcription upload limit and run through speech-to-text.
 */

export { processUrl, processVideo, processPlaylist, type RunOptions } from './pipeline/run';
export { resolveTranscript, createDefaultDeps, type PipelineDeps } from './pipeline/resolve';
export { ENV, loadConfig, type PipelineConfig } from './pipeline/env';
export { classifyUrl, extractVideoId, extractPlaylistId, playlistUrl, watchUrl } from './pipeline/ids';
export { chunkAudio, fitSlice, FfmpegEncoder, type AudioEncoder, type ChunkOptions } from './pipeline/chunk';
export {
  transcribeAudio,
  WhisperApiClient,
  parseTranscriptionResponse,
  type TranscriptionClient,
  type TranscriptionProgress,
} from './pipeline/transcribe';
export { fetchCaptions, YoutubeTranscriptCaptions, type CaptionsProvider, type CaptionsHit } from './pipeline/captions';
export {
  downloadAudio,
  YtdlpAudioSource,
  HttpAudioSource,
  type AudioSource,
  type AudioDownloadResult,
  type AudioDownloadOutcome,
} from './pipeline/download';
export { YtdlpMetadataProvider, type MetadataProvider } from './pipeline/ytdlp';
export { saveTranscript, readSubtitleFile, toSubtitleFile, subtitlePath } from './pipeline/export';
export { withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from './pipeline/retry';
export { setLogLevel, setLogFormat, setLogFile, closeLogFile } from './pipeline/log';

export * from './pipeline/types';
export * from './pipeline/errors';
