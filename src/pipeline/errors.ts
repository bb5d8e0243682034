/**
 * Error classes for the transcript pipeline
 */

export type ErrorCode =
  | 'INVALID_URL'
  | 'CAPTIONS_UNAVAILABLE'
  | 'METADATA_FETCH_FAILED'
  | 'PLAYLIST_FETCH_FAILED'
  | 'AUDIO_DOWNLOAD_FAILED'
  | 'CHUNK_TOO_SMALL'
  | 'TRANSCRIPTION_API_ERROR'
  | 'CONFIG_INVALID'
  | 'TOOL_FAILED';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * Neither a playlist id nor a video id could be extracted
 */
export class InvalidUrlError extends PipelineError {
  url: string;

  constructor(url: string) {
    super(`Invalid YouTube URL: ${url}`, 'INVALID_URL', { url });
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

export type CaptionsUnavailableReason = 'disabled' | 'language' | 'unavailable';

/**
 * No caption track could be fetched. Expected; triggers the transcription fallback.
 */
export class CaptionsUnavailableError extends PipelineError {
  reason: CaptionsUnavailableReason;
  language?: string;

  constructor(message: string, reason: CaptionsUnavailableReason, language?: string) {
    super(message, 'CAPTIONS_UNAVAILABLE', { reason, language });
    this.name = 'CaptionsUnavailableError';
    this.reason = reason;
    this.language = language;
  }
}

/**
 * Video metadata could not be fetched
 */
export class MetadataFetchError extends PipelineError {
  retryable: boolean;

  constructor(message: string, retryable = true, details?: Record<string, unknown>) {
    super(message, 'METADATA_FETCH_FAILED', details);
    this.name = 'MetadataFetchError';
    this.retryable = retryable;
  }
}

/**
 * Playlist entries could not be enumerated
 */
export class PlaylistFetchError extends PipelineError {
  retryable: boolean;

  constructor(message: string, retryable = true, details?: Record<string, unknown>) {
    super(message, 'PLAYLIST_FETCH_FAILED', details);
    this.name = 'PlaylistFetchError';
    this.retryable = retryable;
  }
}

/**
 * Every audio source failed for a video
 */
export class AudioDownloadError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUDIO_DOWNLOAD_FAILED', details);
    this.name = 'AudioDownloadError';
  }
}

/**
 * Even the shortest allowed slice encodes above the upload ceiling
 */
export class ChunkTooSmallError extends PipelineError {
  start: number;
  durationSec: number;
  bytes: number;
  maxBytes: number;

  constructor(start: number, durationSec: number, bytes: number, maxBytes: number) {
    super(
      `Cannot fit audio at ${start.toFixed(3)}s under ${maxBytes} bytes: ` +
        `a ${durationSec.toFixed(3)}s slice already encodes to ${bytes} bytes`,
      'CHUNK_TOO_SMALL',
      { start, durationSec, bytes, maxBytes }
    );
    this.name = 'ChunkTooSmallError';
    this.start = start;
    this.durationSec = durationSec;
    this.bytes = bytes;
    this.maxBytes = maxBytes;
  }
}

/**
 * The speech-to-text endpoint rejected a chunk
 */
export class TranscriptionApiError extends PipelineError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, 'TRANSCRIPTION_API_ERROR', details);
    this.name = 'TranscriptionApiError';
    this.statusCode = statusCode;
  }

  toString(): string {
    const parts = [this.message];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    parts.push(`(code: ${this.code})`);
    return parts.join(' ');
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
    this.name = 'ConfigError';
  }
}

/**
 * An external binary (yt-dlp, ffmpeg, ffprobe) failed
 */
export class ToolError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOOL_FAILED', details);
    this.name = 'ToolError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Parse an error body from the transcription endpoint and throw
 */
export function handleTranscriptionErrorResponse(response: Response, body?: unknown): never {
  const statusCode = response.status;
  let message = response.statusText || `HTTP ${statusCode}`;
  let errorType: string | undefined;
  if (typeof body === 'object' && body !== null && 'error' in body) {
    const err = body.error;
    if (typeof err === 'string') {
      message = err;
    } else if (typeof err === 'object' && err !== null) {
      if ('message' in err && typeof err.message === 'string') message = err.message;
      if ('type' in err && typeof err.type === 'string') errorType = err.type;
    }
  }
  throw new TranscriptionApiError(message, statusCode, errorType ? { type: errorType } : undefined);
}
