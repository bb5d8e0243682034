import type { ErrorCode } from './errors';

/** YYYYMMDD, as reported by yt-dlp */
export type UploadDate = string;

export interface VideoReference {
  videoId: string;
  title: string;
  channelTitle: string;
  uploadDate?: UploadDate;
  viewCount?: number;
  likeCount?: number;
  durationSec?: number;
  description?: string;
  tags?: string[];
  categories?: string[];
  webpageUrl?: string;
}

/** What is known about a video when processing stops early. */
export type PartialVideoReference = Partial<VideoReference> & { videoId: string };

export interface TranscriptSegment {
  text: string;
  start: number;
  duration: number;
}

export type TranscriptSource = 'captions' | 'transcription';

export interface Transcript {
  videoId: string;
  title: string;
  channelTitle: string;
  uploadDate?: UploadDate;
  source: TranscriptSource;
  language?: string;
  segments: TranscriptSegment[];
}

/** A caption line as returned by the captions provider (seconds). */
export interface CaptionLine {
  text: string;
  start: number;
  duration: number;
  lang?: string;
}

/** A segment as returned by the transcription endpoint, relative to its chunk. */
export interface TimedText {
  text: string;
  start: number;
  end: number;
}

export interface AudioChunk {
  index: number;
  path: string;
  /** Seconds into the source audio, inclusive */
  start: number;
  /** Seconds into the source audio, exclusive */
  end: number;
  bytes: number;
}

/** On-disk subtitle format. `channel_id` holds the channel title. */
export interface SubtitleFile {
  channel_id: string;
  video_title: string;
  transcript: TranscriptSegment[];
}

export type VideoStage =
  | 'metadata'
  | 'captions'
  | 'audio_download'
  | 'chunk_transcribe'
  | 'done'
  | 'failed';

export interface VideoSuccess {
  ok: true;
  video: VideoReference;
  transcript: Transcript;
  savedPath?: string;
}

export interface VideoFailure {
  ok: false;
  video: PartialVideoReference;
  stage: Exclude<VideoStage, 'done' | 'failed'>;
  code: ErrorCode;
  error: string;
  completedChunks?: number;
}

export type VideoResult = VideoSuccess | VideoFailure;

export type UrlTarget =
  | { kind: 'video'; videoId: string; url: string }
  | { kind: 'playlist'; playlistId: string; url: string };
