import fs from "fs-extra";
import { fetchCaptions, YoutubeTranscriptCaptions, type CaptionsHit, type CaptionsProvider } from "./captions";
import { FfmpegEncoder, type AudioEncoder } from "./chunk";
import { downloadAudio, HttpAudioSource, YtdlpAudioSource, type AudioSource } from "./download";
import type { PipelineConfig } from "./env";
import { errorMessage, PipelineError, type ErrorCode } from "./errors";
import { saveTranscript } from "./export";
import { watchUrl } from "./ids";
import { debug, info, startStep, warn, type LogMeta } from "./log";
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from "./retry";
import { transcribeAudio, WhisperApiClient, type TranscriptionClient, type TranscriptionProgress } from "./transcribe";
import type { Transcript, VideoFailure, VideoReference, VideoResult, VideoStage } from "./types";
import { YtdlpMetadataProvider, ytdlpOptionsFrom, type MetadataProvider } from "./ytdlp";

/** External collaborators of the pipeline. */
export interface PipelineDeps {
  metadata: MetadataProvider;
  captions: CaptionsProvider;
  /** Tried in order until one yields a file */
  audioSources: AudioSource[];
  encoder: AudioEncoder;
  transcriber: TranscriptionClient;
}

export function createDefaultDeps(config: PipelineConfig): PipelineDeps {
  const ytdlp = ytdlpOptionsFrom(config);
  const audioSources: AudioSource[] = [new YtdlpAudioSource(ytdlp)];
  if (config.audioFallbackUrl) {
    audioSources.push(new HttpAudioSource({ urlTemplate: config.audioFallbackUrl }));
  }
  return {
    metadata: new YtdlpMetadataProvider(ytdlp),
    captions: new YoutubeTranscriptCaptions(),
    audioSources,
    encoder: new FfmpegEncoder({
      ffmpegBin: config.ffmpegBin,
      ffprobeBin: config.ffprobeBin,
      bitrate: config.audioBitrate,
    }),
    transcriber: new WhisperApiClient({
      apiKey: config.apiKey,
      baseUrl: config.transcribeBaseUrl,
      model: config.transcribeModel,
      language: config.transcribeLanguage,
      timeoutMs: config.transcribeTimeoutMs,
    }),
  };
}

/** Backoff for yt-dlp lookups: `maxRetries` attempts in total, warning before each retry. */
export function lookupRetryConfig(config: PipelineConfig, event: string, meta: LogMeta): RetryConfig {
  return {
    ...DEFAULT_RETRY_CONFIG,
    maxAttempts: config.maxRetries,
    initialDelay: config.retryBaseMs,
    onRetry: (e, attempt, delayMs) => warn(event, { ...meta, attempt, delayMs: Math.round(delayMs), error: errorMessage(e) }),
  };
}

function failure(
  video: VideoFailure["video"],
  stage: VideoFailure["stage"],
  e: unknown,
  fallbackCode: ErrorCode,
  extra: Pick<VideoFailure, "completedChunks"> = {}
): VideoFailure {
  const code = e instanceof PipelineError ? e.code : fallbackCode;
  warn("resolve.failed", { videoId: video.videoId, stage, code, error: errorMessage(e) });
  return { ok: false, video, stage, code, error: errorMessage(e), ...extra };
}

async function persist(transcript: Transcript, config: PipelineConfig): Promise<string | undefined> {
  if (!config.saveSubtitle) return undefined;
  try {
    const savedPath = await saveTranscript(transcript, config.outputDir);
    info("resolve.saved", { videoId: transcript.videoId, path: savedPath });
    return savedPath;
  } catch (e) {
    warn("resolve.save.fail", { videoId: transcript.videoId, error: errorMessage(e) });
    return undefined;
  }
}

/**
 * Produces a transcript for one video: captions when the platform has them,
 * otherwise downloaded audio run through chunked speech-to-text.
 *
 * Never throws for per-video problems; those come back as a failure result
 * naming the stage that stopped.
 */
export async function resolveTranscript(
  videoId: string,
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<VideoResult> {
  const timer = startStep("resolve.video", { videoId });
  const enter = (stage: VideoStage) => debug("resolve.stage", { videoId, stage });

  enter("metadata");
  let video: VideoReference;
  try {
    video = await withRetry(
      () => deps.metadata.fetchMetadata(watchUrl(videoId)),
      lookupRetryConfig(config, "resolve.metadata.retry", { videoId })
    );
  } catch (e) {
    timer.end({ outcome: "failed" });
    return failure({ videoId }, "metadata", e, "METADATA_FETCH_FAILED");
  }

  enter("captions");
  let hit: CaptionsHit | null = null;
  try {
    hit = await fetchCaptions(deps.captions, videoId, config.captionLanguages);
  } catch (e) {
    warn("resolve.captions.error", { videoId, error: errorMessage(e) });
  }
  if (hit) {
    const transcript: Transcript = {
      videoId: video.videoId,
      title: video.title,
      channelTitle: video.channelTitle,
      uploadDate: video.uploadDate,
      source: "captions",
      language: hit.language,
      segments: hit.lines.map((l) => ({ text: l.text, start: l.start, duration: l.duration })),
    };
    enter("done");
    timer.end({ outcome: "captions", segments: transcript.segments.length });
    return { ok: true, video, transcript, savedPath: await persist(transcript, config) };
  }
  info("resolve.captions.miss", { videoId });

  enter("audio_download");
  const audio = await downloadAudio(videoId, config.workDir, deps.audioSources);
  if (!audio.ok) {
    timer.end({ outcome: "failed" });
    return failure(video, "audio_download", audio.error, "AUDIO_DOWNLOAD_FAILED");
  }
  info("resolve.audio", { videoId, source: audio.source, path: audio.path });

  enter("chunk_transcribe");
  const progress: TranscriptionProgress = { completedChunks: 0, segments: [] };
  try {
    await transcribeAudio(
      audio.path,
      {
        videoId,
        client: deps.transcriber,
        chunk: {
          maxBytes: config.maxUploadBytes,
          initialDurationSec: config.chunkSec,
          minDurationSec: config.minChunkSec,
          workDir: config.workDir,
          filePrefix: `${videoId}_${process.pid}`,
          encoder: deps.encoder,
        },
      },
      progress
    );
  } catch (e) {
    timer.end({ outcome: "failed" });
    return failure(video, "chunk_transcribe", e, "TRANSCRIPTION_API_ERROR", {
      completedChunks: progress.completedChunks,
    });
  } finally {
    if (!config.keepAudio) {
      await fs.remove(audio.path);
    }
  }

  const transcript: Transcript = {
    videoId: video.videoId,
    title: video.title,
    channelTitle: video.channelTitle,
    uploadDate: video.uploadDate,
    source: "transcription",
    language: config.transcribeLanguage ?? undefined,
    segments: progress.segments,
  };
  enter("done");
  timer.end({ outcome: "transcription", chunks: progress.completedChunks, segments: progress.segments.length });
  return { ok: true, video, transcript, savedPath: await persist(transcript, config) };
}
