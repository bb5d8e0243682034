import { loadConfig, type PipelineConfig } from "./env";
import { InvalidUrlError } from "./errors";
import { classifyUrl, extractVideoId, playlistUrl } from "./ids";
import { info, setLogFile, setLogLevel, startStep } from "./log";
import { createDefaultDeps, lookupRetryConfig, resolveTranscript, type PipelineDeps } from "./resolve";
import { withRetry } from "./retry";
import type { VideoResult } from "./types";

export interface RunOptions {
  config?: PipelineConfig;
  deps?: PipelineDeps;
}

function prepare(opts: RunOptions): { config: PipelineConfig; deps: PipelineDeps } {
  const config = opts.config ?? loadConfig();
  setLogLevel(config.logLevel);
  if (config.logFile) setLogFile(config.logFile);
  return { config, deps: opts.deps ?? createDefaultDeps(config) };
}

/** Single video by URL or bare id. */
export async function processVideo(videoOrUrl: string, opts: RunOptions = {}): Promise<VideoResult> {
  const videoId = extractVideoId(videoOrUrl);
  if (!videoId) throw new InvalidUrlError(videoOrUrl);
  const { config, deps } = prepare(opts);
  return resolveTranscript(videoId, config, deps);
}

/**
 * Resolves every playlist member in enumeration order. A failing video shows
 * up as a failure result at its position; the rest still run. Listing is
 * retried like a metadata lookup; once retries run out the error is thrown.
 */
export async function processPlaylist(url: string, opts: RunOptions = {}): Promise<VideoResult[]> {
  const { config, deps } = prepare(opts);
  const ids = await withRetry(
    () => deps.metadata.listPlaylist(url),
    lookupRetryConfig(config, "playlist.list.retry", { url })
  );
  info("playlist.listed", { url, count: ids.length });

  const timer = startStep("playlist.process", { url, total: ids.length });
  const results: VideoResult[] = [];
  for (const id of ids) {
    results.push(await resolveTranscript(id, config, deps));
    timer.eta(results.length, ids.length);
  }
  const failed = results.filter((r) => !r.ok).length;
  timer.end({ succeeded: results.length - failed, failed });
  return results;
}

/**
 * Entry point: a playlist URL yields one result per member, anything else is
 * handled as a single video. Throws {@link InvalidUrlError} when the URL names
 * neither.
 */
export async function processUrl(url: string, opts: RunOptions = {}): Promise<VideoResult | VideoResult[]> {
  const target = classifyUrl(url);
  if (target.kind === "playlist") {
    return processPlaylist(playlistUrl(target.playlistId), opts);
  }
  const { config, deps } = prepare(opts);
  return resolveTranscript(target.videoId, config, deps);
}
