import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import type { PipelineConfig } from './env';
import { MetadataFetchError, PlaylistFetchError, ToolError } from './errors';
import { extractVideoId, watchUrl } from './ids';
import { debug, warn } from './log';
import type { VideoReference } from './types';

export interface MetadataProvider {
    fetchMetadata(url: string): Promise<VideoReference>;
    /** Returns member video ids in playlist order. */
    listPlaylist(url: string): Promise<string[]>;
}

export interface YtdlpOptions {
    ytdlpBin: string;
    ytdlpPythonBin: string;
    cookiesFile: string | null;
    username: string | null;
    password: string | null;
    extraArgs: string[];
}

export function ytdlpOptionsFrom(config: PipelineConfig): YtdlpOptions {
    return {
        ytdlpBin: config.ytdlpBin,
        ytdlpPythonBin: config.ytdlpPythonBin,
        cookiesFile: config.cookiesFile,
        username: config.username,
        password: config.password,
        extraArgs: config.ytdlpExtraArgs,
    };
}

export function authArgs(opts: YtdlpOptions): string[] {
    const args: string[] = [];
    if (opts.cookiesFile) {
        args.push('--cookies', opts.cookiesFile);
    }
    if (opts.username && opts.password) {
        args.push('--username', opts.username, '--password', opts.password);
    }
    return [...args, ...opts.extraArgs];
}

/** Configured binary first, then plain `yt-dlp`, then the python module entry points. */
export function candidateCommands(opts: YtdlpOptions, args: string[]): Array<[string, string[]]> {
    const candidates: Array<[string, string[]]> = [];
    candidates.push([opts.ytdlpBin, args]);
    if (opts.ytdlpBin !== 'yt-dlp') {
        candidates.push(['yt-dlp', args]);
    }
    if (opts.ytdlpPythonBin) {
        candidates.push([opts.ytdlpPythonBin, ['-m', 'yt_dlp', ...args]]);
    }
    candidates.push(['python3', ['-m', 'yt_dlp', ...args]]);
    return candidates;
}

export function toolOutput(e: unknown): string {
    if (typeof e === 'object' && e !== null) {
        if ('stderr' in e && typeof e.stderr === 'string' && e.stderr) return e.stderr;
        if ('stdout' in e && typeof e.stdout === 'string' && e.stdout) return e.stdout;
        if ('shortMessage' in e && typeof e.shortMessage === 'string') return e.shortMessage;
    }
    return e instanceof Error ? e.message : String(e);
}

/**
 * Runs yt-dlp through each candidate command until one succeeds and returns its stdout.
 * Throws a {@link ToolError} carrying every attempt's error output otherwise.
 */
export async function runYtdlp(args: string[], opts: YtdlpOptions, purpose: string): Promise<string> {
    const errors: string[] = [];
    const tried: string[] = [];
    for (const [cmd, a] of candidateCommands(opts, args)) {
        tried.push(a[0] === '-m' ? `${cmd} -m yt_dlp` : cmd);
        try {
            const res = await execa(cmd, a, { stdio: 'pipe' });
            return res.stdout;
        } catch (e) {
            errors.push(`[${cmd}] ${toolOutput(e)}`);
            debug('ytdlp.attempt.fail', { purpose, cmd });
        }
    }
    throw new ToolError(
        `All yt-dlp attempts failed for ${purpose}. Tried: ${tried.join(', ')}\nErrors:\n${errors.join('\n---\n')}`,
        { purpose, tried }
    );
}

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(o: Json, key: string): string | undefined {
    const v = o[key];
    return typeof v === 'string' && v ? v : undefined;
}

function num(o: Json, key: string): number | undefined {
    const v = o[key];
    return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function strList(o: Json, key: string): string[] | undefined {
    const v = o[key];
    if (!Array.isArray(v)) return undefined;
    return v.filter((x): x is string => typeof x === 'string');
}

function parseJson(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}

/** Maps yt-dlp's `-J` output onto a {@link VideoReference}. */
export function toVideoReference(raw: unknown): VideoReference {
    if (!isRecord(raw)) {
        throw new MetadataFetchError('yt-dlp metadata is not a JSON object', false);
    }
    const videoId = str(raw, 'id');
    if (!videoId) {
        throw new MetadataFetchError('yt-dlp metadata has no video id', false);
    }
    const ref: VideoReference = {
        videoId,
        title: str(raw, 'title') ?? videoId,
        channelTitle: str(raw, 'channel') ?? str(raw, 'uploader') ?? 'unknown',
    };
    const uploadDate = str(raw, 'upload_date');
    if (uploadDate) ref.uploadDate = uploadDate;
    const viewCount = num(raw, 'view_count');
    if (viewCount !== undefined) ref.viewCount = viewCount;
    const likeCount = num(raw, 'like_count');
    if (likeCount !== undefined) ref.likeCount = likeCount;
    const durationSec = num(raw, 'duration');
    if (durationSec !== undefined) ref.durationSec = durationSec;
    const description = str(raw, 'description');
    if (description) ref.description = description;
    const tags = strList(raw, 'tags');
    if (tags) ref.tags = tags;
    const categories = strList(raw, 'categories');
    if (categories) ref.categories = categories;
    const webpageUrl = str(raw, 'webpage_url');
    if (webpageUrl) ref.webpageUrl = webpageUrl;
    return ref;
}

/** Extracts member video ids from `--flat-playlist -J` output, skipping unusable entries. */
export function toPlaylistVideoIds(raw: unknown): string[] {
    if (!isRecord(raw) || !Array.isArray(raw.entries)) {
        throw new PlaylistFetchError('yt-dlp playlist output has no entries', false);
    }
    const ids: string[] = [];
    raw.entries.forEach((entry: unknown, position: number) => {
        const candidate = isRecord(entry) ? str(entry, 'id') ?? str(entry, 'url') : undefined;
        const id = candidate ? extractVideoId(candidate) : null;
        if (id) {
            ids.push(id);
        } else {
            warn('playlist.entry.skip', { position });
        }
    });
    return ids;
}

// Errors that will not go away by asking again
const FATAL_PATTERNS = [
    /video unavailable/i,
    /private video/i,
    /has been removed/i,
    /not available in your country/i,
    /sign in to confirm your age/i,
    /members-only/i,
    /playlist does not exist/i,
];

export class YtdlpMetadataProvider implements MetadataProvider {
    constructor(private readonly opts: YtdlpOptions) {}

    async fetchMetadata(url: string): Promise<VideoReference> {
        let stdout: string;
        try {
            stdout = await runYtdlp(['-J', '--no-playlist', ...authArgs(this.opts), url], this.opts, 'metadata');
        } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            const retryable = !FATAL_PATTERNS.some((p) => p.test(msg));
            throw new MetadataFetchError(`Failed to fetch metadata for ${url}: ${msg}`, retryable, { url });
        }
        return toVideoReference(parseJson(stdout));
    }

    async listPlaylist(url: string): Promise<string[]> {
        let stdout: string;
        try {
            stdout = await runYtdlp(['--flat-playlist', '-J', ...authArgs(this.opts), url], this.opts, 'playlist');
        } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            const retryable = !FATAL_PATTERNS.some((p) => p.test(msg));
            throw new PlaylistFetchError(`Failed to list playlist ${url}: ${msg}`, retryable, { url });
        }
        return toPlaylistVideoIds(parseJson(stdout));
    }
}

/**
 * Downloads the best audio stream of a video as `<outDir>/<videoId>.mp3`.
 */
export async function downloadBestAudio(
    videoId: string,
    outDir: string,
    opts: YtdlpOptions
): Promise<string> {
    await fs.ensureDir(outDir);
    const template = path.join(outDir, `${videoId}.%(ext)s`);
    const args = [
        '-f',
        'bestaudio/best',
        '-x',
        '--audio-format',
        'mp3',
        '--no-playlist',
        '-o',
        template,
        ...authArgs(opts),
        watchUrl(videoId),
    ];
    await runYtdlp(args, opts, 'audio');

    const produced = path.join(outDir, `${videoId}.mp3`);
    if (!(await fs.pathExists(produced))) {
        throw new ToolError(`Expected yt-dlp output ${produced} was not created.`, { videoId });
    }
    return produced;
}
