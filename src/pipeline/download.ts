import fs from 'fs-extra';
import ky, { type KyInstance } from 'ky';
import path from 'path';
import { AudioDownloadError, errorMessage } from './errors';
import { info, warn } from './log';
import { downloadBestAudio, type YtdlpOptions } from './ytdlp';

export type AudioDownloadResult =
    | { ok: true; source: string; path: string }
    | { ok: false; source: string; error: string };

/** One way of getting a local audio file for a video. Never throws. */
export interface AudioSource {
    readonly name: string;
    download(videoId: string, outDir: string): Promise<AudioDownloadResult>;
}

export class YtdlpAudioSource implements AudioSource {
    readonly name = 'yt-dlp';

    constructor(private readonly opts: YtdlpOptions) {}

    async download(videoId: string, outDir: string): Promise<AudioDownloadResult> {
        try {
            const file = await downloadBestAudio(videoId, outDir, this.opts);
            return { ok: true, source: this.name, path: file };
        } catch (e) {
            return { ok: false, source: this.name, error: errorMessage(e) };
        }
    }
}

export interface HttpAudioSourceOptions {
    /** URL template; `{videoId}` is replaced with the video id */
    urlTemplate: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
}

/**
 * Streams audio bytes from an HTTP download service to
 * `<outDir>/<videoId>.fallback.audio`.
 */
export class HttpAudioSource implements AudioSource {
    readonly name = 'http';
    private client: KyInstance;

    constructor(private readonly opts: HttpAudioSourceOptions) {
        this.client = ky.create({
            timeout: opts.timeoutMs ?? 600000,
            retry: 0,
            throwHttpErrors: false,
            ...(opts.fetch ? { fetch: opts.fetch } : {}),
        });
    }

    async download(videoId: string, outDir: string): Promise<AudioDownloadResult> {
        const url = this.opts.urlTemplate.replace(/\{videoId\}/g, encodeURIComponent(videoId));
        const dest = path.join(outDir, `${videoId}.fallback.audio`);
        try {
            await fs.ensureDir(outDir);
            const response = await this.client.get(url);
            if (!response.ok) {
                return { ok: false, source: this.name, error: `HTTP ${response.status} from ${url}` };
            }
            if (!response.body) {
                return { ok: false, source: this.name, error: `Empty body from ${url}` };
            }
            const bytes = await writeStream(response.body, dest);
            if (bytes === 0) {
                await fs.remove(dest);
                return { ok: false, source: this.name, error: `Zero-byte download from ${url}` };
            }
            info('download.http.done', { videoId, bytes });
            return { ok: true, source: this.name, path: dest };
        } catch (e) {
            await fs.remove(dest);
            return { ok: false, source: this.name, error: errorMessage(e) };
        }
    }
}

type ByteStream = NonNullable<Response['body']>;

async function writeStream(body: ByteStream, dest: string): Promise<number> {
    const out = fs.createWriteStream(dest);
    const state: { failure: Error | null } = { failure: null };
    out.on('error', (e) => {
        state.failure = e;
    });
    const reader = body.getReader();
    let total = 0;
    try {
        for (;;) {
            const { done, value } = await reader.read();
            if (done) break;
            total += value.byteLength;
            if (!out.write(value)) {
                await new Promise<void>((resolve, reject) => {
                    const onError = (e: Error) => {
                        out.off('drain', onDrain);
                        reject(e);
                    };
                    const onDrain = () => {
                        out.off('error', onError);
                        resolve();
                    };
                    out.once('drain', onDrain);
                    out.once('error', onError);
                });
            }
        }
    } finally {
        reader.releaseLock();
        await new Promise<void>((resolve) => out.end(() => resolve()));
    }
    if (state.failure) throw state.failure;
    return total;
}

export type AudioDownloadOutcome =
    | { ok: true; source: string; path: string }
    | { ok: false; error: AudioDownloadError };

/**
 * Tries each source in order and returns the first successful download, or a
 * failure listing what every source reported.
 */
export async function downloadAudio(
    videoId: string,
    outDir: string,
    sources: AudioSource[]
): Promise<AudioDownloadOutcome> {
    const failures: string[] = [];
    for (const source of sources) {
        const res = await source.download(videoId, outDir);
        if (res.ok) {
            return res;
        }
        warn('download.source.fail', { videoId, source: res.source, error: res.error });
        failures.push(`[${res.source}] ${res.error}`);
    }
    const error = new AudioDownloadError(
        sources.length
            ? `No audio source could download ${videoId}:\n${failures.join('\n')}`
            : `No audio sources configured for ${videoId}`,
        { videoId, sources: sources.map((s) => s.name) }
    );
    return { ok: false, error };
}
