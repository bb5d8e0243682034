import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ChunkTooSmallError, ToolError } from './errors';
import { debug, info, startStep } from './log';
import type { AudioChunk } from './types';
import { toolOutput } from './ytdlp';

export interface AudioEncoder {
    probeDuration(audioPath: string): Promise<number>;
    /** Encodes `[start, start + duration)` of `audioPath` into `outPath` and returns its size in bytes. */
    encodeSlice(audioPath: string, start: number, duration: number, outPath: string): Promise<number>;
}

export interface FfmpegEncoderOptions {
    ffmpegBin: string;
    ffprobeBin: string;
    /** e.g. "64k" */
    bitrate: string;
}

export class FfmpegEncoder implements AudioEncoder {
    constructor(private readonly opts: FfmpegEncoderOptions) {}

    async probeDuration(audioPath: string): Promise<number> {
        let stdout: string;
        try {
            const probe = await execa(this.opts.ffprobeBin, [
                '-v',
                'error',
                '-show_entries',
                'format=duration',
                '-of',
                'default=noprint_wrappers=1:nokey=1',
                audioPath,
            ]);
            stdout = probe.stdout;
        } catch (e) {
            throw new ToolError(`ffprobe failed for ${audioPath}: ${toolOutput(e)}`, { audioPath });
        }
        const parsed = parseFloat(stdout);
        if (!Number.isFinite(parsed)) {
            throw new ToolError(
                `ffprobe could not determine duration for ${audioPath}. Raw output: ${stdout}`,
                { audioPath }
            );
        }
        return Math.max(0, parsed);
    }

    async encodeSlice(audioPath: string, start: number, duration: number, outPath: string): Promise<number> {
        // Accurate seeking: -ss after -i. Mono 16k MP3 keeps speech intelligible at a small size.
        try {
            await execa(this.opts.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                audioPath,
                '-ss',
                String(start),
                '-t',
                String(duration),
                '-vn',
                '-sn',
                '-ac',
                '1',
                '-ar',
                '16000',
                '-b:a',
                this.opts.bitrate,
                '-f',
                'mp3',
                outPath,
            ]);
        } catch (e) {
            await fs.remove(outPath);
            throw new ToolError(
                `ffmpeg failed while extracting start=${start} dur=${duration} from ${audioPath}: ${toolOutput(e)}`,
                { audioPath, start, duration }
            );
        }
        const stat = await fs.stat(outPath);
        if (stat.size === 0) {
            await fs.remove(outPath);
            throw new ToolError(
                `Created empty chunk at ${outPath}. The source audio had no samples in [${start}, ${start + duration}).`,
                { audioPath, start, duration }
            );
        }
        return stat.size;
    }
}

export interface ChunkOptions {
    /** Upload ceiling every emitted chunk must respect */
    maxBytes: number;
    /** Target chunk length; every chunk starts from this again */
    initialDurationSec: number;
    /** Shortest slice worth shrinking to before giving up */
    minDurationSec?: number;
    workDir: string;
    /** Scopes chunk file names to a job, e.g. `<videoId>_<pid>` */
    filePrefix: string;
    encoder: AudioEncoder;
}

const EPSILON = 1e-6;

export function chunkFilePath(opts: Pick<ChunkOptions, 'workDir' | 'filePrefix'>, index: number): string {
    return path.join(opts.workDir, `${opts.filePrefix}_chunk_${String(index).padStart(4, '0')}.mp3`);
}

/**
 * Encodes `[start, end)` and halves the span until the result fits under
 * `maxBytes`. Throws {@link ChunkTooSmallError} once the next span would drop
 * below `minDurationSec`.
 */
export async function fitSlice(
    audioPath: string,
    start: number,
    end: number,
    index: number,
    opts: ChunkOptions
): Promise<AudioChunk> {
    const minDuration = opts.minDurationSec ?? 1;
    const outPath = chunkFilePath(opts, index);
    let candidateEnd = end;
    for (;;) {
        const duration = candidateEnd - start;
        const bytes = await opts.encoder.encodeSlice(audioPath, start, duration, outPath);
        if (bytes <= opts.maxBytes) {
            return { index, path: outPath, start, end: candidateEnd, bytes };
        }
        await fs.remove(outPath);
        const halved = start + duration / 2;
        if (halved - start < minDuration) {
            throw new ChunkTooSmallError(start, duration, bytes, opts.maxBytes);
        }
        debug('chunk.shrink', { index, start, from: duration, to: halved - start, bytes, maxBytes: opts.maxBytes });
        candidateEnd = halved;
    }
}

/**
 * Lazily splits `audioPath` into chunks that each encode to at most
 * `maxBytes`. Chunks cover `[0, duration)` back to back. The generator writes
 * each chunk file before yielding it; deleting it is the consumer's job.
 */
export async function* chunkAudio(
    audioPath: string,
    opts: ChunkOptions
): AsyncGenerator<AudioChunk, void, undefined> {
    if (!(await fs.pathExists(audioPath))) {
        throw new ToolError(`Input audio not found: ${audioPath}`, { audioPath });
    }
    const total = await opts.encoder.probeDuration(audioPath);
    await fs.ensureDir(opts.workDir);
    info('chunk.probe', { audioPath, durationSec: total });

    const timer = startStep('chunk.split', {
        audioPath,
        durationSec: total,
        initialDurationSec: opts.initialDurationSec,
        maxBytes: opts.maxBytes,
    });
    let start = 0;
    let index = 0;
    while (total - start > EPSILON) {
        const target = start + opts.initialDurationSec;
        // Snap to the end so float drift cannot leave a sliver behind
        const end = total - target < EPSILON ? total : target;
        const chunk = await fitSlice(audioPath, start, end, index, opts);
        yield chunk;
        timer.eta(chunk.end, total);
        start = chunk.end;
        index += 1;
    }
    timer.end({ count: index });
}
