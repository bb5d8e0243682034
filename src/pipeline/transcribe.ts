import fs from 'fs-extra';
import ky, { type KyInstance } from 'ky';
import path from 'path';
import { chunkAudio, type ChunkOptions } from './chunk';
import { handleTranscriptionErrorResponse, PipelineError, TranscriptionApiError } from './errors';
import { debug, info, warn } from './log';
import type { TimedText, TranscriptSegment } from './types';

export interface TranscriptionClient {
    /** Segment times are relative to the start of the chunk. */
    transcribe(chunkPath: string, durationSec: number): Promise<TimedText[]>;
}

export interface WhisperApiClientOptions {
    apiKey: string;
    baseUrl: string;
    model: string;
    language?: string | null;
    timeoutMs?: number;
    fetch?: typeof fetch;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Maps a `verbose_json` transcription body onto chunk-relative segments. A body
 * carrying only `text` becomes one segment spanning the whole chunk.
 */
export function parseTranscriptionResponse(body: unknown, durationSec: number): TimedText[] {
    if (!isRecord(body)) {
        throw new TranscriptionApiError('Transcription response is not a JSON object');
    }
    if (Array.isArray(body.segments)) {
        const out: TimedText[] = [];
        for (const s of body.segments) {
            if (!isRecord(s) || typeof s.text !== 'string') continue;
            const start = typeof s.start === 'number' ? s.start : 0;
            const end = typeof s.end === 'number' ? s.end : start;
            out.push({ text: s.text, start, end: Math.max(start, end) });
        }
        return out;
    }
    if (typeof body.text === 'string') {
        return body.text.trim() ? [{ text: body.text, start: 0, end: durationSec }] : [];
    }
    throw new TranscriptionApiError('Transcription response has neither segments nor text');
}

/**
 * Client for an OpenAI-compatible `/audio/transcriptions` endpoint
 */
export class WhisperApiClient implements TranscriptionClient {
    private client: KyInstance;

    constructor(private readonly opts: WhisperApiClientOptions) {
        this.client = ky.create({
            prefixUrl: opts.baseUrl,
            timeout: opts.timeoutMs ?? 600000,
            retry: 0,
            throwHttpErrors: false,
            headers: opts.apiKey ? { Authorization: `Bearer ${opts.apiKey}` } : undefined,
            ...(opts.fetch ? { fetch: opts.fetch } : {}),
        });
    }

    async transcribe(chunkPath: string, durationSec: number): Promise<TimedText[]> {
        const bytes = await fs.readFile(chunkPath);
        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(bytes)], { type: 'audio/mpeg' }), path.basename(chunkPath));
        form.append('model', this.opts.model);
        form.append('response_format', 'verbose_json');
        if (this.opts.language) {
            form.append('language', this.opts.language);
        }

        let response: Response;
        try {
            response = await this.client.post('audio/transcriptions', { body: form });
        } catch (e) {
            // Timeouts and connection failures
            const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
            throw new TranscriptionApiError(`Transcription request failed: ${message}`);
        }

        if (!response.ok) {
            let errorData: unknown;
            try {
                errorData = await response.json();
            } catch {
                // Response might not be JSON
            }
            handleTranscriptionErrorResponse(response, errorData);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (e) {
            throw new TranscriptionApiError(
                `Transcription response is not JSON: ${e instanceof Error ? e.message : String(e)}`,
                response.status
            );
        }
        return parseTranscriptionResponse(body, durationSec);
    }
}

export interface TranscriptionProgress {
    completedChunks: number;
    segments: TranscriptSegment[];
}

export interface TranscribeAudioOptions {
    videoId: string;
    chunk: ChunkOptions;
    client: TranscriptionClient;
}

/**
 * Chunks `audioPath`, submits the chunks one at a time and concatenates the
 * results in chunk order. Each chunk file is deleted as soon as its request
 * settles. `progress` is updated in place so a caller can see how far a failed
 * run got.
 */
export async function transcribeAudio(
    audioPath: string,
    opts: TranscribeAudioOptions,
    progress: TranscriptionProgress = { completedChunks: 0, segments: [] }
): Promise<TranscriptionProgress> {
    for await (const chunk of chunkAudio(audioPath, opts.chunk)) {
        debug('transcribe.chunk.start', {
            videoId: opts.videoId,
            idx: chunk.index,
            start: chunk.start,
            end: chunk.end,
            bytes: chunk.bytes,
        });
        let parts: TimedText[];
        try {
            parts = await opts.client.transcribe(chunk.path, chunk.end - chunk.start);
        } catch (e) {
            warn('transcribe.chunk.fail', {
                videoId: opts.videoId,
                idx: chunk.index,
                error: e instanceof Error ? e.message : String(e),
            });
            if (e instanceof PipelineError) throw e;
            throw new TranscriptionApiError(
                `Chunk ${chunk.index} failed: ${e instanceof Error ? e.message : String(e)}`
            );
        } finally {
            await fs.remove(chunk.path);
        }
        for (const p of parts) {
            const text = p.text.trim();
            if (!text) continue;
            progress.segments.push({
                text,
                start: chunk.start + p.start,
                duration: Math.max(0, p.end - p.start),
            });
        }
        progress.completedChunks += 1;
        info('transcribe.chunk.done', { videoId: opts.videoId, idx: chunk.index, segments: parts.length });
    }
    return progress;
}
