import * as dotenv from 'dotenv';
import { ConfigError } from './errors';
import { isLogLevel, type LogLevel } from './log';
dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function list(value: string | undefined, fallback: string[]): string[] {
    if (!value) return fallback;
    return value
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
}

export const ENV = {
    outputDir: process.env.OUTPUT_DIR || 'data/youtube/subtitles',
    saveSubtitle: flag(process.env.SAVE_SUBTITLE, true),
    // Scratch space for downloaded audio and chunk files
    workDir: process.env.WORK_DIR || 'data/youtube/audio',
    keepAudio: flag(process.env.KEEP_AUDIO, false),
    maxRetries: Number(process.env.MAX_RETRIES || 3),
    retryBaseMs: Number(process.env.RETRY_BASE_MS || 1000),
    // Preferred caption tracks, tried in order before an unrestricted lookup
    captionLanguages: list(process.env.CAPTION_LANGUAGES, [
        'zh-TW',
        'zh-Hant',
        'zh-HK',
        'zh-Hans',
        'zh-CN',
        'zh',
    ]),
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    youtubeUsername: process.env.YOUTUBE_USERNAME || '',
    youtubePassword: process.env.YOUTUBE_PASSWORD || '',
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    // Hard ceiling of the transcription endpoint (25 MB for OpenAI)
    maxUploadBytes: Number(process.env.MAX_UPLOAD_BYTES || 25 * 1024 * 1024),
    chunkSec: Number(process.env.CHUNK_SEC || 600),
    minChunkSec: Number(process.env.MIN_CHUNK_SEC || 1),
    audioBitrate: process.env.AUDIO_BITRATE || '64k',
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    transcribeBaseUrl: process.env.TRANSCRIBE_BASE_URL || 'https://api.openai.com/v1',
    transcribeModel: process.env.TRANSCRIBE_MODEL || 'whisper-1',
    transcribeLanguage: process.env.TRANSCRIBE_LANGUAGE || '',
    transcribeTimeoutMs: Number(process.env.TRANSCRIBE_TIMEOUT_MS || 600000),
    // Optional secondary audio source, e.g. "https://dl.example.com/audio/{videoId}"
    audioFallbackUrl: process.env.AUDIO_FALLBACK_URL || '',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFile: process.env.LOG_FILE || '',
};

export interface PipelineConfig {
    outputDir: string;
    saveSubtitle: boolean;
    workDir: string;
    keepAudio: boolean;
    cookiesFile: string | null;
    username: string | null;
    password: string | null;
    apiKey: string;
    maxRetries: number;
    retryBaseMs: number;
    captionLanguages: string[];
    ytdlpBin: string;
    ytdlpPythonBin: string;
    ytdlpExtraArgs: string[];
    ffmpegBin: string;
    ffprobeBin: string;
    maxUploadBytes: number;
    chunkSec: number;
    minChunkSec: number;
    audioBitrate: string;
    transcribeBaseUrl: string;
    transcribeModel: string;
    transcribeLanguage: string | null;
    transcribeTimeoutMs: number;
    audioFallbackUrl: string | null;
    logLevel: LogLevel;
    logFile: string | null;
}

/**
 * Builds the pipeline configuration from {@link ENV}, applying explicit overrides
 * on top. Throws {@link ConfigError} for values the pipeline cannot run with.
 */
export function loadConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
    const config: PipelineConfig = {
        outputDir: ENV.outputDir,
        saveSubtitle: ENV.saveSubtitle,
        workDir: ENV.workDir,
        keepAudio: ENV.keepAudio,
        cookiesFile: ENV.ytdlpCookiesFile || null,
        username: ENV.youtubeUsername || null,
        password: ENV.youtubePassword || null,
        apiKey: ENV.openaiApiKey,
        maxRetries: ENV.maxRetries,
        retryBaseMs: ENV.retryBaseMs,
        captionLanguages: ENV.captionLanguages,
        ytdlpBin: ENV.ytdlpBin,
        ytdlpPythonBin: ENV.ytdlpPythonBin,
        ytdlpExtraArgs: ENV.ytdlpExtraArgs
            .split(' ')
            .map((s) => s.trim())
            .filter(Boolean),
        ffmpegBin: ENV.ffmpegBin,
        ffprobeBin: ENV.ffprobeBin,
        maxUploadBytes: ENV.maxUploadBytes,
        chunkSec: ENV.chunkSec,
        minChunkSec: ENV.minChunkSec,
        audioBitrate: ENV.audioBitrate,
        transcribeBaseUrl: ENV.transcribeBaseUrl,
        transcribeModel: ENV.transcribeModel,
        transcribeLanguage: ENV.transcribeLanguage || null,
        transcribeTimeoutMs: ENV.transcribeTimeoutMs,
        audioFallbackUrl: ENV.audioFallbackUrl || null,
        logLevel: isLogLevel(ENV.logLevel) ? ENV.logLevel : 'info',
        logFile: ENV.logFile || null,
        ...overrides,
    };

    if (!isLogLevel(config.logLevel)) {
        throw new ConfigError(`Unknown log level: ${config.logLevel}`, { field: 'logLevel' });
    }

    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
        throw new ConfigError(`maxRetries must be an integer >= 1, got ${config.maxRetries}`, {
            field: 'maxRetries',
        });
    }
    const positives: Array<[keyof PipelineConfig, number]> = [
        ['maxUploadBytes', config.maxUploadBytes],
        ['chunkSec', config.chunkSec],
        ['minChunkSec', config.minChunkSec],
        ['transcribeTimeoutMs', config.transcribeTimeoutMs],
    ];
    for (const [field, value] of positives) {
        if (!Number.isFinite(value) || value <= 0) {
            throw new ConfigError(`${field} must be a positive number, got ${value}`, { field });
        }
    }
    if (config.minChunkSec > config.chunkSec) {
        throw new ConfigError(
            `minChunkSec (${config.minChunkSec}) cannot exceed chunkSec (${config.chunkSec})`,
            { field: 'minChunkSec' }
        );
    }
    if (!Number.isFinite(config.retryBaseMs) || config.retryBaseMs < 0) {
        throw new ConfigError(`retryBaseMs must be >= 0, got ${config.retryBaseMs}`, {
            field: 'retryBaseMs',
        });
    }
    return config;
}
