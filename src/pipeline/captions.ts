import { YoutubeTranscript } from 'youtube-transcript';
import { CaptionsUnavailableError, type CaptionsUnavailableReason } from './errors';
import { debug } from './log';
import type { CaptionLine } from './types';

export interface CaptionsProvider {
  /**
   * Fetches a caption track. Without a language, whichever track the platform
   * offers is returned. Rejects with {@link CaptionsUnavailableError} when no
   * matching track exists.
   */
  fetch(videoId: string, language?: string): Promise<CaptionLine[]>;
}

export function classifyCaptionsError(message: string): CaptionsUnavailableReason {
  if (/disabled/i.test(message)) return 'disabled';
  if (/available in|languages?/i.test(message)) return 'language';
  return 'unavailable';
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

export function decodeCaptionText(text: string): string {
  // Caption XML is escaped twice, so "&amp;#39;" has to become "'"
  let out = text;
  for (let i = 0; i < 2; i++) {
    out = out.replace(/&(amp|lt|gt|quot|#39);/g, (m) => ENTITIES[m] ?? m);
  }
  return out.replace(/\s+/g, ' ').trim();
}

/** Captions through the `youtube-transcript` package. Offsets and durations are seconds. */
export class YoutubeTranscriptCaptions implements CaptionsProvider {
  async fetch(videoId: string, language?: string): Promise<CaptionLine[]> {
    const lines = await YoutubeTranscript.fetchTranscript(
      videoId,
      language ? { lang: language } : undefined
    ).catch((e: unknown) => {
      const message = e instanceof Error ? e.message : String(e);
      throw new CaptionsUnavailableError(message, classifyCaptionsError(message), language);
    });
    if (!lines.length) {
      throw new CaptionsUnavailableError(`Empty caption track for ${videoId}`, 'unavailable', language);
    }
    return lines.map((l) => ({
      text: decodeCaptionText(l.text),
      start: l.offset,
      duration: l.duration,
      lang: l.lang ?? language,
    }));
  }
}

export interface CaptionsHit {
  language?: string;
  lines: CaptionLine[];
}

/**
 * Tries each preferred language in order, then an unrestricted lookup.
 * Returns null when no track is available at all; other errors propagate.
 */
export async function fetchCaptions(
  provider: CaptionsProvider,
  videoId: string,
  languages: string[]
): Promise<CaptionsHit | null> {
  const attempts: Array<string | undefined> = [...languages, undefined];
  for (const language of attempts) {
    try {
      const lines = await provider.fetch(videoId, language);
      return { language: language ?? lines[0]?.lang, lines };
    } catch (e) {
      if (!(e instanceof CaptionsUnavailableError)) throw e;
      debug('captions.miss', { videoId, language: language ?? '*', reason: e.reason });
      // A disabled track will not appear under another language
      if (e.reason === 'disabled') return null;
    }
  }
  return null;
}
