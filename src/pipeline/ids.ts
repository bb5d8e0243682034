import { InvalidUrlError } from './errors';
import type { UrlTarget } from './types';

const VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;
const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'music.youtube.com']);
const PATH_PREFIXES = ['/embed/', '/v/', '/shorts/', '/live/'];

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Extracts a YouTube video ID from a URL, or returns the input if it already is one.
 * Returns null when nothing usable is found.
 */
export function extractVideoId(videoOrUrl: string): string | null {
  const input = videoOrUrl.trim();
  if (VIDEO_ID.test(input)) return input;

  const url = parseUrl(input);
  if (!url) return null;

  let candidate: string | null = null;
  if (url.hostname === 'youtu.be') {
    candidate = url.pathname.slice(1).split('/')[0] || null;
  } else if (YOUTUBE_HOSTS.has(url.hostname)) {
    if (url.pathname === '/watch') {
      candidate = url.searchParams.get('v');
    } else {
      const prefix = PATH_PREFIXES.find((p) => url.pathname.startsWith(p));
      if (prefix) candidate = url.pathname.slice(prefix.length).split('/')[0] || null;
    }
  }
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}

export function extractPlaylistId(url: string): string | null {
  const parsed = parseUrl(url.trim());
  if (!parsed) return null;
  const list = parsed.searchParams.get('list');
  return list && /^[a-zA-Z0-9_-]+$/.test(list) ? list : null;
}

export function playlistUrl(playlistId: string): string {
  return `https://www.youtube.com/playlist?list=${playlistId}`;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/** A playlist id wins over a video id, so `watch?v=..&list=..` is treated as a playlist. */
export function classifyUrl(url: string): UrlTarget {
  const playlistId = extractPlaylistId(url);
  if (playlistId) return { kind: 'playlist', playlistId, url };
  const videoId = extractVideoId(url);
  if (videoId) return { kind: 'video', videoId, url };
  throw new InvalidUrlError(url);
}
