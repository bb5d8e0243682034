import { describe, it, expect } from 'vitest';
import { InvalidUrlError } from '../src/pipeline/errors';
import { classifyUrl, extractPlaylistId, extractVideoId, playlistUrl, watchUrl } from '../src/pipeline/ids';

describe('extractVideoId', () => {
  it.each([
    ['abcDEF12345', 'abcDEF12345'],
    ['https://youtu.be/abcDEF12345', 'abcDEF12345'],
    ['https://youtu.be/abcDEF12345?t=42', 'abcDEF12345'],
    ['https://www.youtube.com/watch?v=abcDEF12345', 'abcDEF12345'],
    ['https://youtube.com/watch?feature=share&v=abcDEF12345', 'abcDEF12345'],
    ['https://m.youtube.com/watch?v=abcDEF12345', 'abcDEF12345'],
    ['https://www.youtube.com/embed/abcDEF12345', 'abcDEF12345'],
    ['https://www.youtube.com/v/abcDEF12345', 'abcDEF12345'],
    ['https://www.youtube.com/shorts/abcDEF12345', 'abcDEF12345'],
    ['  https://www.youtube.com/watch?v=abcDEF12345  ', 'abcDEF12345'],
  ])('extracts the id from %s', (input, expected) => {
    expect(extractVideoId(input)).toBe(expected);
  });

  it.each([
    'https://www.example.com/watch?v=abcDEF12345',
    'https://www.youtube.com/watch?v=short',
    'https://www.youtube.com/channel/UCabcdefghijk',
    'not a url',
    '',
  ])('returns null for %s', (input) => {
    expect(extractVideoId(input)).toBeNull();
  });
});

describe('extractPlaylistId', () => {
  it('reads the list parameter', () => {
    expect(extractPlaylistId('https://www.youtube.com/playlist?list=PLtest_123-x')).toBe('PLtest_123-x');
    expect(extractPlaylistId('https://www.youtube.com/watch?v=abcDEF12345&list=PLtest123')).toBe('PLtest123');
  });

  it('returns null without a usable list parameter', () => {
    expect(extractPlaylistId('https://www.youtube.com/watch?v=abcDEF12345')).toBeNull();
    expect(extractPlaylistId('https://www.youtube.com/playlist?list=bad%20id')).toBeNull();
    expect(extractPlaylistId('nope')).toBeNull();
  });
});

describe('classifyUrl', () => {
  it('prefers the playlist when both ids are present', () => {
    const url = 'https://www.youtube.com/watch?v=abcDEF12345&list=PLtest123';
    expect(classifyUrl(url)).toEqual({ kind: 'playlist', playlistId: 'PLtest123', url });
  });

  it('falls back to a single video', () => {
    const url = 'https://youtu.be/abcDEF12345';
    expect(classifyUrl(url)).toEqual({ kind: 'video', videoId: 'abcDEF12345', url });
  });

  it('throws InvalidUrlError when neither id is present', () => {
    expect(() => classifyUrl('https://www.example.com/')).toThrow(InvalidUrlError);
    expect(() => classifyUrl('https://www.example.com/')).toThrow('Invalid YouTube URL: https://www.example.com/');
  });
});

describe('canonical URLs', () => {
  it('builds watch and playlist URLs', () => {
    expect(watchUrl('abcDEF12345')).toBe('https://www.youtube.com/watch?v=abcDEF12345');
    expect(playlistUrl('PLtest123')).toBe('https://www.youtube.com/playlist?list=PLtest123');
  });
});
