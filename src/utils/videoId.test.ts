import { describe, expect, it } from 'vitest';
import { extractVideoId } from './videoId';

const VIDEO_ID = 'dQw4w9WgXcQ';

describe('extractVideoId', () => {
  it('extracts the id from a watch URL', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=dQw4w9WgXcQ')).toBe(VIDEO_ID);
  });

  it('extracts the id from a short link and drops its query', () => {
    expect(extractVideoId('https://youtu.be/dQw4w9WgXcQ?t=30')).toBe(VIDEO_ID);
  });

  it('extracts the id from an embed URL', () => {
    expect(extractVideoId('https://www.youtube.com/embed/dQw4w9WgXcQ#t=5')).toBe(VIDEO_ID);
  });

  it('stops the id at the next query parameter', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=dQw4w9WgXcQ&list=PL123&index=2')).toBe(VIDEO_ID);
  });

  it('stops the id at a newline', () => {
    expect(extractVideoId('https://youtu.be/dQw4w9WgXcQ\nsecond line')).toBe(VIDEO_ID);
  });

  it('finds v when it is not the first watch parameter', () => {
    expect(extractVideoId('https://www.youtube.com/watch?feature=share&v=dQw4w9WgXcQ')).toBe(VIDEO_ID);
  });

  it('matches URLs anywhere in the input', () => {
    expect(extractVideoId('watch this: youtu.be/dQw4w9WgXcQ')).toBe(VIDEO_ID);
  });

  it('returns a bare id unchanged', () => {
    expect(extractVideoId(VIDEO_ID)).toBe(VIDEO_ID);
  });

  it('returns unrecognised input unchanged', () => {
    expect(extractVideoId('https://vimeo.com/12345')).toBe('https://vimeo.com/12345');
    expect(extractVideoId('not a video')).toBe('not a video');
    expect(extractVideoId('')).toBe('');
  });
});
