// Watch, short-link and embed URLs; the second pattern covers watch URLs
// where `v` is not the first query parameter.
const VIDEO_ID_PATTERNS = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/)([^&\n?#]+)/,
  /youtube\.com\/watch\?.*v=([^&\n?#]+)/
];

/**
 * Extracts the video id from a YouTube URL, or returns the input unchanged
 * when it does not look like one. Nothing is validated here: a bad id only
 * shows up once YouTube rejects it.
 */
export function extractVideoId(urlOrId: string): string {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = urlOrId.match(pattern);
    if (match) {
      return match[1];
    }
  }

  return urlOrId;
}
