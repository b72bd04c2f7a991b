/**
 * URL utilities
 */

const VIDEO_PATTERNS = [
  /(?:youtube\.com\/watch\?(?:.*&)?v=|youtu\.be\/)([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/embed\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/v\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/shorts\/([a-zA-Z0-9_-]{11})/,
];

/**
 * Extract the 11-character video id from a YouTube URL
 */
export function parseYouTubeUrl(url: string): { id: string } {
  for (const pattern of VIDEO_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { id: match[1] };
    }
  }

  throw new Error(`Invalid YouTube URL: ${url}`);
}

export function isValidYouTubeUrl(url: string): boolean {
  try {
    parseYouTubeUrl(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether the string parses as an absolute http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}
