/**
 * Video Identifier Extraction
 *
 * Pulls the YouTube video identifier out of whatever the user typed:
 * a full watch URL, a short link, a shorts/embed/live URL, or a bare
 * `v=<id>&...` fragment.
 *
 * @module input/video-id
 */

/**
 * Characters allowed in an identifier. The identifier ends up in a file
 * name, so anything else is rejected.
 */
const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Path prefixes that carry the identifier as the next segment.
 */
const PATH_ID_PREFIXES = new Set(['shorts', 'embed', 'live', 'v']);

/**
 * Error thrown when the input cannot be turned into a usable reference.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Extract the video identifier from a URL or `v=` fragment.
 *
 * URL inputs are parsed properly; everything else falls back to taking the
 * text after the first `v=` up to the next `&`.
 *
 * @param reference - URL or fragment typed by the user
 * @returns The raw identifier (not validated)
 *
 * @example
 * ```typescript
 * extractVideoId('https://www.youtube.com/watch?v=ABC123&t=5'); // 'ABC123'
 * extractVideoId('https://youtu.be/ABC123?si=x');               // 'ABC123'
 * extractVideoId('v=ABC123&t=5');                               // 'ABC123'
 * ```
 */
export function extractVideoId(reference: string): string {
  const trimmed = reference.trim();
  const fromUrl = extractFromUrl(trimmed);
  if (fromUrl !== null) {
    return fromUrl;
  }

  const marker = trimmed.indexOf('v=');
  const afterMarker = marker === -1 ? trimmed : trimmed.slice(marker + 2);
  const ampersand = afterMarker.indexOf('&');
  return ampersand === -1 ? afterMarker : afterMarker.slice(0, ampersand);
}

/**
 * Try URL parsing. Returns null when the string is not an http(s) URL or
 * carries no identifier in a known place.
 */
function extractFromUrl(reference: string): string | null {
  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  const fromQuery = url.searchParams.get('v');
  if (fromQuery !== null) {
    return fromQuery;
  }

  const segments = url.pathname.split('/').filter((segment) => segment.length > 0);
  const host = url.hostname.replace(/^www\./, '');

  if (host === 'youtu.be' && segments.length > 0) {
    return segments[0];
  }

  if (segments.length >= 2 && PATH_ID_PREFIXES.has(segments[0])) {
    return segments[1];
  }

  return null;
}

/**
 * Check whether an identifier is safe to use in a file name.
 *
 * @param videoId - Identifier to check
 */
export function isValidVideoId(videoId: string): boolean {
  return VIDEO_ID_PATTERN.test(videoId);
}

/**
 * Extract and validate the identifier.
 *
 * @param reference - URL or fragment typed by the user
 * @returns The validated identifier
 * @throws InputError if the identifier is empty or has unsafe characters
 */
export function parseVideoId(reference: string): string {
  const videoId = extractVideoId(reference);

  if (videoId.length === 0) {
    throw new InputError(`No video identifier found in "${reference}"`, reference);
  }

  if (!isValidVideoId(videoId)) {
    throw new InputError(
      `"${reference}" is neither an existing file nor a video reference ` +
        `(identifier "${videoId}" contains unsupported characters)`,
      reference
    );
  }

  return videoId;
}

/**
 * Canonical watch URL for an identifier.
 */
export function buildWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
