/**
 * Note Headings
 *
 * Title + date heading used when delivering a transcript.
 *
 * @module postprocess/heading
 */

/**
 * Convert yt-dlp's `YYYYMMDD` upload date to `YYYY.MM.DD`.
 *
 * @returns Formatted date, or null for anything that is not 8 digits
 */
export function formatUploadDate(uploadDate: string): string | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(uploadDate.trim());
  if (!match) {
    return null;
  }
  return `${match[1]}.${match[2]}.${match[3]}`;
}

/**
 * Format a date as `YYYY.MM.DD` in local time.
 */
export function formatLocalDate(date: Date): string {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())}`;
}

/**
 * Build a note heading.
 *
 * @param title - Video title or file name
 * @param date - Already formatted `YYYY.MM.DD`, or null
 *
 * @example
 * ```typescript
 * buildHeading('Weekly sync', '2024.01.31'); // 'Weekly sync (2024.01.31)'
 * buildHeading('Weekly sync', null);         // 'Weekly sync'
 * ```
 */
export function buildHeading(title: string, date: string | null): string {
  const cleanTitle = title.trim() || 'Untitled transcript';
  return date ? `${cleanTitle} (${date})` : cleanTitle;
}
