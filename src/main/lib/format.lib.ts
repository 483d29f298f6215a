/**
 * Formatting helpers for user-facing strings
 */

import { FILE_SIZE_UNITS } from '../utils/constants';

/**
 * Format file size for display
 */
export function formatFileSize(bytes: number): string {
  if (bytes <= 0) {
    return `0 ${FILE_SIZE_UNITS[0]}`;
  }
  const k = 1024;
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), FILE_SIZE_UNITS.length - 1);
  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + FILE_SIZE_UNITS[i];
}

/**
 * `singular` for a count of 1, `plural` otherwise
 */
export function pluralize(count: number, singular: string, plural: string): string {
  return count === 1 ? singular : plural;
}

/**
 * Count followed by the matching noun, e.g. "3 files"
 */
export function countOf(count: number, singular: string, plural: string): string {
  return `${count} ${pluralize(count, singular, plural)}`;
}

/**
 * Cut `text` to `max` characters, marking the cut with "..."
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
