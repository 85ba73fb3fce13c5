import { randomUUID } from 'crypto';

// ============================================
// STRING UTILITIES
// ============================================

/**
 * Truncate a string to a maximum length with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Count whitespace-separated words
 */
export function countWords(str: string): number {
  const trimmed = str.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}

// ============================================
// ID UTILITIES
// ============================================

/**
 * Generate a unique event id.
 * Without a seed the id is random; with a seed it is stable, so republishing
 * for the same entity yields the same id and consumers drop the duplicate.
 */
export function generateEventId(prefix: string, seed?: string): string {
  return `${prefix}_${seed ?? randomUUID()}`;
}
