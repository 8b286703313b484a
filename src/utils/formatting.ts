/**
 * Shared formatting utilities
 */

import { SIZE_THRESHOLD_K, SIZE_THRESHOLD_M } from './constants.js';

/**
 * Format character count for display
 * @param chars - Number of characters
 * @returns Formatted string: "N chars", "N.NK chars", or "N.NM chars"
 */
export function formatSize(chars: number): string {
  if (chars < SIZE_THRESHOLD_K) {
    return `${chars} chars`;
  } else if (chars < SIZE_THRESHOLD_M) {
    return `${(chars / SIZE_THRESHOLD_K).toFixed(1)}K chars`;
  }
  return `${(chars / SIZE_THRESHOLD_M).toFixed(1)}M chars`;
}

/**
 * Quote a value for safe use as a single shell word
 * Plain words pass through; everything else is single-quoted
 */
export function shellQuote(value: string): string {
  if (value === '') {
    return "''";
  }
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Format a list of names for log output: "A, B, C" or "(none)"
 */
export function formatNameList(names: Iterable<string>): string {
  const sorted = [...names].sort();
  return sorted.length > 0 ? sorted.join(', ') : '(none)';
}
