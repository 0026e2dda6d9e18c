import { DEFAULT_SEASON } from '../../types/classification.js';

// "Season 2", "season02", "S01", "s2"
const SEASON_PATTERN = /season\s*(\d+)|s(\d+)/gi;

/**
 * Zero-pad a numeric string to two digits
 */
export function padNumber(digits: string): string {
  return digits.padStart(2, '0');
}

/**
 * Season number of a cleaned filename, two digits, defaulting to "01".
 * Candidates longer than two digits ("S2024") are passed over.
 */
export function identifySeason(cleaned: string): string {
  for (const match of cleaned.matchAll(SEASON_PATTERN)) {
    const digits = match[1] ?? match[2];
    if (digits !== undefined && digits.length <= 2) {
      return padNumber(digits);
    }
  }
  return DEFAULT_SEASON;
}
