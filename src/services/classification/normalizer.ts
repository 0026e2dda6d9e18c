/**
 * Filename Normalizer
 *
 * Strips release hashes and technical keywords from a raw base name,
 * producing the cleaned string every identifier works from.
 *
 * Keyword removal is plain substring removal, not word-anchored, so a keyword
 * can eat part of an adjacent word ("Webster" loses "Web"). Existing
 * classifications depend on this, so it stays.
 */

import { TechnicalKeywordSet } from '../../types/classification.js';

// [A1B2C3D4] style CRC/hash tags
const RELEASE_HASH_PATTERN = /\[[a-zA-Z0-9]{8}\]/g;
const EMPTY_BRACKETS_PATTERN = /\[\s*\]/g;
const WHITESPACE_RUN_PATTERN = /\s{2,}/g;

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove every case-insensitive occurrence of each keyword, in list order
 */
export function removeKeywords(text: string, keywords: TechnicalKeywordSet): string {
  let result = text;
  for (const keyword of keywords) {
    if (!keyword) continue;
    result = result.replace(new RegExp(escapeRegExp(keyword), 'gi'), '');
  }
  return result;
}

/**
 * Produce the cleaned filename
 *
 * @example
 * normalize('[VCB-Studio] Attack on Titan [01][Ma10p_1080p]', keywords)
 * // '[VCB-Studio] Attack on Titan [01][_]'
 */
export function normalize(raw: string, keywords: TechnicalKeywordSet): string {
  let text = raw.replace(RELEASE_HASH_PATTERN, '');
  text = removeKeywords(text, keywords);
  text = text.replace(EMPTY_BRACKETS_PATTERN, '[]');
  return text.replace(WHITESPACE_RUN_PATTERN, ' ').trim();
}
