import {
  SegmentList,
  TechnicalKeywordSet,
  TokenizedFilename,
} from '../../types/classification.js';

/** Unified separator every delimiter is rewritten to */
export const SEGMENT_SEPARATOR = '|';

const DELIMITER_PATTERN = /[.\-_[\]()&\/]/g;

/**
 * Whether a segment contains any technical keyword (case-insensitive)
 */
export function isTechnicalSegment(segment: string, keywords: TechnicalKeywordSet): boolean {
  const lower = segment.toLowerCase();
  return keywords.some(keyword => keyword.length > 0 && lower.includes(keyword.toLowerCase()));
}

/**
 * Split a cleaned filename into ordered, trimmed, non-technical segments
 */
export function tokenize(cleaned: string, keywords: TechnicalKeywordSet): TokenizedFilename {
  const normalizedForDisplay = cleaned.replace(DELIMITER_PATTERN, SEGMENT_SEPARATOR);

  const segments: SegmentList = normalizedForDisplay
    .split(SEGMENT_SEPARATOR)
    .map(part => part.trim())
    .filter(part => part.length > 0 && !isTechnicalSegment(part, keywords));

  return { normalizedForDisplay, segments };
}
