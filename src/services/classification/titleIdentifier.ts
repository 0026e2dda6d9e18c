import {
  ReleaseGroupRegistry,
  SegmentList,
  UNKNOWN_TITLE,
} from '../../types/classification.js';
import { findRegistryMatches } from './releaseGroupIdentifier.js';

const SEASON_TOKEN_PATTERN = /\b(season\s*\d{1,2}|s\d{1,2})\b/gi;
const EPISODE_TOKEN_PATTERN = /\bE(p)?\d{1,2}\b|\b\d{1,2}\b/gi;

/**
 * Remove season and episode tokens from a segment
 */
export function stripSeasonAndEpisode(segment: string): string {
  return segment
    .replace(SEASON_TOKEN_PATTERN, '')
    .replace(EPISODE_TOKEN_PATTERN, '')
    .trim();
}

/**
 * Pick the title from the segments: drop group-branded segments, strip
 * season/episode tokens, then take the longest survivor (first on ties).
 */
export function identifyTitle(segments: SegmentList, registry: ReleaseGroupRegistry): string {
  const candidates = segments
    .filter(segment => findRegistryMatches(segment, registry).length === 0)
    .map(stripSeasonAndEpisode)
    .filter(candidate => candidate.length > 0);

  if (candidates.length === 0) {
    return UNKNOWN_TITLE;
  }

  return candidates.reduce((best, candidate) => (candidate.length > best.length ? candidate : best));
}
