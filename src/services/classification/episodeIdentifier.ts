/**
 * Episode Identifier
 *
 * Ordered cascade of (pattern, extractor) rules. The first rule with any
 * match wins; within it, matches are taken left to right and the first one
 * yielding at most two digits is accepted. Explicit markers (E09, 第10话)
 * outrank ranges, which outrank bare numbers.
 */

import { DEFAULT_EPISODE } from '../../types/classification.js';
import { padNumber } from './seasonIdentifier.js';

export interface EpisodeRule {
  name: string;
  pattern: RegExp;
  extract: (match: RegExpMatchArray) => string | undefined;
}

export const EPISODE_RULES: readonly EpisodeRule[] = [
  {
    name: 'marker',
    pattern: /E(p)?(\d{1,2})/gi,
    extract: match => match[2],
  },
  {
    name: 'chinese-marker',
    pattern: /第(\d{1,2})话/g,
    extract: match => match[1],
  },
  {
    name: 'range',
    pattern: /\b(\d{1,2})-(\d{1,2})\b/g,
    extract: match => match[1],
  },
  {
    name: 'bare-number',
    pattern: /\b(\d{1,2})\b/g,
    extract: match => match[1],
  },
];

/**
 * Run the rule cascade; undefined when nothing acceptable was found
 */
export function matchEpisode(
  cleaned: string,
  rules: readonly EpisodeRule[] = EPISODE_RULES
): { rule: string; episode: string } | undefined {
  for (const rule of rules) {
    for (const match of cleaned.matchAll(rule.pattern)) {
      const digits = rule.extract(match);
      if (digits !== undefined && digits.length <= 2) {
        return { rule: rule.name, episode: padNumber(digits) };
      }
    }
  }
  return undefined;
}

/**
 * Episode number of a cleaned filename, two digits, defaulting to "01"
 */
export function identifyEpisode(cleaned: string): string {
  return matchEpisode(cleaned)?.episode ?? DEFAULT_EPISODE;
}
