/**
 * Release Group Identifier
 *
 * Resolution order (first non-empty result wins):
 * 1. Registry entries found in the cleaned name (several → joined with "&")
 * 2. First segment advertising itself as a sub/studio team
 * 3. First segment ("[Group] Title" convention)
 * 4. UNKNOWN_RELEASE_GROUP
 */

import {
  ReleaseGroupRegistry,
  SegmentList,
  UNKNOWN_RELEASE_GROUP,
} from '../../types/classification.js';

const GROUP_HINTS = ['sub', 'studio'];

/** Joins co-release groups */
export const CO_RELEASE_SEPARATOR = '&';

/**
 * Registry entries contained in the text, in registry order, canonical casing
 */
export function findRegistryMatches(text: string, registry: ReleaseGroupRegistry): string[] {
  const lower = text.toLowerCase();
  return registry.filter(group => group.length > 0 && lower.includes(group.toLowerCase()));
}

export function identifyGroup(
  cleaned: string,
  segments: SegmentList,
  registry: ReleaseGroupRegistry
): string {
  const matches = findRegistryMatches(cleaned, registry);
  if (matches.length > 0) {
    return matches.join(CO_RELEASE_SEPARATOR);
  }

  const hinted = segments.find(segment => {
    const lower = segment.toLowerCase();
    return GROUP_HINTS.some(hint => lower.includes(hint));
  });
  if (hinted) {
    return hinted.trim();
  }

  if (segments.length > 0) {
    return segments[0];
  }

  return UNKNOWN_RELEASE_GROUP;
}
