import { minimatch } from 'minimatch';
import { logger } from '../utils/logger.js';

export interface IgnorePattern {
  pattern: string;
  pattern_type: 'glob' | 'exact';
}

/**
 * Decides which files a run leaves untouched. Patterns come from
 * configuration and are matched case-insensitively against base names.
 */
export class IgnorePatternService {
  private readonly patterns: IgnorePattern[];

  constructor(patterns: readonly string[] = []) {
    this.patterns = patterns
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0)
      .map(pattern => ({
        pattern,
        pattern_type: pattern.includes('*') || pattern.includes('?') ? 'glob' : 'exact',
      }));
  }

  getPatterns(): readonly IgnorePattern[] {
    return this.patterns;
  }

  /**
   * The first pattern matching the file name, if any
   */
  findMatch(fileName: string): IgnorePattern | undefined {
    const lowerFileName = fileName.toLowerCase();

    for (const pattern of this.patterns) {
      const lowerPattern = pattern.pattern.toLowerCase();

      if (pattern.pattern_type === 'exact') {
        if (lowerFileName === lowerPattern) {
          logger.debug('File matched exact pattern', { fileName, pattern: pattern.pattern });
          return pattern;
        }
      } else if (
        lowerFileName === lowerPattern ||
        minimatch(lowerFileName, lowerPattern, { nocase: true, dot: true })
      ) {
        logger.debug('File matched glob pattern', { fileName, pattern: pattern.pattern });
        return pattern;
      }
    }

    return undefined;
  }

  matchesAnyPattern(fileName: string): boolean {
    return this.findMatch(fileName) !== undefined;
  }
}
