/**
 * Classification Types
 *
 * Shapes that flow through the filename classification pipeline:
 * raw name → cleaned name → segments → classification → rename outcome.
 */

/**
 * Ordered, case-insensitive list of quality/codec/container tokens.
 * Order matters: a token must precede any shorter token it contains.
 */
export type TechnicalKeywordSet = readonly string[];

/**
 * Ordered list of known release group names in canonical casing
 */
export type ReleaseGroupRegistry = readonly string[];

/**
 * Filename segments after delimiter splitting, in original order
 */
export type SegmentList = readonly string[];

/**
 * Tokenizer output
 */
export interface TokenizedFilename {
  /** Cleaned name with every delimiter rewritten to the separator */
  normalizedForDisplay: string;
  segments: SegmentList;
}

/**
 * Directory-scoped part of a classification (cacheable per directory)
 */
export interface DirectoryClassification {
  title: string;
  /** Two-digit, zero-padded */
  season: string;
  releaseGroup: string;
}

/**
 * Full classification of a single file
 */
export interface Classification extends DirectoryClassification {
  /** Two-digit, zero-padded; always computed per file */
  episode: string;
}

/**
 * Classification of one file plus the parts needed to rename it
 */
export interface ClassifiedPath {
  sourcePath: string;
  directory: string;
  /** Base name without extension */
  baseName: string;
  /** Extension including the dot, verbatim (may be empty) */
  extension: string;
  cleanedName: string;
  classification: Classification;
  /** Whether the directory-scoped fields came from the cache */
  fromCache: boolean;
  targetName: string;
  targetPath: string;
}

export type RenameStatus = 'renamed' | 'unchanged' | 'skipped' | 'failed';

/**
 * Result of processing one file
 */
export interface RenameOutcome {
  status: RenameStatus;
  sourcePath: string;
  /** Attempted target path (absent for skipped files) */
  targetPath?: string;
  classification?: Classification;
  /** Set when the rename was only reported, not performed */
  dryRun?: boolean;
  /** Human-readable failure or skip reason */
  reason?: string;
  error?: Error;
}

/**
 * Aggregate counts for a run
 */
export interface RenameSummary {
  total: number;
  renamed: number;
  unchanged: number;
  skipped: number;
  failed: number;
  failures: RenameOutcome[];
}

/**
 * Sentinels used when a heuristic finds nothing
 */
export const UNKNOWN_RELEASE_GROUP = 'UNKnownSub';
export const UNKNOWN_TITLE = 'UnknownAnime';
export const DEFAULT_SEASON = '01';
export const DEFAULT_EPISODE = '01';
