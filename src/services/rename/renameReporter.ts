import { RenameOutcome, RenameSummary } from '../../types/classification.js';
import { logger } from '../../utils/logger.js';
import { getErrorCode } from '../../utils/errorHandling.js';

/**
 * One human-readable line per outcome
 */
export function formatOutcome(outcome: RenameOutcome): string {
  const target = outcome.targetPath ?? '';

  switch (outcome.status) {
    case 'renamed':
      return outcome.dryRun
        ? `Would rename: ${outcome.sourcePath} -> ${target}`
        : `Renamed: ${outcome.sourcePath} -> ${target}`;
    case 'unchanged':
      return `Already named: ${outcome.sourcePath}`;
    case 'skipped':
      return `Skipped: ${outcome.sourcePath} (${outcome.reason ?? 'ignored'})`;
    case 'failed':
      return `Rename failed: ${outcome.sourcePath} -> ${target}, error: ${outcome.reason ?? 'unknown error'}`;
  }
}

/**
 * Log an outcome at a level matching its status
 */
export function reportOutcome(outcome: RenameOutcome): void {
  const line = formatOutcome(outcome);
  const meta = {
    from: outcome.sourcePath,
    to: outcome.targetPath,
    ...(outcome.error && { code: getErrorCode(outcome.error) }),
  };

  if (outcome.status === 'failed') {
    logger.error(line, meta);
  } else if (outcome.status === 'skipped') {
    logger.debug(line, meta);
  } else {
    logger.info(line, meta);
  }
}

export function createSummary(): RenameSummary {
  return { total: 0, renamed: 0, unchanged: 0, skipped: 0, failed: 0, failures: [] };
}

/**
 * Fold an outcome into a summary (mutates and returns it)
 */
export function recordOutcome(summary: RenameSummary, outcome: RenameOutcome): RenameSummary {
  summary.total += 1;
  summary[outcome.status] += 1;
  if (outcome.status === 'failed') {
    summary.failures.push(outcome);
  }
  return summary;
}

export function formatSummary(summary: RenameSummary, dryRun = false): string {
  const verb = dryRun ? 'would rename' : 'renamed';
  return (
    `Processed ${summary.total} file(s): ${summary.renamed} ${verb}, ` +
    `${summary.unchanged} unchanged, ${summary.skipped} skipped, ${summary.failed} failed`
  );
}
