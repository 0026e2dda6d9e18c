import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { ClassificationCache } from '../classification/classificationCache.js';
import { RenameOrchestrator } from './renameOrchestrator.js';
import { walkDirectories } from './directoryWalker.js';
import { createSummary, recordOutcome, reportOutcome } from './renameReporter.js';
import { RenameOutcome, RenameSummary } from '../../types/classification.js';
import { InvalidInputPathError } from '../../errors/index.js';
import { logger } from '../../utils/logger.js';

export interface RenameServiceOptions {
  /** Called after every processed file; defaults to logging the outcome */
  onOutcome?: (outcome: RenameOutcome) => void;
}

/**
 * Runs the orchestrator over a file or a directory tree.
 *
 * One cache per run. A single file gets a fresh, empty cache; a directory
 * walk clears the cache on entering every directory, so reuse never spans
 * siblings or parent/child levels. Files are processed strictly in sequence.
 */
export class RenameService {
  private readonly onOutcome: (outcome: RenameOutcome) => void;

  constructor(
    private readonly orchestrator: RenameOrchestrator,
    options: RenameServiceOptions = {}
  ) {
    this.onOutcome = options.onOutcome ?? reportOutcome;
  }

  /**
   * @throws InvalidInputPathError when the path is neither a file nor a directory
   */
  async run(inputPath: string): Promise<RenameSummary> {
    const resolved = path.resolve(inputPath);
    const stats = await this.statOrUndefined(resolved);

    if (stats?.isFile()) {
      return this.renameFile(resolved);
    }

    if (stats?.isDirectory()) {
      return this.renameDirectory(resolved);
    }

    throw new InvalidInputPathError(inputPath, undefined, {
      service: 'RenameService',
      operation: 'run',
    });
  }

  private async renameFile(filePath: string): Promise<RenameSummary> {
    const summary = createSummary();
    const outcome = await this.orchestrator.process(filePath, new ClassificationCache());
    this.record(summary, outcome);
    return summary;
  }

  private async renameDirectory(rootPath: string): Promise<RenameSummary> {
    const summary = createSummary();
    const cache = new ClassificationCache();

    logger.info('Processing directory', { rootPath, dryRun: this.orchestrator.isDryRun() });

    for await (const batch of walkDirectories(rootPath)) {
      cache.clear();
      for (const filePath of batch.files) {
        const outcome = await this.orchestrator.process(filePath, cache);
        this.record(summary, outcome);
      }
    }

    return summary;
  }

  private record(summary: RenameSummary, outcome: RenameOutcome): void {
    recordOutcome(summary, outcome);
    this.onOutcome(outcome);
  }

  private async statOrUndefined(target: string): Promise<Stats | undefined> {
    try {
      return await fs.stat(target);
    } catch (error) {
      logger.debug('Unable to stat input path', { target, error });
      return undefined;
    }
  }
}
