/**
 * Rename Orchestrator
 *
 * Drives the classification pipeline for one file and hands the physical
 * rename to its FileRenamer:
 *
 *   base name → normalize → tokenize
 *     → title / season / release group (reused from the directory cache)
 *     → episode (always recomputed)
 *     → "{title} - S{season}E{episode} - {releaseGroup}{ext}"
 *
 * Identifiers stay pure; only this class reads or writes the cache.
 * Rename failures become 'failed' outcomes and never abort a batch.
 */

import path from 'path';
import { ClassificationCache } from '../classification/classificationCache.js';
import { normalize } from '../classification/normalizer.js';
import { tokenize } from '../classification/tokenizer.js';
import { identifyGroup } from '../classification/releaseGroupIdentifier.js';
import { identifySeason } from '../classification/seasonIdentifier.js';
import { identifyEpisode } from '../classification/episodeIdentifier.js';
import { identifyTitle } from '../classification/titleIdentifier.js';
import { IgnorePatternService } from '../ignorePatternService.js';
import { FileRenamer } from './fileRenamer.js';
import {
  Classification,
  ClassifiedPath,
  DirectoryClassification,
  ReleaseGroupRegistry,
  RenameOutcome,
  TechnicalKeywordSet,
} from '../../types/classification.js';
import { logger } from '../../utils/logger.js';
import { createErrorLogContext, toError } from '../../utils/errorHandling.js';

export interface RenameOrchestratorOptions {
  registry: ReleaseGroupRegistry;
  keywords: TechnicalKeywordSet;
  renamer: FileRenamer;
  /** Report target names without renaming */
  dryRun?: boolean;
  ignorePatterns?: IgnorePatternService;
}

/**
 * Canonical target name for a classification
 */
export function buildTargetName(classification: Classification, extension: string): string {
  const { title, season, episode, releaseGroup } = classification;
  return `${title} - S${season}E${episode} - ${releaseGroup}${extension}`;
}

export class RenameOrchestrator {
  private readonly registry: ReleaseGroupRegistry;
  private readonly keywords: TechnicalKeywordSet;
  private readonly renamer: FileRenamer;
  private readonly dryRun: boolean;
  private readonly ignorePatterns: IgnorePatternService;

  constructor(options: RenameOrchestratorOptions) {
    this.registry = options.registry;
    this.keywords = options.keywords;
    this.renamer = options.renamer;
    this.dryRun = options.dryRun ?? false;
    this.ignorePatterns = options.ignorePatterns ?? new IgnorePatternService();
  }

  isDryRun(): boolean {
    return this.dryRun;
  }

  /**
   * Classify a file without touching the filesystem
   */
  classify(filePath: string, cache: ClassificationCache): ClassifiedPath {
    const directory = path.dirname(filePath);
    const fileName = path.basename(filePath);
    const extension = path.extname(fileName);
    const baseName = path.basename(fileName, extension);

    const cleanedName = normalize(baseName, this.keywords);
    const { segments } = tokenize(cleanedName, this.keywords);

    let scoped: DirectoryClassification | undefined = cache.get(directory);
    const fromCache = scoped !== undefined;

    if (!scoped) {
      scoped = {
        title: identifyTitle(segments, this.registry),
        season: identifySeason(cleanedName),
        releaseGroup: identifyGroup(cleanedName, segments, this.registry),
      };
      cache.put(directory, scoped);
    }

    const classification: Classification = {
      ...scoped,
      episode: identifyEpisode(cleanedName),
    };

    const targetName = buildTargetName(classification, extension);

    return {
      sourcePath: filePath,
      directory,
      baseName,
      extension,
      cleanedName,
      classification,
      fromCache,
      targetName,
      targetPath: path.join(directory, targetName),
    };
  }

  /**
   * Classify and rename one file
   */
  async process(filePath: string, cache: ClassificationCache): Promise<RenameOutcome> {
    const fileName = path.basename(filePath);
    const ignored = this.ignorePatterns.findMatch(fileName);
    if (ignored) {
      return {
        status: 'skipped',
        sourcePath: filePath,
        reason: `matches ignore pattern ${ignored.pattern}`,
      };
    }

    const classified = this.classify(filePath, cache);
    const { classification, targetPath } = classified;

    logger.debug('Classified file', {
      file: filePath,
      cleaned: classified.cleanedName,
      fromCache: classified.fromCache,
      ...classification,
    });

    if (targetPath === filePath) {
      return { status: 'unchanged', sourcePath: filePath, targetPath, classification };
    }

    if (this.dryRun) {
      return { status: 'renamed', sourcePath: filePath, targetPath, classification, dryRun: true };
    }

    try {
      await this.renamer.rename(filePath, targetPath);
      return { status: 'renamed', sourcePath: filePath, targetPath, classification };
    } catch (error) {
      logger.debug('Rename failed', createErrorLogContext(error, { file: filePath, targetPath }));
      const cause = toError(error);
      return {
        status: 'failed',
        sourcePath: filePath,
        targetPath,
        classification,
        reason: cause.message,
        error: cause,
      };
    }
  }
}
