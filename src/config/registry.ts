import fs from 'fs-extra';
import path from 'path';
import releaseGroupData from './releaseGroups.json';
import technicalKeywordData from './technicalKeywords.json';
import { ReleaseGroupRegistry, TechnicalKeywordSet } from '../types/classification.js';
import {
  parseWithSchema,
  releaseGroupRegistrySchema,
  technicalKeywordSchema,
} from '../validation/registrySchemas.js';
import { FileNotFoundError } from '../errors/index.js';
import { logger } from '../utils/logger.js';

/**
 * Built-in release group registry, in match/join order
 */
export function getDefaultRegistry(): ReleaseGroupRegistry {
  return Object.freeze(parseWithSchema(releaseGroupRegistrySchema, releaseGroupData, 'releaseGroups.json'));
}

/**
 * Built-in technical keyword list, in removal order
 */
export function getDefaultTechnicalKeywords(): TechnicalKeywordSet {
  return Object.freeze(parseWithSchema(technicalKeywordSchema, technicalKeywordData, 'technicalKeywords.json'));
}

/**
 * Append entries to a registry, skipping names already present (case-insensitive)
 */
export function mergeRegistries(
  base: ReleaseGroupRegistry,
  extra: readonly string[]
): ReleaseGroupRegistry {
  const seen = new Set(base.map(name => name.toLowerCase()));
  const merged = [...base];

  for (const name of extra) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(name);
  }

  return Object.freeze(merged);
}

/**
 * Built-in registry, extended by a user JSON file when one is configured
 */
export async function loadRegistry(registryFile?: string): Promise<ReleaseGroupRegistry> {
  const registry = getDefaultRegistry();
  if (!registryFile) {
    return registry;
  }

  const resolved = path.resolve(registryFile);
  if (!(await fs.pathExists(resolved))) {
    throw new FileNotFoundError(resolved, `Registry file not found: ${resolved}`, {
      operation: 'loadRegistry',
    });
  }

  const data: unknown = await fs.readJson(resolved);
  const extra = parseWithSchema(releaseGroupRegistrySchema, data, resolved);
  const merged = mergeRegistries(registry, extra);

  logger.info('Loaded custom release groups', {
    file: resolved,
    added: merged.length - registry.length,
    total: merged.length,
  });

  return merged;
}
