import { DirectoryClassification } from '../../types/classification.js';

/**
 * Per-directory memo of the directory-scoped classification fields.
 *
 * Owned by a single traversal run. The traversal clears it on entering each
 * directory, so entries never outlive the directory they were computed for.
 * Episodes are never cached.
 */
export class ClassificationCache {
  private readonly entries = new Map<string, DirectoryClassification>();

  get(directory: string): DirectoryClassification | undefined {
    const entry = this.entries.get(directory);
    return entry ? { ...entry } : undefined;
  }

  has(directory: string): boolean {
    return this.entries.has(directory);
  }

  put(directory: string, entry: DirectoryClassification): void {
    this.entries.set(directory, {
      title: entry.title,
      season: entry.season,
      releaseGroup: entry.releaseGroup,
    });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
