import fs from 'fs-extra';
import os from 'os';
import path from 'path';

/**
 * Test File System Utilities
 *
 * Creates throwaway directory trees under the OS temp directory:
 * - Files are created empty unless content is given
 * - Everything is removed in cleanup()
 */
export class TestFileSystem {
  private root: string | null = null;

  async create(): Promise<string> {
    this.root = await fs.mkdtemp(path.join(os.tmpdir(), 'release-renamer-'));
    return this.root;
  }

  getRoot(): string {
    if (!this.root) {
      throw new Error('Test file system not created. Call create() first.');
    }
    return this.root;
  }

  /**
   * Create a file (and its parent directories) relative to the root
   */
  async addFile(relativePath: string, content = ''): Promise<string> {
    const filePath = path.join(this.getRoot(), relativePath);
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content);
    return filePath;
  }

  async addDirectory(relativePath: string): Promise<string> {
    const dirPath = path.join(this.getRoot(), relativePath);
    await fs.ensureDir(dirPath);
    return dirPath;
  }

  /**
   * Sorted file names directly inside a directory relative to the root
   */
  async listFiles(relativeDir = '.'): Promise<string[]> {
    const entries = await fs.readdir(path.join(this.getRoot(), relativeDir), { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile())
      .map(entry => entry.name)
      .sort();
  }

  async cleanup(): Promise<void> {
    if (this.root) {
      await fs.remove(this.root);
      this.root = null;
    }
  }
}
