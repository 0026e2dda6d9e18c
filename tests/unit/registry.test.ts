import { jest } from '@jest/globals';
import path from 'path';
import {
  getDefaultRegistry,
  getDefaultTechnicalKeywords,
  loadRegistry,
  mergeRegistries,
} from '../../src/config/registry.js';
import { FileNotFoundError, SchemaValidationError } from '../../src/errors/index.js';
import { TestFileSystem } from '../utils/testFileSystem.js';

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('registry', () => {
  describe('defaults', () => {
    it('should load the built-in release groups in order', () => {
      const registry = getDefaultRegistry();

      expect(registry).toHaveLength(34);
      expect(registry[0]).toBe('VCB-Studio');
      expect(registry[33]).toBe('Skymoon-Raws');
      expect(registry).toContain('新Sub');
      expect(Object.isFrozen(registry)).toBe(true);
    });

    it('should load the built-in technical keywords in order', () => {
      const keywords = getDefaultTechnicalKeywords();

      expect(keywords).toHaveLength(21);
      expect(keywords[0]).toBe('1080p');
      expect(keywords.slice(-2)).toEqual(['1080', '1920']);
    });
  });

  describe('mergeRegistries', () => {
    it('should append new names and skip case-insensitive duplicates', () => {
      expect(mergeRegistries(['DMG', 'KTXP'], ['ktxp', 'NewGroup', 'newgroup']))
        .toEqual(['DMG', 'KTXP', 'NewGroup']);
    });
  });

  describe('loadRegistry', () => {
    const testFs = new TestFileSystem();

    beforeEach(async () => {
      await testFs.create();
    });

    afterEach(async () => {
      await testFs.cleanup();
    });

    it('should return the built-in registry without a file', async () => {
      expect(await loadRegistry()).toEqual(getDefaultRegistry());
    });

    it('should extend the registry from a JSON file', async () => {
      const file = await testFs.addFile('groups.json', JSON.stringify(['NewGroup', 'dmg']));

      const registry = await loadRegistry(file);

      expect(registry).toHaveLength(35);
      expect(registry[34]).toBe('NewGroup');
    });

    it('should reject an invalid registry file', async () => {
      const file = await testFs.addFile('groups.json', JSON.stringify(['']));

      await expect(loadRegistry(file)).rejects.toBeInstanceOf(SchemaValidationError);
      await expect(loadRegistry(file)).rejects.toMatchObject({
        errors: [{ path: '0', message: 'Name must not be empty' }],
      });
    });

    it('should report a missing registry file', async () => {
      const file = path.join(testFs.getRoot(), 'missing.json');

      await expect(loadRegistry(file)).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });
});
