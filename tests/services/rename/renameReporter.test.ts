import { jest } from '@jest/globals';
import {
  createSummary,
  formatOutcome,
  formatSummary,
  recordOutcome,
  reportOutcome,
} from '../../../src/services/rename/renameReporter.js';
import { RenameOutcome } from '../../../src/types/classification.js';
import { logger } from '../../../src/utils/logger.js';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const renamed: RenameOutcome = {
  status: 'renamed',
  sourcePath: '/m/[DMG] Show - 01.mkv',
  targetPath: '/m/Show - S01E01 - DMG.mkv',
};

const failed: RenameOutcome = {
  status: 'failed',
  sourcePath: '/m/[DMG] Show - 01.mkv',
  targetPath: '/m/Show - S01E01 - DMG.mkv',
  reason: 'permission denied',
  error: new Error('permission denied'),
};

describe('formatOutcome', () => {
  it('should format each status on one line', () => {
    expect(formatOutcome(renamed))
      .toBe('Renamed: /m/[DMG] Show - 01.mkv -> /m/Show - S01E01 - DMG.mkv');
    expect(formatOutcome({ ...renamed, dryRun: true }))
      .toBe('Would rename: /m/[DMG] Show - 01.mkv -> /m/Show - S01E01 - DMG.mkv');
    expect(formatOutcome(failed))
      .toBe('Rename failed: /m/[DMG] Show - 01.mkv -> /m/Show - S01E01 - DMG.mkv, error: permission denied');
    expect(formatOutcome({ status: 'unchanged', sourcePath: '/m/a.mkv', targetPath: '/m/a.mkv' }))
      .toBe('Already named: /m/a.mkv');
    expect(formatOutcome({ status: 'skipped', sourcePath: '/m/a.nfo', reason: 'matches ignore pattern *.nfo' }))
      .toBe('Skipped: /m/a.nfo (matches ignore pattern *.nfo)');
  });
});

describe('reportOutcome', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should log failures as errors and renames as info', () => {
    reportOutcome(failed);
    reportOutcome(renamed);

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      'Renamed: /m/[DMG] Show - 01.mkv -> /m/Show - S01E01 - DMG.mkv',
      { from: '/m/[DMG] Show - 01.mkv', to: '/m/Show - S01E01 - DMG.mkv' }
    );
  });
});

describe('summary', () => {
  it('should count outcomes by status and keep failures', () => {
    const summary = createSummary();
    recordOutcome(summary, renamed);
    recordOutcome(summary, failed);
    recordOutcome(summary, { status: 'skipped', sourcePath: '/m/a.nfo' });

    expect(summary).toMatchObject({ total: 3, renamed: 1, unchanged: 0, skipped: 1, failed: 1 });
    expect(summary.failures).toEqual([failed]);
    expect(formatSummary(summary))
      .toBe('Processed 3 file(s): 1 renamed, 0 unchanged, 1 skipped, 1 failed');
    expect(formatSummary(summary, true))
      .toBe('Processed 3 file(s): 1 would rename, 0 unchanged, 1 skipped, 1 failed');
  });
});
