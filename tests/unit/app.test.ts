import { jest } from '@jest/globals';
import path from 'path';
import { App, USAGE, cleanPromptInput, main, parseArgs } from '../../src/app.js';
import { ConfigManager } from '../../src/config/ConfigManager.js';
import { ValidationError } from '../../src/errors/index.js';
import { RenameOutcome } from '../../src/types/classification.js';
import { logger } from '../../src/utils/logger.js';
import { TestFileSystem } from '../utils/testFileSystem.js';

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  initializeLogger: jest.fn(),
}));

describe('parseArgs', () => {
  it('should read flags and a path in any order', () => {
    expect(parseArgs(['/media', '-n'])).toEqual({ inputPath: '/media', dryRun: true, help: false });
    expect(parseArgs(['--help'])).toEqual({ dryRun: false, help: true });
  });

  it('should reject unknown options and extra arguments', () => {
    expect(() => parseArgs(['--force'])).toThrow(ValidationError);
    expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
  });
});

describe('cleanPromptInput', () => {
  it('should strip whitespace and surrounding quotes', () => {
    expect(cleanPromptInput('  "/media/My Show"\n')).toBe('/media/My Show');
    expect(cleanPromptInput('/media/show')).toBe('/media/show');
  });
});

describe('App', () => {
  const testFs = new TestFileSystem();
  let write: jest.Mock<(text: string) => void>;
  let outcomes: RenameOutcome[];

  const createApp = (
    env: NodeJS.ProcessEnv = {},
    prompt?: (question: string) => Promise<string>
  ): App =>
    new App({
      config: ConfigManager.fromEnv(env),
      write,
      onOutcome: outcome => outcomes.push(outcome),
      ...(prompt && { prompt }),
    });

  beforeEach(async () => {
    jest.clearAllMocks();
    write = jest.fn<(text: string) => void>();
    outcomes = [];
    await testFs.create();
  });

  afterEach(async () => {
    await testFs.cleanup();
  });

  it('should print usage for --help', async () => {
    expect(await createApp().run(['--help'])).toBe(0);
    expect(write).toHaveBeenCalledWith(USAGE);
  });

  it('should print usage and fail on a bad option', async () => {
    expect(await createApp().run(['--force'])).toBe(1);
    expect(write).toHaveBeenCalledWith(`Unknown option: --force\n\n${USAGE}`);
  });

  it('should rename a directory and log a summary', async () => {
    await testFs.addFile('[DMG] Show - 01.mkv');

    expect(await createApp().run([testFs.getRoot()])).toBe(0);

    expect(await testFs.listFiles()).toEqual(['Show - S01E01 - DMG.mkv']);
    expect(logger.info).toHaveBeenCalledWith(
      'Processed 1 file(s): 1 renamed, 0 unchanged, 0 skipped, 0 failed'
    );
  });

  it('should only report in dry-run mode', async () => {
    await testFs.addFile('[DMG] Show - 01.mkv');

    expect(await createApp().run(['--dry-run', testFs.getRoot()])).toBe(0);

    expect(await testFs.listFiles()).toEqual(['[DMG] Show - 01.mkv']);
    expect(outcomes[0].dryRun).toBe(true);
    expect(logger.info).toHaveBeenCalledWith(
      'Processed 1 file(s): 1 would rename, 0 unchanged, 0 skipped, 0 failed'
    );
  });

  it('should honour dry run and ignore patterns from the environment', async () => {
    await testFs.addFile('[DMG] Show - 01.mkv');
    await testFs.addFile('info.nfo');

    const exitCode = await createApp({
      RENAMER_DRY_RUN: 'true',
      RENAMER_IGNORE_PATTERNS: '*.NFO',
    }).run([testFs.getRoot()]);

    expect(exitCode).toBe(0);
    expect(await testFs.listFiles()).toEqual(['[DMG] Show - 01.mkv', 'info.nfo']);
    expect(outcomes.map(outcome => outcome.status).sort()).toEqual(['renamed', 'skipped']);
  });

  it('should prompt for a path when none is given', async () => {
    const filePath = await testFs.addFile('[DMG] Show - 04.mkv');
    const prompt = jest.fn<(question: string) => Promise<string>>();
    prompt.mockResolvedValue(` "${filePath}" `);

    expect(await createApp({}, prompt).run([])).toBe(0);

    expect(prompt).toHaveBeenCalledWith('Enter a file or folder path: ');
    expect(await testFs.listFiles()).toEqual(['Show - S01E04 - DMG.mkv']);
  });

  it('should fail on a path that does not exist', async () => {
    const missing = path.join(testFs.getRoot(), 'missing');

    expect(await createApp().run([missing])).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(`Invalid path: ${missing}`);
  });

  it('should fail when a rename fails', async () => {
    await testFs.addFile('[DMG] Show - 01.mkv');
    await testFs.addFile('Show - S01E01 - DMG.mkv');

    const exitCode = await createApp({ RENAMER_IGNORE_PATTERNS: 'Show - S01E01 - DMG.mkv' })
      .run([testFs.getRoot()]);

    expect(exitCode).toBe(1);
    expect(outcomes.filter(outcome => outcome.status === 'failed')).toHaveLength(1);
  });

  it('should fail when the configured registry file is missing', async () => {
    const registryFile = path.join(testFs.getRoot(), 'groups.json');

    expect(await createApp({ RENAMER_REGISTRY_FILE: registryFile }).run([testFs.getRoot()]))
      .toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      `Registry file not found: ${registryFile}`,
      expect.objectContaining({ code: 'FS_FILE_NOT_FOUND' })
    );
  });
});

describe('main', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should log invalid configuration and exit with 1', async () => {
    const exitCode = await main([], () => new App({ config: ConfigManager.fromEnv({ LOG_LEVEL: 'verbose' }) }));

    expect(exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Environment variable LOG_LEVEL must be one of: error, warn, info, debug',
      expect.objectContaining({ code: 'CONFIG_INVALID' })
    );
  });

  it('should run the app it builds', async () => {
    const write = jest.fn<(text: string) => void>();

    expect(await main(['--help'], () => new App({ config: ConfigManager.fromEnv({}), write }))).toBe(0);
    expect(write).toHaveBeenCalledWith(USAGE);
  });
});
