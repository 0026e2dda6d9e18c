import { createInterface } from 'readline/promises';
import { ConfigManager } from './config/ConfigManager.js';
import { getDefaultTechnicalKeywords, loadRegistry } from './config/registry.js';
import { IgnorePatternService } from './services/ignorePatternService.js';
import { FileRenamer, FsFileRenamer } from './services/rename/fileRenamer.js';
import { RenameOrchestrator } from './services/rename/renameOrchestrator.js';
import { RenameService } from './services/rename/renameService.js';
import { formatSummary } from './services/rename/renameReporter.js';
import { RenameOutcome } from './types/classification.js';
import { ApplicationError, InvalidInputPathError, ValidationError } from './errors/index.js';
import { initializeLogger, logger } from './utils/logger.js';

export const USAGE = [
  'Usage: release-renamer [options] [path]',
  '',
  'Renames every file under <path> to "{Title} - S{season}E{episode} - {Group}{ext}".',
  'Prompts for a path when none is given.',
  '',
  'Options:',
  '  -n, --dry-run   Show the new names without renaming anything',
  '  -h, --help      Show this help',
].join('\n');

export interface CliOptions {
  inputPath?: string;
  dryRun: boolean;
  help: boolean;
}

/**
 * Parse command-line arguments (without the node/script prefix)
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { dryRun: false, help: false };

  for (const arg of argv) {
    if (arg === '--dry-run' || arg === '-n') {
      options.dryRun = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw new ValidationError(`Unknown option: ${arg}`, { operation: 'parseArgs' });
    } else if (options.inputPath === undefined) {
      options.inputPath = arg;
    } else {
      throw new ValidationError(`Unexpected argument: ${arg}`, { operation: 'parseArgs' });
    }
  }

  return options;
}

/**
 * Clean a path typed or pasted at the prompt (drag-and-drop adds quotes)
 */
export function cleanPromptInput(input: string): string {
  return input.trim().replace(/^"+|"+$/g, '');
}

async function promptForPath(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export interface AppOptions {
  config?: ConfigManager;
  renamer?: FileRenamer;
  prompt?: (question: string) => Promise<string>;
  onOutcome?: (outcome: RenameOutcome) => void;
  write?: (text: string) => void;
}

export class App {
  private readonly config: ConfigManager;
  private readonly renamer: FileRenamer;
  private readonly prompt: (question: string) => Promise<string>;
  private readonly onOutcome: ((outcome: RenameOutcome) => void) | undefined;
  private readonly write: (text: string) => void;

  constructor(options: AppOptions = {}) {
    this.config = options.config ?? ConfigManager.getInstance();
    this.renamer = options.renamer ?? new FsFileRenamer();
    this.prompt = options.prompt ?? promptForPath;
    this.onOutcome = options.onOutcome;
    this.write = options.write ?? (text => process.stdout.write(`${text}\n`));
  }

  /**
   * Run the CLI; resolves to the process exit code
   */
  async run(argv: readonly string[]): Promise<number> {
    let options: CliOptions;
    try {
      options = parseArgs(argv);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.write(`${error.message}\n\n${USAGE}`);
        return 1;
      }
      throw error;
    }

    if (options.help) {
      this.write(USAGE);
      return 0;
    }

    initializeLogger(this.config.getLoggingConfig());
    const renamerConfig = this.config.getRenamerConfig();
    const dryRun = options.dryRun || renamerConfig.dryRun;

    try {
      const inputPath = options.inputPath ?? cleanPromptInput(
        await this.prompt('Enter a file or folder path: ')
      );

      const orchestrator = new RenameOrchestrator({
        registry: await loadRegistry(renamerConfig.registryFile),
        keywords: getDefaultTechnicalKeywords(),
        renamer: this.renamer,
        dryRun,
        ignorePatterns: new IgnorePatternService(renamerConfig.ignorePatterns),
      });

      const service = new RenameService(
        orchestrator,
        this.onOutcome ? { onOutcome: this.onOutcome } : {}
      );
      const summary = await service.run(inputPath);

      logger.info(formatSummary(summary, dryRun));
      return summary.failed > 0 ? 1 : 0;
    } catch (error) {
      if (error instanceof InvalidInputPathError) {
        logger.error(`Invalid path: ${error.inputPath}`);
        return 1;
      }
      if (error instanceof ApplicationError) {
        logger.error(error.message, error.toJSON());
        return 1;
      }
      throw error;
    }
  }
}

/**
 * Process entry: builds the App (reading configuration) and runs it.
 * Configuration errors become exit code 1 instead of an uncaught throw.
 */
export async function main(
  argv: readonly string[],
  createApp: () => App = () => new App()
): Promise<number> {
  let app: App;
  try {
    app = createApp();
  } catch (error) {
    if (error instanceof ApplicationError) {
      logger.error(error.message, error.toJSON());
      return 1;
    }
    throw error;
  }
  return app.run(argv);
}
