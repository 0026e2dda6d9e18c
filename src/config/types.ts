export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    /** Megabytes per file before rotation */
    maxSize: number;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface RenamerConfig {
  /** Classify and report without touching the filesystem */
  dryRun: boolean;
  /** Optional JSON file of extra release group names */
  registryFile?: string | undefined;
  /** Glob patterns (minimatch) of base names to leave alone */
  ignorePatterns: string[];
}

export interface AppConfig {
  logging: LoggingConfig;
  renamer: RenamerConfig;
}
