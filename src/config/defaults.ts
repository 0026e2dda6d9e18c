import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  renamer: {
    dryRun: false,
    ignorePatterns: [],
  },
};
