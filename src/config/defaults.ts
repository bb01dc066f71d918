import os from 'os';
import type { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  env: 'production',
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  scan: {
    concurrency: os.availableParallelism(),
    organizationFolder: 'clipsift',
    cacheFileName: 'clipsift-cache.json',
    scratchDir: os.tmpdir(),
    constrainedMountPatterns: ['gvfs/mtp', 'run/user'],
    maxStringScanBytes: 1024 * 1024, // 1 MiB
    conflictMaxAttempts: 999,
  },
};
