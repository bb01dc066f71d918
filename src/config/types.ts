export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface ScanConfig {
  /** Analysis workers; defaults to the host's available parallelism */
  concurrency: number;
  /** Name of the organisation folder created under the scan root */
  organizationFolder: string;
  /** File name of the persisted result cache */
  cacheFileName: string;
  /** Local, writable location used when the scan root is not writable */
  scratchDir: string;
  /** Path substrings that mark a constrained (MTP/GVFS) mount */
  constrainedMountPatterns: string[];
  /** Upper bound of bytes read for the indicator string scan */
  maxStringScanBytes: number;
  /** Suffix probes tried before a filename conflict is reported */
  conflictMaxAttempts: number;
  /** Optional override for the bundled heuristics file */
  heuristicsFile?: string | undefined;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logging: LoggingConfig;
  scan: ScanConfig;
}
