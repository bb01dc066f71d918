/**
 * Scan Types
 *
 * Summary returned by one scan invocation. Created fresh per scan, never
 * persisted.
 */

import type { TierName } from './evidence.js';
import type { OrganizeOutcome } from '../services/files/organizerService.js';

export type ScanMode = 'apply' | 'preview';

export interface ScanOptions {
  rootPath: string;
  /** Move files instead of copying them */
  apply: boolean;
}

/**
 * A per-file failure, contained to that file
 */
export interface ScanFileError {
  filePath: string;
  phase: string;
  code: string;
  message: string;
}

export interface ScanSummary {
  rootPath: string;
  mode: ScanMode;
  organizationDir: string;
  cacheFile: string;
  constrainedMount: boolean;
  /** Organisation folder and cache were redirected to the scratch dir */
  fallback: boolean;
  fallbackReason?: string;
  totalFiles: number;
  skippedCached: number;
  analyzed: number;
  failed: number;
  /** Analysed files per tier */
  tiers: Record<TierName, number>;
  /** Destination paths of files that were moved */
  movedFiles: string[];
  organized: OrganizeOutcome[];
  errors: ScanFileError[];
  cacheSaved: boolean;
  cacheError?: string;
  durationMs: number;
}
