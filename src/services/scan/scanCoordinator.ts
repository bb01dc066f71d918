/**
 * Scan Coordinator
 *
 * Drives one scan through its phases:
 *
 *   Enumerating → CacheFiltering → Analyzing → Organizing → Persisting → Done
 *
 * - CacheFiltering is sequential and completes before any analysis starts
 * - Analyzing fans out with p-map; tasks never touch the cache or write files
 * - Organizing is sequential, in enumeration order
 * - The cache is saved once, best-effort
 *
 * Only an invalid scan root is fatal. Every other failure is contained to
 * the file it happened on and reported in the summary.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';
import { InvalidScanRootError, InvalidStateError } from '../../errors/index.js';
import type { ScanConfig } from '../../config/types.js';
import type { TierName } from '../../types/evidence.js';
import type { ScanFileError, ScanOptions, ScanSummary } from '../../types/scan.js';
import { ResultCache } from '../cache/resultCacheService.js';
import { ensureTierFolders, resolveScanTargets } from '../files/targetResolver.js';
import { OrganizerService } from '../files/organizerService.js';
import type { OrganizeOutcome } from '../files/organizerService.js';
import { enumerateMediaFiles } from './mediaEnumerator.js';
import type { MediaFile } from './mediaEnumerator.js';
import type { MediaAnalyzer } from './mediaAnalyzer.js';
import { ORGANIZE_THRESHOLD, tierForScore } from './scoringEngine.js';

export enum ScanPhase {
  IDLE = 'idle',
  ENUMERATING = 'enumerating',
  CACHE_FILTERING = 'cache_filtering',
  ANALYZING = 'analyzing',
  ORGANIZING = 'organizing',
  PERSISTING = 'persisting',
  DONE = 'done',
}

const PHASE_ORDER: readonly ScanPhase[] = [
  ScanPhase.IDLE,
  ScanPhase.ENUMERATING,
  ScanPhase.CACHE_FILTERING,
  ScanPhase.ANALYZING,
  ScanPhase.ORGANIZING,
  ScanPhase.PERSISTING,
  ScanPhase.DONE,
];

/**
 * Tracks the phase of one scan and rejects out-of-order transitions
 */
export class ScanPhaseTracker {
  private current: ScanPhase = ScanPhase.IDLE;

  get phase(): ScanPhase {
    return this.current;
  }

  advance(next: ScanPhase): void {
    const expected = PHASE_ORDER[PHASE_ORDER.indexOf(this.current) + 1];
    if (next !== expected) {
      throw new InvalidStateError(expected ?? 'none', next, undefined, {
        service: 'ScanCoordinator',
        operation: 'advance',
        metadata: { from: this.current },
      });
    }
    logger.debug('Scan phase', { from: this.current, to: next });
    this.current = next;
  }
}

interface PendingFile {
  file: MediaFile;
  size: number;
  modified: Date;
}

function emptyTierCounts(): Record<TierName, number> {
  return { confirmed: 0, likely: 0, possible: 0, unlikely: 0 };
}

export class ScanCoordinator {
  constructor(
    private readonly analyzer: MediaAnalyzer,
    private readonly config: ScanConfig
  ) {}

  async scan(options: ScanOptions): Promise<ScanSummary> {
    const startedAt = Date.now();
    const rootPath = path.resolve(options.rootPath);
    const tracker = new ScanPhaseTracker();

    await this.validateRoot(rootPath);

    const targets = await resolveScanTargets(rootPath, this.config);
    await ensureTierFolders(targets.organizationDir);

    logger.info('Scan started', {
      rootPath,
      mode: options.apply ? 'apply' : 'preview',
      organizationDir: targets.organizationDir,
      cacheFile: targets.cacheFile,
      fallback: targets.fallback,
    });

    const errors: ScanFileError[] = [];
    const recordError = (filePath: string, phase: ScanPhase, error: unknown): void => {
      errors.push({
        filePath,
        phase,
        code: getErrorCode(error) ?? 'UNKNOWN',
        message: getErrorMessage(error),
      });
    };

    // Enumerating
    tracker.advance(ScanPhase.ENUMERATING);
    const files = await enumerateMediaFiles(rootPath, [targets.organizationDir]);
    const cache = await ResultCache.load(targets.cacheFile);

    // CacheFiltering
    tracker.advance(ScanPhase.CACHE_FILTERING);
    const pending: PendingFile[] = [];
    let skippedCached = 0;
    for (const file of files) {
      try {
        const stats = await fs.stat(file.filePath);
        if (cache.shouldSkip(file.filePath, stats.size, stats.mtime)) {
          skippedCached++;
          continue;
        }
        pending.push({ file, size: stats.size, modified: stats.mtime });
      } catch (error) {
        logger.warn('Cannot stat file, skipping', {
          filePath: file.filePath,
          error: getErrorMessage(error),
        });
        recordError(file.filePath, ScanPhase.CACHE_FILTERING, error);
      }
    }

    // Analyzing
    tracker.advance(ScanPhase.ANALYZING);
    const outcomes = await this.analyzer.analyzeAll(pending, this.config.concurrency);

    // Organizing
    tracker.advance(ScanPhase.ORGANIZING);
    const organizer = new OrganizerService({
      organizationDir: targets.organizationDir,
      organizationFolder: this.config.organizationFolder,
      scratchDir: this.config.scratchDir,
      conflictMaxAttempts: this.config.conflictMaxAttempts,
      apply: options.apply,
    });

    const tiers = emptyTierCounts();
    const organized: OrganizeOutcome[] = [];
    const movedFiles: string[] = [];
    let analyzed = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        errors.push({
          filePath: outcome.failure.file.filePath,
          phase: ScanPhase.ANALYZING,
          code: outcome.failure.code,
          message: outcome.failure.message,
        });
        continue;
      }

      analyzed++;
      const { item, analysis } = outcome;
      const { confidence } = analysis.result;
      const tier = tierForScore(confidence);
      tiers[tier]++;

      if (confidence < ORGANIZE_THRESHOLD) {
        cache.record(item.file.filePath, item.size, item.modified, confidence, false);
        continue;
      }

      try {
        const placed = await organizer.organize(item.file.filePath, tier, analysis.result);
        organized.push(placed);
        if (placed.action === 'moved') {
          movedFiles.push(placed.destinationPath);
        }
      } catch (error) {
        logger.error('Failed to organise detected file', {
          filePath: item.file.filePath,
          tier,
          confidence,
          error: getErrorMessage(error),
        });
        recordError(item.file.filePath, ScanPhase.ORGANIZING, error);
      }
    }

    // Persisting
    tracker.advance(ScanPhase.PERSISTING);
    const saveResult = await cache.save(targets.cacheFile);

    tracker.advance(ScanPhase.DONE);

    const summary: ScanSummary = {
      rootPath,
      mode: options.apply ? 'apply' : 'preview',
      organizationDir: targets.organizationDir,
      cacheFile: targets.cacheFile,
      constrainedMount: targets.constrainedMount,
      fallback: targets.fallback,
      totalFiles: files.length,
      skippedCached,
      analyzed,
      failed: errors.length,
      tiers,
      movedFiles,
      organized,
      errors,
      cacheSaved: saveResult.saved,
      durationMs: Date.now() - startedAt,
    };
    if (targets.fallbackReason) {
      summary.fallbackReason = targets.fallbackReason;
    }
    if (saveResult.error) {
      summary.cacheError = saveResult.error;
    }

    logger.info('Scan completed', {
      rootPath,
      totalFiles: summary.totalFiles,
      skippedCached,
      analyzed,
      failed: summary.failed,
      tiers,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async validateRoot(rootPath: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(rootPath)).isDirectory();
    } catch (error) {
      throw new InvalidScanRootError(rootPath, getErrorMessage(error), toError(error));
    }
    if (!isDirectory) {
      throw new InvalidScanRootError(rootPath, 'not a directory');
    }
  }
}
