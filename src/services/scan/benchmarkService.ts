/**
 * Benchmark Service
 *
 * Scores two labelled sample folders (known positives, known negatives)
 * without touching the cache or organising anything, and reports:
 *
 * - sensitivity: share of analysed positives flagged as the target app
 * - specificity: share of analysed negatives NOT flagged
 *
 * Rates are null when a set has no analysable files.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { InvalidScanRootError } from '../../errors/index.js';
import type { TierName } from '../../types/evidence.js';
import type { ScanFileError } from '../../types/scan.js';
import { enumerateMediaFiles } from './mediaEnumerator.js';
import type { MediaAnalyzer } from './mediaAnalyzer.js';
import { tierForScore } from './scoringEngine.js';

export interface BenchmarkSetResult {
  dirPath: string;
  totalFiles: number;
  analyzed: number;
  /** Files flagged as the target app (CONFIRMED or LIKELY) */
  detected: number;
  tiers: Record<TierName, number>;
}

export interface BenchmarkReport {
  positive: BenchmarkSetResult;
  negative: BenchmarkSetResult;
  sensitivity: number | null;
  specificity: number | null;
  /** Negatives that were flagged */
  falsePositives: string[];
  /** Positives that were not flagged */
  missedPositives: string[];
  errors: ScanFileError[];
  durationMs: number;
}

interface SetRun {
  summary: BenchmarkSetResult;
  flagged: string[];
  unflagged: string[];
  errors: ScanFileError[];
}

export function rate(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

export class BenchmarkService {
  constructor(
    private readonly analyzer: MediaAnalyzer,
    private readonly concurrency: number
  ) {}

  async run(positiveDir: string, negativeDir: string): Promise<BenchmarkReport> {
    const startedAt = Date.now();

    const positive = await this.runSet(positiveDir);
    const negative = await this.runSet(negativeDir);

    const report: BenchmarkReport = {
      positive: positive.summary,
      negative: negative.summary,
      sensitivity: rate(positive.summary.detected, positive.summary.analyzed),
      specificity: rate(
        negative.summary.analyzed - negative.summary.detected,
        negative.summary.analyzed
      ),
      falsePositives: negative.flagged,
      missedPositives: positive.unflagged,
      errors: [...positive.errors, ...negative.errors],
      durationMs: Date.now() - startedAt,
    };

    logger.info('Benchmark completed', {
      sensitivity: report.sensitivity,
      specificity: report.specificity,
      falsePositives: report.falsePositives.length,
      missedPositives: report.missedPositives.length,
    });

    return report;
  }

  private async runSet(dirPath: string): Promise<SetRun> {
    const root = path.resolve(dirPath);
    await this.validateDir(root);

    const files = await enumerateMediaFiles(root);
    const outcomes = await this.analyzer.analyzeAll(
      files.map(file => ({ file })),
      this.concurrency
    );

    const tiers: Record<TierName, number> = { confirmed: 0, likely: 0, possible: 0, unlikely: 0 };
    const flagged: string[] = [];
    const unflagged: string[] = [];
    const errors: ScanFileError[] = [];

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        errors.push({
          filePath: outcome.failure.file.filePath,
          phase: 'benchmark',
          code: outcome.failure.code,
          message: outcome.failure.message,
        });
        continue;
      }
      const { result, file } = outcome.analysis;
      tiers[tierForScore(result.confidence)]++;
      if (result.isTargetApp) {
        flagged.push(file.filePath);
      } else {
        unflagged.push(file.filePath);
      }
    }

    return {
      summary: {
        dirPath: root,
        totalFiles: files.length,
        analyzed: flagged.length + unflagged.length,
        detected: flagged.length,
        tiers,
      },
      flagged,
      unflagged,
      errors,
    };
  }

  private async validateDir(dirPath: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(dirPath)).isDirectory();
    } catch (error) {
      throw new InvalidScanRootError(dirPath, getErrorMessage(error), toError(error));
    }
    if (!isDirectory) {
      throw new InvalidScanRootError(dirPath, 'not a directory');
    }
  }
}
