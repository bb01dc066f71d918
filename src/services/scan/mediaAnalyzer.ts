/**
 * Media Analyzer
 *
 * Extract evidence and score it, for many files at once. Each task reads only
 * its own file and returns a result; failures are captured per file so one
 * unreadable file never aborts the batch.
 */

import pMap from 'p-map';
import { logger } from '../../utils/logger.js';
import { getErrorCode, getErrorMessage } from '../../utils/errorHandling.js';
import type { EvidenceBundle, ScoreResult } from '../../types/evidence.js';
import type { MediaFile } from './mediaEnumerator.js';
import type { ScoringEngine } from './scoringEngine.js';

/**
 * Anything that can turn a path into evidence
 */
export interface EvidenceSource {
  extract(filePath: string): Promise<EvidenceBundle>;
}

export interface AnalyzedFile {
  file: MediaFile;
  evidence: EvidenceBundle;
  result: ScoreResult;
}

export interface FailedAnalysis {
  file: MediaFile;
  code: string;
  message: string;
}

export type AnalysisOutcome<T extends { file: MediaFile }> =
  | { ok: true; item: T; analysis: AnalyzedFile }
  | { ok: false; item: T; failure: FailedAnalysis };

export class MediaAnalyzer {
  constructor(
    private readonly extractor: EvidenceSource,
    private readonly scoring: ScoringEngine
  ) {}

  async analyze(file: MediaFile): Promise<AnalyzedFile> {
    const evidence = await this.extractor.extract(file.filePath);
    const result = this.scoring.score(evidence, file.kind);
    return { file, evidence, result };
  }

  /**
   * Analyse items concurrently. Output order matches input order.
   */
  async analyzeAll<T extends { file: MediaFile }>(
    items: readonly T[],
    concurrency: number
  ): Promise<AnalysisOutcome<T>[]> {
    return pMap(
      items,
      async (item): Promise<AnalysisOutcome<T>> => {
        try {
          const analysis = await this.analyze(item.file);
          return { ok: true, item, analysis };
        } catch (error) {
          logger.warn('Failed to analyse file', {
            filePath: item.file.filePath,
            error: getErrorMessage(error),
          });
          return {
            ok: false,
            item,
            failure: {
              file: item.file,
              code: getErrorCode(error) ?? 'UNKNOWN',
              message: getErrorMessage(error),
            },
          };
        }
      },
      { concurrency: Math.max(1, concurrency) }
    );
  }
}
