/**
 * Organizer Service - places detected files into tier folders
 *
 * Apply mode:   move → copy → sidecar record
 * Preview mode: copy → sidecar record
 *
 * A detection is never dropped silently: when the file itself cannot be
 * placed, a text record describing the intended action is written instead.
 * Runs sequentially; callers must not organise two files concurrently.
 */

import fs from 'fs-extra';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ConflictUnresolvedError, PersistenceError } from '../../errors/index.js';
import type { ScoreResult, TierName } from '../../types/evidence.js';

export type OrganizeAction = 'moved' | 'copied' | 'recorded';

export interface OrganizeOutcome {
  sourcePath: string;
  /** Final location of the file, or of the sidecar record */
  destinationPath: string;
  action: OrganizeAction;
  tier: TierName;
  /** Why the preferred action was not taken */
  fallbackReason?: string;
}

export interface OrganizerOptions {
  organizationDir: string;
  /** Name used for the scratch results folder (`<name>_results`) */
  organizationFolder: string;
  scratchDir: string;
  conflictMaxAttempts: number;
  /** Move instead of copy */
  apply: boolean;
}

/**
 * First free path for `filename` in `dirPath`: the name itself, then
 * `<stem>_1<ext>` … `<stem>_<maxAttempts><ext>`.
 */
export async function resolveConflictFreePath(
  dirPath: string,
  filename: string,
  maxAttempts: number
): Promise<string> {
  const candidate = path.join(dirPath, filename);
  if (!(await fs.pathExists(candidate))) {
    return candidate;
  }

  const ext = path.extname(filename);
  const stem = path.basename(filename, ext);

  for (let i = 1; i <= maxAttempts; i++) {
    const suffixed = path.join(dirPath, `${stem}_${i}${ext}`);
    if (!(await fs.pathExists(suffixed))) {
      return suffixed;
    }
  }

  throw new ConflictUnresolvedError(candidate, maxAttempts, {
    service: 'OrganizerService',
    operation: 'resolveConflictFreePath',
  });
}

export function formatSidecarRecord(
  sourcePath: string,
  intendedPath: string,
  tier: TierName,
  result: ScoreResult,
  apply: boolean,
  reason: string
): string {
  const lines = [
    `Source: ${sourcePath}`,
    `Intended action: ${apply ? 'move' : 'copy'}`,
    `Intended destination: ${intendedPath}`,
    `Tier: ${tier}`,
    `Confidence: ${result.confidence}`,
    `Verdict: ${result.verdict}`,
    `Reason: ${reason}`,
    'Evidence:',
    ...result.evidence.map(entry => `  - ${entry}`),
  ];
  return `${lines.join('\n')}\n`;
}

export class OrganizerService {
  constructor(private readonly options: OrganizerOptions) {}

  async organize(sourcePath: string, tier: TierName, result: ScoreResult): Promise<OrganizeOutcome> {
    const filename = path.basename(sourcePath);
    const tierDir = path.join(this.options.organizationDir, tier);

    try {
      await fs.ensureDir(tierDir);
    } catch (error) {
      logger.debug('Tier folder unavailable', { tierDir, error: getErrorMessage(error) });
    }

    const destination = await resolveConflictFreePath(
      tierDir,
      filename,
      this.options.conflictMaxAttempts
    );

    let lastError: unknown;

    if (this.options.apply) {
      try {
        await fs.move(sourcePath, destination, { overwrite: false });
        logger.info('Moved detected file', { sourcePath, destination, tier });
        return { sourcePath, destinationPath: destination, action: 'moved', tier };
      } catch (error) {
        lastError = error;
        logger.warn('Move failed, falling back to copy', {
          sourcePath,
          destination,
          error: getErrorMessage(error),
        });
      }

      // A cross-device move copies first, so the file may already be in place
      if (await this.isPlaced(sourcePath, destination)) {
        logger.info('Detected file placed before move failed', { sourcePath, destination, tier });
        return {
          sourcePath,
          destinationPath: destination,
          action: 'copied',
          tier,
          fallbackReason: getErrorMessage(lastError),
        };
      }
    }

    try {
      await fs.copy(sourcePath, destination, { overwrite: false, errorOnExist: true });
      logger.info('Copied detected file', { sourcePath, destination, tier });
      const outcome: OrganizeOutcome = { sourcePath, destinationPath: destination, action: 'copied', tier };
      if (lastError !== undefined) {
        outcome.fallbackReason = getErrorMessage(lastError);
      }
      return outcome;
    } catch (error) {
      lastError = error;
      logger.warn('Copy failed, writing sidecar record', {
        sourcePath,
        destination,
        error: getErrorMessage(error),
      });
    }

    const reason = getErrorMessage(lastError);
    const record = formatSidecarRecord(sourcePath, destination, tier, result, this.options.apply, reason);
    const sidecarPath = await this.writeSidecar(filename, tier, record, lastError);

    return {
      sourcePath,
      destinationPath: sidecarPath,
      action: 'recorded',
      tier,
      fallbackReason: reason,
    };
  }

  private async isPlaced(sourcePath: string, destination: string): Promise<boolean> {
    try {
      const [source, placed] = await Promise.all([fs.stat(sourcePath), fs.stat(destination)]);
      return placed.isFile() && placed.size === source.size;
    } catch (error) {
      logger.debug('Destination not in place', { destination, error: getErrorMessage(error) });
      return false;
    }
  }

  /**
   * Write a sidecar record beside the tier folder, else in the scratch results folder
   */
  private async writeSidecar(
    filename: string,
    tier: TierName,
    record: string,
    originalError: unknown
  ): Promise<string> {
    const sidecarName = `${path.basename(filename, path.extname(filename))}_detection.txt`;
    const candidates = [
      path.join(this.options.organizationDir, tier),
      path.join(this.options.scratchDir, `${this.options.organizationFolder}_results`, tier),
    ];

    let lastError: unknown = originalError;
    for (const dirPath of candidates) {
      try {
        await fs.ensureDir(dirPath);
        const sidecarPath = await resolveConflictFreePath(
          dirPath,
          sidecarName,
          this.options.conflictMaxAttempts
        );
        await fs.writeFile(sidecarPath, record, 'utf-8');
        logger.info('Wrote sidecar detection record', { sidecarPath, tier });
        return sidecarPath;
      } catch (error) {
        lastError = error;
        logger.debug('Sidecar location unavailable', { dirPath, error: getErrorMessage(error) });
      }
    }

    throw new PersistenceError(
      candidates[candidates.length - 1],
      `Could not record detection for ${filename}: ${getErrorMessage(lastError)}`,
      { service: 'OrganizerService', operation: 'writeSidecar' },
      toError(lastError)
    );
  }
}
