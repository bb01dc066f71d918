/**
 * Target Resolver - where organised files and the cache go
 *
 * Regular roots: organisation folder under the root, cache inside it.
 * Constrained mounts (MTP/GVFS device mounts): organisation folder on the
 * mount, cache in the scratch dir.
 * If the organisation folder cannot be created, both move to the scratch dir
 * and the fallback is reported.
 */

import fs from 'fs-extra';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { TIER_NAMES } from '../../types/evidence.js';
import type { ScanConfig } from '../../config/types.js';

export interface ScanTargets {
  organizationDir: string;
  cacheFile: string;
  constrainedMount: boolean;
  fallback: boolean;
  fallbackReason?: string;
}

export type TargetConfig = Pick<
  ScanConfig,
  'organizationFolder' | 'cacheFileName' | 'scratchDir' | 'constrainedMountPatterns'
>;

export function isConstrainedMount(rootPath: string, patterns: readonly string[]): boolean {
  const normalized = rootPath.split(path.sep).join('/');
  return patterns.some(pattern => pattern.length > 0 && normalized.includes(pattern));
}

export async function resolveScanTargets(
  rootPath: string,
  config: TargetConfig
): Promise<ScanTargets> {
  const root = path.resolve(rootPath);
  const constrainedMount = isConstrainedMount(root, config.constrainedMountPatterns);
  const preferredDir = path.join(root, config.organizationFolder);

  try {
    await fs.ensureDir(preferredDir);
    const cacheDir = constrainedMount ? config.scratchDir : preferredDir;
    return {
      organizationDir: preferredDir,
      cacheFile: path.join(cacheDir, config.cacheFileName),
      constrainedMount,
      fallback: false,
    };
  } catch (error) {
    const fallbackDir = path.join(config.scratchDir, config.organizationFolder);
    const fallbackReason = `Cannot create ${preferredDir}: ${getErrorMessage(error)}`;

    logger.warn('Organisation folder not writable, using scratch location', {
      rootPath: root,
      constrainedMount,
      fallbackDir,
      error: getErrorMessage(error),
    });

    return {
      organizationDir: fallbackDir,
      cacheFile: path.join(config.scratchDir, config.cacheFileName),
      constrainedMount,
      fallback: true,
      fallbackReason,
    };
  }
}

/**
 * Create the four tier folders. Best-effort: returns the folders that failed.
 */
export async function ensureTierFolders(organizationDir: string): Promise<string[]> {
  const failed: string[] = [];
  for (const tier of TIER_NAMES) {
    const tierDir = path.join(organizationDir, tier);
    try {
      await fs.ensureDir(tierDir);
    } catch (error) {
      logger.warn('Could not create tier folder', { tierDir, error: getErrorMessage(error) });
      failed.push(tierDir);
    }
  }
  return failed;
}
