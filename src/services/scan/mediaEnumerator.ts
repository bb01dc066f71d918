/**
 * Media Enumerator
 *
 * Recursively lists recognised media files under a root, depth-first with
 * entries sorted by name so repeated scans see files in the same order.
 * Symlinks are not followed and excluded directories (the organisation
 * folder) are never entered.
 */

import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { MediaKind } from '../../types/evidence.js';

export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.flv', '.webm'];

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif', '.bmp'];

const MEDIA_EXTENSIONS = new Set([...IMAGE_EXTENSIONS, ...VIDEO_EXTENSIONS]);

export interface MediaFile {
  filePath: string;
  kind: Exclude<MediaKind, 'generic'>;
}

export function isMediaFile(filePath: string): boolean {
  return MEDIA_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function mediaKindFor(filePath: string): Exclude<MediaKind, 'generic'> {
  return VIDEO_EXTENSIONS.includes(path.extname(filePath).toLowerCase()) ? 'video' : 'photo';
}

export async function enumerateMediaFiles(
  rootPath: string,
  excludeDirs: readonly string[] = []
): Promise<MediaFile[]> {
  const excluded = new Set(excludeDirs.map(dir => path.resolve(dir)));
  const results: MediaFile[] = [];

  const walk = async (dirPath: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      logger.warn('Skipping unreadable directory', {
        dirPath,
        error: getErrorMessage(error),
      });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entryPath)) {
          await walk(entryPath);
        }
      } else if (entry.isFile() && isMediaFile(entry.name)) {
        results.push({ filePath: entryPath, kind: mediaKindFor(entry.name) });
      }
    }
  };

  await walk(path.resolve(rootPath));
  return results;
}
