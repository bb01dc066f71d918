/**
 * Result Cache Service
 *
 * Persisted map of file path → last analysis result, used to skip unchanged
 * files that were previously rejected. Owned by a single scan: loaded once,
 * mutated in memory, saved once.
 *
 * Skip rule: same size AND same modification time AND isMatch=false.
 * Files once flagged as a match are always re-examined.
 *
 * Loading never fails. Missing → empty, corrupt → warning + empty,
 * list-only legacy documents → migrated with empty per-file metadata.
 * Saving never throws; the outcome is returned.
 */

import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { CacheCorruptError } from '../../errors/index.js';
import { CACHE_SCHEMA_VERSION } from '../../types/cache.js';
import type {
  CacheDocument,
  CacheEntry,
  CacheSaveResult,
  CacheStats,
} from '../../types/cache.js';

const cacheEntrySchema = z.object({
  size: z.number().int().nonnegative(),
  modified: z.string().min(1),
  confidence: z.number(),
  isMatch: z.boolean(),
});

/**
 * Lenient envelope: every field optional so older and newer documents load.
 * Unknown fields are dropped.
 */
const cacheEnvelopeSchema = z.object({
  version: z.string().optional(),
  lastUpdated: z.string().nullable().optional(),
  scannedFiles: z.array(z.string()).optional(),
  files: z.record(z.unknown()).optional(),
});

/**
 * Oldest format: a bare list of scanned paths
 */
const bareListSchema = z.array(z.string());

function toIsoTimestamp(modified: Date | string): string {
  return typeof modified === 'string' ? modified : modified.toISOString();
}

function emptyDocument(): CacheDocument {
  return {
    version: CACHE_SCHEMA_VERSION,
    lastUpdated: null,
    scannedFiles: [],
    files: {},
  };
}

export class ResultCache {
  private document: CacheDocument;
  private readonly scannedSet: Set<string>;

  private constructor(document: CacheDocument) {
    this.document = document;
    this.scannedSet = new Set(document.scannedFiles);
  }

  static empty(): ResultCache {
    return new ResultCache(emptyDocument());
  }

  /**
   * Load a cache file. Never throws.
   */
  static async load(location: string): Promise<ResultCache> {
    let raw: string;
    try {
      if (!(await fs.pathExists(location))) {
        logger.debug('No cache file found, starting empty', { location });
        return ResultCache.empty();
      }
      raw = await fs.readFile(location, 'utf-8');
    } catch (error) {
      logger.warn('Cache file unreadable, starting empty', {
        location,
        error: getErrorMessage(error),
      });
      return ResultCache.empty();
    }

    try {
      return new ResultCache(ResultCache.parseDocument(JSON.parse(raw), location));
    } catch (error) {
      const corrupt =
        error instanceof CacheCorruptError
          ? error
          : new CacheCorruptError(location, undefined, toError(error));
      logger.warn('Cache file corrupt, starting empty', corrupt.toJSON());
      return ResultCache.empty();
    }
  }

  /**
   * Normalise any known on-disk shape into the current document
   */
  static parseDocument(data: unknown, location: string): CacheDocument {
    const bareList = bareListSchema.safeParse(data);
    if (bareList.success) {
      logger.info('Migrating list-only cache document', { location, paths: bareList.data.length });
      return { ...emptyDocument(), scannedFiles: bareList.data };
    }

    const envelope = cacheEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new CacheCorruptError(
        location,
        `Cache document has an unexpected shape: ${envelope.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }

    const { version, lastUpdated, scannedFiles, files } = envelope.data;

    if (!version) {
      logger.info('Migrating unversioned cache document', { location });
    } else if (version !== CACHE_SCHEMA_VERSION) {
      logger.info('Cache document version differs, reading known fields', {
        location,
        version,
        expected: CACHE_SCHEMA_VERSION,
      });
    }

    const entries: Record<string, CacheEntry> = {};
    let dropped = 0;
    for (const [filePath, value] of Object.entries(files ?? {})) {
      const entry = cacheEntrySchema.safeParse(value);
      if (entry.success) {
        entries[filePath] = entry.data;
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      logger.warn('Dropped malformed cache entries', { location, dropped });
    }

    return {
      version: CACHE_SCHEMA_VERSION,
      lastUpdated: lastUpdated ?? null,
      scannedFiles: scannedFiles ?? [],
      files: entries,
    };
  }

  get(filePath: string): CacheEntry | undefined {
    return this.document.files[path.resolve(filePath)];
  }

  shouldSkip(filePath: string, size: number, modified: Date | string): boolean {
    const entry = this.get(filePath);
    if (!entry || entry.isMatch) {
      return false;
    }
    return entry.size === size && entry.modified === toIsoTimestamp(modified);
  }

  /**
   * Store the latest result for a path, replacing any previous entry
   */
  record(
    filePath: string,
    size: number,
    modified: Date | string,
    confidence: number,
    isMatch: boolean
  ): void {
    const key = path.resolve(filePath);
    this.document.files[key] = {
      size,
      modified: toIsoTimestamp(modified),
      confidence,
      isMatch,
    };

    if (!isMatch && !this.scannedSet.has(key)) {
      this.scannedSet.add(key);
      this.document.scannedFiles.push(key);
    }
  }

  /**
   * Write the cache to disk. Failure is reported, never thrown.
   */
  async save(location: string): Promise<CacheSaveResult> {
    this.document.lastUpdated = new Date().toISOString();
    try {
      await fs.ensureDir(path.dirname(location));
      await fs.writeFile(location, JSON.stringify(this.document, null, 2), 'utf-8');
      logger.debug('Cache saved', { location, entries: this.stats().entries });
      return { saved: true, path: location };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.warn('Cache could not be saved', { location, error: message });
      return { saved: false, path: location, error: message };
    }
  }

  stats(): CacheStats {
    return {
      entries: Object.keys(this.document.files).length,
      lastUpdated: this.document.lastUpdated,
    };
  }

  reset(): void {
    this.document = emptyDocument();
    this.scannedSet.clear();
  }

  toDocument(): CacheDocument {
    return structuredClone(this.document);
  }
}
