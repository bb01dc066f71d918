/**
 * Result Cache Types
 *
 * Persisted shape of the scan cache. `scannedFiles` is kept for readers of
 * the older list-only format.
 */

export const CACHE_SCHEMA_VERSION = '2.0';

export interface CacheEntry {
  size: number;
  /** ISO-8601 modification time */
  modified: string;
  confidence: number;
  isMatch: boolean;
}

export interface CacheDocument {
  version: string;
  lastUpdated: string | null;
  scannedFiles: string[];
  files: Record<string, CacheEntry>;
}

export interface CacheStats {
  entries: number;
  lastUpdated: string | null;
}

/**
 * Outcome of a best-effort save. Never thrown.
 */
export interface CacheSaveResult {
  saved: boolean;
  path: string;
  error?: string;
}
