/**
 * Detection Heuristics
 *
 * Indicator vocabularies, resolution tables and patterns used by the evidence
 * extractor and the scoring engine. Loaded once from JSON, validated with zod,
 * compiled (lowercased terms, resolution lookup sets, regexes) and frozen.
 * Components receive the compiled object by reference.
 */

import fs from 'fs';
import { z } from 'zod';
import bundledHeuristics from './heuristics.json';
import { ConfigurationError, SchemaValidationError } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

const resolutionSchema = z.tuple([z.number().int().positive(), z.number().int().positive()]);

export const heuristicsFileSchema = z.object({
  indicatorVocabulary: z.array(z.string().min(1)).min(1),
  brandTerms: z.array(z.string().min(1)).min(1),
  aigcMarker: z.string().min(1),
  contentHashMarker: z.string().min(1),
  cameraMarkers: z.array(z.string().min(1)).min(1),
  videoIdPattern: z.string().min(1),
  resolutions: z.object({
    app: z.array(resolutionSchema),
    screenshot: z.array(resolutionSchema),
    video: z.array(resolutionSchema),
    preferredVideo: z.array(resolutionSchema),
  }),
  videoIndicators: z.array(
    z.object({
      token: z.string().min(1),
      weight: z.number().int().positive(),
    })
  ),
  downloadName: z.object({
    prefix: z.string().min(1),
    extension: z.string().min(1),
  }),
});

export type HeuristicsFile = z.infer<typeof heuristicsFileSchema>;

/**
 * Set of "WIDTHxHEIGHT" keys for O(1) resolution lookups
 */
export type ResolutionSet = ReadonlySet<string>;

export interface VideoIndicator {
  readonly token: string;
  /** Lowercased token used for matching */
  readonly needle: string;
  readonly weight: number;
}

export interface Heuristics {
  /** Terms that make a printable run worth keeping (lowercase) */
  readonly indicatorVocabulary: readonly string[];
  /** Narrower brand subset used by the string-evidence rule (lowercase) */
  readonly brandTerms: readonly string[];
  readonly aigcMarker: string;
  readonly contentHashMarker: string;
  /** Camera metadata markers as whole words, case-insensitive */
  readonly cameraMarkerPattern: RegExp;
  readonly videoIdPattern: RegExp;
  readonly resolutions: {
    readonly app: ResolutionSet;
    readonly screenshot: ResolutionSet;
    readonly video: ResolutionSet;
    readonly preferredVideo: ResolutionSet;
  };
  readonly videoIndicators: readonly VideoIndicator[];
  readonly downloadName: {
    readonly prefix: string;
    readonly extension: string;
  };
}

export function resolutionKey(width: number, height: number): string {
  return `${width}x${height}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toResolutionSet(pairs: Array<[number, number]>): ResolutionSet {
  return new Set(pairs.map(([width, height]) => resolutionKey(width, height)));
}

function compilePattern(source: string, flags: string, key: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(
      key,
      `Invalid pattern for '${key}': ${getErrorMessage(error)}`,
      { service: 'heuristics' },
      toError(error)
    );
  }
}

/**
 * Validate raw heuristics data and compile it into the frozen runtime form
 */
export function compileHeuristics(raw: unknown): Heuristics {
  const parsed = heuristicsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaValidationError(
      parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      'Heuristics file failed validation',
      { service: 'heuristics' }
    );
  }

  const data = parsed.data;
  const cameraAlternation = data.cameraMarkers.map(escapeRegExp).join('|');

  return Object.freeze({
    indicatorVocabulary: Object.freeze(data.indicatorVocabulary.map(term => term.toLowerCase())),
    brandTerms: Object.freeze(data.brandTerms.map(term => term.toLowerCase())),
    aigcMarker: data.aigcMarker.toLowerCase(),
    contentHashMarker: data.contentHashMarker.toLowerCase(),
    cameraMarkerPattern: compilePattern(`\\b(?:${cameraAlternation})\\b`, 'i', 'cameraMarkers'),
    videoIdPattern: compilePattern(data.videoIdPattern, '', 'videoIdPattern'),
    resolutions: Object.freeze({
      app: toResolutionSet(data.resolutions.app),
      screenshot: toResolutionSet(data.resolutions.screenshot),
      video: toResolutionSet(data.resolutions.video),
      preferredVideo: toResolutionSet(data.resolutions.preferredVideo),
    }),
    videoIndicators: Object.freeze(
      data.videoIndicators.map(indicator =>
        Object.freeze({
          token: indicator.token,
          needle: indicator.token.toLowerCase(),
          weight: indicator.weight,
        })
      )
    ),
    downloadName: Object.freeze({
      prefix: data.downloadName.prefix.toLowerCase(),
      extension: data.downloadName.extension.toLowerCase(),
    }),
  });
}

/**
 * Load heuristics from an override file, or the bundled defaults
 */
export function loadHeuristics(filePath?: string): Heuristics {
  if (!filePath) {
    return compileHeuristics(bundledHeuristics);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      'HEURISTICS_FILE',
      `Failed to read heuristics file ${filePath}: ${getErrorMessage(error)}`,
      { service: 'heuristics', filePath },
      toError(error)
    );
  }

  return compileHeuristics(raw);
}
