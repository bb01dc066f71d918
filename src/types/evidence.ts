/**
 * Evidence & Scoring Types
 *
 * Evidence is gathered per file without any classification logic, then handed
 * to the scoring engine which turns it into a confidence score and verdict.
 *
 * Principle: "Gather the facts, then score them with explicit rules"
 */

/**
 * Pixel dimensions (both positive integers)
 */
export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Evidence Bundle - observable attributes of one file
 */
export interface EvidenceBundle {
  /** Absolute path to the file */
  filePath: string;
  /** Filename with extension */
  filename: string;
  /** File size in bytes */
  sizeBytes: number;
  dimensions?: Dimensions;
  /** width / height, present only when dimensions are */
  aspectRatio?: number;
  /** Container or pixel format label (e.g. "PNG", "WebP", "Rgb8", "MP4") */
  format?: string;
  /** Printable runs that matched the indicator vocabulary, in file order */
  foundStrings: string[];
}

/**
 * Media kind hint passed to the scoring engine.
 * 'generic' evaluates the shared base rules only.
 */
export type MediaKind = 'photo' | 'video' | 'generic';

/**
 * Verdict tiers, lowest to highest
 */
export enum Verdict {
  UNLIKELY = 'UNLIKELY',
  POSSIBLE = 'POSSIBLE',
  LIKELY = 'LIKELY',
  CONFIRMED = 'CONFIRMED',
}

/**
 * Organisation folder tier names
 */
export type TierName = 'confirmed' | 'likely' | 'possible' | 'unlikely';

export const TIER_NAMES: readonly TierName[] = ['confirmed', 'likely', 'possible', 'unlikely'];

/**
 * Score Result - output of the scoring engine
 */
export interface ScoreResult {
  /** Additive integer score, unbounded above */
  confidence: number;
  /** One entry per contributing rule, in evaluation order */
  evidence: string[];
  /** Structured lookups, e.g. video_dimensions → "1080x1920" */
  indicators: Record<string, string>;
  verdict: Verdict;
  /** True for CONFIRMED and LIKELY */
  isTargetApp: boolean;
  /** True when the camera-metadata exclusion fired */
  excluded: boolean;
}
