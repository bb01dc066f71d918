/**
 * Scoring Engine
 *
 * Pure, deterministic scoring of an EvidenceBundle. Rules live in data tables:
 * a shared base table evaluated for every media kind, with photo and video
 * tables layered on top. Each rule adds a fixed weight when its condition
 * holds and never depends on another rule having fired.
 *
 * Verdict thresholds:
 * - ≥70: CONFIRMED
 * - 40-69: LIKELY
 * - 20-39: POSSIBLE
 * - <20: UNLIKELY
 *
 * Only CONFIRMED and LIKELY count as a detection (isTargetApp).
 */

import type { Heuristics } from '../../config/heuristics.js';
import { resolutionKey } from '../../config/heuristics.js';
import { Verdict } from '../../types/evidence.js';
import type { EvidenceBundle, MediaKind, ScoreResult, TierName } from '../../types/evidence.js';

export const CONFIRMED_THRESHOLD = 70;
export const LIKELY_THRESHOLD = 40;
export const POSSIBLE_THRESHOLD = 20;

/** Confidence at which a file is organised rather than recorded as a non-match */
export const ORGANIZE_THRESHOLD = POSSIBLE_THRESHOLD;

const NINE_SIXTEEN = 0.5625;
const PORTRAIT_RANGE: readonly [number, number] = [0.55, 0.58];

const PHOTO_SIZE_RANGE: readonly [number, number] = [500_000, 5_000_000];
const VIDEO_SIZE_RANGE: readonly [number, number] = [100_000, 50_000_000];

interface RuleContext {
  bundle: EvidenceBundle;
  heuristics: Heuristics;
  lowerFilename: string;
  lowerStrings: string[];
}

interface RuleOutcome {
  points: number;
  evidence: string;
  indicators?: Record<string, string>;
}

export interface ScoringRule {
  name: string;
  evaluate(ctx: RuleContext): RuleOutcome[];
}

const NOT_FIRED: RuleOutcome[] = [];

function fired(points: number, evidence: string, indicators?: Record<string, string>): RuleOutcome[] {
  return [{ points, evidence, indicators }];
}

function dimensionKey(ctx: RuleContext): string | undefined {
  const dims = ctx.bundle.dimensions;
  return dims ? resolutionKey(dims.width, dims.height) : undefined;
}

function inClosedRange(value: number, [min, max]: readonly [number, number]): boolean {
  return value >= min && value <= max;
}

function inOpenRange(value: number, [min, max]: readonly [number, number]): boolean {
  return value > min && value < max;
}

function formatRatio(ratio: number): string {
  return ratio.toFixed(3);
}

/**
 * 32 hex digits, one dot, three-character extension
 */
function isHashStyleFilename(filename: string): boolean {
  if (filename.length !== 36) {
    return false;
  }
  const parts = filename.split('.');
  return parts.length === 2 && /^[0-9a-f]{32}$/i.test(parts[0]);
}

// ============================================
// Base Rules (all media kinds)
// ============================================

const BASE_RULES: readonly ScoringRule[] = [
  {
    name: 'aigc_marker',
    evaluate: ctx =>
      ctx.lowerStrings.some(s => s.includes(ctx.heuristics.aigcMarker))
        ? fired(40, 'AIGC label metadata found', { aigc_label: ctx.heuristics.aigcMarker })
        : NOT_FIRED,
  },
  {
    name: 'video_id',
    evaluate: ctx => {
      for (const value of ctx.bundle.foundStrings) {
        const match = ctx.heuristics.videoIdPattern.exec(value);
        if (match) {
          return fired(35, `Video ID pattern found: ${match[0]}`, { video_id: match[0] });
        }
      }
      return NOT_FIRED;
    },
  },
  {
    name: 'content_hash_marker',
    evaluate: ctx =>
      ctx.lowerStrings.some(s => s.includes(ctx.heuristics.contentHashMarker))
        ? fired(30, 'Content hash metadata found')
        : NOT_FIRED,
  },
  {
    name: 'app_resolution',
    evaluate: ctx => {
      const key = dimensionKey(ctx);
      return key && ctx.heuristics.resolutions.app.has(key)
        ? fired(25, `App resolution: ${key}`, { dimensions: key })
        : NOT_FIRED;
    },
  },
  {
    name: 'nine_sixteen_aspect',
    evaluate: ctx => {
      const ratio = ctx.bundle.aspectRatio;
      return ratio !== undefined && inClosedRange(ratio, PORTRAIT_RANGE)
        ? fired(15, `9:16 aspect ratio (${formatRatio(ratio)})`)
        : NOT_FIRED;
    },
  },
  {
    name: 'portrait',
    evaluate: ctx => {
      const dims = ctx.bundle.dimensions;
      return dims && dims.height > dims.width ? fired(5, 'Portrait orientation') : NOT_FIRED;
    },
  },
  {
    name: 'webp_named_png',
    evaluate: ctx =>
      ctx.lowerFilename.endsWith('.png') && (ctx.bundle.format ?? '').toLowerCase().includes('webp')
        ? fired(15, 'WebP content saved under a .png name', { format_mismatch: 'webp-as-png' })
        : NOT_FIRED,
  },
  {
    name: 'hash_filename',
    evaluate: ctx =>
      isHashStyleFilename(ctx.bundle.filename) ? fired(10, 'Hash-style filename') : NOT_FIRED,
  },
  {
    name: 'brand_reference',
    evaluate: ctx => {
      for (const value of ctx.lowerStrings) {
        const term = ctx.heuristics.brandTerms.find(t => value.includes(t));
        if (term) {
          return fired(20, `Brand reference found: ${term}`, { brand: term });
        }
      }
      return NOT_FIRED;
    },
  },
];

// ============================================
// Photo Rules
// ============================================

const PHOTO_RULES: readonly ScoringRule[] = [
  {
    name: 'screenshot_resolution',
    evaluate: ctx => {
      const key = dimensionKey(ctx);
      return key && ctx.heuristics.resolutions.screenshot.has(key)
        ? fired(15, `Mobile screenshot resolution: ${key}`, { photo_dimensions: key })
        : NOT_FIRED;
    },
  },
  {
    name: 'exact_nine_sixteen',
    evaluate: ctx => {
      const ratio = ctx.bundle.aspectRatio;
      return ratio !== undefined && Math.abs(ratio - NINE_SIXTEEN) <= 0.01
        ? fired(10, `Exact 9:16 aspect ratio (${formatRatio(ratio)})`)
        : NOT_FIRED;
    },
  },
  {
    name: 'hash_png_filename',
    evaluate: ctx =>
      isHashStyleFilename(ctx.bundle.filename) && ctx.lowerFilename.endsWith('.png')
        ? fired(8, 'Hash-style .png filename')
        : NOT_FIRED,
  },
  {
    name: 'photo_size',
    evaluate: ctx =>
      inOpenRange(ctx.bundle.sizeBytes, PHOTO_SIZE_RANGE)
        ? fired(5, `Typical photo size (${ctx.bundle.sizeBytes} bytes)`)
        : NOT_FIRED,
  },
];

// ============================================
// Video Rules
// ============================================

const VIDEO_RULES: readonly ScoringRule[] = [
  {
    name: 'video_resolution',
    evaluate: ctx => {
      const key = dimensionKey(ctx);
      return key && ctx.heuristics.resolutions.video.has(key)
        ? fired(30, `Video resolution: ${key}`, { video_dimensions: key })
        : NOT_FIRED;
    },
  },
  {
    name: 'preferred_video_resolution',
    evaluate: ctx => {
      const key = dimensionKey(ctx);
      return key && ctx.heuristics.resolutions.preferredVideo.has(key)
        ? fired(15, `Preferred video resolution: ${key}`)
        : NOT_FIRED;
    },
  },
  {
    name: 'vertical_video',
    evaluate: ctx => {
      const dims = ctx.bundle.dimensions;
      return dims && dims.width < dims.height ? fired(10, 'Vertical video') : NOT_FIRED;
    },
  },
  {
    name: 'video_aspect',
    evaluate: ctx => {
      const ratio = ctx.bundle.aspectRatio;
      if (ratio === undefined) {
        return NOT_FIRED;
      }
      if (inClosedRange(ratio, PORTRAIT_RANGE)) {
        return fired(20, `9:16 video aspect ratio (${formatRatio(ratio)})`);
      }
      if (ratio < 0.8) {
        return fired(8, `Tall video aspect ratio (${formatRatio(ratio)})`);
      }
      return NOT_FIRED;
    },
  },
  {
    name: 'encoder_tokens',
    evaluate: ctx => {
      // Each string credits the first token it contains; each token at most once
      const credited = new Set<string>();
      const outcomes: RuleOutcome[] = [];
      for (const value of ctx.lowerStrings) {
        const indicator = ctx.heuristics.videoIndicators.find(i => value.includes(i.needle));
        if (indicator && !credited.has(indicator.needle)) {
          credited.add(indicator.needle);
          outcomes.push({
            points: indicator.weight,
            evidence: `Video indicator found: ${indicator.token}`,
          });
        }
      }
      return outcomes;
    },
  },
  {
    name: 'download_name',
    evaluate: ctx => {
      const { prefix, extension } = ctx.heuristics.downloadName;
      return ctx.lowerFilename.startsWith(prefix) && ctx.lowerFilename.endsWith(extension)
        ? fired(25, 'Download-style filename')
        : NOT_FIRED;
    },
  },
  {
    name: 'video_size',
    evaluate: ctx =>
      inOpenRange(ctx.bundle.sizeBytes, VIDEO_SIZE_RANGE)
        ? fired(5, `Typical video size (${ctx.bundle.sizeBytes} bytes)`)
        : NOT_FIRED,
  },
];

const RULES_BY_KIND: Record<MediaKind, readonly ScoringRule[]> = {
  generic: BASE_RULES,
  photo: [...BASE_RULES, ...PHOTO_RULES],
  video: [...BASE_RULES, ...VIDEO_RULES],
};

/**
 * Map a final score to its verdict
 */
export function verdictForScore(score: number): Verdict {
  if (score >= CONFIRMED_THRESHOLD) return Verdict.CONFIRMED;
  if (score >= LIKELY_THRESHOLD) return Verdict.LIKELY;
  if (score >= POSSIBLE_THRESHOLD) return Verdict.POSSIBLE;
  return Verdict.UNLIKELY;
}

export function isTargetVerdict(verdict: Verdict): boolean {
  return verdict === Verdict.CONFIRMED || verdict === Verdict.LIKELY;
}

/**
 * Organisation tier folder for a score
 */
export function tierForScore(score: number): TierName {
  switch (verdictForScore(score)) {
    case Verdict.CONFIRMED:
      return 'confirmed';
    case Verdict.LIKELY:
      return 'likely';
    case Verdict.POSSIBLE:
      return 'possible';
    case Verdict.UNLIKELY:
      return 'unlikely';
  }
}

function buildResult(
  confidence: number,
  evidence: string[],
  indicators: Record<string, string>,
  excluded: boolean
): ScoreResult {
  const verdict = verdictForScore(confidence);
  return {
    confidence,
    evidence,
    indicators,
    verdict,
    isTargetApp: isTargetVerdict(verdict),
    excluded,
  };
}

export class ScoringEngine {
  constructor(private readonly heuristics: Heuristics) {}

  score(bundle: EvidenceBundle, mediaKind: MediaKind): ScoreResult {
    const exclusion = this.findCameraMarker(bundle);
    if (exclusion) {
      return buildResult(
        0,
        [`Camera metadata found (${exclusion}): excluded`],
        { camera_metadata: exclusion },
        true
      );
    }

    const ctx: RuleContext = {
      bundle,
      heuristics: this.heuristics,
      lowerFilename: bundle.filename.toLowerCase(),
      lowerStrings: bundle.foundStrings.map(s => s.toLowerCase()),
    };

    let confidence = 0;
    const evidence: string[] = [];
    const indicators: Record<string, string> = {};

    for (const rule of RULES_BY_KIND[mediaKind]) {
      for (const outcome of rule.evaluate(ctx)) {
        confidence += outcome.points;
        evidence.push(`${outcome.evidence} (+${outcome.points})`);
        if (outcome.indicators) {
          Object.assign(indicators, outcome.indicators);
        }
      }
    }

    return buildResult(confidence, evidence, indicators, false);
  }

  private findCameraMarker(bundle: EvidenceBundle): string | undefined {
    for (const value of bundle.foundStrings) {
      const match = this.heuristics.cameraMarkerPattern.exec(value);
      if (match) {
        return match[0];
      }
    }
    return undefined;
  }
}
