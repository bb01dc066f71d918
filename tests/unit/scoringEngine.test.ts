/**
 * Tests for the Scoring Engine
 *
 * Rule weights, exclusion, verdict thresholds and determinism
 */

import { loadHeuristics } from '../../src/config/heuristics.js';
import {
  ScoringEngine,
  tierForScore,
  verdictForScore,
} from '../../src/services/scan/scoringEngine.js';
import { Verdict } from '../../src/types/evidence.js';
import { makeBundle } from '../utils/testSandbox.js';

const HASH_NAME = '0123456789abcdef0123456789abcdef.png';

describe('ScoringEngine', () => {
  const engine = new ScoringEngine(loadHeuristics());

  describe('Camera metadata exclusion', () => {
    it('should force score 0 and UNLIKELY even with strong evidence', () => {
      const bundle = makeBundle('/media/clip.png', {
        dimensions: { width: 1080, height: 1920 },
        format: 'WebP',
        foundStrings: ['Focal Length: 50mm', 'aigc_label_type tiktok'],
      });

      for (const kind of ['generic', 'photo', 'video'] as const) {
        const result = engine.score(bundle, kind);
        expect(result.confidence).toBe(0);
        expect(result.verdict).toBe(Verdict.UNLIKELY);
        expect(result.isTargetApp).toBe(false);
        expect(result.excluded).toBe(true);
        expect(result.evidence).toEqual(['Camera metadata found (Focal Length): excluded']);
      }
    });

    it('should match markers case-insensitively as whole words', () => {
      const bundle = makeBundle('/media/shot.jpg', { foundStrings: ['iso 200 tiktok'] });
      expect(engine.score(bundle, 'photo').excluded).toBe(true);
    });

    it('should not treat the isom container brand as an ISO marker', () => {
      const bundle = makeBundle('/media/clip.mp4', { sizeBytes: 0, foundStrings: ['isom tiktok'] });
      const result = engine.score(bundle, 'video');

      expect(result.excluded).toBe(false);
      // brand +20, isom token +8
      expect(result.confidence).toBe(28);
    });
  });

  describe('Base rules', () => {
    it('should score WebP bytes under a .png name with AIGC metadata at 100', () => {
      const bundle = makeBundle('/media/clip.png', {
        sizeBytes: 1000,
        dimensions: { width: 1080, height: 1920 },
        format: 'WebP',
        foundStrings: ['{"aigc_label_type":1}'],
      });

      const result = engine.score(bundle, 'generic');

      // AIGC 40 + app resolution 25 + 9:16 15 + portrait 5 + webp-as-png 15
      expect(result.confidence).toBe(100);
      expect(result.verdict).toBe(Verdict.CONFIRMED);
      expect(result.isTargetApp).toBe(true);
      expect(result.indicators).toEqual({
        aigc_label: 'aigc_label_type',
        dimensions: '1080x1920',
        format_mismatch: 'webp-as-png',
      });
      expect(result.evidence).toEqual([
        'AIGC label metadata found (+40)',
        'App resolution: 1080x1920 (+25)',
        '9:16 aspect ratio (0.563) (+15)',
        'Portrait orientation (+5)',
        'WebP content saved under a .png name (+15)',
      ]);
    });

    it('should add the photo rules on top of the base rules', () => {
      const bundle = makeBundle('/media/clip.png', {
        sizeBytes: 1000,
        dimensions: { width: 1080, height: 1920 },
        format: 'WebP',
        foundStrings: ['{"aigc_label_type":1}'],
      });

      // 100 + screenshot resolution 15 + exact 9:16 10
      expect(engine.score(bundle, 'photo').confidence).toBe(125);
    });

    it('should score a bare hash-style .png name at 10 generic and 18 as a photo', () => {
      const bundle = makeBundle(`/media/${HASH_NAME}`, { sizeBytes: 1000, format: 'PNG' });

      const generic = engine.score(bundle, 'generic');
      const photo = engine.score(bundle, 'photo');

      expect(generic.confidence).toBe(10);
      expect(photo.confidence).toBe(18);
      expect(photo.verdict).toBe(Verdict.UNLIKELY);
      expect(photo.isTargetApp).toBe(false);
    });

    it('should not treat a 36-character non-hex name as hash-style', () => {
      const bundle = makeBundle('/media/0123456789abcdef0123456789abcdeg.png', { sizeBytes: 1000 });
      expect(engine.score(bundle, 'photo').confidence).toBe(0);
    });

    it('should record the first video ID match', () => {
      const bundle = makeBundle('/media/a.jpg', {
        foundStrings: ['vid:v12f0000abc123 tiktok', 'vid:v99l0000ff'],
      });

      const result = engine.score(bundle, 'generic');

      // video id 35 + brand 20
      expect(result.confidence).toBe(55);
      expect(result.verdict).toBe(Verdict.LIKELY);
      expect(result.indicators.video_id).toBe('vid:v12f0000abc123');
      expect(result.indicators.brand).toBe('tiktok');
    });

    it('should return 0 for an empty bundle', () => {
      const result = engine.score(makeBundle('/media/a.jpg'), 'generic');
      expect(result.confidence).toBe(0);
      expect(result.evidence).toEqual([]);
      expect(result.verdict).toBe(Verdict.UNLIKELY);
    });
  });

  describe('Video rules', () => {
    it('should credit each applicable video rule', () => {
      const bundle = makeBundle('/media/Download_abc.mp4', {
        sizeBytes: 2_000_000,
        dimensions: { width: 576, height: 1024 },
        foundStrings: ['Lavf58.76.100 tiktok', 'ByteDance vid_md5', 'isom musically'],
      });

      const result = engine.score(bundle, 'video');

      // base: content hash 30, app res 25, 9:16 15, portrait 5, brand 20 = 95
      // video: res 30, preferred 15, vertical 10, aspect 20,
      //        tokens 20 + 25 + 8, download 25, size 5 = 158
      expect(result.confidence).toBe(253);
      expect(result.evidence).toHaveLength(14);
      expect(result.indicators.video_dimensions).toBe('576x1024');
      expect(result.verdict).toBe(Verdict.CONFIRMED);
    });

    it('should credit a token at most once', () => {
      const bundle = makeBundle('/media/a.mov', {
        sizeBytes: 0,
        foundStrings: ['isom one tiktok', 'isom two tiktok'],
      });

      const result = engine.score(bundle, 'video');

      expect(result.confidence).toBe(28);
      expect(result.verdict).toBe(Verdict.POSSIBLE);
      expect(result.isTargetApp).toBe(false);
    });

    it('should credit the app name only once for video', () => {
      const bundle = makeBundle('/m/a.mp4', { sizeBytes: 0, foundStrings: ['TikTok'] });

      const result = engine.score(bundle, 'video');

      expect(result.confidence).toBe(20);
      expect(result.verdict).toBe(Verdict.POSSIBLE);
      expect(result.isTargetApp).toBe(false);
      expect(result.evidence).toEqual(['Brand reference found: tiktok (+20)']);
    });

    it('should give the smaller bonus for tall but not 9:16 video', () => {
      const bundle = makeBundle('/media/a.mov', {
        sizeBytes: 0,
        dimensions: { width: 720, height: 1000 },
      });

      // portrait 5 + vertical 10 + tall aspect 8
      expect(engine.score(bundle, 'video').confidence).toBe(23);
    });
  });

  describe('Determinism', () => {
    it('should return identical results for identical input', () => {
      const bundle = makeBundle('/media/Download_x.mp4', {
        sizeBytes: 200_000,
        dimensions: { width: 1080, height: 1920 },
        foundStrings: ['Douyin aigc_info'],
      });

      expect(engine.score(bundle, 'video')).toEqual(engine.score(bundle, 'video'));
    });
  });
});

describe('verdictForScore', () => {
  it('should map threshold boundaries', () => {
    expect(verdictForScore(0)).toBe(Verdict.UNLIKELY);
    expect(verdictForScore(19)).toBe(Verdict.UNLIKELY);
    expect(verdictForScore(20)).toBe(Verdict.POSSIBLE);
    expect(verdictForScore(39)).toBe(Verdict.POSSIBLE);
    expect(verdictForScore(40)).toBe(Verdict.LIKELY);
    expect(verdictForScore(69)).toBe(Verdict.LIKELY);
    expect(verdictForScore(70)).toBe(Verdict.CONFIRMED);
    expect(verdictForScore(500)).toBe(Verdict.CONFIRMED);
  });

  it('should be non-decreasing in score', () => {
    const order = [Verdict.UNLIKELY, Verdict.POSSIBLE, Verdict.LIKELY, Verdict.CONFIRMED];
    let previous = 0;
    for (let score = 0; score <= 200; score++) {
      const rank = order.indexOf(verdictForScore(score));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('tierForScore', () => {
  it('should use the verdict boundaries', () => {
    expect(tierForScore(19)).toBe('unlikely');
    expect(tierForScore(20)).toBe('possible');
    expect(tierForScore(40)).toBe('likely');
    expect(tierForScore(70)).toBe('confirmed');
  });
});
