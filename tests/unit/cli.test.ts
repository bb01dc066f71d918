import { parseArgs } from '../../src/cli/args.js';
import {
  formatBenchmarkReport,
  formatPercent,
  formatScanSummary,
} from '../../src/cli/summaryReport.js';
import { ValidationError } from '../../src/errors/index.js';
import type { ScanSummary } from '../../src/types/scan.js';
import type { BenchmarkReport } from '../../src/services/scan/benchmarkService.js';

describe('parseArgs', () => {
  it('should parse a preview scan', () => {
    expect(parseArgs(['scan', '/media'])).toEqual({ command: 'scan', rootPath: '/media', apply: false });
  });

  it('should parse an apply scan with the flag in any position', () => {
    expect(parseArgs(['scan', '--apply', '/media'])).toEqual({
      command: 'scan',
      rootPath: '/media',
      apply: true,
    });
  });

  it('should parse a benchmark', () => {
    expect(parseArgs(['benchmark', '/pos', '/neg'])).toEqual({
      command: 'benchmark',
      positiveDir: '/pos',
      negativeDir: '/neg',
    });
  });

  it('should fall back to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('should reject bad input', () => {
    expect(() => parseArgs(['scan'])).toThrow(ValidationError);
    expect(() => parseArgs(['scan', '/media', '--force'])).toThrow('Unknown option: --force');
    expect(() => parseArgs(['benchmark', '/pos'])).toThrow(ValidationError);
    expect(() => parseArgs(['organise'])).toThrow('Unknown command: organise');
  });
});

describe('summaryReport', () => {
  it('should format rates as percentages', () => {
    expect(formatPercent(0.5)).toBe('50.0%');
    expect(formatPercent(1)).toBe('100.0%');
    expect(formatPercent(null)).toBe('n/a');
  });

  it('should render a scan summary', () => {
    const summary: ScanSummary = {
      rootPath: '/media',
      mode: 'preview',
      organizationDir: '/tmp/clipsift',
      cacheFile: '/tmp/clipsift-cache.json',
      constrainedMount: true,
      fallback: true,
      fallbackReason: 'Cannot create /media/clipsift: EACCES',
      totalFiles: 5,
      skippedCached: 3,
      analyzed: 2,
      failed: 0,
      tiers: { confirmed: 1, likely: 0, possible: 0, unlikely: 1 },
      movedFiles: [],
      organized: [
        {
          sourcePath: '/media/a.png',
          destinationPath: '/tmp/clipsift/confirmed/a.png',
          action: 'copied',
          tier: 'confirmed',
        },
      ],
      errors: [],
      cacheSaved: false,
      cacheError: 'EACCES',
      durationMs: 12,
    };

    const lines = formatScanSummary(summary).split('\n');

    expect(lines[0]).toBe('Scan of /media (preview)');
    expect(lines).toContain('NOTE: scan root not writable, results written to scratch location');
    expect(lines).toContain('      Cannot create /media/clipsift: EACCES');
    expect(lines).toContain('Skipped (cached): 3');
    expect(lines).toContain('  confirmed  1');
    expect(lines).toContain('  [copied] /media/a.png -> /tmp/clipsift/confirmed/a.png');
    expect(lines[lines.length - 1]).toBe('Cache not saved: EACCES');
  });

  it('should render a benchmark report', () => {
    const set = { dirPath: '/pos', totalFiles: 2, analyzed: 2, detected: 1, tiers: { confirmed: 1, likely: 0, possible: 0, unlikely: 1 } };
    const report: BenchmarkReport = {
      positive: set,
      negative: { ...set, dirPath: '/neg' },
      sensitivity: 0.5,
      specificity: null,
      falsePositives: ['/neg/n.jpg'],
      missedPositives: [],
      errors: [],
      durationMs: 3,
    };

    const lines = formatBenchmarkReport(report).split('\n');

    expect(lines[0]).toBe('Positive set: /pos');
    expect(lines[1]).toBe('  files 2, analysed 2, detected 1');
    expect(lines).toContain('Sensitivity: 50.0%');
    expect(lines).toContain('Specificity: n/a');
    expect(lines.slice(-2)).toEqual(['False positives:', '  /neg/n.jpg']);
  });
});
