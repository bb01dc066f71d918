/**
 * Summary Report - plain-text rendering of scan and benchmark results
 */

import { TIER_NAMES } from '../types/evidence.js';
import type { TierName } from '../types/evidence.js';
import type { ScanSummary } from '../types/scan.js';
import type { BenchmarkReport, BenchmarkSetResult } from '../services/scan/benchmarkService.js';

export function formatPercent(value: number | null): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;
}

function tierLines(tiers: Record<TierName, number>): string[] {
  return TIER_NAMES.map(tier => `  ${tier.padEnd(10)} ${tiers[tier]}`);
}

export function formatScanSummary(summary: ScanSummary): string {
  const lines = [
    `Scan of ${summary.rootPath} (${summary.mode})`,
    `Organisation folder: ${summary.organizationDir}`,
    `Cache file: ${summary.cacheFile}`,
  ];

  if (summary.fallback) {
    lines.push(`NOTE: scan root not writable, results written to scratch location`);
    if (summary.fallbackReason) {
      lines.push(`      ${summary.fallbackReason}`);
    }
  }

  lines.push(
    '',
    `Files found:      ${summary.totalFiles}`,
    `Skipped (cached): ${summary.skippedCached}`,
    `Analysed:         ${summary.analyzed}`,
    `Failed:           ${summary.failed}`,
    '',
    'Tiers:',
    ...tierLines(summary.tiers)
  );

  if (summary.organized.length > 0) {
    lines.push('', `Organised (${summary.organized.length}):`);
    for (const outcome of summary.organized) {
      lines.push(`  [${outcome.action}] ${outcome.sourcePath} -> ${outcome.destinationPath}`);
    }
  }

  if (summary.errors.length > 0) {
    lines.push('', `Errors (${summary.errors.length}):`);
    for (const error of summary.errors) {
      lines.push(`  ${error.filePath}: ${error.message}`);
    }
  }

  lines.push(
    '',
    summary.cacheSaved
      ? 'Cache saved.'
      : `Cache not saved${summary.cacheError ? `: ${summary.cacheError}` : '.'}`
  );

  return lines.join('\n');
}

function formatSet(label: string, set: BenchmarkSetResult): string[] {
  return [
    `${label}: ${set.dirPath}`,
    `  files ${set.totalFiles}, analysed ${set.analyzed}, detected ${set.detected}`,
    ...tierLines(set.tiers),
  ];
}

export function formatBenchmarkReport(report: BenchmarkReport): string {
  const lines = [
    ...formatSet('Positive set', report.positive),
    ...formatSet('Negative set', report.negative),
    '',
    `Sensitivity: ${formatPercent(report.sensitivity)}`,
    `Specificity: ${formatPercent(report.specificity)}`,
  ];

  if (report.falsePositives.length > 0) {
    lines.push('', 'False positives:', ...report.falsePositives.map(p => `  ${p}`));
  }
  if (report.missedPositives.length > 0) {
    lines.push('', 'Missed positives:', ...report.missedPositives.map(p => `  ${p}`));
  }
  if (report.errors.length > 0) {
    lines.push('', 'Errors:', ...report.errors.map(e => `  ${e.filePath}: ${e.message}`));
  }

  return lines.join('\n');
}
