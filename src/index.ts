export { App } from './app.js';
export type { AppDependencies } from './app.js';
export { ConfigManager } from './config/ConfigManager.js';
export { loadHeuristics, compileHeuristics } from './config/heuristics.js';
export type { Heuristics } from './config/heuristics.js';
export type { AppConfig, ScanConfig, LoggingConfig } from './config/types.js';
export * from './errors/index.js';
export { Verdict, TIER_NAMES } from './types/evidence.js';
export type {
  Dimensions,
  EvidenceBundle,
  MediaKind,
  ScoreResult,
  TierName,
} from './types/evidence.js';
export type { CacheDocument, CacheEntry, CacheSaveResult, CacheStats } from './types/cache.js';
export type { ScanFileError, ScanMode, ScanOptions, ScanSummary } from './types/scan.js';
export { EvidenceExtractor, scanPrintableRuns, sniffSignature } from './services/scan/evidenceExtractor.js';
export {
  DEFAULT_PROBES,
  extensionProbe,
  runProbes,
  sharpDecodeProbe,
  sharpHeaderProbe,
} from './services/scan/imageProbes.js';
export type { DimensionProbe, ProbeResult } from './services/scan/imageProbes.js';
export { createFfprobeProbe, ffprobeProbe } from './services/scan/videoProbe.js';
export type { ProbeExec } from './services/scan/videoProbe.js';
export {
  ScoringEngine,
  isTargetVerdict,
  tierForScore,
  verdictForScore,
} from './services/scan/scoringEngine.js';
export { MediaAnalyzer } from './services/scan/mediaAnalyzer.js';
export type { AnalyzedFile, EvidenceSource } from './services/scan/mediaAnalyzer.js';
export { ScanCoordinator, ScanPhase, ScanPhaseTracker } from './services/scan/scanCoordinator.js';
export { BenchmarkService } from './services/scan/benchmarkService.js';
export type { BenchmarkReport, BenchmarkSetResult } from './services/scan/benchmarkService.js';
export { ResultCache } from './services/cache/resultCacheService.js';
export { OrganizerService, resolveConflictFreePath } from './services/files/organizerService.js';
export type { OrganizeOutcome } from './services/files/organizerService.js';
export { isConstrainedMount, resolveScanTargets } from './services/files/targetResolver.js';
