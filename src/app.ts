import { ConfigManager } from './config/ConfigManager.js';
import { loadHeuristics } from './config/heuristics.js';
import type { Heuristics } from './config/heuristics.js';
import type { AppConfig } from './config/types.js';
import { initializeLogger, logger } from './utils/logger.js';
import { EvidenceExtractor } from './services/scan/evidenceExtractor.js';
import type { DimensionProbe } from './services/scan/imageProbes.js';
import { ScoringEngine } from './services/scan/scoringEngine.js';
import { MediaAnalyzer } from './services/scan/mediaAnalyzer.js';
import type { EvidenceSource } from './services/scan/mediaAnalyzer.js';
import { ScanCoordinator } from './services/scan/scanCoordinator.js';
import { BenchmarkService } from './services/scan/benchmarkService.js';
import type { BenchmarkReport } from './services/scan/benchmarkService.js';
import type { ScanOptions, ScanSummary } from './types/scan.js';

export interface AppDependencies {
  /** Replaces the file-backed extractor */
  extractor?: EvidenceSource;
  /** Probe chain for the default extractor */
  probes?: readonly DimensionProbe[];
}

/**
 * Wires configuration, heuristics and services for one process
 */
export class App {
  public readonly heuristics: Heuristics;
  private readonly config: AppConfig;
  private readonly coordinator: ScanCoordinator;
  private readonly benchmarkService: BenchmarkService;

  constructor(config?: AppConfig, dependencies: AppDependencies = {}) {
    if (!config) {
      const manager = ConfigManager.getInstance();
      manager.validate();
      config = manager.getConfig();
    }
    this.config = config;

    initializeLogger(this.config.logging);

    this.heuristics = loadHeuristics(this.config.scan.heuristicsFile);

    const extractor =
      dependencies.extractor ??
      new EvidenceExtractor(this.heuristics, {
        maxStringScanBytes: this.config.scan.maxStringScanBytes,
        ...(dependencies.probes ? { probes: dependencies.probes } : {}),
      });
    const analyzer = new MediaAnalyzer(extractor, new ScoringEngine(this.heuristics));

    this.coordinator = new ScanCoordinator(analyzer, this.config.scan);
    this.benchmarkService = new BenchmarkService(analyzer, this.config.scan.concurrency);

    logger.debug('Application initialised', {
      env: this.config.env,
      concurrency: this.config.scan.concurrency,
      heuristicsFile: this.config.scan.heuristicsFile ?? 'bundled',
    });
  }

  public async scan(options: ScanOptions): Promise<ScanSummary> {
    return this.coordinator.scan(options);
  }

  public async benchmark(positiveDir: string, negativeDir: string): Promise<BenchmarkReport> {
    return this.benchmarkService.run(positiveDir, negativeDir);
  }
}
