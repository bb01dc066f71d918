/**
 * Evidence Extractor
 *
 * Turns a file path into an EvidenceBundle: size, dimensions, format label and
 * the indicator strings found near the start of the file. No classification
 * happens here. Unrecognised content yields absent fields, never an error; only
 * an unreadable file raises FileReadError.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { FileReadError } from '../../errors/index.js';
import type { Heuristics } from '../../config/heuristics.js';
import type { EvidenceBundle } from '../../types/evidence.js';
import { DEFAULT_PROBES, runProbes } from './imageProbes.js';
import type { DimensionProbe } from './imageProbes.js';

const SIGNATURE_BYTES = 16;
const MIN_RUN_LENGTH = 4;
const PRINTABLE_MIN = 32;
const PRINTABLE_MAX = 126;

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export interface EvidenceExtractorOptions {
  /** Upper bound on bytes scanned for strings */
  maxStringScanBytes: number;
  /** Ordered dimension probes; defaults to header → decode → ffprobe → extension */
  probes?: readonly DimensionProbe[];
}

/**
 * Identify a container from its leading bytes
 */
export function sniffSignature(header: Buffer): string | undefined {
  if (
    header.length >= 12 &&
    header.toString('latin1', 0, 4) === 'RIFF' &&
    header.toString('latin1', 8, 12) === 'WEBP'
  ) {
    return 'WebP';
  }
  if (header.length >= PNG_MAGIC.length && PNG_MAGIC.every((byte, i) => header[i] === byte)) {
    return 'PNG';
  }
  if (header.length >= 2 && header[0] === 0xff && header[1] === 0xd8) {
    return 'JPEG';
  }
  return undefined;
}

/**
 * Collect printable-ASCII runs worth keeping as evidence.
 *
 * A run is kept when it is at least four characters long and either mentions
 * an indicator term or carries a camera-metadata marker.
 */
export function scanPrintableRuns(buffer: Buffer, heuristics: Heuristics): string[] {
  const found: string[] = [];
  let runStart = -1;

  const flush = (end: number): void => {
    if (runStart >= 0 && end - runStart >= MIN_RUN_LENGTH) {
      const run = buffer.toString('latin1', runStart, end);
      const lowered = run.toLowerCase();
      if (
        heuristics.indicatorVocabulary.some(term => lowered.includes(term)) ||
        heuristics.cameraMarkerPattern.test(run)
      ) {
        found.push(run);
      }
    }
    runStart = -1;
  };

  for (let i = 0; i < buffer.length; i++) {
    const byte = buffer[i];
    if (byte >= PRINTABLE_MIN && byte <= PRINTABLE_MAX) {
      if (runStart < 0) {
        runStart = i;
      }
    } else {
      flush(i);
    }
  }
  flush(buffer.length);

  return found;
}

export class EvidenceExtractor {
  private readonly probes: readonly DimensionProbe[];

  constructor(
    private readonly heuristics: Heuristics,
    private readonly options: EvidenceExtractorOptions
  ) {
    this.probes = options.probes ?? DEFAULT_PROBES;
  }

  async extract(filePath: string): Promise<EvidenceBundle> {
    const absolutePath = path.resolve(filePath);
    const head = await this.readHead(absolutePath);

    const probeResult = await runProbes(this.probes, absolutePath);
    const sniffed = sniffSignature(head.bytes.subarray(0, SIGNATURE_BYTES));

    const bundle: EvidenceBundle = {
      filePath: absolutePath,
      filename: path.basename(absolutePath),
      sizeBytes: head.size,
      foundStrings: scanPrintableRuns(
        head.bytes.subarray(0, this.options.maxStringScanBytes),
        this.heuristics
      ),
    };

    const format = sniffed ?? probeResult?.format;
    if (format) {
      bundle.format = format;
    }

    if (probeResult?.dimensions) {
      bundle.dimensions = probeResult.dimensions;
      bundle.aspectRatio = probeResult.dimensions.width / probeResult.dimensions.height;
    }

    logger.debug('Evidence extracted', {
      filePath: absolutePath,
      format: bundle.format,
      dimensions: bundle.dimensions,
      foundStrings: bundle.foundStrings.length,
    });

    return bundle;
  }

  /**
   * Stat the file and read its leading bytes
   */
  private async readHead(filePath: string): Promise<{ size: number; bytes: Buffer }> {
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      size = stats.size;
    } catch (error) {
      throw new FileReadError(
        filePath,
        `Cannot read attributes of ${filePath}: ${getErrorMessage(error)}`,
        { service: 'EvidenceExtractor', operation: 'stat' },
        toError(error)
      );
    }

    const wanted = Math.min(size, Math.max(this.options.maxStringScanBytes, SIGNATURE_BYTES));

    try {
      const fileHandle = await fs.open(filePath, 'r');
      try {
        const buffer = Buffer.alloc(wanted);
        const { bytesRead } = await fileHandle.read(buffer, 0, wanted, 0);
        return { size, bytes: buffer.subarray(0, bytesRead) };
      } finally {
        await fileHandle.close();
      }
    } catch (error) {
      throw new FileReadError(
        filePath,
        `Cannot read ${filePath}: ${getErrorMessage(error)}`,
        { service: 'EvidenceExtractor', operation: 'read' },
        toError(error)
      );
    }
  }
}
