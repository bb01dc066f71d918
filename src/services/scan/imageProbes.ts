/**
 * Image Probes
 *
 * Ordered, fallible dimension/format probes. The extractor tries each probe in
 * turn and keeps the first result; a probe that throws or returns null simply
 * hands over to the next one.
 */

import path from 'path';
import sharp from 'sharp';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { Dimensions } from '../../types/evidence.js';
import { ffprobeProbe } from './videoProbe.js';

export interface ProbeResult {
  dimensions?: Dimensions;
  format: string;
}

export interface DimensionProbe {
  readonly name: string;
  probe(filePath: string): Promise<ProbeResult | null>;
}

const SHARP_FORMAT_LABELS: Record<string, string> = {
  jpeg: 'JPEG',
  jpg: 'JPEG',
  png: 'PNG',
  webp: 'WebP',
  gif: 'GIF',
};

const CHANNEL_LAYOUT_LABELS: Record<number, string> = {
  1: 'L8',
  2: 'La8',
  3: 'Rgb8',
  4: 'Rgba8',
};

function toDimensions(width: number | undefined, height: number | undefined): Dimensions | undefined {
  if (width === undefined || height === undefined) {
    return undefined;
  }
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return undefined;
  }
  return { width, height };
}

/**
 * Header probe: reads the container header via sharp metadata()
 */
export const sharpHeaderProbe: DimensionProbe = {
  name: 'header',
  async probe(filePath: string): Promise<ProbeResult | null> {
    const metadata = await sharp(filePath).metadata();
    const dimensions = toDimensions(metadata.width, metadata.height);
    if (!dimensions || !metadata.format) {
      return null;
    }
    return {
      dimensions,
      format: SHARP_FORMAT_LABELS[metadata.format] ?? metadata.format.toUpperCase(),
    };
  },
};

/**
 * Full decode probe: decodes pixels and labels the result by channel layout
 */
export const sharpDecodeProbe: DimensionProbe = {
  name: 'decode',
  async probe(filePath: string): Promise<ProbeResult | null> {
    const { info } = await sharp(filePath).raw().toBuffer({ resolveWithObject: true });
    const dimensions = toDimensions(info.width, info.height);
    if (!dimensions) {
      return null;
    }
    return {
      dimensions,
      format: CHANNEL_LAYOUT_LABELS[info.channels] ?? `Channels${info.channels}`,
    };
  },
};

/**
 * Last resort: the uppercased extension, no dimensions
 */
export const extensionProbe: DimensionProbe = {
  name: 'extension',
  async probe(filePath: string): Promise<ProbeResult | null> {
    const ext = path.extname(filePath).slice(1);
    if (!ext) {
      return null;
    }
    return { format: ext.toUpperCase() };
  },
};

export const DEFAULT_PROBES: readonly DimensionProbe[] = [
  sharpHeaderProbe,
  sharpDecodeProbe,
  ffprobeProbe,
  extensionProbe,
];

/**
 * First match wins
 */
export async function runProbes(
  probes: readonly DimensionProbe[],
  filePath: string
): Promise<ProbeResult | null> {
  for (const probe of probes) {
    try {
      const result = await probe.probe(filePath);
      if (result) {
        return result;
      }
    } catch (error) {
      logger.debug('Probe failed, trying next', {
        probe: probe.name,
        filePath,
        error: getErrorMessage(error),
      });
    }
  }
  return null;
}
