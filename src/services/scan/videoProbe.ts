/**
 * Video Probe
 *
 * Reads the first video stream's frame size through ffprobe. Only video
 * extensions are probed; when ffprobe is missing or cannot read the file the
 * probe throws and the chain moves on to the next probe.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { VIDEO_EXTENSIONS } from './mediaEnumerator.js';
import type { DimensionProbe, ProbeResult } from './imageProbes.js';

export type ProbeExec = (file: string, args: string[]) => Promise<{ stdout: string }>;

const execFilePromise = promisify(execFile);

const defaultExec: ProbeExec = async (file, args) => {
  const { stdout } = await execFilePromise(file, args, { maxBuffer: 1024 * 1024 });
  return { stdout };
};

/**
 * Raw ffprobe stream fields we read
 */
const ffprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().int().optional(),
        height: z.number().int().optional(),
        tags: z.object({ rotate: z.string().optional() }).passthrough().optional(),
        side_data_list: z
          .array(z.object({ rotation: z.number().optional() }).passthrough())
          .optional(),
      })
    )
    .default([]),
});

type FFprobeStream = z.infer<typeof ffprobeOutputSchema>['streams'][number];

/**
 * Quarter-turn rotations swap the displayed width and height
 */
function isQuarterTurn(stream: FFprobeStream): boolean {
  const sideRotation = stream.side_data_list?.find(entry => entry.rotation !== undefined)?.rotation;
  const tagRotation = stream.tags?.rotate !== undefined ? Number(stream.tags.rotate) : undefined;
  const rotation = sideRotation ?? tagRotation;
  if (rotation === undefined || !Number.isFinite(rotation)) {
    return false;
  }
  return Math.abs(rotation) % 180 === 90;
}

export function parseFfprobeOutput(stdout: string, format: string): ProbeResult | null {
  const parsed = ffprobeOutputSchema.safeParse(JSON.parse(stdout));
  if (!parsed.success) {
    return null;
  }

  const stream = parsed.data.streams.find(entry => entry.codec_type === 'video');
  if (!stream || stream.width === undefined || stream.height === undefined) {
    return null;
  }
  if (stream.width <= 0 || stream.height <= 0) {
    return null;
  }

  const dimensions = isQuarterTurn(stream)
    ? { width: stream.height, height: stream.width }
    : { width: stream.width, height: stream.height };
  return { dimensions, format };
}

export function createFfprobeProbe(exec: ProbeExec = defaultExec, binary = 'ffprobe'): DimensionProbe {
  return {
    name: 'ffprobe',
    async probe(filePath: string): Promise<ProbeResult | null> {
      const ext = path.extname(filePath).toLowerCase();
      if (!VIDEO_EXTENSIONS.includes(ext)) {
        return null;
      }

      const { stdout } = await exec(binary, [
        '-v',
        'quiet',
        '-print_format',
        'json',
        '-show_streams',
        '-select_streams',
        'v:0',
        filePath,
      ]);

      const result = parseFfprobeOutput(stdout, ext.slice(1).toUpperCase());
      logger.debug('Probed video stream via ffprobe', { filePath, dimensions: result?.dimensions });
      return result;
    },
  };
}

export const ffprobeProbe = createFfprobeProbe();
