/**
 * Tests for the Evidence Extractor
 *
 * Probe ordering, signature sniffing and the indicator string scan.
 * One test goes through sharp for real; the rest inject probes.
 */

import path from 'path';
import sharp from 'sharp';
import { loadHeuristics } from '../../src/config/heuristics.js';
import { FileReadError } from '../../src/errors/index.js';
import {
  EvidenceExtractor,
  scanPrintableRuns,
  sniffSignature,
} from '../../src/services/scan/evidenceExtractor.js';
import {
  DEFAULT_PROBES,
  runProbes,
  sharpDecodeProbe,
} from '../../src/services/scan/imageProbes.js';
import type { DimensionProbe } from '../../src/services/scan/imageProbes.js';
import { TestSandbox } from '../utils/testSandbox.js';

const heuristics = loadHeuristics();

function fixedProbe(name: string, result: Awaited<ReturnType<DimensionProbe['probe']>>): DimensionProbe {
  return { name, probe: async () => result };
}

const throwingProbe: DimensionProbe = {
  name: 'broken',
  probe: async () => {
    throw new Error('cannot decode');
  },
};

describe('sniffSignature', () => {
  it('should detect a RIFF/WEBP header', () => {
    const header = Buffer.concat([Buffer.from('RIFF'), Buffer.from([1, 2, 3, 4]), Buffer.from('WEBPVP8 ')]);
    expect(sniffSignature(header)).toBe('WebP');
  });

  it('should detect the PNG magic number', () => {
    expect(sniffSignature(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0]))).toBe('PNG');
  });

  it('should detect a JPEG start-of-image marker', () => {
    expect(sniffSignature(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('JPEG');
  });

  it('should return undefined for unknown or short content', () => {
    expect(sniffSignature(Buffer.from('hello world'))).toBeUndefined();
    expect(sniffSignature(Buffer.from([0xff]))).toBeUndefined();
    expect(sniffSignature(Buffer.alloc(0))).toBeUndefined();
  });
});

describe('scanPrintableRuns', () => {
  it('should keep runs that mention an indicator or camera marker', () => {
    const buffer = Buffer.concat([
      Buffer.from('abc'),
      Buffer.from([0]),
      Buffer.from('hello TikTok world'),
      Buffer.from([0x01]),
      Buffer.from('tik'),
      Buffer.from([0xff]),
      Buffer.from('isometric view'),
      Buffer.from([0x0a]),
      Buffer.from('Focal Length: 50mm'),
      Buffer.from([0]),
      Buffer.from('aigc_label_type'),
    ]);

    expect(scanPrintableRuns(buffer, heuristics)).toEqual([
      'hello TikTok world',
      'Focal Length: 50mm',
      'aigc_label_type',
    ]);
  });

  it('should drop runs shorter than four characters', () => {
    expect(scanPrintableRuns(Buffer.from('vid'), heuristics)).toEqual([]);
  });
});

describe('EvidenceExtractor', () => {
  const sandbox = new TestSandbox();

  afterEach(async () => {
    await sandbox.cleanup();
  });

  it('should let the byte signature override the probe format', async () => {
    const dir = await sandbox.create();
    const content = Buffer.concat([
      Buffer.from('RIFF'),
      Buffer.from([0x10, 0, 0, 0]),
      Buffer.from('WEBPVP8 '),
      Buffer.alloc(8),
      Buffer.from('aigc_label_type'),
      Buffer.alloc(4),
    ]);
    const filePath = await sandbox.writeFile(dir, 'clip.png', content);

    const extractor = new EvidenceExtractor(heuristics, {
      maxStringScanBytes: 1024 * 1024,
      probes: [fixedProbe('fake', { dimensions: { width: 1080, height: 1920 }, format: 'PNG' })],
    });

    const bundle = await extractor.extract(filePath);

    expect(bundle).toEqual({
      filePath,
      filename: 'clip.png',
      sizeBytes: 43,
      format: 'WebP',
      dimensions: { width: 1080, height: 1920 },
      aspectRatio: 1080 / 1920,
      foundStrings: ['aigc_label_type'],
    });
  });

  it('should fall through failing probes to the next one', async () => {
    const dir = await sandbox.create();
    const filePath = await sandbox.writeFile(dir, 'clip.mov', 'nothing here');

    const extractor = new EvidenceExtractor(heuristics, {
      maxStringScanBytes: 1024,
      probes: [throwingProbe, fixedProbe('empty', null), fixedProbe('ext', { format: 'MOV' })],
    });

    const bundle = await extractor.extract(filePath);

    expect(bundle.format).toBe('MOV');
    expect(bundle.dimensions).toBeUndefined();
    expect(bundle.aspectRatio).toBeUndefined();
    expect(bundle.foundStrings).toEqual([]);
  });

  it('should only scan up to the configured byte limit', async () => {
    const dir = await sandbox.create();
    const filePath = await sandbox.writeFile(
      dir,
      'clip.mp4',
      Buffer.concat([Buffer.alloc(20), Buffer.from('tiktok marker')])
    );
    const probes = [fixedProbe('none', null)];

    const limited = new EvidenceExtractor(heuristics, { maxStringScanBytes: 16, probes });
    const full = new EvidenceExtractor(heuristics, { maxStringScanBytes: 1024, probes });

    expect((await limited.extract(filePath)).foundStrings).toEqual([]);
    expect((await full.extract(filePath)).foundStrings).toEqual(['tiktok marker']);
  });

  it('should fail with FileReadError when the file is missing', async () => {
    const dir = await sandbox.create();
    const extractor = new EvidenceExtractor(heuristics, { maxStringScanBytes: 1024 });

    await expect(extractor.extract(path.join(dir, 'missing.png'))).rejects.toBeInstanceOf(FileReadError);
  });

  it('should read dimensions of a real PNG through sharp', async () => {
    const dir = await sandbox.create();
    const filePath = path.join(dir, 'tiny.png');
    await sharp({
      create: { width: 4, height: 8, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .png()
      .toFile(filePath);

    const extractor = new EvidenceExtractor(heuristics, { maxStringScanBytes: 1024 });
    const bundle = await extractor.extract(filePath);

    expect(bundle.dimensions).toEqual({ width: 4, height: 8 });
    expect(bundle.aspectRatio).toBe(0.5);
    expect(bundle.format).toBe('PNG');

    expect(await sharpDecodeProbe.probe(filePath)).toEqual({
      dimensions: { width: 4, height: 8 },
      format: 'Rgb8',
    });
  });

  it('should fall back to the extension for undecodable content', async () => {
    const dir = await sandbox.create();
    const filePath = await sandbox.writeFile(dir, 'notes.gif', 'plain text, not an image');

    expect(await runProbes(DEFAULT_PROBES, filePath)).toEqual({ format: 'GIF' });
  });
});
