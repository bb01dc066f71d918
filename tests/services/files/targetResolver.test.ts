import fs from 'fs-extra';
import path from 'path';
import {
  ensureTierFolders,
  isConstrainedMount,
  resolveScanTargets,
} from '../../../src/services/files/targetResolver.js';
import { TestSandbox, makeScanConfig } from '../../utils/testSandbox.js';

describe('isConstrainedMount', () => {
  const patterns = ['gvfs/mtp', 'run/user'];

  it('should detect MTP device mounts', () => {
    expect(isConstrainedMount('/run/user/1000/gvfs/mtp:host=Phone/Internal storage', patterns)).toBe(true);
  });

  it('should not flag regular folders', () => {
    expect(isConstrainedMount('/home/user/Pictures', patterns)).toBe(false);
  });

  it('should ignore empty patterns', () => {
    expect(isConstrainedMount('/home/user/Pictures', [''])).toBe(false);
  });
});

describe('resolveScanTargets', () => {
  const sandbox = new TestSandbox();

  afterEach(async () => {
    await sandbox.cleanup();
  });

  it('should keep the cache inside the organisation folder on regular roots', async () => {
    const root = await sandbox.create();
    const scratch = await sandbox.create();

    const targets = await resolveScanTargets(root, makeScanConfig(scratch));

    expect(targets).toEqual({
      organizationDir: path.join(root, 'clipsift'),
      cacheFile: path.join(root, 'clipsift', 'clipsift-cache.json'),
      constrainedMount: false,
      fallback: false,
    });
    expect(await fs.pathExists(targets.organizationDir)).toBe(true);
  });

  it('should put the cache in the scratch dir on constrained mounts', async () => {
    const root = await sandbox.create('clipsift-mount-');
    const scratch = await sandbox.create();

    const targets = await resolveScanTargets(
      root,
      makeScanConfig(scratch, { constrainedMountPatterns: [path.basename(root)] })
    );

    expect(targets).toEqual({
      organizationDir: path.join(root, 'clipsift'),
      cacheFile: path.join(scratch, 'clipsift-cache.json'),
      constrainedMount: true,
      fallback: false,
    });
  });

  it('should fall back to the scratch dir when the root is not writable', async () => {
    const dir = await sandbox.create();
    const scratch = await sandbox.create();
    const blocker = await sandbox.writeFile(dir, 'blocker', 'file');

    const targets = await resolveScanTargets(blocker, makeScanConfig(scratch));

    expect(targets.fallback).toBe(true);
    expect(targets.organizationDir).toBe(path.join(scratch, 'clipsift'));
    expect(targets.cacheFile).toBe(path.join(scratch, 'clipsift-cache.json'));
    expect(targets.fallbackReason).toContain(path.join(blocker, 'clipsift'));
  });
});

describe('ensureTierFolders', () => {
  const sandbox = new TestSandbox();

  afterEach(async () => {
    await sandbox.cleanup();
  });

  it('should create all four tier folders', async () => {
    const root = await sandbox.create();

    expect(await ensureTierFolders(root)).toEqual([]);
    for (const tier of ['confirmed', 'likely', 'possible', 'unlikely']) {
      expect(await fs.pathExists(path.join(root, tier))).toBe(true);
    }
  });

  it('should report folders it could not create', async () => {
    const root = await sandbox.create();
    const blocker = await sandbox.writeFile(root, 'blocker', 'file');

    expect(await ensureTierFolders(blocker)).toHaveLength(4);
  });
});
