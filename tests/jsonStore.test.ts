import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { cleanupOrphanedTempFiles, commitTempFile, tempPathFor, writeJsonAtomic } from '../src/storage/jsonStore';
import { makeTempDir, removeTempDir, writeFileAt } from './helpers/tempDir';

describe('jsonStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('json-store-test');
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should write pretty JSON with a trailing newline and no leftover temp file', async () => {
    const target = path.join(tempDir, 'deep', 'data.json');

    await writeJsonAtomic(target, { a: 1, b: ['x'] });

    expect(await fs.readFile(target, 'utf-8')).toBe('{\n  "a": 1,\n  "b": [\n    "x"\n  ]\n}\n');
    expect(await fs.pathExists(tempPathFor(target))).toBe(false);
  });

  it('should replace an existing file', async () => {
    const target = path.join(tempDir, 'data.json');
    await fs.writeFile(target, 'old');

    await writeJsonAtomic(target, [1, 2]);

    expect(await fs.readJson(target)).toEqual([1, 2]);
  });

  it('should move a committed temp file onto its final name', async () => {
    const target = path.join(tempDir, 'archive.zip');
    await fs.writeFile(tempPathFor(target), 'payload');

    await commitTempFile(tempPathFor(target), target);

    expect(await fs.readFile(target, 'utf-8')).toBe('payload');
    expect(await fs.pathExists(tempPathFor(target))).toBe(false);
  });

  describe('cleanupOrphanedTempFiles', () => {
    it('should remove only stale temp files, recursively', async () => {
      const stale = Math.floor(Date.now() / 1000) - 2 * 60 * 60;
      await writeFileAt(path.join(tempDir, 'Shop', 'backup_Shop_a.zip.tmp'), 'partial', stale);
      await writeFileAt(path.join(tempDir, 'Shop', 'backup_Shop_a.zip'), 'complete', stale);
      await fs.writeFile(path.join(tempDir, 'fresh.zip.tmp'), 'in progress');

      const removed = await cleanupOrphanedTempFiles(tempDir);

      expect(removed).toBe(1);
      expect(await fs.readdir(path.join(tempDir, 'Shop'))).toEqual(['backup_Shop_a.zip']);
      expect(await fs.pathExists(path.join(tempDir, 'fresh.zip.tmp'))).toBe(true);
    });

    it('should honour a custom maximum age', async () => {
      const tenSecondsAgo = Math.floor(Date.now() / 1000) - 10;
      await writeFileAt(path.join(tempDir, 'recent.zip.tmp'), 'partial', tenSecondsAgo);

      expect(await cleanupOrphanedTempFiles(tempDir, 60 * 1000)).toBe(0);
      expect(await cleanupOrphanedTempFiles(tempDir, 5 * 1000)).toBe(1);
      expect(await fs.readdir(tempDir)).toEqual([]);
    });

    it('should return 0 for a missing directory', async () => {
      expect(await cleanupOrphanedTempFiles(path.join(tempDir, 'missing'))).toBe(0);
    });
  });
});
