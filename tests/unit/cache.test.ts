import { mkdir, mkdtemp, rm, stat, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { artifactName, DocumentCache, sourceDigest } from '../../src/cache/cache.js';
import { CacheArtifactSourceError, SourceNotFoundError } from '../../src/core/errors.js';
import { ENGINE_VERSION, runtimeId } from '../../src/core/version.js';
import { translateMusicXml } from '../../src/parser/parse.js';
import { note, partwise, QUARTER_ATTRIBUTES } from '../helpers/musicxml.js';

const SOURCE = partwise(`<measure number="1">${QUARTER_ATTRIBUTES}${note('C4', 4, '<type>whole</type>')}</measure>`);
const LONG_AGO = new Date('2001-01-01T00:00:00Z');
const FAR_FUTURE = new Date('2099-01-01T00:00:00Z');

describe('document cache', () => {
  let root: string;
  let scratch: string;
  let sourcePath: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'cache-test-'));
    scratch = path.join(root, 'scratch');
    sourcePath = path.join(root, 'score.musicxml');
    await writeFile(sourcePath, SOURCE);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('names artifacts after engine, runtime, digest and work number', () => {
    expect(artifactName('abc123')).toBe(`si-${ENGINE_VERSION}-${runtimeId()}-abc123.frozen`);
    expect(artifactName('abc123', 2)).toBe(`si-${ENGINE_VERSION}-${runtimeId()}-abc123-2.frozen`);
  });

  it('writes, then loads, then rewrites once the source changes', async () => {
    const cache = new DocumentCache({ scratchDirectory: scratch });
    const cachePath = path.join(scratch, artifactName(await sourceDigest(sourcePath)));

    expect(await cache.status(sourcePath)).toEqual({ pathToLoad: sourcePath, shouldWrite: true, cachePath });

    await cache.store(cachePath, translateMusicXml(SOURCE).score);
    await utimes(sourcePath, LONG_AGO, LONG_AGO);
    expect(await cache.status(sourcePath)).toEqual({ pathToLoad: cachePath, shouldWrite: false, cachePath });

    const loaded = await cache.load(cachePath);
    expect(loaded?.kind).toBe('score');

    await utimes(sourcePath, FAR_FUTURE, FAR_FUTURE);
    expect(await cache.status(sourcePath)).toEqual({ pathToLoad: sourcePath, shouldWrite: true, cachePath });
  });

  it('bypasses the cache when forced or when no scratch directory is set', async () => {
    const cache = new DocumentCache({ scratchDirectory: scratch });

    expect(await cache.status(sourcePath, { forceSource: true })).toEqual({ pathToLoad: sourcePath, shouldWrite: false });
    expect(await new DocumentCache().status(sourcePath)).toEqual({ pathToLoad: sourcePath, shouldWrite: false });
  });

  it('loads an artifact given as the source but refuses it as a forced source', async () => {
    const cache = new DocumentCache({ scratchDirectory: scratch });
    const artifactPath = path.join(root, 'given.frozen');
    await cache.store(artifactPath, translateMusicXml(SOURCE).score);

    expect(await cache.status(artifactPath)).toEqual({ pathToLoad: artifactPath, shouldWrite: false });
    await expect(cache.status(artifactPath, { forceSource: true })).rejects.toBeInstanceOf(CacheArtifactSourceError);
    await expect(cache.status(path.join(root, 'missing.xml'))).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('removes an artifact that cannot be decoded', async () => {
    const cache = new DocumentCache({ scratchDirectory: scratch });
    const broken = path.join(root, 'broken.frozen');
    await writeFile(broken, 'not gzip');

    expect(await cache.load(broken)).toBeUndefined();
    expect(cache.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['CACHE_DECODE_FAILED']);
    await expect(stat(broken)).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await cache.load(path.join(root, 'absent.frozen'))).toBeUndefined();
  });

  it('treats a structurally hollow artifact as a miss', async () => {
    const cache = new DocumentCache({ scratchDirectory: scratch });
    const hollow = path.join(root, 'hollow.frozen');
    const document = { kind: 'score', ref: 1, metadata: {}, staffGroups: [], spanners: [], parts: [{}] };
    const envelope = { format: 'frozen-score', engineVersion: ENGINE_VERSION, runtime: runtimeId(), document };
    await writeFile(hollow, gzipSync(JSON.stringify(envelope)));

    expect(await cache.load(hollow)).toBeUndefined();
    expect(cache.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['CACHE_DECODE_FAILED']);
    await expect(stat(hollow)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('digests directories by entry names and contents', async () => {
    const directory = path.join(root, 'parts');
    await mkdir(directory);
    await writeFile(path.join(directory, '01'), 'first');
    const before = await sourceDigest(directory, true);

    await writeFile(path.join(directory, '02'), 'second');
    const after = await sourceDigest(directory, true);

    expect(before).toMatch(/^[0-9a-f]{32}$/);
    expect(after).not.toBe(before);
  });
});
