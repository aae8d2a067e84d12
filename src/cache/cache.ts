import { createHash } from 'node:crypto';
import type { Stats } from 'node:fs';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../core/diagnostics.js';
import { CacheArtifactSourceError, InterchangeError, isMissingFileError, SourceNotFoundError } from '../core/errors.js';
import type { ScoreStream } from '../core/score.js';
import { ENGINE_VERSION, runtimeId } from '../core/version.js';
import { freeze, readFrozenHeader, thaw } from './freeze.js';

/** What to read for a source and whether to write a fresh artifact afterwards. */
export interface CacheStatus {
  pathToLoad: string;
  shouldWrite: boolean;
  cachePath?: string;
}

export interface CacheStatusOptions {
  /** Always translate the source; an artifact given as the source is an error. */
  forceSource?: boolean;
  /** Work number of a multi-work source; part of the artifact name. */
  number?: number;
}

export interface DocumentCacheOptions {
  /** Where artifacts live; without one the cache is off. */
  scratchDirectory?: string;
}

/**
 * Frozen translations of source files, keyed by engine version, runtime and a
 * digest of the source bytes. An artifact is reused while it is newer than its source.
 */
export class DocumentCache {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly options: DocumentCacheOptions = {}) {}

  /** Decide between the source and its artifact. */
  async status(sourcePath: string, options: CacheStatusOptions = {}): Promise<CacheStatus> {
    const source = await statSource(sourcePath);

    if (source.isFile() && readFrozenHeader(await readFile(sourcePath))) {
      if (options.forceSource) {
        throw new CacheArtifactSourceError(sourcePath);
      }
      return { pathToLoad: sourcePath, shouldWrite: false };
    }

    const directory = this.options.scratchDirectory;
    if (options.forceSource || directory === undefined) {
      return { pathToLoad: sourcePath, shouldWrite: false };
    }

    const cachePath = path.join(directory, artifactName(await sourceDigest(sourcePath, source.isDirectory()), options.number));
    const cached = await statOptional(cachePath);
    if (!cached) {
      return { pathToLoad: sourcePath, shouldWrite: true, cachePath };
    }
    if (source.mtimeMs < cached.mtimeMs) {
      return { pathToLoad: cachePath, shouldWrite: false, cachePath };
    }
    return { pathToLoad: sourcePath, shouldWrite: true, cachePath };
  }

  /**
   * Thaw an artifact. An undecodable artifact is deleted and `undefined` comes
   * back so the caller translates the source again.
   */
  async load(cachePath: string): Promise<ScoreStream | undefined> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(cachePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }

    try {
      const artifact = thaw(bytes);
      if (artifact.engineVersion !== ENGINE_VERSION) {
        this.diagnostics.push({
          code: 'CACHE_VERSION_MISMATCH',
          severity: 'warning',
          message: `Cache artifact '${cachePath}' was written by engine ${artifact.engineVersion}; running ${ENGINE_VERSION}.`
        });
      }
      return artifact.document;
    } catch (error) {
      if (!(error instanceof InterchangeError)) {
        throw error;
      }
      this.diagnostics.push({
        code: 'CACHE_DECODE_FAILED',
        severity: 'warning',
        message: `Cache artifact '${cachePath}' could not be decoded and was removed: ${error.message}`
      });
      await rm(cachePath, { force: true });
      return undefined;
    }
  }

  /** Freeze `stream` to `cachePath`, creating the scratch directory as needed. */
  async store(cachePath: string, stream: ScoreStream, number?: number): Promise<void> {
    await mkdir(path.dirname(cachePath), { recursive: true });
    await writeFile(cachePath, freeze(stream, number === undefined ? {} : { number }));
  }
}

/** `si-{engine}-{runtime}-{md5}[-{number}].frozen` */
export function artifactName(digest: string, number?: number): string {
  const suffix = number === undefined ? '' : `-${number}`;
  return `si-${ENGINE_VERSION}-${runtimeId()}-${digest}${suffix}.frozen`;
}

/** MD5 of a file's bytes, or of a directory's entry names and file contents. */
export async function sourceDigest(sourcePath: string, isDirectory = false): Promise<string> {
  const hash = createHash('md5');
  if (!isDirectory) {
    hash.update(await readFile(sourcePath));
    return hash.digest('hex');
  }

  for (const name of (await readdir(sourcePath)).sort()) {
    const entry = path.join(sourcePath, name);
    hash.update(name);
    if ((await stat(entry)).isFile()) {
      hash.update(await readFile(entry));
    }
  }
  return hash.digest('hex');
}

async function statSource(sourcePath: string): Promise<Stats> {
  const found = await statOptional(sourcePath);
  if (!found) {
    throw new SourceNotFoundError(sourcePath);
  }
  return found;
}

async function statOptional(filePath: string): Promise<Stats | undefined> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}
