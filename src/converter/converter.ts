import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';

import { DocumentCache } from '../cache/cache.js';
import { hasErrors, normalizeDiagnosticsForMode, type Diagnostic, type ParserMode } from '../core/diagnostics.js';
import {
  AutoDownloadError,
  isMissingFileError,
  SourceNotFoundError,
  UnknownFormatError,
  ValidationError
} from '../core/errors.js';
import type { ScoreStream } from '../core/score.js';
import { defaultSettings, type Settings } from '../core/settings.js';
import { isArchive, sniffArchiveKind } from '../archive/archive.js';
import { Registry } from './registry.js';
import { FormatRouter } from './router.js';
import type { SubConverter } from './sub-converter.js';

/** Per-call conversion options. */
export interface ConvertOptions {
  /** Format name or extension; skips detection when given. */
  format?: string;
  /** Work to select from a multi-work source. */
  number?: number;
  /** Translate the source even when a fresh cache artifact exists. */
  forceSource?: boolean;
  /** Set to false to leave the cache untouched after translating. */
  storeCache?: boolean;
  mode?: ParserMode;
}

export interface ConvertResult {
  stream: ScoreStream;
  /** Canonical name of the format that produced the stream. */
  format: string;
  diagnostics: Diagnostic[];
  fromCache: boolean;
}

export interface ConverterOptions {
  registry?: Registry;
  settings?: Settings;
  /** Transport for URL sources; the global `fetch` by default. */
  fetch?: typeof fetch;
}

const MULTI_FORMAT_ARCHIVES = new Set(['musicxml', 'musedata']);

/**
 * Entry point for every conversion: routes a source to its sub-converter,
 * consults the document cache for files, and applies the parser mode.
 */
export class Converter {
  readonly router: FormatRouter;
  readonly settings: Settings;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ConverterOptions = {}) {
    this.router = new FormatRouter(options.registry ?? Registry.defaults());
    this.settings = options.settings ?? defaultSettings();
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Convert a file or a MuseData directory. */
  async parseFile(filePath: string, options: ConvertOptions = {}): Promise<ConvertResult> {
    const source = await statSource(filePath);
    const format = await this.routeFile(filePath, source, options.format);
    const handler = this.router.dispatch(format);
    const mode = options.mode ?? this.settings.parserMode;

    const cache = new DocumentCache(this.settings.cache ? { scratchDirectory: this.settings.scratchDirectory } : {});
    const status = await cache.status(filePath, { forceSource: options.forceSource, number: options.number });

    let stream: ScoreStream | undefined;
    if (status.pathToLoad !== filePath) {
      stream = await cache.load(status.pathToLoad);
    }
    const fromCache = stream !== undefined;
    stream ??= await handler.parseFile(filePath, { number: options.number, mode, sourceName: filePath });

    const diagnostics = this.finish(mode, cache.diagnostics, fromCache ? [] : handler.diagnostics);

    // A cache hit never rewrites; a miss, a stale artifact or an undecodable one does.
    if (!fromCache && status.cachePath !== undefined && options.storeCache !== false) {
      await cache.store(status.cachePath, stream, options.number);
    }
    return { stream, format, diagnostics, fromCache };
  }

  /** Convert in-memory content: the format hint, then a `name:` header, then sniffing. */
  async parseData(data: string | Uint8Array, options: ConvertOptions = {}): Promise<ConvertResult> {
    let payload = data;
    let format = options.format === undefined ? undefined : this.router.resolveFormat(options.format);

    if (format === undefined && typeof data === 'string') {
      const header = this.router.formatFromContentHeader(data);
      if (header.format !== undefined) {
        format = header.format;
        payload = header.remainder;
      }
    }
    format ??= this.router.sniffFormat(data);
    if (format === undefined) {
      throw new UnknownFormatError('data', 'Cannot determine the format of the given data');
    }

    return this.translate(this.router.dispatch(format), format, payload, options, '<data>');
  }

  /** Download and convert; only allowed when `autoDownload` is `'allow'`. */
  async parseUrl(url: string, options: ConvertOptions = {}): Promise<ConvertResult> {
    if (this.settings.autoDownload !== 'allow') {
      throw new AutoDownloadError(this.settings.autoDownload);
    }

    const response = await this.fetchImpl(url);
    if (!response.ok) {
      throw new SourceNotFoundError(url);
    }
    const bytes = new Uint8Array(await response.arrayBuffer());

    const format =
      (options.format === undefined ? undefined : this.router.resolveFormat(options.format)) ??
      this.router.formatFromExtension(new URL(url).pathname) ??
      this.router.sniffFormat(bytes);
    if (format === undefined) {
      throw new UnknownFormatError(url, `Cannot determine the format of '${url}'`);
    }

    return this.translate(this.router.dispatch(format), format, bytes, options, url);
  }

  /** A URL string is downloaded, an existing path is read, anything else is content. */
  async parse(value: string | Uint8Array, options: ConvertOptions = {}): Promise<ConvertResult> {
    if (typeof value === 'string' && /^https?:\/\//i.test(value)) {
      return this.parseUrl(value, options);
    }
    if (typeof value === 'string' && !value.includes('\n') && (await pathExists(value))) {
      return this.parseFile(value, options);
    }
    return this.parseData(value, options);
  }

  private translate(
    handler: SubConverter,
    format: string,
    data: string | Uint8Array,
    options: ConvertOptions,
    sourceName: string
  ): ConvertResult {
    const mode = options.mode ?? this.settings.parserMode;
    const stream = handler.parseData(data, { number: options.number, mode, sourceName });
    return { stream, format, diagnostics: this.finish(mode, handler.diagnostics), fromCache: false };
  }

  /** Apply the parser mode; strict mode refuses a result that carries errors. */
  private finish(mode: ParserMode, ...groups: Diagnostic[][]): Diagnostic[] {
    const diagnostics = normalizeDiagnosticsForMode(groups.flat(), mode);
    if (mode === 'strict' && hasErrors(diagnostics)) {
      throw new ValidationError(diagnostics);
    }
    return diagnostics;
  }

  /**
   * Hint, then directory (MuseData), then extension, then content. An archive
   * routed by extension to MusicXML or MuseData is settled by its entry names.
   */
  private async routeFile(filePath: string, source: Stats, hint: string | undefined): Promise<string> {
    if (hint !== undefined) {
      return this.router.resolveFormat(hint);
    }
    if (source.isDirectory()) {
      return this.router.resolveFormat('musedata');
    }

    const byExtension = this.router.formatFromExtension(filePath);
    if (byExtension !== undefined && !MULTI_FORMAT_ARCHIVES.has(byExtension)) {
      return byExtension;
    }

    const bytes = new Uint8Array(await readFile(filePath));
    if (byExtension !== undefined) {
      return isArchive(bytes) ? (sniffArchiveKind(bytes) ?? byExtension) : byExtension;
    }

    const sniffed = this.router.sniffFormat(bytes);
    if (sniffed === undefined) {
      throw new UnknownFormatError(filePath, `Cannot determine the format of '${filePath}'`);
    }
    return sniffed;
  }
}

async function statSource(filePath: string): Promise<Stats> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new SourceNotFoundError(filePath, { cause: error });
    }
    throw error;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error) || (error instanceof Error && 'code' in error && error.code === 'ENAMETOOLONG')) {
      return false;
    }
    throw error;
  }
}
