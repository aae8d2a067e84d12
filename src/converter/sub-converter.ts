import { readFile } from 'node:fs/promises';

import type { Diagnostic, ParserMode } from '../core/diagnostics.js';
import { InterchangeError, isMissingFileError, SourceNotFoundError } from '../core/errors.js';
import type { ScoreStream } from '../core/score.js';

/** Immutable identity of a format handler as the router sees it. */
export interface SubConverterDescriptor {
  /** Canonical format name. */
  name: string;
  /** Format-name aliases, canonical name included, lower case. */
  formats: readonly string[];
  inputExtensions: readonly string[];
  outputExtensions: readonly string[];
}

/** Per-call options handed to a sub-converter. */
export interface SubConverterOptions {
  /** Which work of a multi-work source to return; all of them when absent. */
  number?: number;
  mode?: ParserMode;
  sourceName?: string;
}

/**
 * One format's reader. Instances are created per conversion and keep the
 * produced stream and diagnostics, so no state is shared between conversions.
 */
export abstract class SubConverter {
  readonly diagnostics: Diagnostic[] = [];
  private produced: ScoreStream | undefined;

  abstract readonly descriptor: SubConverterDescriptor;

  /** Translate in-memory content. */
  abstract parseData(data: string | Uint8Array, options?: SubConverterOptions): ScoreStream;

  /** Read `path` and translate its content. */
  async parseFile(path: string, options: SubConverterOptions = {}): Promise<ScoreStream> {
    return this.parseData(await readSource(path), { sourceName: path, ...options });
  }

  /** Score (or collection) produced by the last parse. */
  get stream(): ScoreStream {
    if (!this.produced) {
      throw new InterchangeError('NO_STREAM', `The ${this.descriptor.name} converter has not parsed anything yet.`);
    }
    return this.produced;
  }

  /** Record the parse result; sub-classes return through this. */
  protected emit(stream: ScoreStream): ScoreStream {
    this.produced = stream;
    return stream;
  }
}

/** Read a source file, turning a missing path into `SourceNotFoundError`. */
export async function readSource(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new SourceNotFoundError(path, { cause: error });
    }
    throw error;
  }
}

/** Text of `data`, decoding bytes as UTF-8 with a Latin-1 fallback. */
export function asText(data: string | Uint8Array): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (error) {
    if (error instanceof TypeError) {
      return new TextDecoder('iso-8859-1').decode(data);
    }
    throw error;
  }
}
