import { inflateRawSync } from 'node:zlib';
import { TextDecoder } from 'node:util';

import type { Diagnostic } from '../core/diagnostics.js';
import { ArchiveError, XmlParseError } from '../core/errors.js';
import { parseXmlToAst } from '../parser/xml-ast.js';
import { attribute, firstChild } from '../parser/xml-utils.js';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
/** End record is 22 bytes plus a comment of up to 64 KiB. */
const END_RECORD_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;

/** Extensions an archive is plausibly stored under. */
const ARCHIVE_EXTENSIONS = new Set(['mxl', 'md', 'zip']);

/** Reserved container-metadata folder of compressed MusicXML. */
const METADATA_FOLDER = 'meta-inf/';

/** What the caller expects the archive to hold. */
export type ArchiveKind = 'musicxml' | 'musedata';

/** One central-directory record. */
export interface ArchiveEntry {
  name: string;
  method: number;
  compressedSize: number;
  size: number;
  localHeaderOffset: number;
  isDirectory: boolean;
}

export interface ExtractOptions {
  /** Entry to extract instead of the automatic choice. */
  name?: string;
  sourceName?: string;
}

/** Decoded archive content plus the entries it came from. */
export interface ArchiveDocument<T> {
  content: T;
  entryNames: string[];
  diagnostics: Diagnostic[];
}

/**
 * True when `data` is a readable ZIP and, if a file name is given, its extension
 * is one archives travel under. A bad signature means "not an archive", never an error.
 */
export function isArchive(data: Uint8Array, fileName?: string): boolean {
  if (fileName !== undefined) {
    const extension = fileName.toLowerCase().split('.').at(-1) ?? '';
    if (!ARCHIVE_EXTENSIONS.has(extension)) {
      return false;
    }
  }
  if (data.length < END_RECORD_SIZE || readU32(data, 0) !== LOCAL_HEADER_SIGNATURE) {
    return false;
  }
  try {
    readZipEntries(data);
    return true;
  } catch (error) {
    if (error instanceof ArchiveError) {
      return false;
    }
    throw error;
  }
}

/** Names of every entry, in central-directory order. */
export function listEntries(data: Uint8Array): string[] {
  return readZipEntries(data).map((entry) => entry.name);
}

/**
 * Which document kind an archive holds, judged by its entry names alone:
 * any XML entry outside META-INF means compressed MusicXML.
 */
export function sniffArchiveKind(data: Uint8Array): ArchiveKind | undefined {
  const entries = readZipEntries(data).filter((entry) => !entry.isDirectory);
  if (entries.some((entry) => isXmlName(entry.name) && !isMetadata(entry.name))) {
    return 'musicxml';
  }
  return selectMuseDataNames(entries.map((entry) => entry.name)).length > 0 ? 'musedata' : undefined;
}

/** Extract the score document of a compressed MusicXML file. */
export function extract(data: Uint8Array, kind: 'musicxml', options?: ExtractOptions): ArchiveDocument<string>;
/** Extract every shard of a MuseData archive, one decoded string per part file. */
export function extract(data: Uint8Array, kind: 'musedata', options?: ExtractOptions): ArchiveDocument<string[]>;
export function extract(
  data: Uint8Array,
  kind: ArchiveKind,
  options: ExtractOptions = {}
): ArchiveDocument<string> | ArchiveDocument<string[]> {
  const entries = readZipEntries(data);
  return kind === 'musicxml' ? extractMusicXml(data, entries, options) : extractMuseData(data, entries, options);
}

function extractMusicXml(data: Uint8Array, entries: ArchiveEntry[], options: ExtractOptions): ArchiveDocument<string> {
  const diagnostics: Diagnostic[] = [];
  const entry = options.name !== undefined ? findEntry(entries, options.name) : chooseScoreEntry(data, entries, diagnostics);
  if (!entry) {
    throw new ArchiveError(
      options.name !== undefined
        ? `Entry '${options.name}' not found in archive${options.sourceName ? ` '${options.sourceName}'` : ''}.`
        : 'Archive contains no MusicXML document.'
    );
  }

  const content = decodeXml(readEntry(data, entry), entry.name, diagnostics);
  return { content, entryNames: [entry.name], diagnostics };
}

/**
 * A top-level XML entry outside META-INF wins; then the container's rootfile;
 * then the first nested XML entry.
 */
function chooseScoreEntry(data: Uint8Array, entries: ArchiveEntry[], diagnostics: Diagnostic[]): ArchiveEntry | undefined {
  const candidates = entries.filter((entry) => !entry.isDirectory && isXmlName(entry.name) && !isMetadata(entry.name));

  const topLevel = candidates.find((entry) => !entry.name.includes('/'));
  if (topLevel) {
    return topLevel;
  }

  const container = findEntry(entries, 'META-INF/container.xml');
  const rootfile = container ? readRootfilePath(readEntry(data, container), diagnostics) : undefined;
  const fromContainer = rootfile === undefined ? undefined : findEntry(entries, rootfile);
  return fromContainer ?? candidates[0];
}

function readRootfilePath(bytes: Uint8Array, diagnostics: Diagnostic[]): string | undefined {
  try {
    const root = parseXmlToAst(new TextDecoder().decode(bytes), 'META-INF/container.xml');
    return attribute(firstChild(firstChild(root, 'rootfiles'), 'rootfile'), 'full-path');
  } catch (error) {
    if (error instanceof XmlParseError) {
      diagnostics.push({
        code: 'ARCHIVE_CONTAINER_INVALID',
        severity: 'warning',
        message: `container.xml is malformed (${error.message}); using the first XML entry.`
      });
      return undefined;
    }
    throw error;
  }
}

function extractMuseData(data: Uint8Array, entries: ArchiveEntry[], options: ExtractOptions): ArchiveDocument<string[]> {
  const diagnostics: Diagnostic[] = [];
  const prefix = options.name?.replace(/\/+$/, '');
  const scoped = entries.filter(
    (entry) => prefix === undefined || entry.name === prefix || entry.name.startsWith(`${prefix}/`)
  );
  const selected = selectMuseDataNames(scoped.filter((entry) => !entry.isDirectory).map((entry) => entry.name));
  if (selected.length === 0) {
    throw new ArchiveError('Archive contains no MuseData part files.');
  }

  const content = selected.map((name) => {
    const entry = findEntry(entries, name);
    if (!entry) {
      throw new ArchiveError(`Entry '${name}' vanished from the central directory.`);
    }
    return decodeText(readEntry(data, entry), name, diagnostics);
  });
  return { content, entryNames: selected, diagnostics };
}

/**
 * MuseData part files: a `.md` suffix or a digit in the name, never hidden and
 * never an `mchan` channel map. Score files are dropped when parts exist beside them.
 */
export function selectMuseDataNames(names: readonly string[]): string[] {
  const qualifying = names.filter((name) => {
    const segments = name.split('/');
    const base = segments.at(-1) ?? '';
    if (!base || segments.some((segment) => segment.startsWith('.') || segment === '__MACOSX')) {
      return false;
    }
    if (base.toLowerCase().startsWith('mchan')) {
      return false;
    }
    return base.toLowerCase().endsWith('.md') || /\d/.test(base);
  });

  const parts =
    qualifying.length > 1
      ? qualifying.filter((name) => {
          const base = (name.split('/').at(-1) ?? '').replace(/\.[^.]*$/, '');
          return !base.replace(/\d/g, '').toLowerCase().startsWith('s');
        })
      : qualifying;

  return [...parts].sort();
}

/** Read every central-directory record; throws `ArchiveError` on a damaged archive. */
export function readZipEntries(data: Uint8Array): ArchiveEntry[] {
  const end = findEndRecord(data);
  const count = readU16(data, end + 10);
  const directorySize = readU32(data, end + 12);
  const directoryOffset = readU32(data, end + 16);
  if (directoryOffset + directorySize > data.length) {
    throw new ArchiveError('Central directory lies outside the archive.');
  }

  const entries: ArchiveEntry[] = [];
  let cursor = directoryOffset;
  for (let index = 0; index < count; index += 1) {
    if (readU32(data, cursor) !== CENTRAL_DIRECTORY_SIGNATURE) {
      throw new ArchiveError(`Central directory record ${index + 1} has a bad signature.`);
    }

    const nameLength = readU16(data, cursor + 28);
    const extraLength = readU16(data, cursor + 30);
    const commentLength = readU16(data, cursor + 32);
    const name = normalizePath(new TextDecoder().decode(slice(data, cursor + 46, nameLength)));

    entries.push({
      name,
      method: readU16(data, cursor + 10),
      compressedSize: readU32(data, cursor + 20),
      size: readU32(data, cursor + 24),
      localHeaderOffset: readU32(data, cursor + 42),
      isDirectory: name.endsWith('/')
    });
    cursor += 46 + nameLength + extraLength + commentLength;
  }
  return entries;
}

/** Bytes of one entry, inflated when it was deflated. */
export function readEntry(data: Uint8Array, entry: ArchiveEntry): Uint8Array {
  const header = entry.localHeaderOffset;
  if (readU32(data, header) !== LOCAL_HEADER_SIGNATURE) {
    throw new ArchiveError(`Local header of '${entry.name}' has a bad signature.`);
  }

  const payloadOffset = header + 30 + readU16(data, header + 26) + readU16(data, header + 28);
  const payload = slice(data, payloadOffset, entry.compressedSize);

  if (entry.method === 0) {
    return payload;
  }
  if (entry.method === 8) {
    try {
      return new Uint8Array(inflateRawSync(payload));
    } catch (error) {
      throw new ArchiveError(`Entry '${entry.name}' cannot be inflated.`, { cause: error });
    }
  }
  throw new ArchiveError(`Entry '${entry.name}' uses unsupported compression method ${entry.method}.`);
}

function findEndRecord(data: Uint8Array): number {
  const lowest = Math.max(0, data.length - END_RECORD_SIZE - MAX_COMMENT_LENGTH);
  for (let offset = data.length - END_RECORD_SIZE; offset >= lowest; offset -= 1) {
    if (readU32(data, offset) === END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
      return offset;
    }
  }
  throw new ArchiveError('End of central directory not found.');
}

function findEntry(entries: ArchiveEntry[], name: string): ArchiveEntry | undefined {
  const wanted = normalizePath(name);
  return (
    entries.find((entry) => entry.name === wanted) ??
    entries.find((entry) => entry.name.toLowerCase() === wanted.toLowerCase())
  );
}

/**
 * Decode with the prolog's declared encoding, then UTF-8, then Windows-1252.
 * When a fallback was needed the declaration is rewritten so it no longer lies.
 */
export function decodeXml(bytes: Uint8Array, entryName: string, diagnostics: Diagnostic[]): string {
  const prolog = new TextDecoder('latin1').decode(bytes.subarray(0, 200));
  const declared = /<\?xml[^>]*encoding\s*=\s*["']([^"']+)["']/.exec(prolog)?.[1];

  for (const label of [declared, 'utf-8']) {
    if (label === undefined) {
      continue;
    }
    const text = tryDecode(bytes, label);
    if (text !== undefined) {
      if (label !== declared && declared !== undefined) {
        diagnostics.push(fallbackDiagnostic(entryName, declared, label));
        return rewriteDeclaredEncoding(text);
      }
      return text;
    }
  }

  diagnostics.push(fallbackDiagnostic(entryName, declared ?? 'utf-8', 'windows-1252'));
  return rewriteDeclaredEncoding(new TextDecoder('windows-1252').decode(bytes));
}

/** UTF-8, or ISO-8859-1 when the bytes are not valid UTF-8. */
export function decodeText(bytes: Uint8Array, entryName: string, diagnostics: Diagnostic[]): string {
  const text = tryDecode(bytes, 'utf-8');
  if (text !== undefined) {
    return text;
  }
  diagnostics.push(fallbackDiagnostic(entryName, 'utf-8', 'iso-8859-1'));
  return new TextDecoder('iso-8859-1').decode(bytes);
}

function tryDecode(bytes: Uint8Array, label: string): string | undefined {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch (error) {
    // Unknown encoding label.
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function rewriteDeclaredEncoding(text: string): string {
  return text.replace(/(<\?xml[^>]*encoding\s*=\s*["'])[^"']+(["'])/, '$1UTF-8$2');
}

function fallbackDiagnostic(entryName: string, tried: string, used: string): Diagnostic {
  return {
    code: 'ARCHIVE_ENCODING_FALLBACK',
    severity: 'warning',
    message: `'${entryName}' is not valid ${tried}; decoded as ${used}.`
  };
}

function isXmlName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.endsWith('.xml') || lower.endsWith('.musicxml');
}

function isMetadata(name: string): boolean {
  return name.toLowerCase().startsWith(METADATA_FOLDER);
}

function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\/+/, '');
}

function slice(data: Uint8Array, offset: number, length: number): Uint8Array {
  if (offset < 0 || offset + length > data.length) {
    throw new ArchiveError('Archive record runs past the end of the data.');
  }
  return data.subarray(offset, offset + length);
}

function readU16(data: Uint8Array, offset: number): number {
  return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint16(checked(data, offset, 2), true);
}

function readU32(data: Uint8Array, offset: number): number {
  return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(checked(data, offset, 4), true);
}

function checked(data: Uint8Array, offset: number, length: number): number {
  if (offset < 0 || offset + length > data.length) {
    throw new ArchiveError('Archive record runs past the end of the data.');
  }
  return offset;
}
