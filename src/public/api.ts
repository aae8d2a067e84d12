import type { Diagnostic, ParserMode } from '../core/diagnostics.js';
import type { Score } from '../core/score.js';
import { loadSettings, type LoadSettingsOptions } from '../core/settings.js';
import { Converter, type ConvertOptions, type ConvertResult } from '../converter/converter.js';
import type { Registry } from '../converter/registry.js';
import { translateMusicXml } from '../parser/parse.js';

export type { Diagnostic, DiagnosticSeverity, DiagnosticSource, ParserMode } from '../core/diagnostics.js';
export * from '../core/errors.js';
export type {
  Barline,
  Chord,
  Duration,
  GeneralNote,
  Harmony,
  Measure,
  MeasureElement,
  Note,
  Part,
  Pitch,
  RepeatBracket,
  Rest,
  Score,
  ScoreCollection,
  ScoreMetadata,
  ScoreStream,
  Spanner,
  StaffGroup,
  Tuplet,
  Voice
} from '../core/score.js';
export { isGeneralNote, measureContents, partNotes } from '../core/score.js';
export { defaultSettings, loadSettings } from '../core/settings.js';
export type { AutoDownloadSetting, LoadSettingsOptions, Settings } from '../core/settings.js';
export { ENGINE_VERSION } from '../core/version.js';
export { extract, isArchive, listEntries, sniffArchiveKind } from '../archive/archive.js';
export type { ArchiveDocument, ArchiveKind } from '../archive/archive.js';
export { DocumentCache } from '../cache/cache.js';
export type { CacheStatus, CacheStatusOptions } from '../cache/cache.js';
export { freeze, thaw } from '../cache/freeze.js';
export { Converter } from '../converter/converter.js';
export type { ConvertOptions, ConvertResult, ConverterOptions } from '../converter/converter.js';
export { Registry } from '../converter/registry.js';
export type { SubConverterRegistration } from '../converter/registry.js';
export { FormatRouter } from '../converter/router.js';
export { SubConverter } from '../converter/sub-converter.js';
export type { SubConverterDescriptor, SubConverterOptions } from '../converter/sub-converter.js';

/** Parser configuration for the synchronous MusicXML entry point. */
export interface ParseOptions {
  sourceName?: string;
  mode?: ParserMode;
}

/** Standard parser return envelope with diagnostics-first reporting. */
export interface ParseResult {
  score: Score;
  diagnostics: Diagnostic[];
}

/** Translate MusicXML text (partwise or timewise) into the canonical score graph. */
export function parseMusicXML(xmlText: string, options: ParseOptions = {}): ParseResult {
  const { score, diagnostics } = translateMusicXml(xmlText, options);
  return { score, diagnostics };
}

/** Options for the one-shot `parse` helper. */
export interface ParseSourceOptions extends ConvertOptions {
  /** Settings file and environment to load; ignored when `converter` is given. */
  settings?: LoadSettingsOptions;
  registry?: Registry;
  converter?: Converter;
}

/**
 * Convert a URL, a file path or in-memory content with settings loaded from
 * the environment. Reuse a `Converter` when converting many sources.
 */
export async function parse(value: string | Uint8Array, options: ParseSourceOptions = {}): Promise<ConvertResult> {
  const { settings, registry, converter, ...convertOptions } = options;
  const active = converter ?? new Converter({ settings: await loadSettings(settings), registry });
  return active.parse(value, convertOptions);
}
