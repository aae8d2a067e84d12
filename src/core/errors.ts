import type { Diagnostic, DiagnosticSource } from './diagnostics.js';

/** Base class for every fatal error raised by the interchange engine. */
export class InterchangeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterchangeError';
    this.code = code;
  }
}

/** The source path does not exist or cannot be read. */
export class SourceNotFoundError extends InterchangeError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('SOURCE_NOT_FOUND', `Source not found: ${path}`, options);
    this.name = 'SourceNotFoundError';
    this.path = path;
  }
}

/** An archive cannot deliver the document kind it was asked for. */
export class ArchiveError extends InterchangeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ARCHIVE_INVALID', message, options);
    this.name = 'ArchiveError';
  }
}

/** A format hint, extension or payload matches no known format. */
export class UnknownFormatError extends InterchangeError {
  readonly hint: string;

  constructor(hint: string, message = `Unknown format: '${hint}'`) {
    super('UNKNOWN_FORMAT', message);
    this.name = 'UnknownFormatError';
    this.hint = hint;
  }
}

/** The format resolved but no handler for it is active in the registry. */
export class HandlerDisabledError extends InterchangeError {
  readonly format: string;

  constructor(format: string) {
    super('HANDLER_DISABLED', `Format '${format}' is known but its handler is not registered`);
    this.name = 'HandlerDisabledError';
    this.format = format;
  }
}

/** A source-only request named a cache artifact, which has no source behind it. */
export class CacheArtifactSourceError extends InterchangeError {
  constructor(path: string) {
    super('CACHE_ARTIFACT_SOURCE', `Cannot access the source of '${path}': it is a frozen cache artifact`);
    this.name = 'CacheArtifactSourceError';
  }
}

/** A URL was given while automatic downloads are not allowed. */
export class AutoDownloadError extends InterchangeError {
  readonly setting: string;

  constructor(setting: string) {
    super(
      'AUTO_DOWNLOAD_DISABLED',
      `Automatic download is not allowed (autoDownload is set to '${setting}'); set it to 'allow' to fetch URLs`
    );
    this.name = 'AutoDownloadError';
    this.setting = setting;
  }
}

/** A settings file or environment override holds an invalid value. */
export class SettingsError extends InterchangeError {
  readonly key: string;

  constructor(key: string, message: string) {
    super('SETTINGS_INVALID', `Invalid setting '${key}': ${message}`);
    this.name = 'SettingsError';
    this.key = key;
  }
}

/** Malformed XML, with the coordinates where the parser gave up. */
export class XmlParseError extends InterchangeError {
  readonly source?: DiagnosticSource;

  constructor(message: string, source?: DiagnosticSource) {
    super('XML_PARSE_ERROR', message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

/** A document element that cannot be translated at all. */
export class ElementTranslationError extends InterchangeError {
  readonly xmlPath?: string;

  constructor(message: string, xmlPath?: string) {
    super('ELEMENT_UNTRANSLATABLE', xmlPath ? `${message} (at ${xmlPath})` : message);
    this.name = 'ElementTranslationError';
    this.xmlPath = xmlPath;
  }
}

/** Any failure inside one measure, localized to its part and measure number. */
export class MeasureTranslationError extends InterchangeError {
  readonly partId: string;
  readonly measureNumber: string;

  constructor(partId: string, measureNumber: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('MEASURE_TRANSLATION_FAILED', `In part ${partId}, measure ${measureNumber}: ${reason}`, { cause });
    this.name = 'MeasureTranslationError';
    this.partId = partId;
    this.measureNumber = measureNumber;
  }
}

/** Strict-mode translation finished with error diagnostics. */
export class ValidationError extends InterchangeError {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const errors = diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    super('VALIDATION_FAILED', `Strict translation failed with ${errors.length} error(s): ${errors[0]?.message ?? ''}`);
    this.name = 'ValidationError';
    this.diagnostics = diagnostics;
  }
}

/** True for the file-system errors of a path that does not exist. */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
