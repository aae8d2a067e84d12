import { HandlerDisabledError, UnknownFormatError } from '../core/errors.js';
import { isArchive, sniffArchiveKind } from '../archive/archive.js';
import { hasGzipMagic } from '../cache/freeze.js';
import { Registry, type SubConverterRegistration } from './registry.js';
import type { SubConverter } from './sub-converter.js';

/** A `name:` header split off in-memory content. */
export interface ContentHeader {
  format?: string;
  remainder: string;
}

/** Maps hints, extensions and content to a registered format, then to a handler instance. */
export class FormatRouter {
  constructor(readonly registry: Registry = Registry.defaults()) {}

  /**
   * Canonical format for a name or extension hint (case-insensitive, leading dot
   * optional). Format names win over input extensions, which win over output extensions.
   */
  resolveFormat(hint: string): string {
    const normalized = hint.trim().toLowerCase().replace(/^\./, '');
    const known = this.registry.known();
    const match =
      known.find((entry) => entry.descriptor.formats.includes(normalized)) ??
      known.find((entry) => entry.descriptor.inputExtensions.includes(normalized)) ??
      known.find((entry) => entry.descriptor.outputExtensions.includes(normalized));
    if (!match) {
      throw new UnknownFormatError(hint);
    }
    return match.descriptor.name;
  }

  /** Format implied by a path's extension, if any registered handler reads it. */
  formatFromExtension(filePath: string): string | undefined {
    const base = filePath.split(/[\\/]/).at(-1) ?? '';
    const dot = base.lastIndexOf('.');
    if (dot <= 0) {
      return undefined;
    }
    const extension = base.slice(dot + 1).toLowerCase();
    return this.registry.known().find((entry) => entry.descriptor.inputExtensions.includes(extension))?.descriptor.name;
  }

  /**
   * Split a leading `tinynotation: ...` style header. Only known format names
   * count, so ABC fields such as `X:` stay part of the content.
   */
  formatFromContentHeader(text: string): ContentHeader {
    const match = /^\s*([A-Za-z][\w-]*):/.exec(text);
    const name = match?.[1]?.toLowerCase();
    if (!match || !name || !this.registry.known().some((entry) => entry.descriptor.formats.includes(name))) {
      return { remainder: text };
    }
    return { format: this.resolveFormat(name), remainder: text.slice(match[0].length) };
  }

  /** Guess a format from the bytes themselves. */
  sniffFormat(data: string | Uint8Array): string | undefined {
    if (typeof data !== 'string') {
      if (hasGzipMagic(data)) {
        return 'frozen';
      }
      if (isArchive(data)) {
        return sniffArchiveKind(data);
      }
    }

    const text = (typeof data === 'string' ? data.slice(0, 4096) : new TextDecoder('latin1').decode(data.subarray(0, 4096)))
      .replace(/^\uFEFF/, '')
      .trimStart();
    if (/^<\?xml/.test(text) || /^<score-(partwise|timewise)/.test(text) || /^<!DOCTYPE\s+score-/.test(text)) {
      return 'musicxml';
    }
    if (/^WK#:/m.test(text) && /^measure/m.test(text)) {
      return 'musedata';
    }
    if (/^M:/m.test(text) && /^K:/m.test(text)) {
      return 'abc';
    }
    return undefined;
  }

  /** A fresh handler for `format`. */
  dispatch(format: string): SubConverter {
    return this.registrationFor(format).create();
  }

  private registrationFor(format: string): SubConverterRegistration {
    const active = this.registry.active().find((entry) => entry.descriptor.name === format);
    if (active) {
      return active;
    }
    if (this.registry.known().some((entry) => entry.descriptor.name === format)) {
      throw new HandlerDisabledError(format);
    }
    throw new UnknownFormatError(format);
  }
}
