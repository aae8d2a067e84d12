import { UnknownFormatError } from '../core/errors.js';
import type { SubConverter, SubConverterDescriptor } from './sub-converter.js';
import { AbcConverter } from './sub-converters/abc.js';
import { FrozenConverter } from './sub-converters/frozen.js';
import { MuseDataConverter } from './sub-converters/musedata.js';
import { MusicXmlConverter } from './sub-converters/musicxml.js';
import { TinyNotationConverter } from './sub-converters/tinynotation.js';

/** A format handler: what it reads, and a factory for a fresh per-conversion instance. */
export interface SubConverterRegistration {
  descriptor: SubConverterDescriptor;
  create(): SubConverter;
}

function registration(create: () => SubConverter): SubConverterRegistration {
  return { descriptor: create().descriptor, create };
}

/** Built-in handlers in priority order. */
export function defaultRegistrations(): SubConverterRegistration[] {
  return [
    registration(() => new MusicXmlConverter()),
    registration(() => new AbcConverter()),
    registration(() => new MuseDataConverter()),
    registration(() => new TinyNotationConverter()),
    registration(() => new FrozenConverter())
  ];
}

/**
 * Immutable, ordered set of sub-converters. `with` and `without` return new
 * registries, so a converter built from one is never affected by later changes.
 * Removed defaults stay known: their formats resolve but dispatch refuses them.
 */
export class Registry {
  private constructor(
    private readonly registrations: readonly SubConverterRegistration[],
    private readonly defaults: readonly SubConverterRegistration[]
  ) {}

  static defaults(): Registry {
    const defaults = defaultRegistrations();
    return new Registry(defaults, defaults);
  }

  /** A registry with `added` ahead of every existing handler. */
  with(added: SubConverterRegistration): Registry {
    return new Registry([added, ...this.registrations], this.defaults);
  }

  /** A registry without the handlers called `name`, or without every default for `'all'`. */
  without(name: string): Registry {
    if (name === 'all') {
      return new Registry(
        this.registrations.filter((entry) => !this.defaults.includes(entry)),
        this.defaults
      );
    }

    if (!this.known().some((entry) => entry.descriptor.name === name)) {
      throw new UnknownFormatError(name, `Cannot remove unknown sub-converter '${name}'`);
    }
    return new Registry(
      this.registrations.filter((entry) => entry.descriptor.name !== name),
      this.defaults
    );
  }

  /** Handlers that dispatch will use, highest priority first. */
  active(): SubConverterRegistration[] {
    return [...this.registrations];
  }

  /** Active handlers followed by removed defaults, for format resolution. */
  known(): SubConverterRegistration[] {
    const retired = this.defaults.filter((entry) => !this.registrations.includes(entry));
    return [...this.registrations, ...retired];
  }

  isActive(name: string): boolean {
    return this.registrations.some((entry) => entry.descriptor.name === name);
  }
}
