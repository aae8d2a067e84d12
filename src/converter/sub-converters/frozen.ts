import { InterchangeError } from '../../core/errors.js';
import type { ScoreStream } from '../../core/score.js';
import { ENGINE_VERSION } from '../../core/version.js';
import { thaw } from '../../cache/freeze.js';
import { SubConverter, type SubConverterDescriptor } from '../sub-converter.js';

/** Loads a frozen cache artifact as a source of its own. */
export class FrozenConverter extends SubConverter {
  readonly descriptor: SubConverterDescriptor = {
    name: 'frozen',
    formats: ['frozen'],
    inputExtensions: ['frozen'],
    outputExtensions: []
  };

  parseData(data: string | Uint8Array): ScoreStream {
    if (typeof data === 'string') {
      throw new InterchangeError('FROZEN_INVALID', 'Frozen artifacts are binary; pass the raw bytes.');
    }
    const artifact = thaw(data);
    if (artifact.engineVersion !== ENGINE_VERSION) {
      this.diagnostics.push({
        code: 'CACHE_VERSION_MISMATCH',
        severity: 'warning',
        message: `Frozen artifact was written by engine ${artifact.engineVersion}; running ${ENGINE_VERSION}.`
      });
    }
    return this.emit(artifact.document);
  }
}
