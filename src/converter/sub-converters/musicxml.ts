import type { ScoreStream } from '../../core/score.js';
import { decodeXml, extract, isArchive } from '../../archive/archive.js';
import { translateMusicXml } from '../../parser/parse.js';
import { SubConverter, type SubConverterDescriptor, type SubConverterOptions } from '../sub-converter.js';

/** Uncompressed and compressed (`.mxl`) MusicXML through the translation engine. */
export class MusicXmlConverter extends SubConverter {
  readonly descriptor: SubConverterDescriptor = {
    name: 'musicxml',
    formats: ['musicxml', 'xml'],
    inputExtensions: ['xml', 'mxl', 'musicxml'],
    outputExtensions: ['musicxml', 'xml', 'mxl']
  };

  parseData(data: string | Uint8Array, options: SubConverterOptions = {}): ScoreStream {
    const result = translateMusicXml(this.documentText(data, options.sourceName), {
      sourceName: options.sourceName,
      mode: options.mode
    });
    this.diagnostics.push(...result.diagnostics);
    return this.emit(result.score);
  }

  private documentText(data: string | Uint8Array, sourceName = 'document'): string {
    if (typeof data === 'string') {
      return data;
    }
    if (isArchive(data)) {
      const archive = extract(data, 'musicxml', { sourceName });
      this.diagnostics.push(...archive.diagnostics);
      return archive.content;
    }
    return decodeXml(data, sourceName, this.diagnostics);
  }
}
