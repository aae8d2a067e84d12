import { describe, expect, it } from 'vitest';

import { extract, isArchive, listEntries, selectMuseDataNames, sniffArchiveKind } from '../../src/archive/archive.js';
import { ArchiveError } from '../../src/core/errors.js';
import { createZip } from '../helpers/zip.js';

const CONTAINER = (fullPath: string): string => `<?xml version="1.0" encoding="UTF-8"?>
<container>
  <rootfiles>
    <rootfile full-path="${fullPath}" media-type="application/vnd.recordare.musicxml+xml"/>
  </rootfiles>
</container>`;

describe('archive resolver', () => {
  it('recognizes archives by signature and extension', () => {
    const zip = createZip([{ name: 'score.xml', data: '<score-partwise/>' }]);

    expect(isArchive(zip)).toBe(true);
    expect(isArchive(zip, 'piece.MXL')).toBe(true);
    expect(isArchive(zip, 'piece.txt')).toBe(false);
    expect(isArchive(new TextEncoder().encode('<score-partwise>not a zip</score-partwise>'))).toBe(false);
    expect(isArchive(zip.subarray(0, 30))).toBe(false);
  });

  it('sniffs the document kind from entry names', () => {
    const musicXml = createZip([
      { name: 'META-INF/container.xml', data: CONTAINER('scores/piece.xml') },
      { name: 'scores/piece.xml', data: '<score-partwise/>' }
    ]);
    const museData = createZip([
      { name: 'mozart/01', data: 'part one' },
      { name: 'mozart/02', data: 'part two' }
    ]);

    expect(sniffArchiveKind(musicXml)).toBe('musicxml');
    expect(sniffArchiveKind(museData)).toBe('musedata');
    expect(sniffArchiveKind(createZip([{ name: 'notes.txt', data: 'hello' }]))).toBeUndefined();
  });

  it('prefers a top-level score over the container rootfile', () => {
    const zip = createZip([
      { name: 'META-INF/container.xml', data: CONTAINER('nested/other.xml') },
      { name: 'nested/other.xml', data: '<other/>' },
      { name: 'score.xml', data: '<score-partwise version="4.0"/>', compressionMethod: 8 }
    ]);

    const document = extract(zip, 'musicxml');

    expect(document.entryNames).toEqual(['score.xml']);
    expect(document.content).toBe('<score-partwise version="4.0"/>');
    expect(document.diagnostics).toEqual([]);
  });

  it('follows the container rootfile when no score sits at the top level', () => {
    const zip = createZip([
      { name: 'META-INF/container.xml', data: CONTAINER('scores/b.xml'), compressionMethod: 8 },
      { name: 'scores/a.xml', data: '<a/>' },
      { name: 'scores/b.xml', data: '<b/>', compressionMethod: 8 }
    ]);

    expect(extract(zip, 'musicxml').entryNames).toEqual(['scores/b.xml']);
    expect(extract(zip, 'musicxml', { name: 'scores/a.xml' }).content).toBe('<a/>');
    expect(() => extract(zip, 'musicxml', { name: 'missing.xml' })).toThrow(ArchiveError);
  });

  it('falls back to the first nested score when container.xml is malformed', () => {
    const zip = createZip([
      { name: 'META-INF/container.xml', data: '<container><rootfiles>' },
      { name: 'scores/a.xml', data: '<a/>' }
    ]);

    const document = extract(zip, 'musicxml');

    expect(document.entryNames).toEqual(['scores/a.xml']);
    expect(document.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['ARCHIVE_CONTAINER_INVALID']);
  });

  it('decodes mislabelled bytes as Windows-1252 and rewrites the declaration', () => {
    const prefix = new TextEncoder().encode('<?xml version="1.0" encoding="UTF-8"?><title>Caf');
    const suffix = new TextEncoder().encode('</title>');
    const zip = createZip([{ name: 'score.xml', data: new Uint8Array([...prefix, 0xe9, ...suffix]) }]);

    const document = extract(zip, 'musicxml');

    expect(document.content).toBe('<?xml version="1.0" encoding="UTF-8"?><title>Café</title>');
    expect(document.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['ARCHIVE_ENCODING_FALLBACK']);
  });

  it('extracts MuseData part files in name order', () => {
    const zip = createZip([
      { name: 'bach/02', data: 'second' },
      { name: 'bach/01', data: 'first', compressionMethod: 8 },
      { name: 'bach/mchan', data: 'channels' },
      { name: 'bach/.hidden1', data: 'ignored' },
      { name: 'bach/score1', data: 'score file' },
      { name: 'other/03', data: 'elsewhere' }
    ]);

    expect(listEntries(zip)).toHaveLength(6);
    expect(extract(zip, 'musedata', { name: 'bach' })).toEqual({
      content: ['first', 'second'],
      entryNames: ['bach/01', 'bach/02'],
      diagnostics: []
    });
    expect(() => extract(createZip([{ name: 'readme', data: 'x' }]), 'musedata')).toThrow(ArchiveError);
  });

  it('keeps a lone score file when no part files exist', () => {
    expect(selectMuseDataNames(['set/score1', 'set/mchan'])).toEqual(['set/score1']);
    expect(selectMuseDataNames(['__MACOSX/01', 'set/readme.txt'])).toEqual([]);
  });
});
