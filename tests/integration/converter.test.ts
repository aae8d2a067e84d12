import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  AutoDownloadError,
  Converter,
  defaultSettings,
  HandlerDisabledError,
  parse,
  Registry,
  SourceNotFoundError,
  UnknownFormatError,
  ValidationError,
  type ScoreStream,
  type Settings
} from '../../src/public/api.js';
import { museDataHeader, museDataRecord } from '../helpers/musedata.js';
import { note, partwise, QUARTER_ATTRIBUTES } from '../helpers/musicxml.js';
import { createZip } from '../helpers/zip.js';

const SCORE = partwise(`<measure number="1">${QUARTER_ATTRIBUTES}${note('C4', 4, '<type>whole</type>')}</measure>`, {
  title: 'Cached Piece'
});
const LONG_AGO = new Date('2001-01-01T00:00:00Z');

function titleOf(stream: ScoreStream): string | undefined {
  return stream.kind === 'score' ? stream.metadata.title : undefined;
}

const TWO_VOICES = partwise(`
  <measure number="1">
    ${QUARTER_ATTRIBUTES}
    ${note('C5', 4, '<voice>1</voice><type>whole</type>')}
    <backup><duration>4</duration></backup>
    ${note('C4', 2, '<voice>2</voice><type>half</type><notations><slur type="start" number="1"/></notations>')}
    ${note('D4', 2, '<voice>2</voice><type>half</type><notations><slur type="stop" number="1"/></notations>')}
  </measure>
  <measure number="2">${note('E4', 4, '<type>whole</type>')}</measure>`);

/** Part, measure, voice and event counts of every part. */
function shapeOf(stream: ScoreStream): unknown {
  if (stream.kind !== 'score') {
    return stream.scores.map(shapeOf);
  }
  return stream.parts.map((part) =>
    part.measures.map((measure) => ({
      elements: measure.elements.length,
      voices: measure.voices.map((voice) => [voice.id, voice.elements.length, voice.spanners.length]),
      spanners: measure.spanners.length
    }))
  );
}

function museDataPart(partName: string): string {
  return [
    ...museDataHeader({ workTitle: 'Directory Work', movementTitle: 'Largo', partName }),
    '$ K:0 Q:1 T:4/4 C:4',
    'measure 1',
    museDataRecord({ pitch: 'C4', ticks: 4, type: 'w' }),
    '/END'
  ].join('\n');
}

describe('converter', () => {
  let root: string;
  let settings: Settings;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'converter-test-'));
    settings = { ...defaultSettings(), scratchDirectory: path.join(root, 'scratch') };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('translates a file, stores an artifact and serves the next call from it', async () => {
    const file = path.join(root, 'piece.musicxml');
    await writeFile(file, SCORE);
    const converter = new Converter({ settings });

    const first = await converter.parseFile(file);
    expect(first).toMatchObject({ format: 'musicxml', fromCache: false, diagnostics: [] });
    expect(titleOf(first.stream)).toBe('Cached Piece');

    const artifacts = await readdir(path.join(root, 'scratch'));
    expect(artifacts).toHaveLength(1);
    expect(artifacts[0]).toMatch(/^si-.*\.frozen$/);

    await utimes(file, LONG_AGO, LONG_AGO);
    const second = await converter.parseFile(file);
    expect(second.fromCache).toBe(true);
    expect(titleOf(second.stream)).toBe('Cached Piece');

    expect((await converter.parseFile(file, { forceSource: true })).fromCache).toBe(false);
  });

  it('serves a cached result with the same shape as a fresh translation', async () => {
    const file = path.join(root, 'voices.musicxml');
    await writeFile(file, TWO_VOICES);
    const converter = new Converter({ settings });

    const fresh = await converter.parseFile(file);
    await utimes(file, LONG_AGO, LONG_AGO);
    const cached = await converter.parseFile(file);

    expect(cached.fromCache).toBe(true);
    expect(shapeOf(fresh.stream)).toEqual([
      [
        { elements: 3, voices: [['1', 1, 0], ['2', 2, 1]], spanners: 0 },
        { elements: 1, voices: [], spanners: 0 }
      ]
    ]);
    expect(shapeOf(cached.stream)).toEqual(shapeOf(fresh.stream));
  });

  it('leaves the scratch directory alone when caching is off', async () => {
    const file = path.join(root, 'piece.musicxml');
    await writeFile(file, SCORE);

    const result = await new Converter({ settings: { ...settings, cache: false } }).parseFile(file);

    expect(result.fromCache).toBe(false);
    await expect(readdir(path.join(root, 'scratch'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('settles .mxl and .zip archives by their entries', async () => {
    const mxl = path.join(root, 'piece.mxl');
    const zip = path.join(root, 'parts.zip');
    await writeFile(mxl, createZip([{ name: 'piece.xml', data: SCORE, compressionMethod: 8 }]));
    await writeFile(zip, createZip([{ name: 'work/01', data: museDataPart('Flute') }]));
    const converter = new Converter({ settings: { ...settings, cache: false } });

    expect((await converter.parseFile(mxl)).format).toBe('musicxml');
    const museData = await converter.parseFile(zip);
    expect(museData.format).toBe('musedata');
    expect(titleOf(museData.stream)).toBe('Directory Work');
  });

  it('reads a directory of MuseData parts', async () => {
    const directory = path.join(root, 'work');
    await mkdir(directory);
    await writeFile(path.join(directory, '01'), museDataPart('Violin I'));
    await writeFile(path.join(directory, '02'), museDataPart('Violin II'));

    const result = await new Converter({ settings }).parseFile(directory);

    expect(result.format).toBe('musedata');
    expect(result.stream.kind === 'score' ? result.stream.parts.map((part) => part.name) : []).toEqual([
      'Violin I',
      'Violin II'
    ]);
  });

  it('reports missing sources', async () => {
    await expect(new Converter({ settings }).parseFile(path.join(root, 'absent.xml'))).rejects.toBeInstanceOf(
      SourceNotFoundError
    );
  });

  it('routes in-memory content by hint, header and sniffing', async () => {
    const converter = new Converter({ settings });

    const tiny = await converter.parseData('tinynotation: 4/4 c4 d e f');
    expect(tiny.format).toBe('tinynotation');
    expect(tiny.stream.kind === 'score' ? tiny.stream.parts[0]?.measures[0]?.duration : undefined).toBe(4);

    expect((await converter.parseData('X:1\nM:2/4\nK:D\nDE|')).format).toBe('abc');
    expect((await converter.parseData(SCORE)).format).toBe('musicxml');
    expect((await converter.parseData('c4 d4', { format: '.tntxt' })).format).toBe('tinynotation');
    await expect(converter.parseData('plain words')).rejects.toBeInstanceOf(UnknownFormatError);
  });

  it('refuses formats whose handler was removed', async () => {
    const converter = new Converter({ settings, registry: Registry.defaults().without('abc') });

    await expect(converter.parseData('X:1\nM:2/4\nK:D\nDE|')).rejects.toBeInstanceOf(HandlerDisabledError);
  });

  it('fails strict conversions that carry warnings', async () => {
    const converter = new Converter({ settings });
    const undivided = partwise(`<measure number="1">${note('C4', 1, '<type>quarter</type>')}</measure>`);

    const lenient = await converter.parseData(undivided);
    expect(lenient.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MISSING_DIVISIONS', 'warning']
    ]);
    await expect(converter.parseData(undivided, { mode: 'strict' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('downloads URLs only when allowed', async () => {
    const fetchStub = vi.fn(async () => new Response(SCORE));

    await expect(
      new Converter({ settings, fetch: fetchStub }).parseUrl('https://scores.test/library/piece.musicxml')
    ).rejects.toBeInstanceOf(AutoDownloadError);
    expect(fetchStub).not.toHaveBeenCalled();

    const allowed = new Converter({ settings: { ...settings, autoDownload: 'allow' }, fetch: fetchStub });
    const result = await allowed.parseUrl('https://scores.test/library/piece.musicxml');

    expect(fetchStub).toHaveBeenCalledWith('https://scores.test/library/piece.musicxml');
    expect(result.format).toBe('musicxml');
    expect(titleOf(result.stream)).toBe('Cached Piece');
  });

  it('turns a failed download into a missing source', async () => {
    const fetchStub = vi.fn(async () => new Response('gone', { status: 404 }));
    const converter = new Converter({ settings: { ...settings, autoDownload: 'allow' }, fetch: fetchStub });

    await expect(converter.parseUrl('https://scores.test/missing.abc')).rejects.toBeInstanceOf(SourceNotFoundError);
  });
});

describe('parse helper', () => {
  it('treats text that is not a path as content', async () => {
    const result = await parse('tinynotation: 3/4 c4 d e', { settings: { env: {} } });

    expect(result.format).toBe('tinynotation');
    expect(result.fromCache).toBe(false);
  });

  it('applies the default download policy to URLs', async () => {
    await expect(parse('https://scores.test/piece.abc', { settings: { env: {} } })).rejects.toBeInstanceOf(
      AutoDownloadError
    );
  });
});
