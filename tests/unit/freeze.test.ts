import { gzipSync } from 'node:zlib';

import { describe, expect, it } from 'vitest';

import { freeze, readFrozenHeader, thaw } from '../../src/cache/freeze.js';
import { InterchangeError } from '../../src/core/errors.js';
import { ENGINE_VERSION, runtimeId } from '../../src/core/version.js';
import { translateMusicXml } from '../../src/parser/parse.js';
import { note, partwise, QUARTER_ATTRIBUTES } from '../helpers/musicxml.js';

const SLURRED = partwise(`<measure number="1">
  ${QUARTER_ATTRIBUTES}
  ${note('C4', 2, '<type>half</type><notations><slur type="start" number="1"/></notations>')}
  ${note('D4', 2, '<type>half</type><notations><slur type="stop" number="1"/></notations>')}
</measure>`);

function frozenDocument(document: unknown): Uint8Array {
  return new Uint8Array(
    gzipSync(JSON.stringify({ format: 'frozen-score', engineVersion: ENGINE_VERSION, runtime: 'node20.0', document }))
  );
}

const SCORE_SHELL = { kind: 'score', ref: 1, metadata: { creators: [] }, staffGroups: [], spanners: [] };

describe('frozen artifacts', () => {
  it('round-trips shared nodes as the same objects', () => {
    const { score } = translateMusicXml(SLURRED);

    const artifact = thaw(freeze(score, { number: 3 }));

    expect(artifact.engineVersion).toBe(ENGINE_VERSION);
    expect(artifact.runtime).toBe(runtimeId());
    expect(artifact.number).toBe(3);

    const thawed = artifact.document;
    if (thawed.kind !== 'score') {
      throw new Error('expected a score');
    }
    const measure = thawed.parts[0]?.measures[0];
    const notes = (measure?.elements ?? []).filter((element) => element.kind === 'note');
    const slur = measure?.spanners[0];

    expect(notes).toHaveLength(2);
    expect(slur?.kind).toBe('slur');
    expect(slur?.elements[0]).toBe(notes[0]);
    expect(slur?.elements[1]).toBe(notes[1]);
  });

  it('reads the header without thawing the document', () => {
    const { score } = translateMusicXml(SLURRED);

    expect(readFrozenHeader(freeze(score))).toEqual({
      format: 'frozen-score',
      engineVersion: ENGINE_VERSION,
      runtime: runtimeId()
    });
    expect(readFrozenHeader(new TextEncoder().encode('<score-partwise/>'))).toBeUndefined();
  });

  it('rejects payloads that are not frozen scores', () => {
    const foreign = new Uint8Array(gzipSync(JSON.stringify({ format: 'something-else' })));
    const dangling = frozenDocument({ ...SCORE_SHELL, parts: [{ $ref: 99 }] });

    expect(() => thaw(foreign)).toThrow(/header is missing or not 'frozen-score'/);
    expect(() => thaw(dangling)).toThrow(/undefined node 99/);
    expect(() => thaw(new Uint8Array([1, 2, 3]))).toThrow(InterchangeError);
  });

  it('rejects documents whose parts, measures or voices are hollow', () => {
    const measure = { kind: 'measure', ref: 3, attributes: { divisions: 1, staves: 1, clefs: [] }, elements: [], spanners: [] };
    const part = (measures: unknown[]) => ({ kind: 'part', ref: 2, id: 'P1', spanners: [], measures });

    expect(() => thaw(frozenDocument({ ...SCORE_SHELL, parts: [{}] }))).toThrow(/does not contain a score/);
    expect(() => thaw(frozenDocument({ ...SCORE_SHELL, parts: [part([measure])] }))).toThrow(/does not contain a score/);
    expect(() =>
      thaw(frozenDocument({ ...SCORE_SHELL, parts: [part([{ ...measure, voices: [{ kind: 'voice', ref: 4 }] }])] }))
    ).toThrow(/does not contain a score/);
    expect(thaw(frozenDocument({ ...SCORE_SHELL, parts: [part([{ ...measure, voices: [] }])] })).document.kind).toBe(
      'score'
    );
  });
});
