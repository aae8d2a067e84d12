import { describe, expect, it } from 'vitest';

import { resolveChordKind } from '../../src/parser/parse-harmony.js';
import { translateMusicXml } from '../../src/parser/parse.js';
import { note, partwise, QUARTER_ATTRIBUTES } from '../helpers/musicxml.js';

describe('harmony translation', () => {
  it('resolves historical kind names to their canonical quality', () => {
    expect(resolveChordKind('dominant').kind).toBe('dominant-seventh');
    expect(resolveChordKind('dominant').definition?.degrees).toEqual(['1', '3', '5', '-7']);
    expect(resolveChordKind('half-diminished').kind).toBe('half-diminished-seventh');
    expect(resolveChordKind('major').definition?.abbreviations[0]).toBe('');
    expect(resolveChordKind('made-up').definition).toBeUndefined();
  });

  it('translates chord symbols and no-chord markers at the cursor', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      <harmony>
        <root><root-step>G</root-step></root>
        <kind text="7">dominant</kind>
        <bass><bass-step>B</bass-step></bass>
        <degree><degree-value>9</degree-value><degree-alter>-1</degree-alter><degree-type>add</degree-type></degree>
      </harmony>
      ${note('G4', 2, '<type>half</type>')}
      <harmony><kind text="N.C.">none</kind></harmony>
      ${note('G4', 2, '<type>half</type>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const marks = (score.parts[0]?.measures[0]?.elements ?? []).filter(
      (element) => element.kind === 'harmony' || element.kind === 'no-chord'
    );

    expect(diagnostics).toEqual([]);
    expect(marks).toHaveLength(2);
    expect(marks[0]).toMatchObject({
      kind: 'harmony',
      offset: 0,
      chordKind: 'dominant-seventh',
      kindText: '7',
      abbreviation: '7',
      root: { step: 'G', alter: 0 },
      bass: { step: 'B', alter: 0 },
      degrees: [{ value: 9, alter: -1, type: 'add' }]
    });
    expect(marks[1]).toMatchObject({ kind: 'no-chord', offset: 2, text: 'N.C.' });
  });

  it('warns about an unknown kind but keeps the symbol', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      <harmony><root><root-step>C</root-step></root><kind>mystery</kind></harmony>
      ${note('C4', 4, '<type>whole</type>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const symbol = score.parts[0]?.measures[0]?.elements.find((element) => element.kind === 'harmony');

    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNKNOWN_HARMONY_KIND']);
    expect(symbol).toMatchObject({ chordKind: 'mystery', chordDegrees: [] });
  });
});
