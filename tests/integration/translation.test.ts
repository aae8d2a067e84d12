import { describe, expect, it } from 'vitest';

import { MeasureTranslationError } from '../../src/core/errors.js';
import {
  isGeneralNote,
  type GeneralNote,
  type Measure,
  type Note,
  type RepeatBracket,
  type Spanner
} from '../../src/core/score.js';
import { translateMusicXml } from '../../src/parser/parse.js';
import { note, partwise, QUARTER_ATTRIBUTES } from '../helpers/musicxml.js';

function generalNotes(measure: Measure | undefined): GeneralNote[] {
  return (measure?.elements ?? []).filter(isGeneralNote);
}

function pitchName(element: GeneralNote | undefined): string {
  return element?.kind === 'note' ? `${element.pitch.step}${element.pitch.octave}` : (element?.kind ?? 'none');
}

function endpoints(spanner: Spanner): string[] {
  return spanner.kind === 'repeat-bracket' ? [] : spanner.elements.map(pitchName);
}

describe('MusicXML translation', () => {
  it('puts a single voice directly in the measure with cursor offsets', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      ${note('C4', 1, '<voice>1</voice><type>quarter</type>')}
      ${note('D4', 1, '<voice>1</voice><type>quarter</type>')}
      ${note('E4', 1, '<voice>1</voice><type>quarter</type>')}
      ${note('F4', 1, '<voice>1</voice><type>quarter</type>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);

    expect(diagnostics).toEqual([]);
    expect(score.parts).toHaveLength(1);
    const measure = score.parts[0]?.measures[0];
    expect(score.parts[0]?.measures).toHaveLength(1);
    expect(measure?.voices).toEqual([]);
    expect(measure?.duration).toBe(4);

    const notes = generalNotes(measure);
    expect(notes.map((element) => element.offset)).toEqual([0, 1, 2, 3]);
    expect(notes.map(pitchName)).toEqual(['C4', 'D4', 'E4', 'F4']);
    expect(notes.every((element) => element.voice === '1')).toBe(true);
  });

  it('splits a two-staff part without duplicating elements', () => {
    const xml = partwise(
      `<measure number="1">
        <attributes>
          <divisions>1</divisions>
          <key><fifths>0</fifths></key>
          <time><beats>4</beats><beat-type>4</beat-type></time>
          <staves>2</staves>
          <clef number="1"><sign>G</sign><line>2</line></clef>
          <clef number="2"><sign>F</sign><line>4</line></clef>
        </attributes>
        ${note('E5', 4, '<type>whole</type><staff>1</staff>')}
        <backup><duration>4</duration></backup>
        ${note('C3', 4, '<type>whole</type><staff>2</staff>')}
        <backup><duration>4</duration></backup>
        ${note('G4', 4, '<type>whole</type>')}
      </measure>`,
      { partName: 'Piano' }
    );

    const { score } = translateMusicXml(xml);

    expect(score.parts.map((part) => part.id)).toEqual(['P1-Staff1', 'P1-Staff2']);
    expect(score.parts.map((part) => part.staffNumber)).toEqual([1, 2]);
    expect(score.staffGroups).toEqual([
      { symbol: 'brace', barline: true, partIds: ['P1-Staff1', 'P1-Staff2'], name: 'Piano' }
    ]);

    const [upper, lower] = score.parts.map((part) => part.measures[0]);
    expect(generalNotes(upper).map(pitchName)).toEqual(['E5', 'G4']);
    expect(generalNotes(lower).map(pitchName)).toEqual(['C3', 'G4']);
    expect(upper?.attributes.clefs.map((clef) => clef.sign)).toEqual(['G']);
    expect(lower?.attributes.clefs.map((clef) => clef.sign)).toEqual(['F']);

    // Untagged key, time and notes are shared by identity; tagged notes live on one staff only.
    const upperKey = upper?.elements.find((element) => element.kind === 'key');
    const lowerKey = lower?.elements.find((element) => element.kind === 'key');
    expect(upperKey).toBeDefined();
    expect(upperKey).toBe(lowerKey);
    const lowerNotes = new Set<GeneralNote>(generalNotes(lower));
    const shared = generalNotes(upper).filter((element) => lowerNotes.has(element));
    expect(shared.map(pitchName)).toEqual(['G4']);
    expect(shared[0]).toBe(generalNotes(lower)[1]);
  });

  it('collects chord continuations into one chord', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      ${note('C4', 1, '<type>quarter</type>')}
      ${note('E4', 1, '<chord/><type>quarter</type>')}
      ${note('G4', 1, '<chord/><type>quarter</type>')}
      ${note('D4', 3, '<type>half</type><dot/>')}
    </measure>`);

    const notes = generalNotes(translateMusicXml(xml).score.parts[0]?.measures[0]);

    expect(notes.map((element) => element.kind)).toEqual(['chord', 'note']);
    const [chord, after] = notes;
    expect(chord?.kind === 'chord' ? chord.notes.map(pitchName) : []).toEqual(['C4', 'E4', 'G4']);
    expect(chord?.duration.quarterLength).toBe(1);
    expect(after?.offset).toBe(1);
    expect(after?.duration).toEqual({ quarterLength: 3, type: 'half', dots: 1, tuplets: [] });
  });

  it('reports the full tuplet stack for nested tuplets', () => {
    const outer = '<time-modification><actual-notes>3</actual-notes><normal-notes>2</normal-notes></time-modification>';
    const nested = '<time-modification><actual-notes>15</actual-notes><normal-notes>8</normal-notes></time-modification>';
    const xml = partwise(`<measure number="1">
      <attributes><divisions>15</divisions></attributes>
      ${note('C5', 5, `<type>eighth</type>${outer}<notations><tuplet type="start" number="1"/></notations>`)}
      ${note('D5', 4, `<type>eighth</type>${nested}<notations><tuplet type="start" number="2"/></notations>`)}
      ${note('E5', 4, `<type>eighth</type>${nested}`)}
      ${note('F5', 4, `<type>eighth</type>${nested}`)}
      ${note('G5', 4, `<type>eighth</type>${nested}`)}
      ${note('A5', 4, `<type>eighth</type>${nested}<notations><tuplet type="stop" number="2"/><tuplet type="stop" number="1"/></notations>`)}
    </measure>`);

    const measure = translateMusicXml(xml).score.parts[0]?.measures[0];
    const stacks = generalNotes(measure).map((element) =>
      element.duration.tuplets.map((tuplet) => `${tuplet.actual}:${tuplet.normal}:${tuplet.type ?? '-'}`)
    );

    expect(stacks).toEqual([
      ['3:2:start'],
      ['3:2:-', '5:4:start'],
      ['3:2:-', '5:4:-'],
      ['3:2:-', '5:4:-'],
      ['3:2:-', '5:4:-'],
      ['3:2:stop', '5:4:stop']
    ]);
    expect(generalNotes(measure)[1]?.duration.quarterLength).toBeCloseTo(4 / 15, 9);
    expect(measure?.duration).toBeCloseTo(5 / 3, 9);
  });

  it('lands triplet offsets back on the beat', () => {
    const triplet = '<type>eighth</type><time-modification><actual-notes>3</actual-notes><normal-notes>2</normal-notes></time-modification>';
    const xml = partwise(`<measure number="1">
      <attributes><divisions>3</divisions></attributes>
      ${note('C4', 1, triplet)}
      ${note('D4', 1, triplet)}
      ${note('E4', 1, triplet)}
      ${note('F4', 3, '<type>quarter</type>')}
    </measure>`);

    const notes = generalNotes(translateMusicXml(xml).score.parts[0]?.measures[0]);

    expect(notes[3]?.offset).toBe(1);
  });

  it('links slurs and tolerates a stop with no start', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      ${note('C4', 1, '<type>quarter</type><notations><slur type="stop" number="2"/></notations>')}
      ${note('D4', 1, '<type>quarter</type><notations><slur type="start" number="1"/></notations>')}
      ${note('E4', 1, '<type>quarter</type>')}
      ${note('F4', 1, '<type>quarter</type><notations><slur type="stop" number="1"/></notations>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const measure = score.parts[0]?.measures[0];
    const notes = generalNotes(measure);

    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNMATCHED_SPANNER_STOP']);
    expect(diagnostics[0]?.severity).toBe('info');
    expect(measure?.spanners).toHaveLength(1);
    const [slur] = measure?.spanners ?? [];
    expect(slur?.kind).toBe('slur');
    expect(slur?.complete).toBe(true);
    expect(slur?.elements).toEqual([notes[1], notes[3]]);
    expect(slur?.elements[0]).toBe(notes[1]);
  });

  it('turns endings into repeat brackets over the measures they cover', () => {
    const xml = partwise(`
      <measure number="1">
        ${QUARTER_ATTRIBUTES}
        <barline location="left"><repeat direction="forward"/></barline>
        ${note('C4', 4, '<type>whole</type>')}
      </measure>
      <measure number="2">
        <barline location="left"><ending number="1, 2" type="start"/></barline>
        ${note('D4', 4, '<type>whole</type>')}
        <barline location="right">
          <bar-style>light-heavy</bar-style>
          <ending number="1, 2" type="stop"/>
          <repeat direction="backward"/>
        </barline>
      </measure>
      <measure number="3">
        <barline location="left"><ending number="3" type="start"/></barline>
        ${note('E4', 4, '<type>whole</type>')}
        <barline location="right"><ending number="3" type="discontinue"/></barline>
      </measure>`);

    const { score } = translateMusicXml(xml);
    const part = score.parts[0];
    const brackets = (part?.spanners ?? []).filter((spanner): spanner is RepeatBracket => spanner.kind === 'repeat-bracket');

    expect(brackets.map((bracket) => bracket.numbers)).toEqual([[1, 2], [3]]);
    expect(brackets[0]?.elements[0]).toBe(part?.measures[1]);
    expect(brackets[1]?.elements[0]).toBe(part?.measures[2]);
    expect(part?.measures[0]?.leftBarline?.repeat).toEqual({ direction: 'start' });
    expect(part?.measures[1]?.rightBarline).toMatchObject({ style: 'light-heavy', repeat: { direction: 'end' } });
  });

  it('reports a non-numeric ending number and falls back to ending 1', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      <barline location="left"><ending number="first" type="start"/></barline>
      ${note('C4', 4, '<type>whole</type>')}
      <barline location="right"><ending number="first" type="stop"/></barline>
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const [bracket] = score.parts[0]?.spanners ?? [];

    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['INVALID_ENDING_NUMBER']);
    expect(bracket?.kind === 'repeat-bracket' ? bracket.numbers : []).toEqual([1]);
  });

  it('names the part and measure when a measure cannot be translated', () => {
    const xml = partwise(`
      <measure number="1">${QUARTER_ATTRIBUTES}${note('C4', 4)}</measure>
      <measure number="2"><note><duration>4</duration></note></measure>`);

    let caught: unknown;
    try {
      translateMusicXml(xml);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MeasureTranslationError);
    expect(caught).toMatchObject({ partId: 'P1', measureNumber: '2', code: 'MEASURE_TRANSLATION_FAILED' });
  });

  it('carries ties and pitch alterations onto notes', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      ${note('F14', 2, '<tie type="start"/><type>half</type><accidental>sharp</accidental>')}
      ${note('F14', 2, '<tie type="stop"/><type>half</type>')}
    </measure>`);

    const notes = generalNotes(translateMusicXml(xml).score.parts[0]?.measures[0]).filter(
      (element): element is Note => element.kind === 'note'
    );

    expect(notes.map((element) => element.tie?.type)).toEqual(['start', 'stop']);
    expect(notes[0]?.pitch).toEqual({ step: 'F', octave: 4, alter: 1, accidental: { name: 'sharp' } });
    expect(notes[1]?.pitch).toEqual({ step: 'F', octave: 4, alter: 1 });
  });

  it('normalizes score-timewise documents', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<score-timewise version="4.0">
  <part-list><score-part id="P1"><part-name>Music</part-name></score-part></part-list>
  <measure number="1">
    <part id="P1">
      ${QUARTER_ATTRIBUTES}
      ${note('C4', 4)}
    </part>
  </measure>
</score-timewise>`;

    const { score, diagnostics } = translateMusicXml(xml);
    const [whole] = generalNotes(score.parts[0]?.measures[0]);

    expect(score.parts.map((part) => part.id)).toEqual(['P1']);
    expect(whole?.duration).toEqual({ quarterLength: 4, type: 'whole', dots: 0, tuplets: [] });
    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['SCORE_TIMEWISE_NORMALIZED']);
  });

  it('escalates warnings to errors in strict mode', () => {
    const xml = partwise(`<measure number="1">${note('C4', 1, '<type>quarter</type>')}</measure>`);

    const lenient = translateMusicXml(xml);
    const strict = translateMusicXml(xml, { mode: 'strict' });

    expect(lenient.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MISSING_DIVISIONS', 'warning']
    ]);
    expect(lenient.validationFailure).toBe(false);
    expect(strict.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MISSING_DIVISIONS', 'error']
    ]);
    expect(strict.validationFailure).toBe(true);
    expect(strict.diagnostics[0]).toMatchObject({ partId: 'P1', measureNumber: '1' });
  });

  it('keeps voices joined by a backup apart', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      ${note('C5', 4, '<voice>1</voice><type>whole</type>')}
      <backup><duration>4</duration></backup>
      ${note('C4', 2, '<voice>2</voice><type>half</type>')}
      ${note('D4', 2, '<voice>2</voice><type>half</type>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const measure = score.parts[0]?.measures[0];
    const voices = measure?.voices ?? [];

    expect(diagnostics).toEqual([]);
    expect(generalNotes(measure)).toEqual([]);
    expect(voices.map((voice) => [voice.id, voice.elements.map((element) => element.offset)])).toEqual([
      ['1', [0]],
      ['2', [0, 2]]
    ]);
    expect(voices[1]?.elements.filter(isGeneralNote).map(pitchName)).toEqual(['C4', 'D4']);
    expect(measure?.duration).toBe(4);
  });

  it('handles each direction type and hands direction spanners the notes around them', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      <direction placement="below">
        <direction-type><dynamics><p/></dynamics></direction-type>
        <direction-type><words>dolce</words></direction-type>
        <direction-type><wedge type="crescendo"/></direction-type>
        <direction-type><pedal type="start"/></direction-type>
      </direction>
      ${note('C4', 1, '<type>quarter</type>')}
      <direction><direction-type><octave-shift type="down" size="8"/></direction-type></direction>
      ${note('D4', 1, '<type>quarter</type>')}
      ${note('E4', 1, '<type>quarter</type>')}
      <direction>
        <direction-type><wedge type="stop"/></direction-type>
        <direction-type><octave-shift type="stop" size="8"/></direction-type>
      </direction>
      ${note('F4', 1, '<type>quarter</type>')}
      <direction><direction-type><pedal type="stop"/></direction-type></direction>
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const measure = score.parts[0]?.measures[0];
    const spanners = measure?.spanners ?? [];

    expect(diagnostics).toEqual([]);
    expect(measure?.elements.filter((element) => element.kind === 'dynamic' || element.kind === 'text')).toMatchObject([
      { kind: 'dynamic', offset: 0, value: 'p' },
      { kind: 'text', offset: 0, content: 'dolce', placement: 'below' }
    ]);
    expect(spanners.map((spanner) => [spanner.kind, endpoints(spanner)])).toEqual([
      ['wedge', ['C4', 'E4']],
      ['ottava', ['D4', 'E4']],
      ['pedal', ['C4', 'F4']]
    ]);
    expect(spanners[0]).toMatchObject({ wedgeType: 'crescendo', placement: 'below', complete: true });
    expect(spanners[1]).toMatchObject({ ottavaType: '8va', complete: true });
    expect(spanners[0]?.elements[0]).toBe(generalNotes(measure)[0]);
    expect(score.spanners).toEqual([]);
  });

  it('gives a grace note without a type an eighth that takes no time', () => {
    const xml = partwise(`<measure number="1">
      ${QUARTER_ATTRIBUTES}
      <note><grace/><pitch><step>D</step><octave>5</octave></pitch></note>
      ${note('C5', 4, '<type>whole</type>')}
    </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const measure = score.parts[0]?.measures[0];
    const [grace, main] = generalNotes(measure);

    expect(diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['GRACE_TYPE_MISSING', 'info']
    ]);
    expect(grace).toMatchObject({
      kind: 'note',
      offset: 0,
      grace: { slash: true },
      duration: { quarterLength: 0, type: 'eighth', dots: 0, tuplets: [] }
    });
    expect(pitchName(main)).toBe('C5');
    expect(main?.offset).toBe(0);
    expect(measure?.duration).toBe(4);
  });

  it('reads durations against divisions that change between measures', () => {
    const xml = partwise(`
      <measure number="1">${QUARTER_ATTRIBUTES}${note('C4', 4, '<type>whole</type>')}</measure>
      <measure number="2">
        <attributes><divisions>4</divisions></attributes>
        ${note('D4', 8, '<type>half</type>')}
        ${note('E4', 2, '<type>eighth</type>')}
        ${note('F4', 6, '<type>quarter</type><dot/>')}
      </measure>`);

    const { score, diagnostics } = translateMusicXml(xml);
    const [first, second] = score.parts[0]?.measures ?? [];
    const notes = generalNotes(second);

    expect(diagnostics).toEqual([]);
    expect(first?.attributes.divisions).toBe(1);
    expect(second?.attributes.divisions).toBe(4);
    expect(notes.map((element) => element.duration.quarterLength)).toEqual([2, 0.5, 1.5]);
    expect(notes.map((element) => element.offset)).toEqual([0, 2, 2.5]);
    expect(second?.duration).toBe(4);
  });
});
