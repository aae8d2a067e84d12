import { describe, expect, it } from 'vitest';

import type { Measure, Note } from '../../src/core/score.js';
import { parsePitch, TinyNotationConverter } from '../../src/converter/sub-converters/tinynotation.js';

function notesOf(measure: Measure | undefined): Note[] {
  return (measure?.elements ?? []).filter((element): element is Note => element.kind === 'note');
}

describe('TinyNotation reader', () => {
  it('fills bar-length measures and carries durations forward', () => {
    const score = new TinyNotationConverter().parseData('3/4 c4 d8 e f#4 r2. trip{c8 d e} g2~ g4');
    if (score.kind !== 'score') {
      throw new Error('expected a score');
    }
    const measures = score.parts[0]?.measures ?? [];

    expect(measures.map((measure) => measure.number)).toEqual([1, 2, 3, 4]);
    expect(measures.map((measure) => measure.duration)).toEqual([3, 3, 3, 1]);

    const first = notesOf(measures[0]);
    expect(first.map((note) => [note.pitch.step, note.offset, note.duration.quarterLength])).toEqual([
      ['C', 0, 1],
      ['D', 1, 0.5],
      ['E', 1.5, 0.5],
      ['F', 2, 1]
    ]);
    expect(first[3]?.pitch).toEqual({ step: 'F', octave: 4, alter: 1, accidental: { name: 'sharp' } });
    expect(measures[0]?.elements.map((element) => element.kind).slice(0, 2)).toEqual(['clef', 'time']);
    expect(measures[1]?.elements.map((element) => element.kind)).toEqual(['rest']);
  });

  it('marks triplets and ties the note that crosses into the next bar', () => {
    const score = new TinyNotationConverter().parseData('3/4 c4 d8 e f#4 r2. trip{c8 d e} g2~ g4');
    if (score.kind !== 'score') {
      throw new Error('expected a score');
    }
    const [, , third, fourth] = score.parts[0]?.measures ?? [];
    const triplet = notesOf(third).slice(0, 3);

    expect(triplet.map((note) => note.offset)).toEqual([0, 1 / 3, 2 / 3]);
    expect(triplet.map((note) => note.duration.type)).toEqual(['eighth', 'eighth', 'eighth']);
    expect(triplet.map((note) => note.duration.tuplets[0]?.type)).toEqual(['start', undefined, 'stop']);
    expect(notesOf(third)[3]?.tie).toEqual({ type: 'start' });
    expect(notesOf(fourth)[0]?.tie).toEqual({ type: 'stop' });
  });

  it('splits a note at the bar line', () => {
    const score = new TinyNotationConverter().parseData('c2. d2');
    if (score.kind !== 'score') {
      throw new Error('expected a score');
    }
    const [first, second] = score.parts[0]?.measures ?? [];

    expect(notesOf(first)[1]).toMatchObject({ offset: 3, duration: { quarterLength: 1, type: 'quarter' }, tie: { type: 'start' } });
    expect(notesOf(second)[0]).toMatchObject({ offset: 0, duration: { quarterLength: 1 }, tie: { type: 'stop' } });
  });

  it('reads octaves from letter case, repetition and ticks', () => {
    expect(parsePitch('c', '')).toEqual({ step: 'C', octave: 4 });
    expect(parsePitch('cc', '')).toEqual({ step: 'C', octave: 5 });
    expect(parsePitch('c', "'")).toEqual({ step: 'C', octave: 5 });
    expect(parsePitch('C', '')).toEqual({ step: 'C', octave: 3 });
    expect(parsePitch('CC', '')).toEqual({ step: 'C', octave: 2 });
    expect(parsePitch('b', '-')).toEqual({ step: 'B', octave: 4, alter: -1, accidental: { name: 'flat' } });
  });

  it('rejects tokens it cannot read', () => {
    expect(() => new TinyNotationConverter().parseData('4/4 c4 x4')).toThrow(
      "Unreadable TinyNotation token 'x4'."
    );
  });
});
