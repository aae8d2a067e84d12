import type {
  Barline,
  Chord,
  Clef,
  Duration,
  KeySignature,
  Measure,
  MeasureAttributes,
  Note,
  Part,
  Pitch,
  Rest,
  Score,
  ScoreMetadata,
  TimeSignature,
  Tuplet
} from '../../core/score.js';
import { createRefAllocator, sortByOffset, type RefAllocator } from '../../core/score.js';
import { quarterLengthToType, roundQuarterLength } from '../../parser/parse-duration.js';

/**
 * Constructors for the text dialects, which build the same graph the MusicXML
 * engine does but without its running document state.
 */
export class ScoreBuilder {
  constructor(readonly refs: RefAllocator = createRefAllocator()) {}

  score(metadata: ScoreMetadata = { creators: [] }): Score {
    return { kind: 'score', ref: this.refs.next(), metadata, parts: [], staffGroups: [], spanners: [] };
  }

  part(id: string, name?: string): Part {
    const part: Part = { kind: 'part', ref: this.refs.next(), id, measures: [], spanners: [] };
    if (name) {
      part.name = name;
    }
    return part;
  }

  measure(number: number, attributes: MeasureAttributes): Measure {
    return {
      kind: 'measure',
      ref: this.refs.next(),
      number,
      attributes: { ...attributes, clefs: [...attributes.clefs] },
      elements: [],
      voices: [],
      duration: 0,
      spanners: []
    };
  }

  note(pitch: Pitch, duration: Duration, offset: number): Note {
    return {
      kind: 'note',
      ref: this.refs.next(),
      offset,
      duration,
      pitch,
      articulations: [],
      expressions: [],
      lyrics: [],
      beams: []
    };
  }

  rest(duration: Duration, offset: number): Rest {
    return {
      kind: 'rest',
      ref: this.refs.next(),
      offset,
      duration,
      articulations: [],
      expressions: [],
      lyrics: [],
      beams: []
    };
  }

  chord(pitches: Pitch[], duration: Duration, offset: number): Chord {
    return {
      kind: 'chord',
      ref: this.refs.next(),
      offset,
      duration,
      notes: pitches.map((pitch) => this.note(pitch, { ...duration }, offset)),
      articulations: [],
      expressions: [],
      lyrics: [],
      beams: []
    };
  }

  clef(sign: string, line: number, octaveChange = 0, offset = 0): Clef {
    return { kind: 'clef', ref: this.refs.next(), offset, sign, line, octaveChange };
  }

  key(fifths: number, mode?: string, offset = 0): KeySignature {
    const key: KeySignature = { kind: 'key', ref: this.refs.next(), offset, fifths };
    if (mode) {
      key.mode = mode;
    }
    return key;
  }

  time(numerator: number, denominator: number, symbol?: string, offset = 0): TimeSignature {
    const time: TimeSignature = {
      kind: 'time',
      ref: this.refs.next(),
      offset,
      numerator: String(numerator),
      denominator,
      barDuration: (numerator * 4) / denominator
    };
    if (symbol) {
      time.symbol = symbol;
    }
    return time;
  }

  barline(location: Barline['location'], offset: number, style?: string): Barline {
    const barline: Barline = { kind: 'barline', ref: this.refs.next(), offset, location };
    if (style) {
      barline.style = style;
    }
    return barline;
  }
}

/** Duration of `quarterLength`, with the written type inferred under any tuplets. */
export function durationOf(quarterLength: number, tuplets: Tuplet[] = []): Duration {
  const written = tuplets.reduce((length, tuplet) => (length * tuplet.actual) / tuplet.normal, quarterLength);
  const inferred = quarterLengthToType(roundQuarterLength(written));
  const duration: Duration = { quarterLength: roundQuarterLength(quarterLength), dots: inferred?.dots ?? 0, tuplets };
  if (inferred) {
    duration.type = inferred.type;
  }
  return duration;
}

/** Close a measure: duration is the furthest point any element reaches. */
export function finishMeasure(measure: Measure): void {
  measure.elements = sortByOffset(measure.elements);
  measure.duration = measure.elements.reduce(
    (end, element) =>
      'duration' in element && !element.grace ? Math.max(end, roundQuarterLength(element.offset + element.duration.quarterLength)) : end,
    0
  );
}

/** Major-key fifths by tonic spelling. */
const MAJOR_FIFTHS: Record<string, number> = {
  Cb: -7,
  Gb: -6,
  Db: -5,
  Ab: -4,
  Eb: -3,
  Bb: -2,
  F: -1,
  C: 0,
  G: 1,
  D: 2,
  A: 3,
  E: 4,
  B: 5,
  'F#': 6,
  'C#': 7
};

/** Fifths shift of each mode against its relative major. */
const MODE_SHIFT: Record<string, number> = {
  major: 0,
  ionian: 0,
  minor: -3,
  aeolian: -3,
  dorian: -2,
  phrygian: -4,
  lydian: 1,
  mixolydian: -1,
  locrian: -5
};

/** Fifths of `tonic` in `mode`, or `undefined` for an unknown spelling. */
export function keyFifths(tonic: string, mode = 'major'): number | undefined {
  const base = MAJOR_FIFTHS[tonic];
  const shift = MODE_SHIFT[mode];
  if (base === undefined || shift === undefined) {
    return undefined;
  }
  const fifths = base + shift;
  // Theoretical keys beyond seven accidentals wrap to their enharmonic spelling.
  if (fifths > 7) {
    return fifths - 12;
  }
  if (fifths < -7) {
    return fifths + 12;
  }
  return fifths;
}

const SHARP_ORDER = ['F', 'C', 'G', 'D', 'A', 'E', 'B'];
const FLAT_ORDER = ['B', 'E', 'A', 'D', 'G', 'C', 'F'];

/** Alteration a key signature applies to `step`. */
export function keyAlter(fifths: number, step: string): number {
  if (fifths > 0) {
    return SHARP_ORDER.slice(0, fifths).includes(step) ? 1 : 0;
  }
  if (fifths < 0) {
    return FLAT_ORDER.slice(0, -fifths).includes(step) ? -1 : 0;
  }
  return 0;
}
