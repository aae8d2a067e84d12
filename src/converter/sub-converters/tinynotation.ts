import { InterchangeError } from '../../core/errors.js';
import type { Accidental, Note, Part, Pitch, PitchStep, ScoreStream, TimeSignature, Tuplet } from '../../core/score.js';
import { roundQuarterLength } from '../../parser/parse-duration.js';
import { asText, SubConverter, type SubConverterDescriptor } from '../sub-converter.js';
import { durationOf, finishMeasure, ScoreBuilder } from './score-builder.js';

const TOKEN = /^(r|[a-gA-G]+)([#\-n']*)(\d+)?(\.*)(~)?$/;

const ACCIDENTALS: Record<string, { alter: number; name: string }> = {
  '##': { alter: 2, name: 'double-sharp' },
  '#': { alter: 1, name: 'sharp' },
  '--': { alter: -2, name: 'flat-flat' },
  '-': { alter: -1, name: 'flat' },
  n: { alter: 0, name: 'natural' }
};

const TRIPLET: Tuplet = { actual: 3, normal: 2 };

/** One note or rest read from a token, before it is fitted into measures. */
interface TinyEvent {
  pitch?: Pitch;
  quarterLength: number;
  tie: boolean;
  tuplet?: 'start' | 'stop' | 'startStop' | 'inside';
}

/**
 * Reader for the one-line TinyNotation dialect: `3/4 c4 d8 e f#4 r2 trip{c8 d e}`.
 * Durations persist until a token gives a new one; notes are cut at bar lines and tied across.
 */
export class TinyNotationConverter extends SubConverter {
  readonly descriptor: SubConverterDescriptor = {
    name: 'tinynotation',
    formats: ['tinynotation'],
    inputExtensions: ['tntxt', 'tinynotation'],
    outputExtensions: []
  };

  parseData(data: string | Uint8Array): ScoreStream {
    const builder = new ScoreBuilder();
    const { time, events } = tokenize(asText(data));
    const part = fillMeasures(builder, builder.time(time.numerator, time.denominator), events);
    const score = builder.score();
    score.parts.push(part);
    return this.emit(score);
  }
}

/** Read the time signature and the note events of a TinyNotation string. */
export function tokenize(text: string): { time: { numerator: number; denominator: number }; events: TinyEvent[] } {
  let time = { numerator: 4, denominator: 4 };
  const events: TinyEvent[] = [];
  // Undotted length of the last duration number; dots apply per token.
  let baseLength = 1;
  let triplet: TinyEvent[] | undefined;

  const words = text
    .replace(/\btrip\{/g, ' trip{ ')
    .replace(/\}/g, ' } ')
    .split(/\s+/)
    .filter((word) => word.length > 0);

  for (const word of words) {
    const meter = /^(\d+)\/(\d+)$/.exec(word);
    if (meter) {
      time = { numerator: Number(meter[1]), denominator: Number(meter[2]) };
      continue;
    }
    if (word === 'trip{') {
      triplet = [];
      continue;
    }
    if (word === '}') {
      markTriplet(triplet ?? []);
      triplet = undefined;
      continue;
    }

    const match = TOKEN.exec(word);
    if (!match) {
      throw new InterchangeError('TINYNOTATION_INVALID_TOKEN', `Unreadable TinyNotation token '${word}'.`);
    }
    const [, letters = 'r', modifiers = '', number, dots = '', tie] = match;
    if (number !== undefined) {
      baseLength = 4 / Number(number);
    }
    const quarterLength = baseLength * (2 - 1 / 2 ** dots.length);

    const event: TinyEvent = {
      quarterLength: triplet ? (quarterLength * TRIPLET.normal) / TRIPLET.actual : quarterLength,
      tie: tie !== undefined
    };
    if (letters !== 'r') {
      event.pitch = parsePitch(letters, modifiers);
    }
    events.push(event);
    triplet?.push(event);
  }

  if (triplet) {
    markTriplet(triplet);
  }
  return { time, events };
}

function markTriplet(members: TinyEvent[]): void {
  members.forEach((event, index) => {
    event.tuplet =
      members.length === 1 ? 'startStop' : index === 0 ? 'start' : index === members.length - 1 ? 'stop' : 'inside';
  });
}

/**
 * `c` is middle C; each repeated lower-case letter or `'` raises an octave.
 * `C` is the octave below middle C and each repeated capital lowers one more.
 */
export function parsePitch(letters: string, modifiers: string): Pitch {
  const first = letters.charAt(0);
  const step = first.toUpperCase();
  if (!isPitchStep(step)) {
    throw new InterchangeError('TINYNOTATION_INVALID_TOKEN', `Unreadable TinyNotation pitch '${letters}'.`);
  }

  const ticks = [...modifiers].filter((char) => char === "'").length;
  const octave = first === step ? 4 - letters.length : 3 + letters.length + ticks;
  const pitch: Pitch = { step, octave };

  const accidentalText = modifiers.replace(/'/g, '');
  const accidental = ACCIDENTALS[accidentalText];
  if (accidental) {
    if (accidental.alter !== 0) {
      pitch.alter = accidental.alter;
    }
    const written: Accidental = { name: accidental.name };
    pitch.accidental = written;
  }
  return pitch;
}

function isPitchStep(value: string): value is PitchStep {
  return ['C', 'D', 'E', 'F', 'G', 'A', 'B'].includes(value);
}

/** Pour events into bar-length measures; a note crossing a bar line is split and tied. */
function fillMeasures(builder: ScoreBuilder, time: TimeSignature, events: TinyEvent[]): Part {
  const part = builder.part('P1');
  const clef = builder.clef('G', 2);
  const attributes = { divisions: 1, staves: 1, time, clefs: [clef] };
  let cursor = 0;
  let tieOpen = false;

  for (const event of events) {
    let remaining = event.quarterLength;
    const tupletMarks = event.tuplet;

    while (remaining > 1e-9) {
      let current = part.measures.at(-1);
      if (!current || cursor >= time.barDuration - 1e-9) {
        if (current) {
          finishMeasure(current);
        }
        current = builder.measure(part.measures.length + 1, attributes);
        if (part.measures.length === 0) {
          current.elements.push(clef, time);
        }
        part.measures.push(current);
        cursor = 0;
      }
      const room = roundQuarterLength(time.barDuration - cursor);
      const length = Math.min(remaining, room);
      remaining = roundQuarterLength(remaining - length);

      const tuplets = tupletMarks ? [tupletFor(tupletMarks)] : [];
      const duration = durationOf(length, tuplets);
      if (event.pitch) {
        const note: Note = builder.note({ ...event.pitch }, duration, cursor);
        const continues = remaining > 1e-9 || event.tie;
        if (tieOpen || continues) {
          note.tie = { type: tieOpen && continues ? 'continue' : tieOpen ? 'stop' : 'start' };
        }
        tieOpen = continues;
        current.elements.push(note);
      } else {
        current.elements.push(builder.rest(duration, cursor));
        tieOpen = false;
      }
      cursor = roundQuarterLength(cursor + length);
    }
  }

  const last = part.measures.at(-1);
  if (last) {
    finishMeasure(last);
  }
  return part;
}

function tupletFor(mark: NonNullable<TinyEvent['tuplet']>): Tuplet {
  const tuplet: Tuplet = { ...TRIPLET };
  if (mark !== 'inside') {
    tuplet.type = mark;
  }
  return tuplet;
}
