import type { Diagnostic } from '../../core/diagnostics.js';
import { InterchangeError } from '../../core/errors.js';
import type {
  Accidental,
  Barline,
  Clef,
  GeneralNote,
  KeySignature,
  Measure,
  MeasureElement,
  MetronomeMark,
  Note,
  Part,
  Pitch,
  PitchStep,
  RepeatBracket,
  Score,
  ScoreMetadata,
  ScoreStream,
  TimeSignature
} from '../../core/score.js';
import { parseEndingNumbers } from '../../parser/parse-barline.js';
import { quarterLengthToType, roundQuarterLength } from '../../parser/parse-duration.js';
import { attachSpanners } from '../../parser/parse-spanners.js';
import { asText, SubConverter, type SubConverterDescriptor, type SubConverterOptions } from '../sub-converter.js';
import { durationOf, finishMeasure, keyAlter, keyFifths, ScoreBuilder } from './score-builder.js';

/** One `X:` block of an ABC file. */
export interface AbcTune {
  number?: number;
  lines: string[];
}

const MODE_NAMES: Record<string, string> = {
  '': 'major',
  m: 'minor',
  maj: 'major',
  min: 'minor',
  ion: 'ionian',
  aeo: 'aeolian',
  dor: 'dorian',
  phr: 'phrygian',
  lyd: 'lydian',
  mix: 'mixolydian',
  loc: 'locrian'
};

const ACCIDENTALS: Record<string, { alter: number; name: string }> = {
  '^^': { alter: 2, name: 'double-sharp' },
  '^': { alter: 1, name: 'sharp' },
  '__': { alter: -2, name: 'flat-flat' },
  _: { alter: -1, name: 'flat' },
  '=': { alter: 0, name: 'natural' }
};

const CLEFS: Record<string, { sign: string; line: number }> = {
  treble: { sign: 'G', line: 2 },
  bass: { sign: 'F', line: 4 },
  alto: { sign: 'C', line: 3 },
  tenor: { sign: 'C', line: 4 }
};

const NOTE = /(\^\^|\^|__|_|=)?([A-Ga-g])([',]*)(\d*)(\/*)(\d*)/y;
const REST = /([zx])(\d*)(\/*)(\d*)/y;
const LENGTH = /(\d*)(\/*)(\d*)/y;
const BAR = /(:\|:|::|:\||\|\]|\|\||\|:|\[\||\|)(\d+(?:[,-]\d+)*)?/y;
const ENDING = /\[(\d+(?:[,-]\d+)*)/y;
const INLINE_FIELD = /\[[A-Za-z]:[^\]]*\]/y;

/** Reader for the ABC subset: headers, notes, chords, ties, bar lines, repeats and endings. */
export class AbcConverter extends SubConverter {
  readonly descriptor: SubConverterDescriptor = {
    name: 'abc',
    formats: ['abc'],
    inputExtensions: ['abc'],
    outputExtensions: []
  };

  parseData(data: string | Uint8Array, options: SubConverterOptions = {}): ScoreStream {
    const tunes = splitTunes(asText(data));
    const builder = new ScoreBuilder();

    if (options.number !== undefined) {
      const tune = tunes.find((candidate) => candidate.number === options.number);
      if (!tune) {
        throw new InterchangeError('WORK_NOT_FOUND', `No tune with X:${options.number} in this ABC source.`);
      }
      return this.emit(new AbcTuneReader(builder, this.diagnostics).read(tune));
    }

    if (tunes.length === 0) {
      throw new InterchangeError('ABC_EMPTY', 'ABC source contains no tunes.');
    }
    const scores = tunes.map((tune) => new AbcTuneReader(builder, this.diagnostics).read(tune));
    const [only] = scores;
    if (only && scores.length === 1) {
      return this.emit(only);
    }
    return this.emit({ kind: 'collection', scores });
  }
}

/**
 * Split on `X:` lines. Text before the first `X:` is the file header and is
 * dropped; a source with no `X:` at all is one unnumbered tune.
 */
export function splitTunes(text: string): AbcTune[] {
  const lines = text.split(/\r?\n/);
  if (!lines.some((line) => /^X:/.test(line))) {
    return lines.some((line) => line.trim().length > 0) ? [{ lines }] : [];
  }

  const tunes: AbcTune[] = [];
  let current: AbcTune | undefined;
  for (const line of lines) {
    const reference = /^X:\s*(\d+)?/.exec(line);
    if (reference) {
      current = { lines: [] };
      if (reference[1] !== undefined) {
        current.number = Number(reference[1]);
      }
      tunes.push(current);
      continue;
    }
    current?.lines.push(line);
  }
  return tunes;
}

/** Key field such as `G`, `Em`, `Bb dor` or `F# mix clef=bass`. */
export function parseKeyField(value: string): { fifths: number; mode: string; clef?: string } | undefined {
  const clef = /clef=(\w+)/.exec(value)?.[1];
  const text = value.replace(/clef=\w+/, '').trim();
  if (text.length === 0 || /^none$/i.test(text)) {
    return { fifths: 0, mode: 'major', ...(clef ? { clef } : {}) };
  }

  const match = /^([A-G])([#b]?)\s*([A-Za-z]*)/.exec(text);
  if (!match) {
    return undefined;
  }
  const modeKey = (match[3] ?? '').toLowerCase();
  const mode = MODE_NAMES[modeKey === 'm' ? 'm' : modeKey.slice(0, 3)];
  if (mode === undefined) {
    return undefined;
  }
  const fifths = keyFifths(`${match[1] ?? ''}${match[2] ?? ''}`, mode);
  if (fifths === undefined) {
    return undefined;
  }
  return { fifths, mode, ...(clef ? { clef } : {}) };
}

/** Meter field: `C` is 4/4, `C|` is 2/2, otherwise `n/d`; `none` means free meter. */
export function parseMeterField(value: string): { numerator: number; denominator: number; symbol?: string } | undefined {
  const text = value.trim();
  if (text === 'C') {
    return { numerator: 4, denominator: 4, symbol: 'common' };
  }
  if (text === 'C|') {
    return { numerator: 2, denominator: 2, symbol: 'cut' };
  }
  const match = /^(\d+)\/(\d+)$/.exec(text);
  if (!match) {
    return undefined;
  }
  return { numerator: Number(match[1]), denominator: Number(match[2]) };
}

/** A length suffix applied to the unit note length: `2`, `/2`, `/`, `3/2`. */
export function lengthFactor(numerator: string, slashes: string, denominator: string): number {
  const top = numerator ? Number(numerator) : 1;
  if (!slashes) {
    return top;
  }
  const bottom = denominator ? Number(denominator) : 2 ** slashes.length;
  return top / bottom;
}

function fraction(text: string): number | undefined {
  const match = /^(\d+)\/(\d+)$/.exec(text.trim());
  return match ? Number(match[1]) / Number(match[2]) : undefined;
}

function isPitchStep(value: string): value is PitchStep {
  return ['C', 'D', 'E', 'F', 'G', 'A', 'B'].includes(value);
}

/** State for reading one tune body. */
class AbcTuneReader {
  private fifths = 0;
  private key: KeySignature;
  private clef: Clef;
  private time: TimeSignature | undefined;
  private unit: number | undefined;
  private readonly part: Part;
  private measure: Measure | undefined;
  private cursor = 0;
  private readonly accidentals = new Map<string, number>();
  private readonly openTies = new Map<string, Note>();
  private lastNotes: Note[] = [];
  private pendingLeft: Barline | undefined;
  /** Attribute and tempo changes waiting for the next measure. */
  private pending: MeasureElement[] = [];
  private bracket: RepeatBracket | undefined;
  private closeBracketAtBar = false;
  private readonly brackets: RepeatBracket[] = [];
  private readonly reported = new Set<string>();

  constructor(
    private readonly builder: ScoreBuilder,
    private readonly diagnostics: Diagnostic[]
  ) {
    this.clef = builder.clef('G', 2);
    this.key = builder.key(0, 'major');
    this.part = builder.part('P1');
  }

  read(tune: AbcTune): Score {
    const metadata: ScoreMetadata = { creators: [] };
    if (tune.number !== undefined) {
      metadata.number = tune.number;
    }

    let index = 0;
    let tempo: string | undefined;
    for (; index < tune.lines.length; index += 1) {
      const field = /^([A-Za-z]):\s*(.*)$/.exec(tune.lines[index] ?? '');
      if (!field) {
        if ((tune.lines[index] ?? '').trim().length === 0 || (tune.lines[index] ?? '').startsWith('%')) {
          continue;
        }
        break;
      }
      const [, name = '', value = ''] = field;
      if (name === 'T' && metadata.title === undefined) {
        metadata.title = value.trim();
      } else if (name === 'C') {
        metadata.creators.push({ role: 'composer', name: value.trim() });
      } else if (name === 'Q') {
        tempo = value;
      } else {
        this.applyField(name, value);
      }
      if (name === 'K') {
        index += 1;
        break;
      }
    }

    this.pending = [this.clef, this.key];
    if (this.time) {
      this.pending.push(this.time);
    }
    if (tempo !== undefined) {
      const mark = this.tempoMark(tempo);
      if (mark) {
        this.pending.push(mark);
      }
    }

    for (const line of tune.lines.slice(index)) {
      this.readBodyLine(line);
    }
    this.closeMeasure(undefined, false);
    this.closeBracket();

    this.numberMeasures();
    const score = this.builder.score(metadata);
    score.parts.push(this.part);
    attachSpanners(
      score,
      this.brackets.filter((bracket) => bracket.elements.length > 0)
    );
    return score;
  }

  private applyField(name: string, value: string): void {
    if (name === 'M') {
      const meter = parseMeterField(value);
      this.time = meter ? this.builder.time(meter.numerator, meter.denominator, meter.symbol) : undefined;
      if (this.time) {
        this.queue(this.time);
      }
    } else if (name === 'L') {
      const length = fraction(value);
      if (length !== undefined) {
        this.unit = length * 4;
      }
    } else if (name === 'K') {
      const key = parseKeyField(value);
      if (!key) {
        this.report('ABC_INVALID_KEY', 'warning', `Unreadable key field '${value.trim()}'; using C major.`);
        return;
      }
      this.fifths = key.fifths;
      this.key = this.builder.key(key.fifths, key.mode);
      this.queue(this.key);
      const clef = key.clef ? CLEFS[key.clef] : undefined;
      if (clef) {
        this.clef = this.builder.clef(clef.sign, clef.line);
        this.queue(this.clef);
      }
    }
  }

  /** Changes land at the cursor of the open measure, or wait for the next one. */
  private queue(element: KeySignature | TimeSignature | Clef): void {
    if (this.measure) {
      element.offset = this.cursor;
      this.measure.elements.push(element);
    } else {
      this.pending.push(element);
    }
  }

  private tempoMark(value: string): MetronomeMark | undefined {
    const mark: MetronomeMark = { kind: 'metronome', ref: this.builder.refs.next(), offset: 0 };
    const text = /"([^"]*)"/.exec(value)?.[1];
    if (text) {
      mark.text = text;
    }

    const explicit = /(\d+)\/(\d+)\s*=\s*(\d+)/.exec(value);
    const bare = /^\s*(\d+)\s*$/.exec(value);
    const beat = explicit ? (Number(explicit[1]) / Number(explicit[2])) * 4 : bare ? this.unitLength() : undefined;
    const perMinute = explicit ? Number(explicit[3]) : bare ? Number(bare[1]) : undefined;
    if (beat !== undefined && perMinute !== undefined) {
      mark.perMinute = perMinute;
      const written = quarterLengthToType(beat);
      if (written) {
        mark.referent = { ...written, quarterLength: beat };
      }
    }
    return mark.text !== undefined || mark.perMinute !== undefined ? mark : undefined;
  }

  /** Unit note length: `L:` when given, else 1/16 under meters below 3/4 and 1/8 otherwise. */
  private unitLength(): number {
    if (this.unit !== undefined) {
      return this.unit;
    }
    const meter = this.time ? Number(this.time.numerator) / this.time.denominator : 1;
    return meter < 0.75 ? 0.25 : 0.5;
  }

  private readBodyLine(raw: string): void {
    const field = /^([A-Za-z]):\s*(.*)$/.exec(raw);
    if (field) {
      this.applyField(field[1] ?? '', field[2] ?? '');
      return;
    }

    const line = raw.replace(/%.*$/, '');
    let index = 0;
    while (index < line.length) {
      index = this.readToken(line, index);
    }
  }

  /** Consume one token starting at `index`; returns the index after it. */
  private readToken(line: string, index: number): number {
    const char = line.charAt(index);

    if (/\s/.test(char) || char === '\\' || char === ')' || char === '`') {
      return index + 1;
    }
    if (char === '"') {
      return skipPast(line, index + 1, '"');
    }
    if (char === '!' || char === '+') {
      return skipPast(line, index + 1, char);
    }
    if (char === '{') {
      this.report('ABC_GRACE_IGNORED', 'info', 'Grace note groups are not translated.');
      return skipPast(line, index + 1, '}');
    }
    if (char === '(') {
      const tuplet = /\(\d+(?::\d*){0,2}/y;
      tuplet.lastIndex = index;
      if (tuplet.exec(line)) {
        this.report('ABC_TUPLET_IGNORED', 'info', 'Tuplet markers are not translated; notes keep their written lengths.');
        return tuplet.lastIndex;
      }
      return index + 1;
    }
    if (char === '>' || char === '<') {
      this.report('ABC_BROKEN_RHYTHM_IGNORED', 'info', 'Broken rhythm markers are not translated.');
      return index + 1;
    }
    if (char === '-') {
      this.startTies();
      return index + 1;
    }

    const bar = match(BAR, line, index);
    if (bar) {
      this.readBar(bar[1] ?? '|', bar[2]);
      return BAR.lastIndex;
    }

    if (char === '[') {
      const ending = match(ENDING, line, index);
      if (ending) {
        this.openEnding(ending[1] ?? '1');
        return ENDING.lastIndex;
      }
      if (match(INLINE_FIELD, line, index)) {
        const end = INLINE_FIELD.lastIndex;
        const inline = /^\[([A-Za-z]):(.*)\]$/.exec(line.slice(index, end));
        if (inline) {
          this.applyField(inline[1] ?? '', inline[2] ?? '');
        }
        return end;
      }
      return this.readChord(line, index + 1);
    }

    const note = match(NOTE, line, index);
    if (note) {
      const pitch = this.pitchOf(note[1], note[2] ?? 'C', note[3] ?? '');
      const length = this.unitLength() * lengthFactor(note[4] ?? '', note[5] ?? '', note[6] ?? '');
      const end = NOTE.lastIndex;
      if (pitch) {
        this.placeNotes([pitch], length);
      }
      return end;
    }

    const rest = match(REST, line, index);
    if (rest) {
      const length = this.unitLength() * lengthFactor(rest[2] ?? '', rest[3] ?? '', rest[4] ?? '');
      const end = REST.lastIndex;
      this.place(this.builder.rest(durationOf(length), this.cursor), length);
      this.lastNotes = [];
      return end;
    }

    // Decoration shorthands (`.`, `~`, `H`, `T`, `u`, `v`...) and stray symbols.
    return index + 1;
  }

  private readChord(line: string, start: number): number {
    const pitches: Pitch[] = [];
    let first: number | undefined;
    let index = start;
    while (index < line.length && line.charAt(index) !== ']') {
      const note = match(NOTE, line, index);
      if (!note) {
        index += 1;
        continue;
      }
      index = NOTE.lastIndex;
      const pitch = this.pitchOf(note[1], note[2] ?? 'C', note[3] ?? '');
      if (pitch) {
        pitches.push(pitch);
      }
      first ??= lengthFactor(note[4] ?? '', note[5] ?? '', note[6] ?? '');
    }
    index += 1;

    const suffix = match(LENGTH, line, index);
    if (suffix) {
      index = LENGTH.lastIndex;
    }
    const factor = (first ?? 1) * lengthFactor(suffix?.[1] ?? '', suffix?.[2] ?? '', suffix?.[3] ?? '');
    if (pitches.length > 0) {
      this.placeNotes(pitches, this.unitLength() * factor);
    }
    return index;
  }

  /** Resolve spelling, octave marks, key signature and accidentals carried within the measure. */
  private pitchOf(accidentalText: string | undefined, letter: string, octaveMarks: string): Pitch | undefined {
    const step = letter.toUpperCase();
    if (!isPitchStep(step)) {
      return undefined;
    }
    let octave = letter === step ? 4 : 5;
    for (const mark of octaveMarks) {
      octave += mark === "'" ? 1 : -1;
    }

    const key = `${step}${octave}`;
    const pitch: Pitch = { step, octave };
    const written = accidentalText ? ACCIDENTALS[accidentalText] : undefined;
    let alter: number;
    if (written) {
      alter = written.alter;
      this.accidentals.set(key, alter);
      const accidental: Accidental = { name: written.name };
      pitch.accidental = accidental;
    } else {
      alter = this.accidentals.get(key) ?? keyAlter(this.fifths, step);
    }
    if (alter !== 0) {
      pitch.alter = alter;
    }
    return pitch;
  }

  private placeNotes(pitches: Pitch[], length: number): void {
    const duration = durationOf(length);
    const [single] = pitches;
    const element: GeneralNote =
      single && pitches.length === 1
        ? this.builder.note(single, duration, this.cursor)
        : this.builder.chord(pitches, duration, this.cursor);
    const notes = element.kind === 'chord' ? element.notes : element.kind === 'note' ? [element] : [];

    for (const note of notes) {
      const key = tieKey(note.pitch);
      if (this.openTies.has(key)) {
        this.openTies.delete(key);
        note.tie = { type: 'stop' };
      }
    }
    this.lastNotes = notes;
    this.place(element, length);
  }

  /** `-` after a note ties it into the next note of the same pitch. */
  private startTies(): void {
    for (const note of this.lastNotes) {
      note.tie = { type: note.tie?.type === 'stop' ? 'continue' : 'start' };
      this.openTies.set(tieKey(note.pitch), note);
    }
  }

  private place(element: GeneralNote, length: number): void {
    this.currentMeasure().elements.push(element);
    this.cursor = roundQuarterLength(this.cursor + length);
  }

  private currentMeasure(): Measure {
    if (this.measure) {
      return this.measure;
    }
    const measure = this.builder.measure(this.part.measures.length + 1, {
      divisions: 1,
      staves: 1,
      key: this.key,
      ...(this.time ? { time: this.time } : {}),
      clefs: [this.clef]
    });
    measure.elements.push(...this.pending);
    this.pending = [];
    if (this.pendingLeft) {
      measure.leftBarline = this.pendingLeft;
      this.pendingLeft = undefined;
    }
    this.bracket?.elements.push(measure);
    this.part.measures.push(measure);
    this.measure = measure;
    this.cursor = 0;
    return measure;
  }

  private readBar(token: string, ending: string | undefined): void {
    const repeatEnd = token.startsWith(':');
    const repeatStart = token.endsWith(':');
    const style =
      token === '||' ? 'light-light' : token === '|]' || repeatEnd ? 'light-heavy' : token === '[|' ? 'heavy-light' : undefined;

    this.closeMeasure(style, repeatEnd);

    if (repeatStart) {
      this.pendingLeft = this.builder.barline('left', 0, 'heavy-light');
      this.pendingLeft.repeat = { direction: 'start' };
    }
    if (ending !== undefined) {
      this.openEnding(ending);
    }
  }

  /** Close the open measure; a bar before any note only decorates the next measure. */
  private closeMeasure(style: string | undefined, repeatEnd: boolean): void {
    const measure = this.measure;
    if (!measure) {
      return;
    }

    finishMeasure(measure);
    if (style !== undefined || repeatEnd) {
      const right = this.builder.barline('right', measure.duration, style);
      if (repeatEnd) {
        right.repeat = { direction: 'end' };
      }
      measure.rightBarline = right;
    }

    if (this.bracket && (repeatEnd || style === 'light-light' || style === 'light-heavy' || this.closeBracketAtBar)) {
      this.closeBracket();
    }

    this.measure = undefined;
    this.cursor = 0;
    this.accidentals.clear();
  }

  private openEnding(text: string): void {
    this.closeBracket();
    const numbers = parseEndingNumbers(text) ?? [1];
    const bracket: RepeatBracket = {
      kind: 'repeat-bracket',
      ref: this.builder.refs.next(),
      complete: false,
      numbers,
      elements: this.measure ? [this.measure] : []
    };
    this.bracket = bracket;
    this.brackets.push(bracket);
    this.closeBracketAtBar = (numbers[0] ?? 1) > 1;
  }

  private closeBracket(): void {
    if (this.bracket) {
      this.bracket.complete = true;
      this.bracket = undefined;
      this.closeBracketAtBar = false;
    }
  }

  /** A short first measure is a pickup numbered 0; the rest count from 1. */
  private numberMeasures(): void {
    const [first] = this.part.measures;
    const barDuration = this.time?.barDuration;
    let next = 1;
    if (first && barDuration !== undefined && this.part.measures.length > 1 && first.duration < barDuration) {
      first.implicit = true;
      next = 0;
    }
    for (const measure of this.part.measures) {
      measure.number = next;
      next += 1;
    }
  }

  private report(code: string, severity: Diagnostic['severity'], message: string): void {
    if (!this.reported.has(code)) {
      this.reported.add(code);
      this.diagnostics.push({ code, severity, message });
    }
  }
}

function match(pattern: RegExp, line: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  const result = pattern.exec(line);
  return result && result[0].length > 0 ? result : null;
}

function skipPast(line: string, index: number, terminator: string): number {
  const end = line.indexOf(terminator, index);
  return end === -1 ? line.length : end + 1;
}

function tieKey(pitch: Pitch): string {
  return `${pitch.step}${pitch.alter ?? 0}/${pitch.octave}`;
}
