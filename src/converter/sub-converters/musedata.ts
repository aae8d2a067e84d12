import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../../core/diagnostics.js';
import { InterchangeError, isMissingFileError } from '../../core/errors.js';
import type {
  Accidental,
  Beam,
  Chord,
  GeneralNote,
  Lyric,
  Measure,
  MeasureAttributes,
  MeasureElement,
  Note,
  NoteTypeName,
  Part,
  Pitch,
  PitchStep,
  Score,
  ScoreStream
} from '../../core/score.js';
import { decodeText, extract, isArchive, selectMuseDataNames } from '../../archive/archive.js';
import { roundQuarterLength } from '../../parser/parse-duration.js';
import {
  asText,
  readSource,
  SubConverter,
  type SubConverterDescriptor,
  type SubConverterOptions
} from '../sub-converter.js';
import { durationOf, finishMeasure, ScoreBuilder } from './score-builder.js';

/** Clef codes of the `C:` attribute. */
const CLEF_CODES: Record<string, { sign: string; line: number; octaveChange?: number }> = {
  '5': { sign: 'G', line: 1 },
  '4': { sign: 'G', line: 2 },
  '34': { sign: 'G', line: 2, octaveChange: -1 },
  '64': { sign: 'G', line: 2, octaveChange: 1 },
  '3': { sign: 'G', line: 3 },
  '11': { sign: 'C', line: 5 },
  '12': { sign: 'C', line: 4 },
  '13': { sign: 'C', line: 3 },
  '14': { sign: 'C', line: 2 },
  '15': { sign: 'C', line: 1 },
  '22': { sign: 'F', line: 4 },
  '23': { sign: 'F', line: 3 },
  '52': { sign: 'F', line: 4, octaveChange: -1 },
  '82': { sign: 'F', line: 4, octaveChange: 1 }
};

const NOTE_TYPE_CODES: Record<string, NoteTypeName> = {
  L: 'longa',
  b: 'breve',
  w: 'whole',
  h: 'half',
  q: 'quarter',
  e: 'eighth',
  s: '16th',
  t: '32nd',
  x: '64th',
  y: '128th',
  z: '256th'
};

const ACCIDENTAL_CODES: Record<string, string> = {
  '#': 'sharp',
  n: 'natural',
  f: 'flat',
  x: 'double-sharp',
  X: 'sharp-sharp',
  '&': 'flat-flat',
  S: 'natural-sharp',
  F: 'natural-flat'
};

const BEAM_CODES: Record<string, string> = {
  '[': 'begin',
  '=': 'continue',
  ']': 'end',
  '/': 'forward hook',
  '\\': 'backward hook'
};

const BAR_STYLES: Record<string, string | undefined> = {
  measure: undefined,
  mdotted: 'dotted',
  mdouble: 'light-light',
  mheavy: 'heavy',
  mheavy1: 'heavy',
  mheavy2: 'light-heavy',
  mheavy3: 'heavy-light',
  mheavy4: 'heavy-heavy'
};

const ALTER_CODES: Record<string, number> = { '##': 2, '#': 1, ff: -2, f: -1 };

const STEPS: readonly string[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];

/** Header fields of one stage-2 part file. */
export interface MuseDataHeader {
  workNumber?: number;
  movementNumber?: string;
  source?: string;
  workTitle?: string;
  movementTitle?: string;
  partName?: string;
}

/** Reader for stage-2 MuseData: a single part file, a directory of parts or a zip of them. */
export class MuseDataConverter extends SubConverter {
  readonly descriptor: SubConverterDescriptor = {
    name: 'musedata',
    formats: ['musedata'],
    inputExtensions: ['md', 'musedata', 'zip'],
    outputExtensions: []
  };

  parseData(data: string | Uint8Array, options: SubConverterOptions = {}): ScoreStream {
    if (typeof data !== 'string' && isArchive(data)) {
      const archive = extract(data, 'musedata', { sourceName: options.sourceName });
      this.diagnostics.push(...archive.diagnostics);
      return this.emit(this.translate(archive.content));
    }
    return this.emit(this.translate([asText(data)]));
  }

  /** A directory path is read as one work with a part file per qualifying entry. */
  override async parseFile(filePath: string, options: SubConverterOptions = {}): Promise<ScoreStream> {
    if (!(await isDirectory(filePath))) {
      return super.parseFile(filePath, options);
    }

    const names = selectMuseDataNames(await readdir(filePath));
    if (names.length === 0) {
      throw new InterchangeError('MUSEDATA_EMPTY', `Directory '${filePath}' contains no MuseData part files.`);
    }
    const texts: string[] = [];
    for (const name of names) {
      texts.push(decodeText(await readSource(path.join(filePath, name)), name, this.diagnostics));
    }
    return this.emit(this.translate(texts));
  }

  private translate(texts: string[]): Score {
    const builder = new ScoreBuilder();
    const sources = texts.flatMap(splitPartSources);
    if (sources.length === 0) {
      throw new InterchangeError('MUSEDATA_EMPTY', 'MuseData source contains no parts.');
    }

    const header = readHeader(sources[0] ?? []);
    const score = builder.score({
      creators: [],
      ...(header.workTitle ? { title: header.workTitle } : {}),
      ...(header.movementTitle ? { movementTitle: header.movementTitle } : {}),
      ...(header.movementNumber ? { movementNumber: header.movementNumber } : {}),
      ...(header.workNumber !== undefined ? { number: header.workNumber } : {})
    });

    sources.forEach((lines, index) => {
      score.parts.push(new MuseDataPartReader(builder, `P${index + 1}`, lines, this.diagnostics).read());
    });
    return score;
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isDirectory();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Strip `@` comment lines and `&`-delimited comment blocks, then split on `/END`.
 * Each returned chunk is the line list of one part.
 */
export function splitPartSources(text: string): string[][] {
  const parts: string[][] = [];
  let lines: string[] = [];
  let inComment = false;

  for (const raw of text.split(/\r?\n/)) {
    if (raw.startsWith('&')) {
      inComment = !inComment;
      continue;
    }
    if (inComment || raw.startsWith('@')) {
      continue;
    }
    if (raw.startsWith('/eof')) {
      break;
    }
    if (raw.startsWith('/END')) {
      if (lines.some((line) => line.trim().length > 0)) {
        parts.push(lines);
      }
      lines = [];
      continue;
    }
    lines.push(raw);
  }

  if (lines.some((line) => line.startsWith('$'))) {
    parts.push(lines);
  }
  return parts;
}

/** Fixed-position header lines preceding the first `$` record. */
export function readHeader(lines: readonly string[]): MuseDataHeader {
  const header: MuseDataHeader = {};
  const ids = lines[4] ?? '';
  const work = /WK#:\s*(\d+)/.exec(ids)?.[1];
  if (work !== undefined) {
    header.workNumber = Number(work);
  }
  const movement = /MV#:\s*(\S+)/.exec(ids)?.[1];
  if (movement !== undefined) {
    header.movementNumber = movement;
  }

  const field = (index: number): string | undefined => {
    const line = lines[index];
    return line === undefined || line.startsWith('$') ? undefined : line.trim() || undefined;
  };
  header.source = field(5);
  header.workTitle = field(6);
  header.movementTitle = field(7);
  header.partName = field(8);
  return header;
}

/** Values following `tag:` in an attribute record. */
function attributeValue(record: string, tag: string): string | undefined {
  const match = new RegExp(`(?:^|\\s|\\$)${tag}:(\\S+)`).exec(record);
  return match?.[1];
}

/** Stateful reader for the records of one part. */
class MuseDataPartReader {
  private attributes: MeasureAttributes = { divisions: 1, staves: 1, clefs: [] };
  private measure: Measure | undefined;
  private cursor = 0;
  private lastNote: GeneralNote | undefined;
  /** Attribute elements read before the first measure opened. */
  private readonly leading: MeasureElement[] = [];
  private readonly openTies = new Map<string, Note>();
  private readonly part: Part;

  constructor(
    private readonly builder: ScoreBuilder,
    id: string,
    private readonly lines: string[],
    private readonly diagnostics: Diagnostic[]
  ) {
    this.part = builder.part(id, readHeader(lines).partName);
  }

  read(): Part {
    const start = this.lines.findIndex((line) => line.startsWith('$'));
    if (start === -1) {
      throw new InterchangeError('MUSEDATA_NO_ATTRIBUTES', `Part ${this.part.id} has no '$' attribute record.`);
    }

    this.lines.slice(start).forEach((line, index) => {
      this.readRecord(line, start + index + 1);
    });

    this.closeMeasure();
    this.dropClosingBarRecord();
    return this.part;
  }

  /** A bar record with nothing after it ends the previous measure instead of opening one. */
  private dropClosingBarRecord(): void {
    const last = this.part.measures.at(-1);
    const previous = this.part.measures.at(-2);
    if (!last || !previous || last.elements.length > 0) {
      return;
    }
    this.part.measures.pop();
    const left = last.leftBarline;
    if (left && !previous.rightBarline) {
      const right = this.builder.barline('right', previous.duration, left.style);
      previous.rightBarline = right;
    }
  }

  private readRecord(line: string, lineNumber: number): void {
    const code = line.charAt(0);

    if (line.startsWith('$')) {
      this.readAttributes(line);
    } else if (line.startsWith('measure') || /^m(dotted|double|heavy)/.test(line)) {
      this.openMeasure(line);
    } else if (/^[A-G]$/.test(code)) {
      this.readNote(line, line.slice(0, 4), {});
    } else if (code === ' ' && /^[A-G]$/.test(line.charAt(1))) {
      this.readChordTone(line);
    } else if (code === 'g') {
      this.readNote(line, line.slice(1, 5), { grace: true });
    } else if (code === 'c' && /^[A-G]$/.test(line.charAt(1))) {
      this.readNote(line, line.slice(1, 5), { cue: true });
    } else if (code === 'r') {
      this.readRest(line);
    } else if (line.startsWith('back')) {
      this.cursor = Math.max(0, roundQuarterLength(this.cursor - this.recordDuration(line)));
    } else if (line.startsWith('irst')) {
      this.cursor = roundQuarterLength(this.cursor + this.recordDuration(line));
    } else if (line.trim().length > 0 && !'*PSf'.includes(code)) {
      this.diagnostics.push({
        code: 'UNSUPPORTED_ELEMENT',
        severity: 'info',
        message: `Skipped MuseData record '${line.trim().slice(0, 12)}' (line ${lineNumber}).`,
        partId: this.part.id
      });
    }
  }

  private readAttributes(record: string): void {
    const next: MeasureAttributes = { ...this.attributes, clefs: [...this.attributes.clefs] };
    const offset = this.measure ? this.cursor : 0;
    const changes: MeasureElement[] = [];

    const divisions = Number(attributeValue(record, 'Q'));
    if (Number.isInteger(divisions) && divisions > 0) {
      next.divisions = divisions;
    }

    const fifths = attributeValue(record, 'K');
    if (fifths !== undefined && /^-?\d+$/.test(fifths)) {
      next.key = this.builder.key(Number(fifths), undefined, offset);
      changes.push(next.key);
    }

    const time = attributeValue(record, 'T');
    if (time !== undefined) {
      const [numerator = 4, denominator = 4] = time.split('/').map(Number);
      next.time =
        (numerator === 1 && denominator === 1) || denominator === 0 || !Number.isFinite(numerator + denominator)
          ? this.builder.time(4, 4, 'common', offset)
          : this.builder.time(numerator, denominator, undefined, offset);
      changes.push(next.time);
    }

    const staves = Number(attributeValue(record, 'S'));
    if (Number.isInteger(staves) && staves > 0) {
      next.staves = staves;
    }

    const clefCode = attributeValue(record, 'C') ?? attributeValue(record, 'C1');
    if (clefCode !== undefined) {
      const spec = CLEF_CODES[clefCode];
      if (spec) {
        const clef = this.builder.clef(spec.sign, spec.line, spec.octaveChange ?? 0, offset);
        next.clefs = [clef];
        changes.push(clef);
      } else {
        this.diagnostics.push({
          code: 'UNSUPPORTED_ELEMENT',
          severity: 'warning',
          message: `Unknown MuseData clef code '${clefCode}'.`,
          partId: this.part.id
        });
      }
    }

    this.attributes = next;
    const measure = this.measure;
    if (!measure) {
      this.leading.push(...changes);
      return;
    }
    if (this.cursor === 0) {
      measure.attributes = { ...next, clefs: [...next.clefs] };
    }
    measure.elements.push(...changes);
  }

  private openMeasure(record: string): void {
    this.closeMeasure();
    const previous = this.part.measures.at(-1);
    const digits = /^\S+\s+(\d+)/.exec(record)?.[1];
    const number = digits !== undefined ? Number(digits) : (previous?.number ?? 0) + 1;
    const measure = this.builder.measure(number, this.attributes);

    const word = /^\S+/.exec(record)?.[0] ?? 'measure';
    const style = BAR_STYLES[word];
    const flags = record.slice(16);
    if (style !== undefined || flags.includes('|:')) {
      const barline = this.builder.barline('left', 0, style);
      if (flags.includes('|:')) {
        barline.repeat = { direction: 'start' };
      }
      measure.leftBarline = barline;
    }
    if (flags.includes(':|') && previous) {
      const right = this.builder.barline('right', previous.duration, style);
      right.repeat = { direction: 'end' };
      previous.rightBarline = right;
    }

    this.push(measure);
  }

  /** The measure under construction; content before the first `measure` record is a pickup. */
  private current(): Measure {
    if (this.measure) {
      return this.measure;
    }
    const pickup = this.builder.measure(0, this.attributes);
    pickup.implicit = true;
    this.push(pickup);
    return pickup;
  }

  private push(measure: Measure): void {
    measure.elements.push(...this.leading.splice(0));
    this.part.measures.push(measure);
    this.measure = measure;
    this.cursor = 0;
  }

  private closeMeasure(): void {
    if (this.measure) {
      finishMeasure(this.measure);
    }
  }

  private recordDuration(line: string): number {
    const ticks = Number(line.slice(5, 8).trim());
    return Number.isFinite(ticks) ? ticks / this.attributes.divisions : 0;
  }

  private readNote(line: string, pitchField: string, flags: { grace?: boolean; cue?: boolean }): void {
    const measure = this.current();
    const pitch = parsePitch(pitchField, line.charAt(18));
    if (!pitch) {
      this.diagnostics.push({
        code: 'INVALID_PITCH',
        severity: 'warning',
        message: `Unreadable MuseData pitch '${pitchField.trim()}'.`,
        partId: this.part.id,
        measureNumber: String(measure.number)
      });
      return;
    }

    const type = NOTE_TYPE_CODES[line.charAt(16)];
    const dots = dotsOf(line);
    const quarterLength = flags.grace ? 0 : this.recordDuration(line);
    const duration = durationOf(quarterLength);
    if (type) {
      duration.type = type;
      duration.dots = dots;
    }

    const note = this.builder.note(pitch, duration, this.cursor);
    if (flags.grace) {
      note.grace = { slash: false };
      if (!type) {
        note.duration.type = 'eighth';
      }
    }
    if (flags.cue) {
      note.cue = true;
    }
    note.beams = beamsOf(line);
    note.lyrics = lyricsOf(line);
    this.applyTie(note, line.charAt(8) === '-');

    measure.elements.push(note);
    this.lastNote = note;
    if (!flags.grace) {
      this.cursor = roundQuarterLength(this.cursor + quarterLength);
    }
  }

  /** A leading space adds a tone to the previous note, which becomes a chord. */
  private readChordTone(line: string): void {
    const measure = this.current();
    const anchor = this.lastNote;
    const pitch = parsePitch(line.slice(1, 5), line.charAt(18));
    if (!anchor || anchor.kind === 'rest' || !pitch) {
      this.diagnostics.push({
        code: 'UNSUPPORTED_ELEMENT',
        severity: 'warning',
        message: 'Chord tone without a preceding note.',
        partId: this.part.id,
        measureNumber: String(measure.number)
      });
      return;
    }

    const tone = this.builder.note(pitch, { ...anchor.duration }, anchor.offset);
    this.applyTie(tone, line.charAt(8) === '-');

    if (anchor.kind === 'chord') {
      anchor.notes.push(tone);
      return;
    }

    const chord: Chord = {
      kind: 'chord',
      ref: this.builder.refs.next(),
      offset: anchor.offset,
      duration: anchor.duration,
      notes: [anchor, tone],
      articulations: anchor.articulations,
      expressions: anchor.expressions,
      lyrics: anchor.lyrics,
      beams: anchor.beams
    };
    if (anchor.grace) {
      chord.grace = anchor.grace;
    }
    if (anchor.cue) {
      chord.cue = anchor.cue;
    }
    measure.elements[measure.elements.indexOf(anchor)] = chord;
    this.lastNote = chord;
  }

  private readRest(line: string): void {
    const measure = this.current();
    const quarterLength = this.recordDuration(line);
    const type = NOTE_TYPE_CODES[line.charAt(16)];
    const duration = durationOf(quarterLength);
    if (type) {
      duration.type = type;
      duration.dots = dotsOf(line);
    }

    const rest = this.builder.rest(duration, this.cursor);
    const barDuration = this.attributes.time?.barDuration;
    if (line.charAt(16) === ' ' && barDuration !== undefined && quarterLength === barDuration) {
      rest.fullMeasure = true;
    }
    measure.elements.push(rest);
    this.lastNote = rest;
    this.cursor = roundQuarterLength(this.cursor + quarterLength);
  }

  /** Close a tie opened on the same pitch, then open one if the record asks. */
  private applyTie(note: Note, starts: boolean): void {
    const key = pitchKey(note.pitch);
    const stops = this.openTies.has(key);
    if (stops) {
      this.openTies.delete(key);
    }
    if (starts) {
      this.openTies.set(key, note);
    }
    if (stops || starts) {
      note.tie = { type: stops && starts ? 'continue' : stops ? 'stop' : 'start' };
    }
  }
}

/** Pitch from a field such as `C#4`, `Bf3` or `Eff5`; the display accidental comes from column 19. */
export function parsePitch(field: string, accidentalCode = ' '): Pitch | undefined {
  const match = /^([A-G])(##|#|ff|f)?(\d)/.exec(field.trim());
  const step = match?.[1];
  if (!match || !isPitchStep(step)) {
    return undefined;
  }

  const alter = ALTER_CODES[match[2] ?? ''] ?? 0;
  const pitch: Pitch = { step, octave: Number(match[3]) };
  if (alter !== 0) {
    pitch.alter = alter;
  }
  const accidentalName = ACCIDENTAL_CODES[accidentalCode];
  if (accidentalName) {
    const accidental: Accidental = { name: accidentalName };
    pitch.accidental = accidental;
  }
  return pitch;
}

function isPitchStep(value: string | undefined): value is PitchStep {
  return value !== undefined && STEPS.includes(value);
}

function pitchKey(pitch: Pitch): string {
  return `${pitch.step}${pitch.alter ?? 0}/${pitch.octave}`;
}

function dotsOf(line: string): number {
  const code = line.charAt(17);
  return code === '.' ? 1 : code === ':' ? 2 : 0;
}

function beamsOf(line: string): Beam[] {
  const beams: Beam[] = [];
  [...line.slice(25, 31)].forEach((code, index) => {
    const type = BEAM_CODES[code];
    if (type) {
      beams.push({ number: index + 1, type });
    }
  });
  return beams;
}

function lyricsOf(line: string): Lyric[] {
  const text = line.slice(43);
  if (text.trim().length === 0) {
    return [];
  }
  const lyrics: Lyric[] = [];
  text.split('|').forEach((syllable, index) => {
    const trimmed = syllable.trim();
    if (trimmed.length > 0) {
      lyrics.push({ number: String(index + 1), text: trimmed });
    }
  });
  return lyrics;
}
