/**
 * Identity carried by every graph node that a spanner, a shared staff element,
 * or a frozen cache artifact can point at.
 */
export interface GraphNode {
  ref: number;
}

/** Allocates graph-node identities for one translation. */
export interface RefAllocator {
  next(): number;
}

/** Create a monotonically increasing ref allocator. */
export function createRefAllocator(start = 1): RefAllocator {
  let current = start;
  return {
    next: () => current++
  };
}

/** Canonical score root produced by every sub-converter. */
export interface Score extends GraphNode {
  kind: 'score';
  metadata: ScoreMetadata;
  parts: Part[];
  staffGroups: StaffGroup[];
  spanners: Spanner[];
}

/** Several independent scores from one multi-work source. */
export interface ScoreCollection {
  kind: 'collection';
  scores: Score[];
}

/** Anything a sub-converter can hand back from `stream`. */
export type ScoreStream = Score | ScoreCollection;

/** Header metadata preserved from the source document. */
export interface ScoreMetadata {
  title?: string;
  movementTitle?: string;
  movementNumber?: string;
  number?: number;
  creators: Creator[];
  rights?: string;
}

/** A named contributor (composer, lyricist, arranger...). */
export interface Creator {
  role: string;
  name: string;
}

/** Visual grouping of several parts, e.g. the brace of a grand staff. */
export interface StaffGroup {
  name?: string;
  symbol?: string;
  barline?: boolean;
  partIds: string[];
}

/** Instrument identity from the part list. */
export interface Instrument {
  name?: string;
  midiChannel?: number;
  midiProgram?: number;
}

/** Written-to-sounding transposition, in diatonic steps and semitones. */
export interface TranspositionInterval {
  diatonic: number;
  chromatic: number;
}

/** One part, or one staff of a multi-staff part after partitioning. */
export interface Part extends GraphNode {
  kind: 'part';
  id: string;
  name?: string;
  abbreviation?: string;
  instrument?: Instrument;
  transposition?: TranspositionInterval;
  /** Staff number inside the source part when this part is one staff of several. */
  staffNumber?: number;
  measures: Measure[];
  spanners: Spanner[];
}

/** Attribute state in effect at the start of a measure. */
export interface MeasureAttributes {
  divisions: number;
  staves: number;
  key?: KeySignature;
  time?: TimeSignature;
  clefs: Clef[];
}

export interface Measure extends GraphNode {
  kind: 'measure';
  number: number;
  numberSuffix?: string;
  implicit?: boolean;
  attributes: MeasureAttributes;
  /** Un-voiced content in score-time order. */
  elements: MeasureElement[];
  voices: Voice[];
  leftBarline?: Barline;
  rightBarline?: Barline;
  multiRest?: number;
  /** Highest offset reached by the measure cursor, in quarter lengths. */
  duration: number;
  spanners: Spanner[];
}

export interface Voice extends GraphNode {
  kind: 'voice';
  id: string;
  elements: MeasureElement[];
  spanners: Spanner[];
}

/** Musical note types, from maxima down to 1024th notes. */
export type NoteTypeName =
  | 'maxima'
  | 'longa'
  | 'breve'
  | 'whole'
  | 'half'
  | 'quarter'
  | 'eighth'
  | '16th'
  | '32nd'
  | '64th'
  | '128th'
  | '256th'
  | '512th'
  | '1024th';

export type PitchStep = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

export interface Accidental {
  name: string;
  cautionary?: boolean;
  editorial?: boolean;
  parentheses?: boolean;
}

export interface Pitch {
  step: PitchStep;
  octave: number;
  alter?: number;
  accidental?: Accidental;
}

/** Ratio of a tuplet: `actual` notes in the time of `normal` notes. */
export interface TupletRatio {
  actual: number;
  normal: number;
  actualType?: NoteTypeName;
  actualDots?: number;
  normalType?: NoteTypeName;
  normalDots?: number;
}

export type TupletType = 'start' | 'stop' | 'startStop';

export interface Tuplet extends TupletRatio {
  number?: number;
  type?: TupletType;
  bracket?: boolean | 'slur';
  placement?: string;
  showNumber?: string;
  showType?: string;
}

export interface Duration {
  quarterLength: number;
  type?: NoteTypeName;
  dots: number;
  /** Outermost first. */
  tuplets: Tuplet[];
}

export interface GraceInfo {
  slash: boolean;
  stealTimePrevious?: number;
  stealTimeFollowing?: number;
  makeTime?: number;
}

export type TieType = 'start' | 'stop' | 'continue' | 'let-ring';

export interface Tie {
  type: TieType;
  placement?: string;
}

export interface Beam {
  number: number;
  type: string;
}

export interface Lyric {
  number: string;
  text: string;
  syllabic?: string;
  extend?: boolean;
}

/** Placement fields shared by every element that sits inside a measure. */
interface PositionedElement extends GraphNode {
  /** Quarter lengths from the start of the owning measure. */
  offset: number;
  staff?: number;
}

/** Fields shared by notes, rests and chords. */
interface GeneralNoteFields extends PositionedElement {
  duration: Duration;
  voice?: string;
  grace?: GraceInfo;
  cue?: boolean;
  articulations: string[];
  expressions: string[];
  lyrics: Lyric[];
  beams: Beam[];
  stemDirection?: string;
}

export interface Note extends GeneralNoteFields {
  kind: 'note';
  pitch: Pitch;
  unpitched?: boolean;
  tie?: Tie;
  notehead?: string;
}

export interface Rest extends GeneralNoteFields {
  kind: 'rest';
  fullMeasure?: boolean;
  displayStep?: PitchStep;
  displayOctave?: number;
}

export interface Chord extends GeneralNoteFields {
  kind: 'chord';
  notes: Note[];
}

export type GeneralNote = Note | Rest | Chord;

export interface Clef extends PositionedElement {
  kind: 'clef';
  sign: string;
  line?: number;
  octaveChange: number;
}

export interface KeySignature extends PositionedElement {
  kind: 'key';
  fifths: number;
  mode?: string;
}

export interface TimeSignature extends PositionedElement {
  kind: 'time';
  /** Beat count as written; may be a "+"-joined compound numerator such as "3+2". */
  numerator: string;
  denominator: number;
  symbol?: string;
  senzaMisura?: string;
  /** Bar length in quarter lengths. */
  barDuration: number;
}

export interface Dynamic extends PositionedElement {
  kind: 'dynamic';
  value: string;
}

/** A duration used as a metronome beat unit. */
export interface TempoReferent {
  type: NoteTypeName;
  dots: number;
  quarterLength: number;
}

export interface MetronomeMark extends PositionedElement {
  kind: 'metronome';
  referent?: TempoReferent;
  perMinute?: number;
  text?: string;
  parentheses?: boolean;
}

export interface MetricModulation extends PositionedElement {
  kind: 'metric-modulation';
  oldReferent: TempoReferent;
  newReferent: TempoReferent;
}

export interface TextExpression extends PositionedElement {
  kind: 'text';
  content: string;
  placement?: string;
}

export interface RehearsalMark extends PositionedElement {
  kind: 'rehearsal';
  content: string;
}

export interface Segno extends PositionedElement {
  kind: 'segno';
}

export interface Coda extends PositionedElement {
  kind: 'coda';
}

export interface HarmonyPitch {
  step: PitchStep;
  alter: number;
}

export interface ChordDegree {
  value: number;
  alter: number;
  type: 'add' | 'alter' | 'subtract';
}

export interface Harmony extends PositionedElement {
  kind: 'harmony';
  root?: HarmonyPitch;
  bass?: HarmonyPitch;
  /** Canonical chord kind, after alias resolution. */
  chordKind: string;
  kindText?: string;
  inversion?: number;
  degrees: ChordDegree[];
  /** Interval degrees implied by `chordKind`, e.g. `['1', '3', '5', '-7']`. */
  chordDegrees: string[];
  abbreviation?: string;
}

export interface NoChord extends PositionedElement {
  kind: 'no-chord';
  text?: string;
}

export interface BarlineRepeat {
  direction: 'start' | 'end';
  times?: number;
}

export interface Barline extends PositionedElement {
  kind: 'barline';
  location: 'left' | 'right' | 'middle';
  style?: string;
  repeat?: BarlineRepeat;
}

export type MeasureElement =
  | GeneralNote
  | Clef
  | KeySignature
  | TimeSignature
  | Dynamic
  | MetronomeMark
  | MetricModulation
  | TextExpression
  | RehearsalMark
  | Segno
  | Coda
  | Harmony
  | NoChord
  | Barline;

interface SpannerFields extends GraphNode {
  /** False while the closing endpoint has not been seen. */
  complete: boolean;
  placement?: string;
}

export interface Slur extends SpannerFields {
  kind: 'slur';
  elements: GeneralNote[];
  lineType?: string;
}

export interface Glissando extends SpannerFields {
  kind: 'glissando' | 'slide';
  elements: GeneralNote[];
  lineType?: string;
  label?: string;
}

export interface TrillExtension extends SpannerFields {
  kind: 'trill-extension';
  elements: GeneralNote[];
}

export interface Wedge extends SpannerFields {
  kind: 'wedge';
  wedgeType: 'crescendo' | 'diminuendo';
  niente?: boolean;
  elements: GeneralNote[];
}

export interface Line extends SpannerFields {
  kind: 'bracket' | 'dashes';
  lineType?: string;
  startTick?: string;
  endTick?: string;
  elements: GeneralNote[];
}

export interface Ottava extends SpannerFields {
  kind: 'ottava';
  ottavaType: '8va' | '8vb' | '15ma' | '15mb' | '22da' | '22db';
  elements: GeneralNote[];
}

export interface PedalMark extends SpannerFields {
  kind: 'pedal';
  elements: GeneralNote[];
}

export interface RepeatBracket extends SpannerFields {
  kind: 'repeat-bracket';
  /** Passes through the repeated section this ending applies to. */
  numbers: number[];
  overrideDisplay?: string;
  elements: Measure[];
}

export type NoteSpanner = Slur | Glissando | TrillExtension | Wedge | Line | Ottava | PedalMark;
export type Spanner = NoteSpanner | RepeatBracket;
export type SpannerKind = Spanner['kind'];

/** True for notes, rests and chords. */
export function isGeneralNote(element: MeasureElement): element is GeneralNote {
  return element.kind === 'note' || element.kind === 'rest' || element.kind === 'chord';
}

/** Every element of a measure, voiced or not, ordered by offset. */
export function measureContents(measure: Measure): MeasureElement[] {
  const all = [...measure.elements, ...measure.voices.flatMap((voice) => voice.elements)];
  return sortByOffset(all);
}

/** Every general note of a part in measure order. */
export function partNotes(part: Part): GeneralNote[] {
  return part.measures.flatMap((measure) => measureContents(measure).filter(isGeneralNote));
}

/** Ordering inside one offset: clefs, keys and times first, then marks, then notes. */
const CLASS_SORT_ORDER: Record<MeasureElement['kind'], number> = {
  clef: 0,
  key: 2,
  time: 4,
  barline: 5,
  'metric-modulation': 8,
  metronome: 8,
  rehearsal: 9,
  segno: 9,
  coda: 9,
  dynamic: 10,
  text: 10,
  harmony: 12,
  'no-chord': 12,
  note: 20,
  rest: 20,
  chord: 20
};

/** Stable sort by offset, then by element class. */
export function sortByOffset<T extends MeasureElement>(elements: T[]): T[] {
  return elements
    .map((element, index) => ({ element, index }))
    .sort(
      (a, b) =>
        a.element.offset - b.element.offset ||
        CLASS_SORT_ORDER[a.element.kind] - CLASS_SORT_ORDER[b.element.kind] ||
        a.index - b.index
    )
    .map((entry) => entry.element);
}
