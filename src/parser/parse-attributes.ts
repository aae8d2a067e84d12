import type {
  Clef,
  GeneralNote,
  KeySignature,
  Measure,
  MeasureAttributes,
  MeasureElement,
  TimeSignature,
  TranspositionInterval
} from '../core/score.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import { TupletTracker } from './parse-duration.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, childrenOf, firstChild, parseOptionalFloat, parseOptionalInt } from './xml-utils.js';

/**
 * Running state of one part, carried from measure to measure.
 * A measure without its own `<attributes>` inherits whatever is current here.
 */
export interface PartState {
  partId: string;
  divisions: number;
  divisionsDeclared: boolean;
  /** Set once a missing `<divisions>` has been reported for this part. */
  divisionsWarned: boolean;
  staves: number;
  /** Largest staff count declared anywhere in the part. */
  maxStaves: number;
  key?: KeySignature;
  time?: TimeSignature;
  /** Current clef by staff number. */
  clefs: Map<number, Clef>;
  transposition?: TranspositionInterval;
  tuplets: TupletTracker;
  /** Most recent note, rest or chord; closing endpoint for direction spanners. */
  lastNote?: GeneralNote;
  /** Measures translated so far, the current one last. */
  measures: Measure[];
}

/** Fresh state for a part: one staff and one division per quarter until told otherwise. */
export function createPartState(partId: string): PartState {
  return {
    partId,
    divisions: 1,
    divisionsDeclared: false,
    divisionsWarned: false,
    staves: 1,
    maxStaves: 1,
    clefs: new Map<number, Clef>(),
    tuplets: new TupletTracker(),
    measures: []
  };
}

/** Attribute state in effect right now, for a measure about to start. */
export function snapshotAttributes(state: PartState): MeasureAttributes {
  const snapshot: MeasureAttributes = {
    divisions: state.divisions,
    staves: state.staves,
    clefs: [...state.clefs.entries()].sort(([a], [b]) => a - b).map(([, clef]) => clef)
  };
  if (state.key) {
    snapshot.key = state.key;
  }
  if (state.time) {
    snapshot.time = state.time;
  }
  return snapshot;
}

/** Side effects of one `<attributes>` element that the measure translator must apply. */
export interface AttributeUpdate {
  /** Clefs, keys and times to insert at the current offset. */
  elements: MeasureElement[];
  multiRest?: number;
}

/** Apply `<attributes>` to the part state as of `offset`. */
export function applyAttributes(
  node: XmlNode,
  offset: number,
  state: PartState,
  ctx: TranslationContext
): AttributeUpdate {
  const update: AttributeUpdate = { elements: [] };

  const divisionsText = childText(node, 'divisions');
  if (divisionsText !== undefined) {
    const divisions = parseOptionalFloat(divisionsText);
    if (divisions !== undefined && divisions > 0) {
      state.divisions = divisions;
      state.divisionsDeclared = true;
    } else {
      addDiagnostic(
        ctx,
        'DIVISIONS_INVALID',
        'warning',
        `Invalid divisions value '${divisionsText}', expected a positive number.`,
        firstChild(node, 'divisions')
      );
    }
  }

  const stavesText = childText(node, 'staves');
  if (stavesText !== undefined) {
    const staves = parseOptionalInt(stavesText);
    if (staves !== undefined && staves > 0) {
      state.staves = staves;
      state.maxStaves = Math.max(state.maxStaves, staves);
    } else {
      addDiagnostic(ctx, 'STAVES_INVALID', 'warning', `Invalid staves value '${stavesText}'.`, firstChild(node, 'staves'));
    }
  }

  for (const keyNode of childrenOf(node, 'key')) {
    const key = readKey(keyNode, offset, ctx);
    if (key) {
      state.key = key;
      update.elements.push(key);
    }
  }

  for (const timeNode of childrenOf(node, 'time')) {
    const time = readTime(timeNode, offset, ctx);
    if (time) {
      state.time = time;
      update.elements.push(time);
    }
  }

  for (const clefNode of childrenOf(node, 'clef')) {
    const clef = readClef(clefNode, offset, state.staves, ctx);
    if (clef) {
      state.clefs.set(clef.staff ?? 1, clef);
      update.elements.push(clef);
    }
  }

  const transposeNode = firstChild(node, 'transpose');
  if (transposeNode) {
    state.transposition = readTranspose(transposeNode);
  }

  const multiRest = parseOptionalInt(childText(firstChild(node, 'measure-style'), 'multiple-rest'));
  if (multiRest !== undefined && multiRest > 0) {
    update.multiRest = multiRest;
  }

  return update;
}

/** Traditional keys only; `key-step`/`key-alter` spellings are reported and skipped. */
function readKey(keyNode: XmlNode, offset: number, ctx: TranslationContext): KeySignature | undefined {
  const fifths = parseOptionalInt(childText(keyNode, 'fifths'));
  if (fifths === undefined) {
    addDiagnostic(ctx, 'UNSUPPORTED_ELEMENT', 'info', 'Non-traditional <key> is not translated.', keyNode);
    return undefined;
  }

  const key: KeySignature = { kind: 'key', ref: ctx.refs.next(), offset, fifths };
  const mode = childText(keyNode, 'mode');
  const staff = parseOptionalInt(attribute(keyNode, 'number'));
  if (mode) {
    key.mode = mode;
  }
  if (staff !== undefined) {
    key.staff = staff;
  }
  return key;
}

/** `beats` may be a compound numerator such as "3+2"; the bar length sums its terms. */
function readTime(timeNode: XmlNode, offset: number, ctx: TranslationContext): TimeSignature | undefined {
  const senzaMisura = firstChild(timeNode, 'senza-misura');
  if (senzaMisura) {
    return {
      kind: 'time',
      ref: ctx.refs.next(),
      offset,
      numerator: '',
      denominator: 0,
      senzaMisura: senzaMisura.text.trim(),
      barDuration: 0
    };
  }

  const numerator = childText(timeNode, 'beats');
  const denominator = parseOptionalInt(childText(timeNode, 'beat-type'));
  const beatTotal = numerator
    ?.split('+')
    .map((term) => parseOptionalInt(term.trim()))
    .reduce<number | undefined>((sum, term) => (sum === undefined || term === undefined ? undefined : sum + term), 0);

  if (!numerator || !denominator || denominator <= 0 || beatTotal === undefined) {
    addDiagnostic(
      ctx,
      'TIME_SIGNATURE_INVALID',
      'warning',
      'Invalid <time> signature; expected numeric beats and beat-type.',
      timeNode
    );
    return undefined;
  }

  const time: TimeSignature = {
    kind: 'time',
    ref: ctx.refs.next(),
    offset,
    numerator,
    denominator,
    barDuration: (beatTotal * 4) / denominator
  };
  const symbol = attribute(timeNode, 'symbol');
  if (symbol) {
    time.symbol = symbol;
  }
  return time;
}

/** Without a `number`, a clef on a multi-staff part belongs to the first staff. */
function readClef(clefNode: XmlNode, offset: number, staves: number, ctx: TranslationContext): Clef | undefined {
  const sign = childText(clefNode, 'sign');
  if (!sign) {
    addDiagnostic(ctx, 'CLEF_INVALID', 'warning', '<clef> is missing <sign>.', clefNode);
    return undefined;
  }

  const clef: Clef = {
    kind: 'clef',
    ref: ctx.refs.next(),
    offset,
    sign,
    octaveChange: parseOptionalInt(childText(clefNode, 'clef-octave-change')) ?? 0
  };
  const line = parseOptionalInt(childText(clefNode, 'line'));
  const staff = parseOptionalInt(attribute(clefNode, 'number')) ?? (staves > 1 ? 1 : undefined);
  if (line !== undefined) {
    clef.line = line;
  }
  if (staff !== undefined) {
    clef.staff = staff;
  }
  return clef;
}

/** Octave change folds into the interval as seven diatonic steps and twelve semitones. */
export function readTranspose(transposeNode: XmlNode): TranspositionInterval {
  const octaveChange = parseOptionalInt(childText(transposeNode, 'octave-change')) ?? 0;
  return {
    diatonic: (parseOptionalInt(childText(transposeNode, 'diatonic')) ?? 0) + 7 * octaveChange,
    chromatic: (parseOptionalFloat(childText(transposeNode, 'chromatic')) ?? 0) + 12 * octaveChange
  };
}
