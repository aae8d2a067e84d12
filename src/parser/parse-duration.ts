import type { NoteTypeName, Tuplet, TupletRatio, TupletType } from '../core/score.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, childrenOf, firstChild, parseOptionalInt, parseYesNo } from './xml-utils.js';

/** Quarter lengths of undotted note types. */
const TYPE_QUARTER_LENGTHS: Record<NoteTypeName, number> = {
  maxima: 32,
  longa: 16,
  breve: 8,
  whole: 4,
  half: 2,
  quarter: 1,
  eighth: 0.5,
  '16th': 0.25,
  '32nd': 0.125,
  '64th': 1 / 16,
  '128th': 1 / 32,
  '256th': 1 / 64,
  '512th': 1 / 128,
  '1024th': 1 / 256
};

const NOTE_TYPES = Object.keys(TYPE_QUARTER_LENGTHS);

/** Map a `<type>` value to a note type; `long` is the MusicXML spelling of `longa`. */
export function parseNoteType(text: string | undefined): NoteTypeName | undefined {
  if (text === undefined) {
    return undefined;
  }
  const normalized = text === 'long' ? 'longa' : text;
  return NOTE_TYPES.find((type): type is NoteTypeName => type === normalized);
}

/** Quarter length of a note type with `dots` augmentation dots. */
export function typeToQuarterLength(type: NoteTypeName, dots = 0): number {
  const base = TYPE_QUARTER_LENGTHS[type];
  return base * (2 - 1 / 2 ** dots);
}

/** Infer the written type of a plain quarter length, allowing up to three dots. */
export function quarterLengthToType(quarterLength: number): { type: NoteTypeName; dots: number } | undefined {
  for (const type of NOTE_TYPES) {
    const noteType = parseNoteType(type);
    if (!noteType) {
      continue;
    }
    for (let dots = 0; dots <= 3; dots += 1) {
      if (Math.abs(typeToQuarterLength(noteType, dots) - quarterLength) < 1e-9) {
        return { type: noteType, dots };
      }
    }
  }
  return undefined;
}

/** Largest denominator a quarter length snaps to; covers nested tuplets of any practical size. */
const MAX_QUARTER_LENGTH_DENOMINATOR = 10000;

/**
 * Snap a quarter length to the nearest fraction with a small denominator, so
 * repeated thirds land back on whole beats. Values with no close fraction are
 * rounded to nine decimals.
 */
export function roundQuarterLength(value: number): number {
  if (Number.isInteger(value) || !Number.isFinite(value)) {
    return value;
  }

  const sign = value < 0 ? -1 : 1;
  const target = Math.abs(value);
  let [previousNum, num, previousDen, den] = [0, 1, 1, 0];
  let remainder = target;

  // Continued-fraction convergents of `target`.
  for (let step = 0; step < 32; step += 1) {
    const whole = Math.floor(remainder);
    const nextNum = whole * num + previousNum;
    const nextDen = whole * den + previousDen;
    if (nextDen > MAX_QUARTER_LENGTH_DENOMINATOR) {
      break;
    }
    [previousNum, num, previousDen, den] = [num, nextNum, den, nextDen];
    if (Math.abs(target - num / den) < 1e-9 || remainder === whole) {
      break;
    }
    remainder = 1 / (remainder - whole);
  }

  if (den > 0 && Math.abs(target - num / den) < 1e-7) {
    return (sign * num) / den;
  }
  return Math.round(value * 1e9) / 1e9;
}

/** Exact rational, kept in lowest terms. */
interface Fraction {
  num: number;
  den: number;
}

function fraction(num: number, den: number): Fraction {
  const divisor = gcd(Math.abs(num), Math.abs(den)) || 1;
  return { num: num / divisor, den: den / divisor };
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/** Divide `value` by a tuplet's multiplier (normal / actual). */
function divideByMultiplier(value: Fraction, ratio: TupletRatio): Fraction {
  return fraction(value.num * ratio.actual, value.den * ratio.normal);
}

/**
 * Tuplet brackets in flight for one part, indexed by tuplet number.
 * Each note reports every tuplet that applies to it, outermost first; a tuplet
 * number is retired only when its own stop arrives.
 */
export class TupletTracker {
  private readonly active = new Map<number, Tuplet>();

  /** Tuplets applying to `note`, given its written type. */
  tupletsFor(note: XmlNode, noteType: NoteTypeName | undefined, ctx: TranslationContext): Tuplet[] {
    const timeModification = firstChild(note, 'time-modification');
    if (!timeModification) {
      return [];
    }

    const timeModRatio: TupletRatio = {
      actual: parseOptionalInt(childText(timeModification, 'actual-notes')) ?? 1,
      normal: parseOptionalInt(childText(timeModification, 'normal-notes')) ?? 1,
      normalType: parseNoteType(childText(timeModification, 'normal-type')) ?? noteType,
      normalDots: childrenOf(timeModification, 'normal-dot').length
    };

    const returned = new Map<number, Tuplet>();
    const toRetire = new Set<number>();
    let remaining = fraction(timeModRatio.normal, timeModRatio.actual);

    const tupletNodes = childrenOf(note, 'notations').flatMap((notations) => childrenOf(notations, 'tuplet'));
    for (const tupletNode of tupletNodes) {
      const type = attribute(tupletNode, 'type');
      const index = parseOptionalInt(attribute(tupletNode, 'number')) ?? 1;

      if (type === 'stop') {
        const activeTuplet = this.active.get(index);
        if (!activeTuplet) {
          addDiagnostic(ctx, 'TUPLET_STOP_WITHOUT_START', 'info', `Tuplet ${index} stops without a start.`, tupletNode);
          continue;
        }
        if ([...returned.values()].includes(activeTuplet)) {
          activeTuplet.type = 'startStop';
        }
        toRetire.add(index);
        continue;
      }

      const tuplet: Tuplet = {
        ...this.tupletRatio(tupletNode, index, timeModRatio),
        number: index,
        type: type === 'start' ? 'start' : undefined
      };
      applyTupletDisplay(tuplet, tupletNode);

      returned.set(index, tuplet);
      remaining = divideByMultiplier(remaining, tuplet);
      this.active.set(index, tuplet);
    }

    for (const [index, activeTuplet] of [...this.active.entries()].sort(([a], [b]) => a - b)) {
      if ([...returned.values()].includes(activeTuplet)) {
        continue;
      }
      const type: TupletType | undefined = toRetire.has(index) ? 'stop' : undefined;
      const carried: Tuplet = { ...activeTuplet, type };
      remaining = divideByMultiplier(remaining, carried);
      returned.set(index, carried);
    }

    const ordered = [...returned.entries()].sort(([a], [b]) => a - b).map(([, tuplet]) => tuplet);

    if (remaining.num !== remaining.den) {
      ordered.push({
        actual: remaining.den,
        normal: remaining.num,
        normalType: timeModRatio.normalType,
        normalDots: timeModRatio.normalDots
      });
    }

    for (const index of toRetire) {
      this.active.delete(index);
    }

    return ordered;
  }

  /** Number of tuplet brackets currently open. */
  get depth(): number {
    return this.active.size;
  }

  /**
   * Explicit `<tuplet-actual>`/`<tuplet-normal>` wins; otherwise the ratio is
   * what the time modification leaves after the other open tuplets.
   */
  private tupletRatio(tupletNode: XmlNode, index: number, timeModRatio: TupletRatio): TupletRatio {
    const actualNode = firstChild(tupletNode, 'tuplet-actual');
    const normalNode = firstChild(tupletNode, 'tuplet-normal');
    const actual = parseOptionalInt(childText(actualNode, 'tuplet-number'));
    const normal = parseOptionalInt(childText(normalNode, 'tuplet-number'));

    if (actual !== undefined && normal !== undefined && actual > 0 && normal > 0) {
      const ratio: TupletRatio = { actual, normal };
      const actualType = parseNoteType(childText(actualNode, 'tuplet-type'));
      const normalType = parseNoteType(childText(normalNode, 'tuplet-type'));
      if (actualType) {
        ratio.actualType = actualType;
        ratio.actualDots = childrenOf(actualNode, 'tuplet-dot').length;
      }
      if (normalType) {
        ratio.normalType = normalType;
        ratio.normalDots = childrenOf(normalNode, 'tuplet-dot').length;
      }
      return ratio;
    }

    let rest = fraction(timeModRatio.normal, timeModRatio.actual);
    for (const [otherIndex, other] of this.active) {
      if (otherIndex !== index) {
        rest = divideByMultiplier(rest, other);
      }
    }

    if (rest.num <= 0 || rest.den <= 0 || rest.num === rest.den) {
      return { ...timeModRatio };
    }

    return {
      actual: rest.den,
      normal: rest.num,
      normalType: timeModRatio.normalType,
      normalDots: timeModRatio.normalDots
    };
  }
}

/** Copy bracket/number display attributes from a `<tuplet>` element. */
function applyTupletDisplay(tuplet: Tuplet, tupletNode: XmlNode): void {
  const bracket = parseYesNo(attribute(tupletNode, 'bracket'));
  const showNumber = attribute(tupletNode, 'show-number');
  const showType = attribute(tupletNode, 'show-type');
  const placement = attribute(tupletNode, 'placement');

  if (bracket !== undefined) {
    tuplet.bracket = bracket;
  } else if (showNumber === 'none') {
    tuplet.bracket = false;
  }
  if (attribute(tupletNode, 'line-shape') === 'curved') {
    tuplet.bracket = 'slur';
  }
  if (showNumber) {
    tuplet.showNumber = showNumber;
  }
  if (showType) {
    tuplet.showType = showType;
  }
  if (placement) {
    tuplet.placement = placement;
  }
}
