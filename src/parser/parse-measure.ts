import type {
  Chord,
  Duration,
  GeneralNote,
  Glissando,
  Measure,
  MeasureElement,
  Note,
  NoteSpanner,
  Pitch,
  Rest,
  Slur,
  TrillExtension,
  Tuplet,
  Voice
} from '../core/score.js';
import { sortByOffset } from '../core/score.js';
import { applyAttributes, snapshotAttributes, type PartState } from './parse-attributes.js';
import { translateBarline } from './parse-barline.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import { translateDirection } from './parse-direction-events.js';
import { parseNoteType, quarterLengthToType, roundQuarterLength, typeToQuarterLength } from './parse-duration.js';
import { translateHarmony } from './parse-harmony.js';
import { isChordContinuation, readNoteFacts, type NoteFacts, type NoteSpannerIntent } from './parse-note.js';
import { addEndpoint } from './parse-spanners.js';
import { SiblingCursor } from './sibling-cursor.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, childrenOf, parseOptionalFloat, parseYesNo } from './xml-utils.js';

/** Measure children that carry layout or playback hints only. */
const IGNORED_MEASURE_CHILDREN = new Set(['print', 'sound', 'grouping', 'link', 'bookmark', 'listening']);

/** Stops run before continues, continues before starts, so one note can end a slur and begin the next. */
const INTENT_ORDER: Record<NoteSpannerIntent['type'], number> = { stop: 0, continue: 1, start: 2 };

/** Split a measure `number` attribute such as "12a" into its numeric part and suffix. */
export function parseMeasureNumber(text: string | undefined): { number: number; suffix?: string } {
  const value = text?.trim() ?? '';
  const match = /^(\d+)(.*)$/.exec(value);
  if (match?.[1] !== undefined) {
    const suffix = match[2] ?? '';
    return suffix ? { number: Number.parseInt(match[1], 10), suffix } : { number: Number.parseInt(match[1], 10) };
  }

  // Pickup and cadenza bars are sometimes numbered "X1"; keep the digits when there are any.
  const digits = /^(\D+)(\d+)$/.exec(value);
  if (digits?.[1] !== undefined && digits[2] !== undefined) {
    return { number: Number.parseInt(digits[2], 10), suffix: digits[1] };
  }

  return value ? { number: 0, suffix: value } : { number: 0 };
}

/** Create an empty measure carrying the part's current attribute state. */
export function createMeasure(node: XmlNode, state: PartState, ctx: TranslationContext): Measure {
  const { number, suffix } = parseMeasureNumber(attribute(node, 'number'));
  const measure: Measure = {
    kind: 'measure',
    ref: ctx.refs.next(),
    number,
    attributes: snapshotAttributes(state),
    elements: [],
    voices: [],
    duration: 0,
    spanners: []
  };
  if (suffix !== undefined) {
    measure.numberSuffix = suffix;
  }
  if (parseYesNo(attribute(node, 'implicit')) === true) {
    measure.implicit = true;
  }
  return measure;
}

/**
 * Translate one `<measure>` by walking its children with a single time cursor.
 * `<backup>` and `<forward>` only move the cursor; notes sharing a `<chord/>` are
 * collected through one element of lookahead and emitted as a single chord.
 */
export class MeasureTranslator {
  private offset = 0;
  private maxOffset = 0;
  private pending: XmlNode[] = [];
  private readonly voicesById = new Map<string, Voice>();

  constructor(
    private readonly measure: Measure,
    private readonly state: PartState,
    private readonly ctx: TranslationContext
  ) {}

  /** Translate every child of `node` into the measure and return it. */
  translate(node: XmlNode): Measure {
    const cursor = new SiblingCursor(node.children);

    while (cursor.hasNext()) {
      const child = cursor.next();
      if (!child) {
        break;
      }

      if (child.name === 'note') {
        this.pending.push(child);
        if (!isChordContinuation(cursor.peek())) {
          this.flushChord();
        }
        continue;
      }

      this.translateChild(child);
    }

    if (this.pending.length > 0) {
      this.flushChord();
    }

    return this.finish();
  }

  private translateChild(child: XmlNode): void {
    switch (child.name) {
      case 'backup':
        this.moveCursor(-this.readTicks(child), child);
        break;
      case 'forward':
        this.moveCursor(this.readTicks(child), child);
        break;
      case 'attributes': {
        const update = applyAttributes(child, this.offset, this.state, this.ctx);
        this.measure.elements.push(...update.elements);
        if (update.multiRest !== undefined) {
          this.measure.multiRest = update.multiRest;
        }
        if (this.offset === 0) {
          this.measure.attributes = snapshotAttributes(this.state);
        }
        break;
      }
      case 'direction':
        this.measure.elements.push(...translateDirection(child, this.offsetOf(child), this.state, this.ctx));
        break;
      case 'harmony':
        this.measure.elements.push(translateHarmony(child, this.offsetOf(child), this.ctx));
        break;
      case 'barline':
        translateBarline(child, this.measure, this.offset, this.state, this.ctx);
        break;
      default:
        if (!IGNORED_MEASURE_CHILDREN.has(child.name)) {
          addDiagnostic(this.ctx, 'UNSUPPORTED_ELEMENT', 'info', `<${child.name}> is not translated.`, child);
        }
        break;
    }
  }

  /** `<duration>` of a backup or forward, in quarter lengths. */
  private readTicks(node: XmlNode): number {
    const ticks = parseOptionalFloat(childText(node, 'duration')) ?? 0;
    return ticks / this.state.divisions;
  }

  private moveCursor(delta: number, node: XmlNode): void {
    const target = roundQuarterLength(this.offset + delta);
    if (target < 0) {
      addDiagnostic(
        this.ctx,
        'BACKUP_BEFORE_MEASURE_START',
        'warning',
        '<backup> moves before the start of the measure; clamped to 0.',
        node
      );
      this.offset = 0;
      return;
    }
    this.offset = target;
    this.maxOffset = Math.max(this.maxOffset, this.offset);
  }

  /** Current cursor plus an optional `<offset>` child, for directions and harmonies. */
  private offsetOf(node: XmlNode): number {
    const shift = parseOptionalFloat(childText(node, 'offset')) ?? 0;
    return roundQuarterLength(Math.max(0, this.offset + shift / this.state.divisions));
  }

  /** Emit the pending note group as a note, rest or chord at the cursor. */
  private flushChord(): void {
    const group = this.pending.map((node) => readNoteFacts(node, this.ctx));
    this.pending = [];
    const first = group[0];
    if (!first) {
      return;
    }

    const duration = this.resolveDuration(first);
    const element = this.buildGeneralNote(group, first, duration);
    const voiceId = group.find((facts) => facts.voice !== undefined)?.voice;

    if (voiceId !== undefined) {
      this.voice(voiceId).elements.push(element);
    } else {
      this.measure.elements.push(element);
    }

    this.ctx.spanners.assignPending(element);
    this.applySpannerIntents(group.flatMap((facts) => facts.spanners), element);

    this.state.lastNote = element;
    if (!first.grace) {
      this.offset = roundQuarterLength(this.offset + duration.quarterLength);
      this.maxOffset = Math.max(this.maxOffset, this.offset);
    }
  }

  /**
   * Grace notes take no time. Everything else is `<duration>` over the current
   * divisions; the written type is inferred from that length when `<type>` is absent.
   */
  private resolveDuration(first: NoteFacts): Duration {
    const node = first.node;
    let type = parseNoteType(childText(node, 'type'));
    let dots = childrenOf(node, 'dot').length;
    const tuplets = this.state.tuplets.tupletsFor(node, type, this.ctx);

    if (first.grace) {
      if (!type) {
        addDiagnostic(this.ctx, 'GRACE_TYPE_MISSING', 'info', 'Grace note has no <type>; using eighth.', node);
        type = 'eighth';
      }
      return { quarterLength: 0, type, dots, tuplets };
    }

    const ticks = parseOptionalFloat(childText(node, 'duration'));
    let quarterLength: number;
    if (ticks === undefined) {
      addDiagnostic(this.ctx, 'MISSING_DURATION', 'warning', '<note> has no <duration>; using its written type.', node);
      quarterLength = type ? roundQuarterLength(typeToQuarterLength(type, dots) * tupletMultiplier(tuplets)) : 0;
    } else {
      if (!this.state.divisionsDeclared && !this.state.divisionsWarned) {
        this.state.divisionsWarned = true;
        addDiagnostic(
          this.ctx,
          'MISSING_DIVISIONS',
          'warning',
          'No <divisions> declared before the first note; assuming 1 division per quarter.',
          node
        );
      }
      quarterLength = roundQuarterLength(ticks / this.state.divisions);
    }

    if (!type && tuplets.length === 0) {
      const inferred = quarterLengthToType(quarterLength);
      if (inferred) {
        type = inferred.type;
        dots = inferred.dots;
      }
    }

    const duration: Duration = { quarterLength, dots, tuplets };
    if (type) {
      duration.type = type;
    }
    return duration;
  }

  /** Two or more pitched notes make a chord; a lone note or rest stays as it is. */
  private buildGeneralNote(group: NoteFacts[], first: NoteFacts, duration: Duration): GeneralNote {
    const pitched = group.flatMap((facts) => (facts.pitch ? [{ facts, pitch: facts.pitch }] : []));
    const [lead] = pitched;

    if (pitched.length >= 2) {
      const chord: Chord = {
        kind: 'chord',
        ref: this.ctx.refs.next(),
        offset: this.offset,
        duration,
        notes: pitched.map(({ facts, pitch }) => this.buildNote(facts, pitch, duration)),
        articulations: unique(group.flatMap((facts) => facts.articulations)),
        expressions: unique(group.flatMap((facts) => facts.expressions)),
        lyrics: group.flatMap((facts) => facts.lyrics),
        beams: first.beams
      };
      copySharedFields(chord, group);
      return chord;
    }

    if (lead) {
      return this.buildNote(lead.facts, lead.pitch, duration);
    }

    const rest: Rest = {
      kind: 'rest',
      ref: this.ctx.refs.next(),
      offset: this.offset,
      duration,
      articulations: first.articulations,
      expressions: first.expressions,
      lyrics: first.lyrics,
      beams: first.beams
    };
    copySharedFields(rest, [first]);
    if (first.rest?.fullMeasure) {
      rest.fullMeasure = true;
    }
    if (first.rest?.displayStep) {
      rest.displayStep = first.rest.displayStep;
    }
    if (first.rest?.displayOctave !== undefined) {
      rest.displayOctave = first.rest.displayOctave;
    }
    return rest;
  }

  private buildNote(facts: NoteFacts, pitch: Pitch, duration: Duration): Note {
    const note: Note = {
      kind: 'note',
      ref: this.ctx.refs.next(),
      offset: this.offset,
      duration: { ...duration, tuplets: duration.tuplets.map((tuplet) => ({ ...tuplet })) },
      pitch,
      articulations: facts.articulations,
      expressions: facts.expressions,
      lyrics: facts.lyrics,
      beams: facts.beams
    };
    copySharedFields(note, [facts]);
    if (facts.unpitched) {
      note.unpitched = true;
    }
    if (facts.tie) {
      note.tie = facts.tie;
    }
    if (facts.notehead) {
      note.notehead = facts.notehead;
    }
    return note;
  }

  private applySpannerIntents(intents: NoteSpannerIntent[], element: GeneralNote): void {
    const ordered = [...intents].sort((a, b) => INTENT_ORDER[a.type] - INTENT_ORDER[b.type]);

    for (const intent of ordered) {
      if (intent.type === 'stop') {
        const spanner = this.ctx.spanners.complete(intent.kind, intent.localId);
        if (!spanner) {
          addDiagnostic(
            this.ctx,
            'UNMATCHED_SPANNER_STOP',
            'info',
            `Stop for ${intent.kind} ${intent.localId} has no matching start.`,
            intent.node
          );
          continue;
        }
        addEndpoint(spanner, element);
      } else if (intent.type === 'continue') {
        const spanner = this.ctx.spanners.find(intent.kind, intent.localId);
        if (spanner) {
          addEndpoint(spanner, element);
        }
      } else {
        const spanner = this.createNoteSpanner(intent, element);
        const displaced = this.ctx.spanners.start(spanner, intent.localId);
        if (displaced) {
          addDiagnostic(
            this.ctx,
            'UNCLOSED_SPANNER',
            'info',
            `A new ${intent.kind} ${intent.localId} started before the previous one stopped; the earlier one is dropped.`,
            intent.node
          );
        }
      }
    }
  }

  private createNoteSpanner(intent: NoteSpannerIntent, element: GeneralNote): NoteSpanner {
    const ref = this.ctx.refs.next();
    let spanner: Slur | Glissando | TrillExtension;
    if (intent.kind === 'slur') {
      spanner = { kind: 'slur', ref, complete: false, elements: [element] };
      if (intent.lineType) {
        spanner.lineType = intent.lineType;
      }
    } else if (intent.kind === 'trill-extension') {
      spanner = { kind: 'trill-extension', ref, complete: false, elements: [element] };
    } else {
      const glissando: Glissando = { kind: intent.kind, ref, complete: false, elements: [element] };
      if (intent.lineType) {
        glissando.lineType = intent.lineType;
      }
      if (intent.label) {
        glissando.label = intent.label;
      }
      spanner = glissando;
    }
    if (intent.placement) {
      spanner.placement = intent.placement;
    }
    return spanner;
  }

  /** Voices are created on first use, in the order they appear. */
  private voice(id: string): Voice {
    let voice = this.voicesById.get(id);
    if (!voice) {
      voice = { kind: 'voice', ref: this.ctx.refs.next(), id, elements: [], spanners: [] };
      this.voicesById.set(id, voice);
      this.measure.voices.push(voice);
    }
    return voice;
  }

  private finish(): Measure {
    const measure = this.measure;
    measure.duration = this.maxOffset;
    measure.elements = sortByOffset(measure.elements);
    for (const voice of measure.voices) {
      voice.elements = sortByOffset(voice.elements);
    }
    flattenSingleVoice(measure);
    return measure;
  }
}

/** A measure with exactly one voice holds its notes directly. */
export function flattenSingleVoice(measure: Measure): void {
  const [only, ...others] = measure.voices;
  if (!only || others.length > 0) {
    return;
  }
  const elements: MeasureElement[] = [...measure.elements, ...only.elements];
  measure.elements = sortByOffset(elements);
  measure.spanners.push(...only.spanners);
  measure.voices = [];
}

/** Voice, staff, grace and cue come from the first note of the group that has them. */
function copySharedFields(target: GeneralNote, group: NoteFacts[]): void {
  const voice = group.find((facts) => facts.voice !== undefined)?.voice;
  const staff = group.find((facts) => facts.staff !== undefined)?.staff;
  const stem = group.find((facts) => facts.stemDirection !== undefined)?.stemDirection;
  const grace = group[0]?.grace;

  if (voice !== undefined) {
    target.voice = voice;
  }
  if (staff !== undefined) {
    target.staff = staff;
  }
  if (stem !== undefined) {
    target.stemDirection = stem;
  }
  if (grace) {
    target.grace = grace;
  }
  if (group.some((facts) => facts.cue)) {
    target.cue = true;
  }
}

/** Product of every tuplet's normal/actual, applied to a written length. */
function tupletMultiplier(tuplets: readonly Tuplet[]): number {
  return tuplets.reduce((product, tuplet) => (product * tuplet.normal) / tuplet.actual, 1);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
