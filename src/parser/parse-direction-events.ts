import type {
  Line,
  MeasureElement,
  MetronomeMark,
  NoteSpanner,
  Ottava,
  TempoReferent,
  TextExpression,
  Wedge
} from '../core/score.js';
import type { PartState } from './parse-attributes.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import { parseNoteType, typeToQuarterLength } from './parse-duration.js';
import { addEndpoint, type NoteSpannerKind } from './parse-spanners.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, childrenOf, firstChild, parseOptionalFloat, parseOptionalInt, textOf } from './xml-utils.js';

/** Direction types carrying nothing the score graph models. */
const IGNORED_DIRECTION_TYPES = new Set([
  'image',
  'scordatura',
  'accordion-registration',
  'harp-pedals',
  'damp',
  'damp-all',
  'eyeglasses',
  'string-mute',
  'principal-voice',
  'percussion',
  'staff-divide',
  'other-direction',
  'swing'
]);

/**
 * Translate one `<direction>` anchored at `offset`.
 * Every direction-type child is handled on its own; spanner starts and stops go
 * through the open-spanner bundle instead of the returned element list.
 */
export function translateDirection(
  directionNode: XmlNode,
  offset: number,
  state: PartState,
  ctx: TranslationContext
): MeasureElement[] {
  const elements: MeasureElement[] = [];
  const staff = parseOptionalInt(childText(directionNode, 'staff'));
  const placement = attribute(directionNode, 'placement');
  let sawMetronome = false;

  const stamp = (element: MeasureElement): void => {
    if (staff !== undefined) {
      element.staff = staff;
    }
    elements.push(element);
  };

  for (const directionType of childrenOf(directionNode, 'direction-type')) {
    for (const child of directionType.children) {
      switch (child.name) {
        case 'dynamics':
          for (const mark of child.children) {
            const value = mark.name === 'other-dynamics' ? textOf(mark) : mark.name;
            if (value) {
              stamp({ kind: 'dynamic', ref: ctx.refs.next(), offset, value });
            }
          }
          break;
        case 'words': {
          const content = textOf(child);
          if (content) {
            const text: TextExpression = { kind: 'text', ref: ctx.refs.next(), offset, content };
            if (placement) {
              text.placement = placement;
            }
            stamp(text);
          }
          break;
        }
        case 'rehearsal': {
          const content = textOf(child);
          if (content) {
            stamp({ kind: 'rehearsal', ref: ctx.refs.next(), offset, content });
          }
          break;
        }
        case 'segno':
          stamp({ kind: 'segno', ref: ctx.refs.next(), offset });
          break;
        case 'coda':
          stamp({ kind: 'coda', ref: ctx.refs.next(), offset });
          break;
        case 'metronome': {
          const element = readMetronome(child, offset, ctx);
          if (element) {
            stamp(element);
            sawMetronome = true;
          }
          break;
        }
        case 'wedge':
          handleWedge(child, state, ctx, placement);
          break;
        case 'bracket':
          handleLine(child, 'bracket', state, ctx, placement);
          break;
        case 'dashes':
          handleLine(child, 'dashes', state, ctx, placement);
          break;
        case 'octave-shift':
          handleOctaveShift(child, state, ctx);
          break;
        case 'pedal':
          handlePedal(child, state, ctx);
          break;
        default:
          if (!IGNORED_DIRECTION_TYPES.has(child.name)) {
            addDiagnostic(ctx, 'UNSUPPORTED_ELEMENT', 'info', `Direction type <${child.name}> is not translated.`, child);
          }
          break;
      }
    }
  }

  const soundTempo = parseOptionalFloat(attribute(firstChild(directionNode, 'sound'), 'tempo'));
  if (!sawMetronome && soundTempo !== undefined && soundTempo > 0) {
    stamp({
      kind: 'metronome',
      ref: ctx.refs.next(),
      offset,
      referent: { type: 'quarter', dots: 0, quarterLength: 1 },
      perMinute: soundTempo
    });
  }

  return elements;
}

/** One beat unit per referent; two beat units make a metric modulation. */
function readMetronome(node: XmlNode, offset: number, ctx: TranslationContext): MeasureElement | undefined {
  const referents: TempoReferent[] = [];
  for (const child of node.children) {
    if (child.name === 'beat-unit') {
      const type = parseNoteType(textOf(child));
      if (type) {
        referents.push({ type, dots: 0, quarterLength: typeToQuarterLength(type) });
      }
    } else if (child.name === 'beat-unit-dot') {
      const last = referents.at(-1);
      if (last) {
        last.dots += 1;
        last.quarterLength = typeToQuarterLength(last.type, last.dots);
      }
    }
  }

  const [first, second] = referents;
  if (first && second) {
    return { kind: 'metric-modulation', ref: ctx.refs.next(), offset, oldReferent: first, newReferent: second };
  }

  const mark: MetronomeMark = { kind: 'metronome', ref: ctx.refs.next(), offset };
  if (first) {
    mark.referent = first;
  }
  const perMinuteText = childText(node, 'per-minute');
  if (perMinuteText !== undefined) {
    const perMinute = Number.parseFloat(perMinuteText.replace(/^[^\d.]+/, ''));
    if (Number.isFinite(perMinute)) {
      mark.perMinute = perMinute;
    } else {
      mark.text = perMinuteText;
    }
  }
  if (attribute(node, 'parentheses') === 'yes') {
    mark.parentheses = true;
  }
  return mark;
}

/** Register a direction spanner that takes its first endpoint from the next note. */
function openDirectionSpanner(spanner: NoteSpanner, localId: string, ctx: TranslationContext, node: XmlNode): void {
  const displaced = ctx.spanners.start(spanner, localId);
  if (displaced) {
    addDiagnostic(
      ctx,
      'UNCLOSED_SPANNER',
      'info',
      `A new ${spanner.kind} ${localId} started before the previous one stopped; the earlier one is dropped.`,
      node
    );
  }
  ctx.spanners.awaitFirstEndpoint(spanner);
}

/** Complete with the most recent note as final endpoint; an unmatched stop is dropped. */
function closeDirectionSpanner(
  kind: NoteSpannerKind,
  localId: string,
  state: PartState,
  ctx: TranslationContext,
  node: XmlNode
): void {
  const spanner = ctx.spanners.complete(kind, localId);
  if (!spanner) {
    addDiagnostic(ctx, 'UNMATCHED_SPANNER_STOP', 'info', `Stop for ${kind} ${localId} has no matching start.`, node);
    return;
  }
  if (state.lastNote) {
    addEndpoint(spanner, state.lastNote);
  }
}

function handleWedge(node: XmlNode, state: PartState, ctx: TranslationContext, placement?: string): void {
  const type = attribute(node, 'type');
  const localId = attribute(node, 'number') ?? '1';

  if (type === 'crescendo' || type === 'diminuendo') {
    const wedge: Wedge = { kind: 'wedge', ref: ctx.refs.next(), complete: false, wedgeType: type, elements: [] };
    if (attribute(node, 'niente') === 'yes') {
      wedge.niente = true;
    }
    if (placement) {
      wedge.placement = placement;
    }
    openDirectionSpanner(wedge, localId, ctx, node);
  } else if (type === 'stop') {
    closeDirectionSpanner('wedge', localId, state, ctx, node);
  }
}

function handleLine(
  node: XmlNode,
  kind: 'bracket' | 'dashes',
  state: PartState,
  ctx: TranslationContext,
  placement?: string
): void {
  const type = attribute(node, 'type');
  const localId = attribute(node, 'number') ?? '1';

  if (type === 'start') {
    const line: Line = { kind, ref: ctx.refs.next(), complete: false, elements: [] };
    const lineType = attribute(node, 'line-type');
    const lineEnd = attribute(node, 'line-end');
    if (lineType) {
      line.lineType = lineType;
    }
    if (lineEnd) {
      line.startTick = lineEnd;
    }
    if (placement) {
      line.placement = placement;
    }
    openDirectionSpanner(line, localId, ctx, node);
  } else if (type === 'stop') {
    const open = ctx.spanners.find(kind, localId);
    const lineEnd = attribute(node, 'line-end');
    if ((open?.kind === 'bracket' || open?.kind === 'dashes') && lineEnd) {
      open.endTick = lineEnd;
    }
    closeDirectionSpanner(kind, localId, state, ctx, node);
  }
}

/** Notes written an octave down sound an octave up: `down` is 8va, `up` is 8vb. */
function handleOctaveShift(node: XmlNode, state: PartState, ctx: TranslationContext): void {
  const type = attribute(node, 'type');
  const localId = attribute(node, 'number') ?? '1';

  if (type === 'up' || type === 'down') {
    const size = parseOptionalInt(attribute(node, 'size')) ?? 8;
    const ottava: Ottava = {
      kind: 'ottava',
      ref: ctx.refs.next(),
      complete: false,
      ottavaType: ottavaType(size, type),
      elements: []
    };
    openDirectionSpanner(ottava, localId, ctx, node);
  } else if (type === 'stop') {
    closeDirectionSpanner('ottava', localId, state, ctx, node);
  }
}

function ottavaType(size: number, type: 'up' | 'down'): Ottava['ottavaType'] {
  if (size === 15) {
    return type === 'down' ? '15ma' : '15mb';
  }
  if (size === 22) {
    return type === 'down' ? '22da' : '22db';
  }
  return type === 'down' ? '8va' : '8vb';
}

function handlePedal(node: XmlNode, state: PartState, ctx: TranslationContext): void {
  const type = attribute(node, 'type');
  const localId = attribute(node, 'number') ?? '1';

  if (type === 'start') {
    openDirectionSpanner({ kind: 'pedal', ref: ctx.refs.next(), complete: false, elements: [] }, localId, ctx, node);
  } else if (type === 'stop') {
    closeDirectionSpanner('pedal', localId, state, ctx, node);
  } else if (type === 'change' || type === 'continue') {
    const open = ctx.spanners.find('pedal', localId);
    if (open && state.lastNote) {
      addEndpoint(open, state.lastNote);
    }
  }
}
