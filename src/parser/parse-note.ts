import { ElementTranslationError } from '../core/errors.js';
import type { Accidental, Beam, GraceInfo, Lyric, Pitch, PitchStep, Tie, TieType } from '../core/score.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import {
  attribute,
  childText,
  childrenOf,
  firstChild,
  hasChild,
  parseOptionalFloat,
  parseOptionalInt,
  parseYesNo,
  textOf
} from './xml-utils.js';

const PITCH_STEPS: readonly PitchStep[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];

/** Spanner start/stop request carried by one note, applied once the note is materialized. */
export interface NoteSpannerIntent {
  kind: 'slur' | 'glissando' | 'slide' | 'trill-extension';
  type: 'start' | 'stop' | 'continue';
  localId: string;
  placement?: string;
  lineType?: string;
  label?: string;
  node: XmlNode;
}

/** Everything one `<note>` element says, before chord grouping and duration resolution. */
export interface NoteFacts {
  node: XmlNode;
  /** Set for pitched and unpitched notes; absent for rests. */
  pitch?: Pitch;
  unpitched: boolean;
  rest?: { fullMeasure: boolean; displayStep?: PitchStep; displayOctave?: number };
  voice?: string;
  staff?: number;
  grace?: GraceInfo;
  cue: boolean;
  tie?: Tie;
  notehead?: string;
  stemDirection?: string;
  beams: Beam[];
  lyrics: Lyric[];
  articulations: string[];
  expressions: string[];
  spanners: NoteSpannerIntent[];
}

/** True when `note` continues the chord begun by the note before it. */
export function isChordContinuation(node: XmlNode | undefined): boolean {
  return node?.name === 'note' && hasChild(node, 'chord');
}

/** Read pitch, voice, staff and notations from one `<note>`. */
export function readNoteFacts(node: XmlNode, ctx: TranslationContext): NoteFacts {
  const facts: NoteFacts = {
    node,
    unpitched: false,
    voice: childText(node, 'voice'),
    staff: parseOptionalInt(childText(node, 'staff')),
    cue: hasChild(node, 'cue'),
    notehead: childText(node, 'notehead'),
    stemDirection: childText(node, 'stem'),
    beams: readBeams(node),
    lyrics: readLyrics(node),
    articulations: [],
    expressions: [],
    spanners: []
  };

  const graceNode = firstChild(node, 'grace');
  if (graceNode) {
    facts.grace = readGrace(graceNode);
  }

  const restNode = firstChild(node, 'rest');
  const pitchNode = firstChild(node, 'pitch');
  const unpitchedNode = firstChild(node, 'unpitched');

  if (restNode) {
    facts.rest = readRest(restNode);
  } else if (pitchNode) {
    const pitch = readPitch(pitchNode, node, ctx);
    if (pitch) {
      facts.pitch = pitch;
    } else {
      facts.rest = { fullMeasure: false };
    }
  } else if (unpitchedNode) {
    facts.unpitched = true;
    facts.pitch = {
      step: readStep(childText(unpitchedNode, 'display-step')) ?? 'B',
      octave: parseOptionalInt(childText(unpitchedNode, 'display-octave')) ?? 4
    };
  } else {
    throw new ElementTranslationError('<note> has no <pitch>, <unpitched> or <rest>', node.path);
  }

  facts.tie = readTie(node);
  readNotations(node, facts);
  return facts;
}

function readStep(text: string | undefined): PitchStep | undefined {
  return PITCH_STEPS.find((step) => step === text?.toUpperCase());
}

/** Invalid step or octave becomes a diagnostic; the caller substitutes a rest. */
function readPitch(pitchNode: XmlNode, noteNode: XmlNode, ctx: TranslationContext): Pitch | undefined {
  const stepText = childText(pitchNode, 'step');
  const step = readStep(stepText);
  const octave = parseOptionalInt(childText(pitchNode, 'octave'));

  if (!step || octave === undefined) {
    addDiagnostic(
      ctx,
      'INVALID_PITCH',
      'warning',
      `Pitch step '${stepText ?? ''}' / octave '${childText(pitchNode, 'octave') ?? ''}' is invalid; translated as a rest.`,
      pitchNode
    );
    return undefined;
  }

  const pitch: Pitch = { step, octave };
  const alter = parseOptionalFloat(childText(pitchNode, 'alter'));
  if (alter !== undefined && alter !== 0) {
    pitch.alter = alter;
  }

  const accidental = readAccidental(firstChild(noteNode, 'accidental'));
  if (accidental) {
    pitch.accidental = accidental;
  }
  return pitch;
}

function readAccidental(node: XmlNode | undefined): Accidental | undefined {
  const name = textOf(node);
  if (!node || !name) {
    return undefined;
  }

  const accidental: Accidental = { name };
  if (attribute(node, 'cautionary') === 'yes') {
    accidental.cautionary = true;
  }
  if (attribute(node, 'editorial') === 'yes') {
    accidental.editorial = true;
  }
  if (attribute(node, 'parentheses') === 'yes') {
    accidental.parentheses = true;
  }
  return accidental;
}

function readRest(restNode: XmlNode): NonNullable<NoteFacts['rest']> {
  const rest: NonNullable<NoteFacts['rest']> = { fullMeasure: attribute(restNode, 'measure') === 'yes' };
  const displayStep = readStep(childText(restNode, 'display-step'));
  const displayOctave = parseOptionalInt(childText(restNode, 'display-octave'));
  if (displayStep) {
    rest.displayStep = displayStep;
  }
  if (displayOctave !== undefined) {
    rest.displayOctave = displayOctave;
  }
  return rest;
}

/** A missing `slash` attribute means a slashed grace note. */
function readGrace(graceNode: XmlNode): GraceInfo {
  const grace: GraceInfo = { slash: attribute(graceNode, 'slash') !== 'no' };

  const previous = parseOptionalFloat(attribute(graceNode, 'steal-time-previous'));
  const following = parseOptionalFloat(attribute(graceNode, 'steal-time-following'));
  const makeTime = parseOptionalFloat(attribute(graceNode, 'make-time'));
  if (previous !== undefined) {
    grace.stealTimePrevious = previous / 100;
  }
  if (following !== undefined) {
    grace.stealTimeFollowing = following / 100;
  }
  if (makeTime !== undefined) {
    grace.makeTime = makeTime;
  }
  return grace;
}

/** Merge `<tie>` and `<tied>`: a start together with a stop is a continuation. */
function readTie(node: XmlNode): Tie | undefined {
  const tiedNodes = childrenOf(node, 'notations').flatMap((notations) => childrenOf(notations, 'tied'));
  const types = new Set<string>();
  for (const tieNode of [...childrenOf(node, 'tie'), ...tiedNodes]) {
    const type = attribute(tieNode, 'type');
    if (type) {
      types.add(type);
    }
  }

  let type: TieType | undefined;
  if (types.has('start') && types.has('stop')) {
    type = 'continue';
  } else if (types.has('continue')) {
    type = 'continue';
  } else if (types.has('start')) {
    type = 'start';
  } else if (types.has('stop')) {
    type = 'stop';
  } else if (types.has('let-ring')) {
    type = 'let-ring';
  }

  if (!type) {
    return undefined;
  }

  const tie: Tie = { type };
  const placement = tiedNodes.map((tied) => attribute(tied, 'placement')).find((value) => value !== undefined);
  if (placement) {
    tie.placement = placement;
  }
  return tie;
}

function readBeams(node: XmlNode): Beam[] {
  const beams: Beam[] = [];
  for (const beamNode of childrenOf(node, 'beam')) {
    const type = textOf(beamNode);
    if (type) {
      beams.push({ number: parseOptionalInt(attribute(beamNode, 'number')) ?? 1, type });
    }
  }
  return beams;
}

/** Lyrics without text or extension are skipped; elided syllables join with a space. */
function readLyrics(node: XmlNode): Lyric[] {
  const lyrics: Lyric[] = [];
  for (const [index, lyricNode] of childrenOf(node, 'lyric').entries()) {
    const text = childrenOf(lyricNode, 'text')
      .map((textNode) => textOf(textNode) ?? '')
      .join(' ')
      .trim();
    const extend = hasChild(lyricNode, 'extend');
    if (!text && !extend) {
      continue;
    }

    const lyric: Lyric = {
      number: attribute(lyricNode, 'number') ?? String(index + 1),
      text
    };
    const syllabic = childText(lyricNode, 'syllabic');
    if (syllabic) {
      lyric.syllabic = syllabic;
    }
    if (extend) {
      lyric.extend = true;
    }
    lyrics.push(lyric);
  }
  return lyrics;
}

const ORNAMENT_NAMES: Record<string, string> = {
  'trill-mark': 'trill',
  turn: 'turn',
  'inverted-turn': 'inverted-turn',
  'delayed-turn': 'delayed-turn',
  'delayed-inverted-turn': 'delayed-inverted-turn',
  mordent: 'mordent',
  'inverted-mordent': 'inverted-mordent',
  shake: 'shake',
  schleifer: 'schleifer',
  tremolo: 'tremolo'
};

/** Collect articulations, ornaments, fermatas and notation spanners from every `<notations>` block. */
function readNotations(node: XmlNode, facts: NoteFacts): void {
  for (const notations of childrenOf(node, 'notations')) {
    for (const child of notations.children) {
      switch (child.name) {
        case 'articulations':
        case 'technical':
          for (const mark of child.children) {
            facts.articulations.push(mark.name);
          }
          break;
        case 'ornaments':
          for (const ornament of child.children) {
            const name = ORNAMENT_NAMES[ornament.name];
            if (name) {
              facts.expressions.push(name);
            } else if (ornament.name === 'wavy-line') {
              pushSpannerIntent(facts, 'trill-extension', ornament);
            }
          }
          break;
        case 'fermata':
          facts.expressions.push('fermata');
          break;
        case 'arpeggiate':
          facts.expressions.push('arpeggio');
          break;
        case 'slur':
        case 'glissando':
        case 'slide':
          pushSpannerIntent(facts, child.name, child);
          break;
        default:
          break;
      }
    }
  }
}

function pushSpannerIntent(facts: NoteFacts, kind: NoteSpannerIntent['kind'], node: XmlNode): void {
  const type = attribute(node, 'type');
  if (type !== 'start' && type !== 'stop' && type !== 'continue') {
    return;
  }

  const intent: NoteSpannerIntent = {
    kind,
    type,
    localId: attribute(node, 'number') ?? '1',
    node
  };
  const placement = attribute(node, 'placement');
  const lineType = attribute(node, 'line-type');
  const label = textOf(node);
  if (placement) {
    intent.placement = placement;
  }
  if (lineType) {
    intent.lineType = lineType;
  }
  if (label && kind !== 'slur') {
    intent.label = label;
  }
  facts.spanners.push(intent);
}
