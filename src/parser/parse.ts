import type { Diagnostic, ParserMode } from '../core/diagnostics.js';
import { InterchangeError } from '../core/errors.js';
import type { Measure, Part, RepeatBracket, Score, StaffGroup } from '../core/score.js';
import { addDiagnostic, createTranslationContext, type TranslationContext } from './parse-context.js';
import { parseMetadata, parsePartList } from './parse-header.js';
import { translatePart } from './parse-part.js';
import { attachSpanners } from './parse-spanners.js';
import { normalizeTimewiseToPartwise } from './parse-timewise.js';
import { partitionStaves } from './staff-partition.js';
import { parseXmlDocument, type XmlNode } from './xml-ast.js';
import { childrenOf, firstChild } from './xml-utils.js';

/** Source naming and strictness for one translation. */
export interface TranslateOptions {
  sourceName?: string;
  mode?: ParserMode;
}

/** Translated score with every diagnostic raised on the way. */
export interface TranslationResult {
  score: Score;
  diagnostics: Diagnostic[];
  /** True when any diagnostic is an error (always the case for warnings under strict mode). */
  validationFailure: boolean;
}

/**
 * Translate MusicXML text into a linked score graph.
 * Throws `XmlParseError` for malformed XML and `MeasureTranslationError` when a measure cannot be translated.
 */
export function translateMusicXml(xmlText: string, options: TranslateOptions = {}): TranslationResult {
  const document = parseXmlDocument(xmlText, options.sourceName);
  return translateDocument(document.root, options);
}

/** Translate an already parsed `score-partwise` or `score-timewise` element tree. */
export function translateDocument(root: XmlNode, options: TranslateOptions = {}): TranslationResult {
  const ctx = createTranslationContext(options.mode ?? 'lenient', options.sourceName);
  const partwise = normalizeRoot(root, ctx);

  const partList = parsePartList(firstChild(partwise, 'part-list'), ctx);
  const definitions = new Map(partList.definitions.map((definition) => [definition.id, definition]));
  const score: Score = {
    kind: 'score',
    ref: ctx.refs.next(),
    metadata: parseMetadata(partwise),
    parts: [],
    staffGroups: [...partList.staffGroups],
    spanners: []
  };

  const partNodes = childrenOf(partwise, 'part');
  if (partNodes.length === 0) {
    addDiagnostic(ctx, 'MISSING_PARTS', 'warning', 'score-partwise contains no <part> elements.', partwise);
  }

  partNodes.forEach((partNode, index) => {
    const id = partNode.attributes.id;
    const { part, state } = translatePart(partNode, id === undefined ? undefined : definitions.get(id), index, ctx);
    score.parts.push(...splitStaves(part, state.maxStaves, score, ctx));
  });

  for (const abandoned of ctx.spanners.abandonOpen()) {
    addDiagnostic(ctx, 'UNCLOSED_SPANNER', 'info', `A ${abandoned.kind} spanner was never closed and is dropped.`);
  }
  attachSpanners(score, ctx.spanners.completedSpanners());

  return { score, diagnostics: ctx.diagnostics, validationFailure: ctx.validationFailure };
}

function normalizeRoot(root: XmlNode, ctx: TranslationContext): XmlNode {
  const normalized = root.name === 'score-timewise' ? normalizeTimewiseToPartwise(root, ctx) : root;
  if (normalized.name !== 'score-partwise') {
    throw new InterchangeError(
      'UNSUPPORTED_ROOT',
      `Unsupported root element '${root.name}'. Expected 'score-partwise' or 'score-timewise'.`
    );
  }
  return normalized;
}

/**
 * A multi-staff part becomes one part per staff, braced together. Repeat brackets
 * that pointed at the undivided part's measures move to the first staff's measures.
 */
function splitStaves(part: Part, staffCount: number, score: Score, ctx: TranslationContext): Part[] {
  if (staffCount <= 1) {
    return [part];
  }

  const partition = partitionStaves(part, staffCount, ctx.refs);
  const brace: StaffGroup = {
    symbol: 'brace',
    barline: true,
    partIds: partition.parts.map((staffPart) => staffPart.id)
  };
  if (part.name) {
    brace.name = part.name;
  }
  score.staffGroups.push(brace);

  for (const spanner of ctx.spanners.completedSpanners()) {
    if (spanner.kind === 'repeat-bracket') {
      remapBracket(spanner, partition.firstStaffMeasures);
    }
  }

  return partition.parts;
}

function remapBracket(bracket: RepeatBracket, measures: Map<Measure, Measure>): void {
  bracket.elements = bracket.elements.map((measure) => measures.get(measure) ?? measure);
}
