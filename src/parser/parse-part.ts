import { MeasureTranslationError } from '../core/errors.js';
import type { Part } from '../core/score.js';
import { createPartState, type PartState } from './parse-attributes.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { PartDefinition } from './parse-header.js';
import { createMeasure, MeasureTranslator } from './parse-measure.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childrenOf } from './xml-utils.js';

/** A translated part plus the running state it finished with. */
export interface TranslatedPart {
  part: Part;
  state: PartState;
}

/**
 * Translate one `<part>` and its measures in document order.
 * Any failure inside a measure is rethrown as a `MeasureTranslationError`
 * naming the part id and measure number.
 */
export function translatePart(
  partNode: XmlNode,
  definition: PartDefinition | undefined,
  partIndex: number,
  ctx: TranslationContext
): TranslatedPart {
  const partId = attribute(partNode, 'id') ?? `P${partIndex + 1}`;
  ctx.location = { partId };

  if (!attribute(partNode, 'id')) {
    addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', '<part> is missing required id attribute.', partNode);
  } else if (!definition) {
    addDiagnostic(ctx, 'PART_NOT_IN_PART_LIST', 'warning', `Part '${partId}' does not appear in <part-list>.`, partNode);
  }

  const state = createPartState(partId);

  childrenOf(partNode, 'measure').forEach((measureNode, measureIndex) => {
    const measureNumber = attribute(measureNode, 'number') ?? String(measureIndex + 1);
    ctx.location = { partId, measureNumber };

    try {
      const measure = createMeasure(measureNode, state, ctx);
      state.measures.push(measure);
      new MeasureTranslator(measure, state, ctx).translate(measureNode);
    } catch (error) {
      throw new MeasureTranslationError(partId, measureNumber, error);
    }
  });

  // An ending still open when the part runs out stops at its last measure.
  ctx.spanners.closeRepeatBracket();
  ctx.location = {};

  const part: Part = {
    kind: 'part',
    ref: ctx.refs.next(),
    id: partId,
    measures: state.measures,
    spanners: []
  };
  if (definition?.name) {
    part.name = definition.name;
  }
  if (definition?.abbreviation) {
    part.abbreviation = definition.abbreviation;
  }
  if (definition?.instrument) {
    part.instrument = definition.instrument;
  }
  if (state.transposition) {
    part.transposition = state.transposition;
  }

  return { part, state };
}
