import type { Barline, Measure, RepeatBracket } from '../core/score.js';
import type { PartState } from './parse-attributes.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, firstChild, parseOptionalInt, textOf } from './xml-utils.js';

/**
 * Translate `<barline>`: style and repeat sign go onto the measure, an
 * `<ending>` opens, extends or closes the part's repeat bracket.
 */
export function translateBarline(
  node: XmlNode,
  measure: Measure,
  offset: number,
  state: PartState,
  ctx: TranslationContext
): void {
  const locationText = attribute(node, 'location');
  const location = locationText === 'left' || locationText === 'middle' ? locationText : 'right';

  const barline: Barline = {
    kind: 'barline',
    ref: ctx.refs.next(),
    offset: location === 'left' ? 0 : offset,
    location
  };

  const style = childText(node, 'bar-style');
  if (style) {
    barline.style = style;
  }

  const repeatNode = firstChild(node, 'repeat');
  const direction = attribute(repeatNode, 'direction');
  if (direction === 'forward' || direction === 'backward') {
    barline.repeat = { direction: direction === 'forward' ? 'start' : 'end' };
    const times = parseOptionalInt(attribute(repeatNode, 'times'));
    if (times !== undefined) {
      barline.repeat.times = times;
    }
  }

  const endingNode = firstChild(node, 'ending');
  if (endingNode) {
    translateEnding(endingNode, measure, state, ctx);
  }

  if (location === 'left') {
    measure.leftBarline = barline;
  } else if (location === 'right') {
    measure.rightBarline = barline;
  } else {
    measure.elements.push(barline);
  }
}

/** An ending with no open bracket opens one on this measure; otherwise the open one grows to reach it. */
function translateEnding(node: XmlNode, measure: Measure, state: PartState, ctx: TranslationContext): void {
  let bracket = ctx.spanners.openRepeatBracket;
  if (!bracket) {
    bracket = { kind: 'repeat-bracket', ref: ctx.refs.next(), complete: false, numbers: [1], elements: [measure] };
    ctx.spanners.openRepeatBracketWith(bracket);
  } else {
    extendBracket(bracket, measure, state.measures);
  }

  const type = attribute(node, 'type');
  if (type === 'start') {
    const numberText = attribute(node, 'number');
    const numbers = parseEndingNumbers(numberText);
    if (numbers) {
      bracket.numbers = numbers;
    } else {
      addDiagnostic(
        ctx,
        'INVALID_ENDING_NUMBER',
        'warning',
        `Ending number '${numberText ?? ''}' is not numeric; using ending 1.`,
        node
      );
      bracket.numbers = [1];
    }

    // Some editors write <ending number="1">2.</ending> for second endings.
    const display = textOf(node);
    if (display) {
      bracket.overrideDisplay = display;
      const match = /^(\d+)\.?$/.exec(display);
      if (match?.[1]) {
        bracket.numbers = [Number.parseInt(match[1], 10)];
      }
    }
  }

  if (type === 'stop' || type === 'discontinue') {
    ctx.spanners.closeRepeatBracket();
  }
}

/** Add `measure` and every measure between the bracket's last one and it. */
function extendBracket(bracket: RepeatBracket, measure: Measure, partMeasures: readonly Measure[]): void {
  if (bracket.elements.includes(measure)) {
    return;
  }

  const last = bracket.elements.at(-1);
  const from = last ? partMeasures.indexOf(last) + 1 : partMeasures.length - 1;
  const to = partMeasures.indexOf(measure);
  if (from <= 0 || to < from) {
    bracket.elements.push(measure);
    return;
  }

  bracket.elements.push(...partMeasures.slice(from, to + 1));
}

/**
 * Parse an ending's `number` attribute: "1", "1,2", "1, 2" or "1-3".
 * Missing or empty means ending 1; anything non-numeric returns `undefined`.
 */
export function parseEndingNumbers(value: string | undefined): number[] | undefined {
  if (value === undefined || value.trim().length === 0) {
    return [1];
  }

  const numbers: number[] = [];
  for (const token of value.split(/[,\s]+/).filter((part) => part.length > 0)) {
    const range = /^(\d+)-(\d+)$/.exec(token);
    if (range?.[1] && range[2]) {
      const start = Number.parseInt(range[1], 10);
      const end = Number.parseInt(range[2], 10);
      if (end < start) {
        return undefined;
      }
      for (let n = start; n <= end; n += 1) {
        numbers.push(n);
      }
      continue;
    }

    if (!/^\d+$/.test(token)) {
      return undefined;
    }
    numbers.push(Number.parseInt(token, 10));
  }

  return numbers.length > 0 ? numbers : undefined;
}
