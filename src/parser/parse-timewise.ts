import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childrenOf, firstChild } from './xml-utils.js';

/**
 * Rewrite a `score-timewise` tree (measures holding parts) as `score-partwise`
 * (parts holding measures). Part order follows `<part-list>`, then first appearance.
 * A part absent from a measure gets an empty measure so every part keeps the same bar count.
 */
export function normalizeTimewiseToPartwise(root: XmlNode, ctx: TranslationContext): XmlNode {
  const partListNode = firstChild(root, 'part-list');
  const measureNodes = childrenOf(root, 'measure');
  const slices = new Map<string, (XmlNode | undefined)[]>();

  const ensurePart = (id: string): (XmlNode | undefined)[] => {
    let slice = slices.get(id);
    if (!slice) {
      slice = new Array<XmlNode | undefined>(measureNodes.length).fill(undefined);
      slices.set(id, slice);
    }
    return slice;
  };

  for (const scorePart of childrenOf(partListNode, 'score-part')) {
    const id = attribute(scorePart, 'id');
    if (id) {
      ensurePart(id);
    }
  }

  measureNodes.forEach((measureNode, measureIndex) => {
    for (const partNode of childrenOf(measureNode, 'part')) {
      const id = attribute(partNode, 'id');
      if (!id) {
        addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', 'Timewise <part> is missing its id attribute.', partNode);
        continue;
      }
      ensurePart(id)[measureIndex] = partNode;
    }
  });

  const partNodes: XmlNode[] = [];
  for (const [id, slice] of slices) {
    const partPath = `/score-partwise[1]/part[${partNodes.length + 1}]`;
    const measures = measureNodes.map((measureNode, measureIndex) => {
      const payload = slice[measureIndex];
      if (!payload) {
        addDiagnostic(
          ctx,
          'TIMEWISE_PART_MISSING',
          'info',
          `Part '${id}' has no content in timewise measure ${attribute(measureNode, 'number') ?? measureIndex + 1}.`,
          measureNode
        );
      }
      return {
        name: 'measure',
        attributes: { ...measureNode.attributes },
        children: payload?.children ?? [],
        text: '',
        location: payload?.location ?? measureNode.location,
        path: `${partPath}/measure[${measureIndex + 1}]`
      };
    });

    partNodes.push({
      name: 'part',
      attributes: { id },
      children: measures,
      text: '',
      location: measures[0]?.location ?? root.location,
      path: partPath
    });
  }

  addDiagnostic(
    ctx,
    'SCORE_TIMEWISE_NORMALIZED',
    'info',
    `Normalized score-timewise to score-partwise for ${partNodes.length} part(s).`,
    root
  );

  return {
    ...root,
    name: 'score-partwise',
    text: '',
    path: '/score-partwise[1]',
    children: [...root.children.filter((child) => child.name !== 'measure'), ...partNodes]
  };
}
