import type { Creator, Instrument, ScoreMetadata, StaffGroup } from '../core/score.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import {
  attribute,
  childText,
  childrenOf,
  firstChild,
  parseOptionalFloat,
  parseOptionalInt,
  parseYesNo,
  textOf
} from './xml-utils.js';

/** One `<score-part>` entry of the part list. */
export interface PartDefinition {
  id: string;
  name?: string;
  abbreviation?: string;
  instrument?: Instrument;
}

/** Part list plus the staff groups its `<part-group>` markers describe. */
export interface PartListResult {
  definitions: PartDefinition[];
  staffGroups: StaffGroup[];
}

/** Part-group still open while iterating `<part-list>` in document order. */
interface ActivePartGroup {
  number: string;
  group: StaffGroup;
}

/** Normalized `<credit-words>` payload used for the title fallback. */
interface CreditWordCandidate {
  text: string;
  justify?: string;
  fontSize?: number;
  defaultY?: number;
}

/** Parse `<part-list>` into part definitions and staff groups. */
export function parsePartList(partListNode: XmlNode | undefined, ctx: TranslationContext): PartListResult {
  const result: PartListResult = { definitions: [], staffGroups: [] };
  if (!partListNode) {
    addDiagnostic(ctx, 'MISSING_PART_LIST', 'warning', 'score-partwise does not include <part-list>.');
    return result;
  }

  const activeGroups: ActivePartGroup[] = [];

  for (const child of partListNode.children) {
    if (child.name === 'part-group') {
      const type = attribute(child, 'type');
      const number = attribute(child, 'number') ?? '1';

      if (type === 'start') {
        activeGroups.push({ number, group: readPartGroup(child) });
      } else if (type === 'stop') {
        const groupIndex = findLastGroupByNumber(activeGroups, number);
        const [closed] = groupIndex >= 0 ? activeGroups.splice(groupIndex, 1) : [];
        if (closed) {
          result.staffGroups.push(closed.group);
        } else {
          addDiagnostic(
            ctx,
            'PART_GROUP_STOP_WITHOUT_START',
            'warning',
            `Encountered <part-group type="stop"> for group '${number}' without matching start.`,
            child
          );
        }
      }
      continue;
    }

    if (child.name !== 'score-part') {
      continue;
    }

    const id = attribute(child, 'id');
    if (!id) {
      addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', '<score-part> is missing required id attribute.', child);
      continue;
    }

    for (const active of activeGroups) {
      active.group.partIds.push(id);
    }
    result.definitions.push(readScorePart(child, id));
  }

  // Groups never stopped still cover the parts they saw.
  for (const active of activeGroups) {
    result.staffGroups.push(active.group);
  }

  return result;
}

function readPartGroup(node: XmlNode): StaffGroup {
  const group: StaffGroup = { partIds: [] };
  const name = childText(node, 'group-name');
  const symbol = childText(node, 'group-symbol');
  const barline = childText(node, 'group-barline');
  if (name) {
    group.name = name;
  }
  if (symbol) {
    group.symbol = symbol.toLowerCase();
  }
  if (barline) {
    // "Mensurstrich" draws barlines between staves only; treat it as connected.
    group.barline = barline === 'Mensurstrich' || parseYesNo(barline) === true;
  }
  return group;
}

function readScorePart(node: XmlNode, id: string): PartDefinition {
  const definition: PartDefinition = { id };
  const name = childText(node, 'part-name');
  const abbreviation = childText(node, 'part-abbreviation');
  if (name) {
    definition.name = name;
  }
  if (abbreviation) {
    definition.abbreviation = abbreviation;
  }

  const instrument: Instrument = {};
  const instrumentName = childText(firstChild(node, 'score-instrument'), 'instrument-name');
  const midiInstrument = firstChild(node, 'midi-instrument');
  const channel = parseOptionalInt(childText(midiInstrument, 'midi-channel'));
  const program = parseOptionalInt(childText(midiInstrument, 'midi-program'));
  if (instrumentName) {
    instrument.name = instrumentName;
  }
  if (channel !== undefined) {
    instrument.midiChannel = channel;
  }
  if (program !== undefined) {
    instrument.midiProgram = program;
  }
  if (Object.keys(instrument).length > 0) {
    definition.instrument = instrument;
  }
  return definition;
}

/** Locate the latest active part-group by group number token. */
function findLastGroupByNumber(groups: ActivePartGroup[], number: string): number {
  for (let index = groups.length - 1; index >= 0; index -= 1) {
    if (groups[index]?.number === number) {
      return index;
    }
  }

  return -1;
}

/**
 * Parse work, movement, identification and rights.
 * Without a `<work-title>`, the most prominent centered credit stands in as the title.
 */
export function parseMetadata(root: XmlNode): ScoreMetadata {
  const work = firstChild(root, 'work');
  const identification = firstChild(root, 'identification');
  const metadata: ScoreMetadata = { creators: readCreators(identification) };

  const title = childText(work, 'work-title') ?? selectCreditTitle(collectCreditWords(root));
  const movementTitle = childText(root, 'movement-title');
  const movementNumber = childText(root, 'movement-number');
  const number = parseOptionalInt(childText(work, 'work-number'));
  const rights = childrenOf(identification, 'rights')
    .map((node) => textOf(node))
    .filter((text): text is string => text !== undefined)
    .join('\n');

  if (title) {
    metadata.title = title;
  }
  if (movementTitle) {
    metadata.movementTitle = movementTitle;
  }
  if (movementNumber) {
    metadata.movementNumber = movementNumber;
  }
  if (number !== undefined) {
    metadata.number = number;
  }
  if (rights) {
    metadata.rights = rights;
  }
  return metadata;
}

function readCreators(identification: XmlNode | undefined): Creator[] {
  const creators: Creator[] = [];
  for (const node of childrenOf(identification, 'creator')) {
    const name = normalizeCreditText(textOf(node));
    if (name) {
      creators.push({ role: attribute(node, 'type') ?? 'composer', name });
    }
  }
  return creators;
}

function collectCreditWords(root: XmlNode): CreditWordCandidate[] {
  const candidates: CreditWordCandidate[] = [];

  for (const creditNode of childrenOf(root, 'credit')) {
    for (const creditWordsNode of childrenOf(creditNode, 'credit-words')) {
      const text = normalizeCreditText(textOf(creditWordsNode));
      if (!text) {
        continue;
      }

      candidates.push({
        text,
        justify: attribute(creditWordsNode, 'justify'),
        fontSize: parseOptionalFloat(attribute(creditWordsNode, 'font-size')),
        defaultY: parseOptionalFloat(attribute(creditWordsNode, 'default-y'))
      });
    }
  }

  return candidates;
}

/** Prefer centered credits, then the largest font, then the highest on the page. */
function selectCreditTitle(candidates: CreditWordCandidate[]): string | undefined {
  const centered = candidates.filter((candidate) => candidate.justify === 'center');
  const pool = centered.length > 0 ? centered : candidates;
  const ranked = [...pool].sort(
    (left, right) =>
      (right.fontSize ?? 0) - (left.fontSize ?? 0) ||
      (right.defaultY ?? 0) - (left.defaultY ?? 0) ||
      right.text.length - left.text.length
  );
  return ranked[0]?.text;
}

/** Collapse whitespace inside each line; keep explicit line breaks. */
function normalizeCreditText(text: string | undefined): string | undefined {
  if (!text) {
    return undefined;
  }

  const lines = text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
  return lines.length > 0 ? lines.join('\n') : undefined;
}
