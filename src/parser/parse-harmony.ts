import { readFileSync } from 'node:fs';

import { InterchangeError } from '../core/errors.js';
import type { ChordDegree, Harmony, HarmonyPitch, NoChord, PitchStep } from '../core/score.js';
import { isRecord } from '../core/settings.js';
import { addDiagnostic, type TranslationContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childText, childrenOf, firstChild, parseOptionalFloat, parseOptionalInt } from './xml-utils.js';

/** Degrees and common abbreviations for one chord quality. */
export interface ChordKindDefinition {
  degrees: string[];
  abbreviations: string[];
}

const { kinds: CHORD_KINDS, aliases: CHORD_KIND_ALIASES } = loadChordKinds(
  new URL('./data/chord-kinds.json', import.meta.url)
);

/** Read and validate the chord-kind table shipped beside this module. */
export function loadChordKinds(location: URL): {
  kinds: Map<string, ChordKindDefinition>;
  aliases: Map<string, string>;
} {
  const table: unknown = JSON.parse(readFileSync(location, 'utf8'));
  if (!isRecord(table) || !isRecord(table.kinds) || !isRecord(table.aliases)) {
    throw new InterchangeError('DATA_INVALID', `Chord kind table ${location.pathname} is malformed.`);
  }

  const kinds = new Map<string, ChordKindDefinition>();
  for (const [name, entry] of Object.entries(table.kinds)) {
    if (!isRecord(entry) || !isStringList(entry.degrees) || !isStringList(entry.abbreviations)) {
      throw new InterchangeError('DATA_INVALID', `Chord kind '${name}' is malformed.`);
    }
    kinds.set(name, { degrees: entry.degrees, abbreviations: entry.abbreviations });
  }

  const aliases = new Map<string, string>();
  for (const [alias, target] of Object.entries(table.aliases)) {
    if (typeof target === 'string') {
      aliases.set(alias, target);
    }
  }
  return { kinds, aliases };
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item: unknown) => typeof item === 'string');
}

const STEPS: readonly PitchStep[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];

/**
 * Resolve a `<kind>` value to its canonical chord quality.
 * Historical spellings (`dominant`, `major-minor`, `half-diminished`) map to the full names.
 */
export function resolveChordKind(kind: string): { kind: string; definition?: ChordKindDefinition } {
  const canonical = CHORD_KIND_ALIASES.get(kind) ?? kind;
  return { kind: canonical, definition: CHORD_KINDS.get(canonical) };
}

/** Translate `<harmony>` into a chord symbol, or a no-chord marker for `kind="none"`. */
export function translateHarmony(node: XmlNode, offset: number, ctx: TranslationContext): Harmony | NoChord {
  const kindNode = firstChild(node, 'kind');
  const kindText = attribute(kindNode, 'text');
  const rawKind = childText(node, 'kind') ?? 'none';
  const staff = parseOptionalInt(childText(node, 'staff'));

  if (rawKind === 'none' || rawKind === 'N.C.') {
    const noChord: NoChord = { kind: 'no-chord', ref: ctx.refs.next(), offset };
    if (kindText) {
      noChord.text = kindText;
    }
    if (staff !== undefined) {
      noChord.staff = staff;
    }
    return noChord;
  }

  const resolved = resolveChordKind(rawKind);
  if (!resolved.definition && rawKind !== 'other') {
    addDiagnostic(ctx, 'UNKNOWN_HARMONY_KIND', 'warning', `Unknown harmony kind '${rawKind}'.`, kindNode);
  }

  const harmony: Harmony = {
    kind: 'harmony',
    ref: ctx.refs.next(),
    offset,
    chordKind: resolved.kind,
    degrees: childrenOf(node, 'degree').flatMap((degreeNode) => readDegree(degreeNode) ?? []),
    chordDegrees: resolved.definition ? [...resolved.definition.degrees] : []
  };

  const root = readHarmonyPitch(firstChild(node, 'root'), 'root');
  const bass = readHarmonyPitch(firstChild(node, 'bass'), 'bass');
  const inversion = parseOptionalInt(childText(node, 'inversion'));
  const abbreviation = resolved.definition?.abbreviations[0];

  if (root) {
    harmony.root = root;
  }
  if (bass) {
    harmony.bass = bass;
  }
  if (inversion !== undefined) {
    harmony.inversion = inversion;
  }
  if (kindText !== undefined) {
    harmony.kindText = kindText;
  }
  if (abbreviation !== undefined) {
    harmony.abbreviation = abbreviation;
  }
  if (staff !== undefined) {
    harmony.staff = staff;
  }
  return harmony;
}

function readHarmonyPitch(node: XmlNode | undefined, prefix: 'root' | 'bass'): HarmonyPitch | undefined {
  const stepText = childText(node, `${prefix}-step`)?.toUpperCase();
  const step = STEPS.find((candidate) => candidate === stepText);
  if (!step) {
    return undefined;
  }
  return { step, alter: parseOptionalFloat(childText(node, `${prefix}-alter`)) ?? 0 };
}

function readDegree(node: XmlNode): ChordDegree | undefined {
  const value = parseOptionalInt(childText(node, 'degree-value'));
  const type = childText(node, 'degree-type');
  if (value === undefined || (type !== 'add' && type !== 'alter' && type !== 'subtract')) {
    return undefined;
  }
  return { value, alter: parseOptionalFloat(childText(node, 'degree-alter')) ?? 0, type };
}
