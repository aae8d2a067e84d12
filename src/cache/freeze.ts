import { gunzipSync, gzipSync } from 'node:zlib';

import { InterchangeError } from '../core/errors.js';
import type { ScoreStream } from '../core/score.js';
import { isRecord } from '../core/settings.js';
import { ENGINE_VERSION, runtimeId } from '../core/version.js';

export const FROZEN_FORMAT = 'frozen-score';

/** Envelope fields written ahead of the document. */
export interface FrozenHeader {
  format: typeof FROZEN_FORMAT;
  engineVersion: string;
  runtime: string;
  number?: number;
}

export interface FrozenArtifact extends FrozenHeader {
  document: ScoreStream;
}

/**
 * Serialize a score graph to gzip-compressed JSON. Every graph node is written
 * in full the first time it is met and as `{"$ref": n}` afterwards, so shared
 * elements and spanner endpoints come back as the same objects.
 */
export function freeze(document: ScoreStream, options: { number?: number } = {}): Uint8Array {
  const header: FrozenHeader = { format: FROZEN_FORMAT, engineVersion: ENGINE_VERSION, runtime: runtimeId() };
  if (options.number !== undefined) {
    header.number = options.number;
  }

  const written = new Set<number>();
  const json = JSON.stringify({ ...header, document }, (_key, value: unknown) => {
    if (isRecord(value) && typeof value.ref === 'number') {
      if (written.has(value.ref)) {
        return { $ref: value.ref };
      }
      written.add(value.ref);
    }
    return value;
  });

  return new Uint8Array(gzipSync(json));
}

/** Decode a frozen artifact; any malformed input throws `InterchangeError` with code `FROZEN_INVALID`. */
export function thaw(bytes: Uint8Array): FrozenArtifact {
  const envelope = readEnvelope(bytes);

  const definitions = new Map<number, Record<string, unknown>>();
  collectDefinitions(envelope.document, definitions);
  const document = resolveReferences(envelope.document, definitions, new Set());

  if (!isScoreStream(document)) {
    throw new InterchangeError('FROZEN_INVALID', 'Frozen artifact does not contain a score or a score collection.');
  }

  const artifact: FrozenArtifact = {
    format: FROZEN_FORMAT,
    engineVersion: envelope.engineVersion,
    runtime: envelope.runtime,
    document
  };
  if (envelope.number !== undefined) {
    artifact.number = envelope.number;
  }
  return artifact;
}

/** Header of `bytes` when they are a frozen artifact, otherwise `undefined`. */
export function readFrozenHeader(bytes: Uint8Array): FrozenHeader | undefined {
  if (!hasGzipMagic(bytes)) {
    return undefined;
  }
  try {
    const envelope = readEnvelope(bytes);
    const header: FrozenHeader = { format: FROZEN_FORMAT, engineVersion: envelope.engineVersion, runtime: envelope.runtime };
    if (envelope.number !== undefined) {
      header.number = envelope.number;
    }
    return header;
  } catch (error) {
    if (error instanceof InterchangeError) {
      return undefined;
    }
    throw error;
  }
}

export function hasGzipMagic(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

interface RawEnvelope extends Omit<FrozenHeader, 'format'> {
  document: unknown;
}

function readEnvelope(bytes: Uint8Array): RawEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(gunzipSync(bytes).toString('utf8'));
  } catch (error) {
    throw new InterchangeError('FROZEN_INVALID', 'Frozen artifact is not gzip-compressed JSON.', { cause: error });
  }

  if (
    !isRecord(parsed) ||
    parsed.format !== FROZEN_FORMAT ||
    typeof parsed.engineVersion !== 'string' ||
    typeof parsed.runtime !== 'string'
  ) {
    throw new InterchangeError('FROZEN_INVALID', `Frozen artifact header is missing or not '${FROZEN_FORMAT}'.`);
  }

  const envelope: RawEnvelope = {
    engineVersion: parsed.engineVersion,
    runtime: parsed.runtime,
    document: parsed.document
  };
  if (typeof parsed.number === 'number') {
    envelope.number = parsed.number;
  }
  return envelope;
}

function isReference(value: unknown): value is { $ref: number } {
  return isRecord(value) && typeof value.$ref === 'number';
}

/** First pass: index every fully written node by its ref. */
function collectDefinitions(value: unknown, definitions: Map<number, Record<string, unknown>>): void {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    items.forEach((item) => collectDefinitions(item, definitions));
    return;
  }
  if (!isRecord(value) || isReference(value)) {
    return;
  }
  if (typeof value.ref === 'number') {
    definitions.set(value.ref, value);
  }
  Object.values(value).forEach((child) => collectDefinitions(child, definitions));
}

/** Second pass: swap each `{"$ref": n}` for its definition, in place. The graph may be cyclic afterwards. */
function resolveReferences(
  value: unknown,
  definitions: Map<number, Record<string, unknown>>,
  visited: Set<object>
): unknown {
  if (isReference(value)) {
    const target = definitions.get(value.$ref);
    if (!target) {
      throw new InterchangeError('FROZEN_INVALID', `Frozen artifact references undefined node ${value.$ref}.`);
    }
    return target;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (!visited.has(items)) {
      visited.add(items);
      items.forEach((item, index) => {
        items[index] = resolveReferences(item, definitions, visited);
      });
    }
    return items;
  }

  if (isRecord(value) && !visited.has(value)) {
    visited.add(value);
    for (const [key, child] of Object.entries(value)) {
      value[key] = resolveReferences(child, definitions, visited);
    }
  }
  return value;
}

/**
 * Shape check for a thawed document: a score with parts, or a collection of them.
 * Every part, measure and voice is checked down to its element arrays.
 */
export function isScoreStream(value: unknown): value is ScoreStream {
  if (!isRecord(value)) {
    return false;
  }
  if (value.kind === 'collection') {
    const scores = value.scores;
    return Array.isArray(scores) && scores.every(isScore);
  }
  return isScore(value);
}

function isScore(value: unknown): boolean {
  return (
    isNode(value, 'score') &&
    isRecord(value.metadata) &&
    Array.isArray(value.staffGroups) &&
    Array.isArray(value.spanners) &&
    everyItem(value.parts, isPart)
  );
}

function isPart(value: unknown): boolean {
  return (
    isNode(value, 'part') &&
    typeof value.id === 'string' &&
    Array.isArray(value.spanners) &&
    everyItem(value.measures, isMeasure)
  );
}

function isMeasure(value: unknown): boolean {
  return (
    isNode(value, 'measure') &&
    isRecord(value.attributes) &&
    Array.isArray(value.elements) &&
    Array.isArray(value.spanners) &&
    everyItem(value.voices, isVoice)
  );
}

function isVoice(value: unknown): boolean {
  return isNode(value, 'voice') && Array.isArray(value.elements) && Array.isArray(value.spanners);
}

function isNode(value: unknown, kind: string): value is Record<string, unknown> {
  return isRecord(value) && value.kind === kind && typeof value.ref === 'number';
}

function everyItem(value: unknown, check: (item: unknown) => boolean): boolean {
  return Array.isArray(value) && value.every((item: unknown) => check(item));
}
