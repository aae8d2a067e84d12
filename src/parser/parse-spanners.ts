import type {
  GeneralNote,
  Measure,
  NoteSpanner,
  Part,
  RepeatBracket,
  Score,
  Spanner,
  Voice
} from '../core/score.js';
import { isGeneralNote } from '../core/score.js';

/** Spanner kinds whose endpoints are notes. */
export type NoteSpannerKind = NoteSpanner['kind'];

/**
 * Open-spanner bundle for one translation.
 * Note spanners are keyed by `kind|localId` so a stop finds its start in one lookup;
 * direction spanners (wedges, brackets, dashes, ottavas, pedals) also wait in a
 * pending slot until the next note becomes their first endpoint.
 */
export class SpannerBundle {
  private readonly open = new Map<string, NoteSpanner>();
  private readonly pending: NoteSpanner[] = [];
  private readonly completed: Spanner[] = [];
  private openBracket: RepeatBracket | undefined;

  /** Register a started spanner; returns any spanner it displaced under the same key. */
  start(spanner: NoteSpanner, localId: string): NoteSpanner | undefined {
    const key = spannerKey(spanner.kind, localId);
    const displaced = this.open.get(key);
    this.open.set(key, spanner);
    return displaced;
  }

  /** Find the open spanner for `kind|localId`. */
  find(kind: NoteSpannerKind, localId: string): NoteSpanner | undefined {
    return this.open.get(spannerKey(kind, localId));
  }

  /** Close the open spanner for `kind|localId`; `undefined` when nothing matches. */
  complete(kind: NoteSpannerKind, localId: string): NoteSpanner | undefined {
    const key = spannerKey(kind, localId);
    const spanner = this.open.get(key);
    if (!spanner) {
      return undefined;
    }

    this.open.delete(key);
    spanner.complete = true;
    this.completed.push(spanner);
    return spanner;
  }

  /** Queue a spanner whose first endpoint is the next note translated. */
  awaitFirstEndpoint(spanner: NoteSpanner): void {
    this.pending.push(spanner);
  }

  /** Hand `note` to every spanner still waiting for its first endpoint. */
  assignPending(note: GeneralNote): void {
    for (const spanner of this.pending.splice(0)) {
      if (!spanner.complete) {
        addEndpoint(spanner, note);
      }
    }
  }

  /** The repeat bracket still collecting measures, if any. */
  get openRepeatBracket(): RepeatBracket | undefined {
    return this.openBracket;
  }

  openRepeatBracketWith(bracket: RepeatBracket): void {
    this.openBracket = bracket;
  }

  closeRepeatBracket(): void {
    if (this.openBracket) {
      this.openBracket.complete = true;
      this.completed.push(this.openBracket);
      this.openBracket = undefined;
    }
  }

  /** Spanners still waiting for a closing endpoint. */
  unclosed(): NoteSpanner[] {
    return [...this.open.values()];
  }

  /** Drop every open note spanner and pending assignment; returns what was dropped. */
  abandonOpen(): NoteSpanner[] {
    const abandoned = this.unclosed();
    this.open.clear();
    this.pending.length = 0;
    return abandoned;
  }

  completedSpanners(): readonly Spanner[] {
    return this.completed;
  }
}

function spannerKey(kind: NoteSpannerKind, localId: string): string {
  return `${kind}|${localId}`;
}

/** Append `note` unless the spanner already holds it. */
export function addEndpoint(spanner: NoteSpanner, note: GeneralNote): void {
  if (!spanner.elements.includes(note)) {
    spanner.elements.push(note);
  }
}

/** Containers an element sits in after partitioning. */
interface ElementLocation {
  part: Part;
  measure?: Measure;
  voice?: Voice;
}

/**
 * Attach each complete spanner to the innermost container holding all of its
 * endpoints: voice, then measure, then part, then the score itself.
 */
export function attachSpanners(score: Score, spanners: readonly Spanner[]): void {
  const locations = indexLocations(score.parts);

  for (const spanner of spanners) {
    if (!spanner.complete || spanner.elements.length === 0) {
      continue;
    }

    const found: ElementLocation[] = [];
    for (const element of spanner.elements) {
      const location = locations.get(element);
      if (location) {
        found.push(location);
      }
    }

    const first = found[0];
    if (!first || found.length !== spanner.elements.length) {
      score.spanners.push(spanner);
      continue;
    }

    if (first.voice && found.every((location) => location.voice === first.voice)) {
      first.voice.spanners.push(spanner);
    } else if (first.measure && found.every((location) => location.measure === first.measure)) {
      first.measure.spanners.push(spanner);
    } else if (found.every((location) => location.part === first.part)) {
      first.part.spanners.push(spanner);
    } else {
      score.spanners.push(spanner);
    }
  }
}

/** Map every measure and general note to its containers; the first sighting wins for shared elements. */
function indexLocations(parts: Part[]): Map<Measure | GeneralNote, ElementLocation> {
  const locations = new Map<Measure | GeneralNote, ElementLocation>();

  for (const part of parts) {
    for (const measure of part.measures) {
      if (!locations.has(measure)) {
        locations.set(measure, { part });
      }

      for (const element of measure.elements) {
        if (isGeneralNote(element) && !locations.has(element)) {
          locations.set(element, { part, measure });
        }
      }

      for (const voice of measure.voices) {
        for (const element of voice.elements) {
          if (isGeneralNote(element) && !locations.has(element)) {
            locations.set(element, { part, measure, voice });
          }
        }
      }
    }
  }

  return locations;
}
