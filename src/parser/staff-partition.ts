import type { Measure, MeasureElement, Part, RefAllocator, Voice } from '../core/score.js';
import { flattenSingleVoice } from './parse-measure.js';

/** Staff parts built from one multi-staff part, plus where each source measure went on staff 1. */
export interface StaffPartition {
  parts: Part[];
  /** Source measure to its staff-1 counterpart; repeat brackets are re-pointed through this. */
  firstStaffMeasures: Map<Measure, Measure>;
}

/**
 * Split a part with `staffCount` staves into one part per staff in a single
 * filtering pass. Containers are new; contents are not copied, so an element
 * without a staff tag is shared by identity between every staff.
 */
export function partitionStaves(part: Part, staffCount: number, refs: RefAllocator): StaffPartition {
  const firstStaffMeasures = new Map<Measure, Measure>();
  const parts: Part[] = [];

  for (let staff = 1; staff <= staffCount; staff += 1) {
    const measures = part.measures.map((measure) => {
      const copy = measureForStaff(measure, staff, refs);
      if (staff === 1) {
        firstStaffMeasures.set(measure, copy);
      }
      return copy;
    });

    parts.push({
      ...part,
      ref: refs.next(),
      id: `${part.id}-Staff${staff}`,
      staffNumber: staff,
      measures,
      spanners: []
    });
  }

  return { parts, firstStaffMeasures };
}

function belongsToStaff(element: MeasureElement, staff: number): boolean {
  return element.staff === undefined || element.staff === staff;
}

function measureForStaff(measure: Measure, staff: number, refs: RefAllocator): Measure {
  const voices: Voice[] = [];
  for (const voice of measure.voices) {
    const elements = voice.elements.filter((element) => belongsToStaff(element, staff));
    if (elements.length > 0) {
      voices.push({ ...voice, ref: refs.next(), elements, spanners: [] });
    }
  }

  const copy: Measure = {
    ...measure,
    ref: refs.next(),
    attributes: {
      ...measure.attributes,
      clefs: measure.attributes.clefs.filter((clef) => belongsToStaff(clef, staff))
    },
    elements: measure.elements.filter((element) => belongsToStaff(element, staff)),
    voices,
    spanners: []
  };
  flattenSingleVoice(copy);
  return copy;
}
