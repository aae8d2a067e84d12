/** Wrap measure markup in a one-part `score-partwise` document. */
export function partwise(measures: string, options: { partName?: string; title?: string } = {}): string {
  const title = options.title ? `<work><work-title>${options.title}</work-title></work>` : '';
  return `<?xml version="1.0" encoding="UTF-8"?>
<score-partwise version="4.0">
  ${title}
  <part-list>
    <score-part id="P1"><part-name>${options.partName ?? 'Music'}</part-name></score-part>
  </part-list>
  <part id="P1">
${measures}
  </part>
</score-partwise>`;
}

/** A `<note>` with pitch, duration in divisions and optional extra children. */
export function note(pitch: string, duration: number, extra = ''): string {
  const match = /^([A-G])(-?\d)?(\d)$/.exec(pitch);
  const step = match?.[1] ?? 'C';
  const alter = match?.[2] !== undefined ? `<alter>${match[2]}</alter>` : '';
  const octave = match?.[3] ?? '4';
  return `<note><pitch><step>${step}</step>${alter}<octave>${octave}</octave></pitch><duration>${duration}</duration>${extra}</note>`;
}

export const QUARTER_ATTRIBUTES = `<attributes>
  <divisions>1</divisions>
  <key><fifths>0</fifths></key>
  <time><beats>4</beats><beat-type>4</beat-type></time>
  <clef><sign>G</sign><line>2</line></clef>
</attributes>`;
