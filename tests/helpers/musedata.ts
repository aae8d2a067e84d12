export interface MuseDataNoteFields {
  pitch: string;
  ticks: number;
  tie?: boolean;
  /** Column 17 type code such as `q` or `h`. */
  type: string;
  dots?: string;
  accidental?: string;
  beams?: string;
  lyric?: string;
  /** Write a chord tone, which carries a leading space. */
  chordTone?: boolean;
}

/** One fixed-column stage-2 note or rest record. */
export function museDataRecord(fields: MuseDataNoteFields): string {
  const pitch = fields.chordTone ? ` ${fields.pitch.padEnd(4)}` : fields.pitch.padEnd(5);
  const head = `${pitch}${String(fields.ticks).padStart(3)}${fields.tie ? '-' : ' '}`;
  const codes = `${' '.repeat(7)}${fields.type}${fields.dots ?? ' '}${fields.accidental ?? ' '}`;
  const line = `${head}${codes}${' '.repeat(6)}${(fields.beams ?? '').padEnd(6)}`;
  return fields.lyric ? `${line.padEnd(43)}${fields.lyric}` : line;
}

/** Header lines of a part file; the work and movement ids sit on the fifth line. */
export function museDataHeader(options: { workTitle: string; movementTitle: string; partName: string }): string[] {
  return [
    '(C) 2024 Test Press',
    '01/01/24 test encoding',
    'TEST',
    '',
    'WK#:7 MV#:2',
    'Test Edition',
    options.workTitle,
    options.movementTitle,
    options.partName,
    '1 0',
    'Group memberships: score',
    'score: part 1 of 1'
  ];
}
