import { deflateRawSync } from 'node:zlib';

export interface ZipFixtureEntry {
  name: string;
  data: string | Uint8Array;
  /** Store (0) or deflate (8). */
  compressionMethod?: 0 | 8;
}

/** Build a minimal ZIP archive in memory for test fixtures. */
export function createZip(entries: ZipFixtureEntry[]): Uint8Array {
  const encoder = new TextEncoder();
  const localBytes: number[] = [];
  const centralBytes: number[] = [];

  for (const entry of entries) {
    const nameBytes = encoder.encode(entry.name);
    const rawBytes = typeof entry.data === 'string' ? encoder.encode(entry.data) : entry.data;
    const compressionMethod = entry.compressionMethod ?? 0;
    const payload = compressionMethod === 8 ? new Uint8Array(deflateRawSync(rawBytes)) : rawBytes;
    const localOffset = localBytes.length;

    pushU32(localBytes, 0x04034b50);
    pushU16(localBytes, 20); // version needed
    pushU16(localBytes, 0); // flags
    pushU16(localBytes, compressionMethod);
    pushU16(localBytes, 0); // mod time
    pushU16(localBytes, 0); // mod date
    pushU32(localBytes, 0); // crc32 (unused by the reader)
    pushU32(localBytes, payload.length);
    pushU32(localBytes, rawBytes.length);
    pushU16(localBytes, nameBytes.length);
    pushU16(localBytes, 0); // extra length
    localBytes.push(...nameBytes, ...payload);

    pushU32(centralBytes, 0x02014b50);
    pushU16(centralBytes, 20); // version made by
    pushU16(centralBytes, 20); // version needed
    pushU16(centralBytes, 0); // flags
    pushU16(centralBytes, compressionMethod);
    pushU16(centralBytes, 0); // mod time
    pushU16(centralBytes, 0); // mod date
    pushU32(centralBytes, 0); // crc32
    pushU32(centralBytes, payload.length);
    pushU32(centralBytes, rawBytes.length);
    pushU16(centralBytes, nameBytes.length);
    pushU16(centralBytes, 0); // extra length
    pushU16(centralBytes, 0); // comment length
    pushU16(centralBytes, 0); // disk number start
    pushU16(centralBytes, 0); // internal attributes
    pushU32(centralBytes, 0); // external attributes
    pushU32(centralBytes, localOffset);
    centralBytes.push(...nameBytes);
  }

  const eocd: number[] = [];
  pushU32(eocd, 0x06054b50);
  pushU16(eocd, 0); // disk number
  pushU16(eocd, 0); // central directory start disk
  pushU16(eocd, entries.length);
  pushU16(eocd, entries.length);
  pushU32(eocd, centralBytes.length);
  pushU32(eocd, localBytes.length);
  pushU16(eocd, 0); // comment length

  return new Uint8Array([...localBytes, ...centralBytes, ...eocd]);
}

function pushU16(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff);
}

function pushU32(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}
