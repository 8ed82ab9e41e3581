import { decodeByteString, findNul, readUint32LE } from '../binary.js';
import { GfArchError, assertInBounds } from '../errors.js';
import {
  COMPRESSION_HEADER_SIZE,
  ENTRY_SIZE,
  GFAC_MAGIC,
  GFCP_MAGIC,
  HEADER_COMPRESSED_FLAG_OFFSET,
  HEADER_FILE_COUNT_OFFSET,
  HEADER_FILE_INFO_OFFSET,
  HEADER_FILE_INFO_SIZE_OFFSET,
  HEADER_GFCP_OFFSET,
  HEADER_PAYLOAD_SIZE_OFFSET,
  HEADER_SIZE,
  HEADER_VERSION_OFFSET,
  LAST_ENTRY_FLAG,
  NAME_OFFSET_MASK,
  schemeFromCode,
  versionFromCode
} from '../format.js';
import type { GfArchCompressionHeader, GfArchEntry, GfArchHeader } from '../types.js';

export function readHeader(data: Uint8Array): GfArchHeader {
  if (data.length < 4 || readUint32LE(data, 0) !== GFAC_MAGIC) {
    throw new GfArchError('GFARCH_BAD_HEADER', 'Missing GFAC magic at start of archive', { offset: 0 });
  }
  assertInBounds(data.length, 0, HEADER_SIZE, 'Archive header');
  const versionCode = readUint32LE(data, HEADER_VERSION_OFFSET);
  return {
    versionCode,
    version: versionFromCode(versionCode),
    compressedFlag: data[HEADER_COMPRESSED_FLAG_OFFSET]!,
    fileInfoOffset: readUint32LE(data, HEADER_FILE_INFO_OFFSET),
    fileInfoSize: readUint32LE(data, HEADER_FILE_INFO_SIZE_OFFSET),
    gfcpOffset: readUint32LE(data, HEADER_GFCP_OFFSET),
    payloadSize: readUint32LE(data, HEADER_PAYLOAD_SIZE_OFFSET),
    fileCount: readUint32LE(data, HEADER_FILE_COUNT_OFFSET)
  };
}

export function readEntries(data: Uint8Array, header: GfArchHeader): GfArchEntry[] {
  assertInBounds(data.length, HEADER_SIZE, header.fileCount * ENTRY_SIZE, 'Entry table');
  const entries: GfArchEntry[] = [];
  for (let index = 0; index < header.fileCount; index += 1) {
    const base = HEADER_SIZE + index * ENTRY_SIZE;
    const rawNameOffset = readUint32LE(data, base + 4);
    const nameOffset = rawNameOffset & NAME_OFFSET_MASK;
    entries.push({
      index,
      name: readName(data, nameOffset, index),
      checksum: readUint32LE(data, base),
      nameOffset,
      flags: rawNameOffset >>> 24,
      isLast: (rawNameOffset & LAST_ENTRY_FLAG) !== 0,
      decompressedSize: readUint32LE(data, base + 8),
      decompressedOffset: readUint32LE(data, base + 12)
    });
  }
  return entries;
}

export function readCompressionHeader(data: Uint8Array, gfcpOffset: number): GfArchCompressionHeader {
  assertInBounds(data.length, gfcpOffset, 4, 'Compression header');
  if (readUint32LE(data, gfcpOffset) !== GFCP_MAGIC) {
    throw new GfArchError('GFARCH_BAD_COMPRESSION_HEADER', `Missing GFCP magic at offset ${gfcpOffset}`, {
      offset: gfcpOffset
    });
  }
  assertInBounds(data.length, gfcpOffset, COMPRESSION_HEADER_SIZE, 'Compression header');
  const typeCode = readUint32LE(data, gfcpOffset + 8);
  const scheme = schemeFromCode(typeCode);
  if (!scheme) {
    throw new GfArchError('GFARCH_UNSUPPORTED_COMPRESSION', `Unsupported compression type ${typeCode}`, {
      offset: gfcpOffset + 8,
      compressionType: typeCode
    });
  }
  const compressedSize = readUint32LE(data, gfcpOffset + 16);
  assertInBounds(data.length, gfcpOffset + COMPRESSION_HEADER_SIZE, compressedSize, 'Compressed payload');
  return {
    formatVersion: readUint32LE(data, gfcpOffset + 4),
    typeCode,
    scheme,
    decompressedSize: readUint32LE(data, gfcpOffset + 12),
    compressedSize
  };
}

function readName(data: Uint8Array, offset: number, index: number): string {
  const end = offset < data.length ? findNul(data, offset) : -1;
  if (end < 0) {
    throw new GfArchError('GFARCH_TRUNCATED', `Name of entry ${index} is not terminated inside the archive`, {
      offset,
      context: { entryIndex: String(index) }
    });
  }
  return decodeByteString(data.subarray(offset, end));
}
