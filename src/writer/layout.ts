import { alignUp, isUint32 } from '../binary.js';
import { GfArchError } from '../errors.js';
import { DATA_ALIGNMENT, ENTRY_SIZE, FILE_INFO_OFFSET, HEADER_SIZE, NAME_OFFSET_MASK } from '../format.js';
import type { GfArchLayout } from '../types.js';

/** Offsets of every section of an archive about to be written. */
export interface GfArchLayoutPlan {
  /** Count, entry table and filenames with terminators; stored unrounded. */
  fileInfoSize: number;
  nameOffsets: number[];
  gfcpOffset: number;
  /** Absolute data offsets, as stored in the entry records. */
  dataOffsets: number[];
  /** Length of the padded, uncompressed payload. */
  payloadSize: number;
}

export function planLayout(
  names: readonly Uint8Array[],
  sizes: readonly number[],
  layout: GfArchLayout
): GfArchLayoutPlan {
  const nameTableOffset = HEADER_SIZE + names.length * ENTRY_SIZE;
  const nameOffsets: number[] = [];
  let cursor = nameTableOffset;
  for (const name of names) {
    nameOffsets.push(cursor);
    cursor += name.length + 1;
  }
  const lastNameOffset = nameOffsets.at(-1) ?? nameTableOffset;
  if (lastNameOffset > NAME_OFFSET_MASK) {
    throw new GfArchError('GFARCH_BAD_LAYOUT', 'Filename table does not fit in 24-bit name offsets', {
      offset: lastNameOffset
    });
  }

  const fileInfoSize = cursor - FILE_INFO_OFFSET;
  const gfcpOffset = resolveGfcpOffset(layout, fileInfoSize);

  const dataOffsets: number[] = [];
  let dataCursor = gfcpOffset;
  for (const size of sizes) {
    dataOffsets.push(dataCursor);
    dataCursor += alignUp(size, DATA_ALIGNMENT);
  }
  if (!isUint32(dataCursor)) {
    throw new GfArchError('GFARCH_BAD_LAYOUT', 'Payload does not fit in 32-bit data offsets', {
      context: { payloadEnd: String(dataCursor) }
    });
  }

  return {
    fileInfoSize,
    nameOffsets,
    gfcpOffset,
    dataOffsets,
    payloadSize: dataCursor - gfcpOffset
  };
}

function resolveGfcpOffset(layout: GfArchLayout, fileInfoSize: number): number {
  if (layout.kind === 'default') {
    return HEADER_SIZE + alignUp(fileInfoSize, DATA_ALIGNMENT);
  }
  if (!isUint32(layout.offset)) {
    throw new GfArchError('GFARCH_BAD_LAYOUT', `Custom compression header offset is not a u32: ${layout.offset}`);
  }
  const fileInfoEnd = FILE_INFO_OFFSET + fileInfoSize;
  if (layout.offset < fileInfoEnd) {
    throw new GfArchError('GFARCH_BAD_LAYOUT', 'Custom compression header offset overlaps the file table', {
      offset: layout.offset,
      context: { fileInfoEnd: String(fileInfoEnd) }
    });
  }
  return layout.offset;
}
