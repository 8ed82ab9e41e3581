import { encodeByteString, writeUint32LE } from '../binary.js';
import { checksum } from '../checksum.js';
import { GfArchError } from '../errors.js';
import {
  COMPRESSED_FLAG,
  COMPRESSION_HEADER_SIZE,
  ENTRY_SIZE,
  FILE_INFO_OFFSET,
  GFAC_MAGIC,
  GFCP_FORMAT_VERSION,
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
  normalizeScheme,
  schemeToCode,
  versionToCode
} from '../format.js';
import { resolveLimits } from '../limits.js';
import { resolveCodecByScheme } from '../compression/registry.js';
import type { GfArchFile, GfArchLayout, GfArchWriterOptions } from '../types.js';
import { planLayout } from './layout.js';

const DEFAULT_LAYOUT: GfArchLayout = { kind: 'default' };

/** Collect files and serialize them into a GfArch archive. */
export class GfArchWriter {
  private readonly files: GfArchFile[] = [];
  private closed = false;

  private constructor(private readonly options: GfArchWriterOptions) {}

  /** Create a writer; options apply when {@link GfArchWriter.finish} runs. */
  static create(options?: GfArchWriterOptions): GfArchWriter {
    return new GfArchWriter(options ?? {});
  }

  /** Number of files added so far. */
  get size(): number {
    return this.files.length;
  }

  /** Queue a file. Names are validated here; duplicates are allowed. */
  add(name: string, data: Uint8Array): void {
    if (this.closed) {
      throw new GfArchError('GFARCH_WRITER_CLOSED', 'Cannot add entries after finish', { entryName: name });
    }
    encodeEntryName(name, this.files.length);
    this.files.push({ name, data });
  }

  /** Serialize the queued files and close the writer. */
  finish(): Uint8Array {
    if (this.closed) {
      throw new GfArchError('GFARCH_WRITER_CLOSED', 'Writer already finished');
    }
    this.closed = true;
    return packGfArch(this.files, this.options);
  }
}

/**
 * Pack files into a GfArch archive. Defaults: version 3.1, BPE compression,
 * compression header directly after the file table.
 */
export function packGfArch(files: readonly GfArchFile[], options?: GfArchWriterOptions): Uint8Array {
  const versionCode = versionToCode(options?.version ?? '3.1');
  const compression = options?.compression ?? 'bpe';
  const layout = options?.layout ?? DEFAULT_LAYOUT;
  const limits = resolveLimits(options?.limits);

  if (files.length > limits.maxEntries || files.length > 0xffffffff) {
    throw new GfArchError('GFARCH_LIMIT_EXCEEDED', 'Too many entries for one archive', {
      context: {
        entries: String(files.length),
        limitEntries: String(limits.maxEntries)
      }
    });
  }
  const names = files.map((file, index) => {
    if (!(file.data instanceof Uint8Array)) {
      throw new GfArchError('GFARCH_INVALID_ENTRY', `Entry ${index} has no byte contents`, {
        entryName: file.name
      });
    }
    return encodeEntryName(file.name, index);
  });
  const plan = planLayout(
    names,
    files.map((file) => file.data.length),
    layout
  );
  const codec = resolveCodecByScheme(normalizeScheme(compression), options?.codecs);

  const payload = new Uint8Array(plan.payloadSize);
  files.forEach((file, index) => {
    payload.set(file.data, plan.dataOffsets[index]! - plan.gfcpOffset);
  });
  const compressed = codec.compress(payload);

  const out = new Uint8Array(plan.gfcpOffset + COMPRESSION_HEADER_SIZE + compressed.length);
  writeUint32LE(out, 0, GFAC_MAGIC);
  writeUint32LE(out, HEADER_VERSION_OFFSET, versionCode);
  out[HEADER_COMPRESSED_FLAG_OFFSET] = COMPRESSED_FLAG;
  writeUint32LE(out, HEADER_FILE_INFO_OFFSET, FILE_INFO_OFFSET);
  writeUint32LE(out, HEADER_FILE_INFO_SIZE_OFFSET, plan.fileInfoSize);
  writeUint32LE(out, HEADER_GFCP_OFFSET, plan.gfcpOffset);
  writeUint32LE(out, HEADER_PAYLOAD_SIZE_OFFSET, COMPRESSION_HEADER_SIZE + compressed.length);
  writeUint32LE(out, HEADER_FILE_COUNT_OFFSET, files.length);

  files.forEach((file, index) => {
    const record = HEADER_SIZE + index * ENTRY_SIZE;
    const isLast = index === files.length - 1;
    const nameOffset = plan.nameOffsets[index]!;
    writeUint32LE(out, record, checksum(names[index]!));
    writeUint32LE(out, record + 4, isLast ? (nameOffset | LAST_ENTRY_FLAG) >>> 0 : nameOffset);
    writeUint32LE(out, record + 8, file.data.length);
    writeUint32LE(out, record + 12, plan.dataOffsets[index]!);
    out.set(names[index]!, nameOffset);
  });

  writeUint32LE(out, plan.gfcpOffset, GFCP_MAGIC);
  writeUint32LE(out, plan.gfcpOffset + 4, GFCP_FORMAT_VERSION);
  writeUint32LE(out, plan.gfcpOffset + 8, schemeToCode(compression));
  writeUint32LE(out, plan.gfcpOffset + 12, payload.length);
  writeUint32LE(out, plan.gfcpOffset + 16, compressed.length);
  out.set(compressed, plan.gfcpOffset + COMPRESSION_HEADER_SIZE);
  return out;
}

/** Pack parallel name and content lists. */
export function packGfArchFiles(
  names: readonly string[],
  contents: readonly Uint8Array[],
  options?: GfArchWriterOptions
): Uint8Array {
  if (names.length !== contents.length) {
    throw new GfArchError(
      'GFARCH_INVALID_ENTRY',
      `Got ${names.length} names for ${contents.length} contents`
    );
  }
  return packGfArch(
    names.map((name, index) => ({ name, data: contents[index]! })),
    options
  );
}

function encodeEntryName(name: string, index: number): Uint8Array {
  if (name.includes('\u0000')) {
    throw new GfArchError('GFARCH_INVALID_NAME', `Name of entry ${index} contains a NUL byte`, {
      entryName: name
    });
  }
  const bytes = encodeByteString(name);
  if (!bytes) {
    throw new GfArchError('GFARCH_INVALID_NAME', `Name of entry ${index} has characters outside one byte`, {
      entryName: name
    });
  }
  return bytes;
}
