import { GfArchError, assertInBounds } from '../errors.js';
import { COMPRESSION_HEADER_SIZE } from '../format.js';
import { resolveLimits } from '../limits.js';
import { resolveCodecByTypeCode } from '../compression/registry.js';
import type {
  GfArchAuditReport,
  GfArchCompressionHeader,
  GfArchEntry,
  GfArchFile,
  GfArchHeader,
  GfArchReaderOptions
} from '../types.js';
import { auditArchive } from './audit.js';
import { readCompressionHeader, readEntries, readHeader } from './header.js';

/** Parsed view of a GfArch archive held in memory. */
export class GfArchReader {
  private payload: Uint8Array | undefined;

  private constructor(
    private readonly data: Uint8Array,
    /** Fixed header fields. */
    readonly header: GfArchHeader,
    /** Compression header found at `header.gfcpOffset`. */
    readonly compression: GfArchCompressionHeader,
    private readonly entryList: readonly GfArchEntry[],
    private readonly options: GfArchReaderOptions
  ) {}

  /**
   * Parse the header, entry table, filenames and compression header. The
   * payload is not decompressed until {@link GfArchReader.extractAll} is called.
   */
  static fromUint8Array(data: Uint8Array, options?: GfArchReaderOptions): GfArchReader {
    const limits = resolveLimits(options?.limits);
    if (data.length > limits.maxInputBytes) {
      throw new GfArchError('GFARCH_LIMIT_EXCEEDED', 'Archive exceeds maxInputBytes', {
        context: {
          requiredBytes: String(data.length),
          limitBytes: String(limits.maxInputBytes)
        }
      });
    }
    const header = readHeader(data);
    if (header.fileCount > limits.maxEntries) {
      throw new GfArchError('GFARCH_LIMIT_EXCEEDED', 'Archive declares more entries than maxEntries', {
        offset: 0x2c,
        context: {
          entries: String(header.fileCount),
          limitEntries: String(limits.maxEntries)
        }
      });
    }
    const entries = readEntries(data, header);
    const compression = readCompressionHeader(data, header.gfcpOffset);
    return new GfArchReader(data, header, compression, entries, options ?? {});
  }

  /** Entry records in table order. */
  entries(): GfArchEntry[] {
    return this.entryList.map((entry) => ({ ...entry }));
  }

  /** Report structural deviations without decompressing the payload. */
  audit(): GfArchAuditReport {
    return auditArchive(this.header, this.compression, this.entryList);
  }

  /** Decompress the payload and return every file in table order. */
  extractAll(): GfArchFile[] {
    if (this.options.isStrict) {
      const report = this.audit();
      if (!report.ok) {
        const first = report.issues.find((issue) => issue.severity === 'error');
        throw new GfArchError('GFARCH_AUDIT_FAILED', first?.message ?? 'Archive audit failed', {
          entryName: first?.entryName,
          context: { errors: String(report.summary.errors) }
        });
      }
    }
    const payload = this.decompressPayload();
    const base = this.header.gfcpOffset;
    return this.entryList.map((entry) => {
      const start = entry.decompressedOffset - base;
      if (start < 0 || start + entry.decompressedSize > payload.length) {
        throw new GfArchError('GFARCH_TRUNCATED', `Data of ${entry.name} lies outside the decompressed payload`, {
          entryName: entry.name,
          offset: entry.decompressedOffset,
          context: {
            size: String(entry.decompressedSize),
            payloadSize: String(payload.length)
          }
        });
      }
      return { name: entry.name, data: payload.slice(start, start + entry.decompressedSize) };
    });
  }

  private decompressPayload(): Uint8Array {
    if (this.payload) return this.payload;
    const limits = resolveLimits(this.options.limits);
    const { decompressedSize, compressedSize, typeCode } = this.compression;
    if (decompressedSize > limits.maxTotalDecompressedBytes) {
      throw new GfArchError('GFARCH_LIMIT_EXCEEDED', 'Decompressed payload exceeds maxTotalDecompressedBytes', {
        context: {
          requiredBytes: String(decompressedSize),
          limitBytes: String(limits.maxTotalDecompressedBytes)
        }
      });
    }
    if (decompressedSize > Math.max(compressedSize, 1) * limits.maxCompressionRatio) {
      throw new GfArchError('GFARCH_LIMIT_EXCEEDED', 'Compression ratio exceeds maxCompressionRatio', {
        offset: this.header.gfcpOffset + 12,
        context: {
          decompressedSize: String(decompressedSize),
          compressedSize: String(compressedSize),
          limitRatio: String(limits.maxCompressionRatio)
        }
      });
    }
    const start = this.header.gfcpOffset + COMPRESSION_HEADER_SIZE;
    assertInBounds(this.data.length, start, compressedSize, 'Compressed payload');
    const codec = resolveCodecByTypeCode(typeCode, this.options.codecs);
    const payload = codec.decompress(this.data.subarray(start, start + compressedSize), {
      decompressedSize,
      ...(this.options.bpeStackSize !== undefined ? { bpeStackSize: this.options.bpeStackSize } : {})
    });
    if (payload.length !== decompressedSize) {
      throw new GfArchError('GFARCH_TRUNCATED', 'Decompressed payload is shorter than the compression header declares', {
        offset: start,
        context: {
          decompressedSize: String(decompressedSize),
          payloadSize: String(payload.length)
        }
      });
    }
    this.payload = payload;
    return payload;
  }
}

/** Extract every file of an archive, in entry-table order. */
export function extractGfArch(data: Uint8Array, options?: GfArchReaderOptions): GfArchFile[] {
  return GfArchReader.fromUint8Array(data, options).extractAll();
}

/** Read the header and entry table without decompressing the payload. */
export function readGfArchInfo(
  data: Uint8Array,
  options?: GfArchReaderOptions
): { header: GfArchHeader; compression: GfArchCompressionHeader; entries: GfArchEntry[] } {
  const reader = GfArchReader.fromUint8Array(data, options);
  return { header: reader.header, compression: reader.compression, entries: reader.entries() };
}
