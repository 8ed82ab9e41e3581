import { alignUp } from '../binary.js';
import { checksum } from '../checksum.js';
import {
  COMPRESSED_FLAG,
  COMPRESSION_HEADER_SIZE,
  DATA_ALIGNMENT,
  ENTRY_SIZE,
  FILE_INFO_OFFSET,
  GFCP_FORMAT_VERSION,
  LAST_ENTRY_FLAG,
  NAME_FLAGS_MASK
} from '../format.js';
import { GFARCH_REPORT_SCHEMA_VERSION } from '../reportSchema.js';
import type {
  GfArchAuditReport,
  GfArchCompressionHeader,
  GfArchEntry,
  GfArchHeader,
  GfArchIssue
} from '../types.js';

const RESERVED_FLAG_BITS = (NAME_FLAGS_MASK & ~LAST_ENTRY_FLAG) >>> 24;

/** Check the structural conventions a well-formed archive follows. */
export function auditArchive(
  header: GfArchHeader,
  compression: GfArchCompressionHeader,
  entries: readonly GfArchEntry[]
): GfArchAuditReport {
  const issues: GfArchIssue[] = [];

  if (header.version === undefined) {
    issues.push({
      code: 'GFARCH_UNKNOWN_VERSION',
      severity: 'warning',
      message: `Unknown version code 0x${header.versionCode.toString(16)}`,
      offset: 4
    });
  }
  if (header.compressedFlag !== COMPRESSED_FLAG) {
    issues.push({
      code: 'GFARCH_COMPRESSED_FLAG',
      severity: 'warning',
      message: `Compressed flag is ${header.compressedFlag}, expected ${COMPRESSED_FLAG}`,
      offset: 8
    });
  }
  if (header.fileInfoOffset !== FILE_INFO_OFFSET) {
    issues.push({
      code: 'GFARCH_FILE_INFO_OFFSET',
      severity: 'warning',
      message: `File info pointer is 0x${header.fileInfoOffset.toString(16)}, expected 0x${FILE_INFO_OFFSET.toString(16)}`,
      offset: 0x0c
    });
  }

  const expectedFileInfoSize =
    4 + entries.length * ENTRY_SIZE + entries.reduce((sum, entry) => sum + entry.name.length + 1, 0);
  if (header.fileInfoSize !== expectedFileInfoSize) {
    issues.push({
      code: 'GFARCH_FILE_INFO_SIZE_MISMATCH',
      severity: 'warning',
      message: `File info size is ${header.fileInfoSize}, entries account for ${expectedFileInfoSize}`,
      offset: 0x10
    });
  }
  if (header.payloadSize !== COMPRESSION_HEADER_SIZE + compression.compressedSize) {
    issues.push({
      code: 'GFARCH_PAYLOAD_SIZE_MISMATCH',
      severity: 'warning',
      message: `Payload size is ${header.payloadSize}, compression header implies ${
        COMPRESSION_HEADER_SIZE + compression.compressedSize
      }`,
      offset: 0x18
    });
  }
  if (compression.formatVersion !== GFCP_FORMAT_VERSION) {
    issues.push({
      code: 'GFARCH_COMPRESSION_FORMAT_VERSION',
      severity: 'warning',
      message: `Compression header format version is ${compression.formatVersion}`,
      offset: header.gfcpOffset + 4
    });
  }

  let expectedOffset = header.gfcpOffset;
  for (const entry of entries) {
    const isFinal = entry.index === entries.length - 1;
    if (checksum(entry.name) !== entry.checksum) {
      issues.push({
        code: 'GFARCH_CHECKSUM_MISMATCH',
        severity: 'error',
        message: `Stored checksum 0x${entry.checksum.toString(16)} does not match the name`,
        entryName: entry.name
      });
    }
    if (isFinal && !entry.isLast) {
      issues.push({
        code: 'GFARCH_LAST_FLAG_MISSING',
        severity: 'error',
        message: 'Final entry lacks the is-last flag',
        entryName: entry.name
      });
    }
    if (!isFinal && entry.isLast) {
      issues.push({
        code: 'GFARCH_LAST_FLAG_MISPLACED',
        severity: 'error',
        message: `Entry ${entry.index} carries the is-last flag but is not the final entry`,
        entryName: entry.name
      });
    }
    if ((entry.flags & RESERVED_FLAG_BITS) !== 0) {
      issues.push({
        code: 'GFARCH_RESERVED_FLAGS',
        severity: 'warning',
        message: `Reserved name-offset flag bits set: 0x${entry.flags.toString(16)}`,
        entryName: entry.name
      });
    }
    if (entry.decompressedOffset !== expectedOffset) {
      issues.push({
        code: 'GFARCH_MISALIGNED_OFFSET',
        severity: 'warning',
        message: `Data offset 0x${entry.decompressedOffset.toString(16)}, expected 0x${expectedOffset.toString(16)}`,
        entryName: entry.name
      });
    }
    expectedOffset = entry.decompressedOffset + alignUp(entry.decompressedSize, DATA_ALIGNMENT);
  }

  const errors = issues.filter((issue) => issue.severity === 'error').length;
  const warnings = issues.filter((issue) => issue.severity === 'warning').length;
  return {
    schemaVersion: GFARCH_REPORT_SCHEMA_VERSION,
    ok: errors === 0,
    summary: {
      entries: entries.length,
      warnings,
      errors
    },
    issues
  };
}
