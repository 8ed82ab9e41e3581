import type { GfArchCompressionCodec } from './compression/types.js';
import type { GfArchLimits } from './limits.js';

/** Archive format versions; only the header's version field differs between them. */
export type GfArchVersion = '2.0' | '3.0' | '3.1';

/** Payload compression schemes stored in the compression header. */
export type GfArchScheme = 'bpe' | 'lz10';

/** Accepted compression names; `lz77` is the legacy name of `lz10`. */
export type GfArchCompression = GfArchScheme | 'lz77';

/** Placement of the compression header. */
export type GfArchLayout =
  | { kind: 'default' }
  | { kind: 'custom'; offset: number };

/** A named file inside an archive. */
export type GfArchFile = {
  name: string;
  data: Uint8Array;
};

/** Parsed fixed header of an archive. */
export interface GfArchHeader {
  versionCode: number;
  version: GfArchVersion | undefined;
  compressedFlag: number;
  fileInfoOffset: number;
  fileInfoSize: number;
  gfcpOffset: number;
  payloadSize: number;
  fileCount: number;
}

/** Parsed compression header found at `gfcpOffset`. */
export interface GfArchCompressionHeader {
  formatVersion: number;
  typeCode: number;
  scheme: GfArchScheme;
  decompressedSize: number;
  compressedSize: number;
}

/** Entry record as stored in the entry table, with its resolved name. */
export interface GfArchEntry {
  index: number;
  name: string;
  checksum: number;
  /** Filename offset with the flag byte masked off. */
  nameOffset: number;
  /** Top byte of the stored name offset. */
  flags: number;
  isLast: boolean;
  decompressedSize: number;
  decompressedOffset: number;
}

/** Options shared by reader entry points. */
export type GfArchReaderOptions = {
  /** Working stack bound for BPE expansion. */
  bpeStackSize?: number;
  limits?: GfArchLimits;
  /** Codecs consulted before the registry. */
  codecs?: readonly GfArchCompressionCodec[];
  /** Audit before extraction and refuse archives with error-level issues. */
  isStrict?: boolean;
};

/** Options for packing archives. */
export type GfArchWriterOptions = {
  version?: GfArchVersion;
  compression?: GfArchCompression;
  layout?: GfArchLayout;
  limits?: GfArchLimits;
  /** Codecs consulted before the registry. */
  codecs?: readonly GfArchCompressionCodec[];
};

/** Severity level for audit issues. */
export type GfArchIssueSeverity = 'info' | 'warning' | 'error';

/** Audit issue codes. */
export type GfArchIssueCode =
  | 'GFARCH_CHECKSUM_MISMATCH'
  | 'GFARCH_LAST_FLAG_MISSING'
  | 'GFARCH_LAST_FLAG_MISPLACED'
  | 'GFARCH_RESERVED_FLAGS'
  | 'GFARCH_MISALIGNED_OFFSET'
  | 'GFARCH_UNKNOWN_VERSION'
  | 'GFARCH_FILE_INFO_SIZE_MISMATCH'
  | 'GFARCH_FILE_INFO_OFFSET'
  | 'GFARCH_COMPRESSED_FLAG'
  | 'GFARCH_PAYLOAD_SIZE_MISMATCH'
  | 'GFARCH_COMPRESSION_FORMAT_VERSION';

/** A single structural issue found in an archive. */
export type GfArchIssue = {
  code: GfArchIssueCode;
  severity: GfArchIssueSeverity;
  message: string;
  entryName?: string;
  offset?: number;
};

/** Audit summary for an archive. */
export type GfArchAuditReport = {
  schemaVersion: string;
  ok: boolean;
  summary: {
    entries: number;
    warnings: number;
    errors: number;
  };
  issues: GfArchIssue[];
};
