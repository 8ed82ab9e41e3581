export { GfArchReader, extractGfArch, readGfArchInfo } from './reader/GfArchReader.js';
export { GfArchWriter, packGfArch, packGfArchFiles } from './writer/GfArchWriter.js';
export { checksum } from './checksum.js';
export { GfArchError } from './errors.js';
export type { GfArchErrorCode } from './errors.js';
export { CompressionError } from './compress/errors.js';
export type { CompressionErrorCode } from './compress/errors.js';
export { GFCP_OFFSET_FIXED, schemeFromCode, schemeToCode, versionFromCode, versionToCode } from './format.js';
export { DEFAULT_GFARCH_LIMITS } from './limits.js';
export type { GfArchLimits } from './limits.js';

export { BPE_CODEC, LZ10_CODEC } from './compression/codecs.js';
export { getCompressionCodec, listCompressionCodecs, registerCompressionCodec } from './compression/registry.js';
export { DEFAULT_BPE_STACK_SIZE, decodeBpe, encodeBpe } from './compression/bpe.js';
export type { BpeDecodeOptions } from './compression/bpe.js';
export { compressLz10, decompressLz10 } from './compression/lz10.js';
export type { Lz10DecompressOptions } from './compression/lz10.js';
export type { GfArchCompressionCodec, GfArchDecompressOptions } from './compression/types.js';

export type {
  GfArchAuditReport,
  GfArchCompression,
  GfArchCompressionHeader,
  GfArchEntry,
  GfArchFile,
  GfArchHeader,
  GfArchIssue,
  GfArchIssueCode,
  GfArchIssueSeverity,
  GfArchLayout,
  GfArchReaderOptions,
  GfArchScheme,
  GfArchVersion,
  GfArchWriterOptions
} from './types.js';
