import type { GfArchScheme } from '../types.js';

/** Options passed to a codec when the reader decodes a payload. */
export type GfArchDecompressOptions = {
  /** Payload size declared by the compression header. */
  decompressedSize: number;
  /** Working stack bound for BPE expansion. */
  bpeStackSize?: number;
};

/**
 * Codec interface for GfArch payload compression. `compress` returns the
 * stream exactly as it is embedded after the compression header, and
 * `decompress` receives that same unframed stream.
 */
export type GfArchCompressionCodec = {
  scheme: GfArchScheme;
  typeCode: number;
  name: string;
  compress(data: Uint8Array): Uint8Array;
  decompress(data: Uint8Array, options: GfArchDecompressOptions): Uint8Array;
};
