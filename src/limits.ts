/** Resource ceilings applied while reading and writing archives. */
export type GfArchLimits = {
  /** Largest accepted entry count. */
  maxEntries?: number;
  /** Largest accepted archive buffer, in bytes. */
  maxInputBytes?: number;
  /** Largest decompressed payload the reader will materialize, in bytes. */
  maxTotalDecompressedBytes?: number;
  /** Largest accepted ratio of declared decompressed size to stored compressed size. */
  maxCompressionRatio?: number;
};

const DEFAULT_LIMITS = Object.freeze({
  maxEntries: 65536,
  maxInputBytes: 1024 * 1024 * 1024,
  maxTotalDecompressedBytes: 1024 * 1024 * 1024,
  maxCompressionRatio: 1000
} satisfies Required<GfArchLimits>);

export const DEFAULT_GFARCH_LIMITS: Readonly<Required<GfArchLimits>> = DEFAULT_LIMITS;

export function resolveLimits(limits?: GfArchLimits): Required<GfArchLimits> {
  return {
    maxEntries: limits?.maxEntries ?? DEFAULT_LIMITS.maxEntries,
    maxInputBytes: limits?.maxInputBytes ?? DEFAULT_LIMITS.maxInputBytes,
    maxTotalDecompressedBytes: limits?.maxTotalDecompressedBytes ?? DEFAULT_LIMITS.maxTotalDecompressedBytes,
    maxCompressionRatio: limits?.maxCompressionRatio ?? DEFAULT_LIMITS.maxCompressionRatio
  };
}
