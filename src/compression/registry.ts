import { CompressionError } from '../compress/errors.js';
import type { GfArchScheme } from '../types.js';
import type { GfArchCompressionCodec } from './types.js';
import { BPE_CODEC, LZ10_CODEC } from './codecs.js';

const codecs = new Map<number, GfArchCompressionCodec>();
let builtinsRegistered = false;

/** Register a payload codec by type code, replacing any codec with the same code. */
export function registerCompressionCodec(codec: GfArchCompressionCodec): void {
  codecs.set(codec.typeCode, codec);
}

/** Look up a registered payload codec by type code. */
export function getCompressionCodec(typeCode: number): GfArchCompressionCodec | undefined {
  return codecs.get(typeCode);
}

/** List all registered payload codecs. */
export function listCompressionCodecs(): GfArchCompressionCodec[] {
  return [...codecs.values()];
}

/** Find the codec for a type code, preferring per-call overrides over the registry. */
export function resolveCodecByTypeCode(
  typeCode: number,
  overrides?: readonly GfArchCompressionCodec[]
): GfArchCompressionCodec {
  const codec = overrides?.find((candidate) => candidate.typeCode === typeCode) ?? codecs.get(typeCode);
  if (!codec) {
    throw new CompressionError(
      'COMPRESSION_UNSUPPORTED_ALGORITHM',
      `No codec registered for compression type ${typeCode}`,
      { context: { typeCode: String(typeCode) } }
    );
  }
  return codec;
}

/** Find the codec for a scheme, preferring per-call overrides over the registry. */
export function resolveCodecByScheme(
  scheme: GfArchScheme,
  overrides?: readonly GfArchCompressionCodec[]
): GfArchCompressionCodec {
  const codec =
    overrides?.find((candidate) => candidate.scheme === scheme) ??
    [...codecs.values()].find((candidate) => candidate.scheme === scheme);
  if (!codec) {
    throw new CompressionError('COMPRESSION_UNSUPPORTED_ALGORITHM', `No codec registered for ${scheme}`, {
      algorithm: scheme
    });
  }
  return codec;
}

function registerBuiltins(): void {
  if (builtinsRegistered) return;
  builtinsRegistered = true;
  registerCompressionCodec(BPE_CODEC);
  registerCompressionCodec(LZ10_CODEC);
}

registerBuiltins();
