import { concatBytes } from '../binary.js';
import { CompressionError } from '../compress/errors.js';
import { decodeBpe, encodeBpe } from './bpe.js';
import { compressLz10, decompressLz10, lz10Header, lz10HeaderLength } from './lz10.js';
import type { GfArchCompressionCodec } from './types.js';

export const BPE_CODEC: GfArchCompressionCodec = {
  scheme: 'bpe',
  typeCode: 1,
  name: 'bpe',
  compress(data) {
    return encodeBpe(data);
  },
  decompress(data, options) {
    return decodeBpe(data, {
      maxOutputBytes: options.decompressedSize,
      ...(options.bpeStackSize !== undefined ? { stackSize: options.bpeStackSize } : {})
    });
  }
};

/**
 * GfArch keeps the LZ10 payload without its frame header, since the
 * compression header already records both sizes.
 */
export const LZ10_CODEC: GfArchCompressionCodec = {
  scheme: 'lz10',
  typeCode: 3,
  name: 'lz10',
  compress(data) {
    const framed = compressLz10(data);
    const headerLength = lz10HeaderLength(data.length);
    if (framed.length < headerLength) {
      throw new CompressionError('COMPRESSION_LZ10_BAD_DATA', 'LZ10 compressor returned a truncated frame', {
        algorithm: 'lz10'
      });
    }
    return framed.subarray(headerLength);
  },
  decompress(data, options) {
    const framed = concatBytes([lz10Header(options.decompressedSize), data]);
    return decompressLz10(framed, { maxOutputBytes: options.decompressedSize });
  }
};
