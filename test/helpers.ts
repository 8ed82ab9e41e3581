import { readUint32LE } from '../src/binary.js';
import type { GfArchCompressionCodec, GfArchDecompressOptions } from '../src/index.js';

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Codec that stores the payload unchanged, registered under the BPE slot. */
export function storedCodec(calls: GfArchDecompressOptions[] = []): GfArchCompressionCodec {
  return {
    scheme: 'bpe',
    typeCode: 1,
    name: 'stored',
    compress(data) {
      return data.slice();
    },
    decompress(data, options) {
      calls.push(options);
      return data.slice();
    }
  };
}

export function bytesOf(length: number, seed = 0): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i += 1) {
    out[i] = (seed + i * 31) & 0xff;
  }
  return out;
}

export function ascii(bytes: Uint8Array, offset: number, length: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + length));
}

export function u32(bytes: Uint8Array, offset: number): number {
  return readUint32LE(bytes, offset);
}
