import { ByteBuffer, readUint32LE, writeUint32LE } from '../binary.js';
import { CompressionError } from '../compress/errors.js';

export const LZ10_TAG = 0x10;
const MAX_SHORT_SIZE = 0xffffff;

const WINDOW_SIZE = 0x1000;
const MIN_MATCH = 3;
const MAX_MATCH = 18;
const HASH_BITS = 12;
const MAX_CHAIN = 256;

export type Lz10DecompressOptions = {
  /** Refuse streams that declare more than this many bytes. */
  maxOutputBytes?: number;
};

/**
 * Length of the frame header for a stream of `size` bytes: four bytes, or
 * eight when the size does not fit the 24-bit field (zero included).
 */
export function lz10HeaderLength(size: number): number {
  return size === 0 || size > MAX_SHORT_SIZE ? 8 : 4;
}

export function lz10Header(size: number): Uint8Array {
  const header = new Uint8Array(lz10HeaderLength(size));
  header[0] = LZ10_TAG;
  if (header.length === 4) {
    header[1] = size & 0xff;
    header[2] = (size >>> 8) & 0xff;
    header[3] = (size >>> 16) & 0xff;
  } else {
    writeUint32LE(header, 4, size);
  }
  return header;
}

/** Compress `input` into a framed LZ10 stream (tag, size, then flag groups). */
export function compressLz10(input: Uint8Array): Uint8Array {
  const out = new ByteBuffer(input.length + (input.length >>> 3) + 16);
  out.pushBytes(lz10Header(input.length));

  const head = new Int32Array(1 << HASH_BITS).fill(-1);
  const prev = new Int32Array(input.length).fill(-1);
  const insert = (pos: number): void => {
    if (pos + MIN_MATCH > input.length) return;
    const hash = hashAt(input, pos);
    prev[pos] = head[hash]!;
    head[hash] = pos;
  };

  let pos = 0;
  while (pos < input.length) {
    const flagIndex = out.length;
    out.push(0);
    let flags = 0;
    for (let bit = 7; bit >= 0 && pos < input.length; bit -= 1) {
      const match = findMatch(input, pos, head, prev);
      if (match.length >= MIN_MATCH) {
        const disp = match.distance - 1;
        flags |= 1 << bit;
        out.push(((match.length - MIN_MATCH) << 4) | (disp >>> 8));
        out.push(disp & 0xff);
        for (let k = 0; k < match.length; k += 1) insert(pos + k);
        pos += match.length;
      } else {
        out.push(input[pos]!);
        insert(pos);
        pos += 1;
      }
    }
    out.setByte(flagIndex, flags);
  }
  return out.toBytes();
}

/** Decompress a framed LZ10 stream. */
export function decompressLz10(input: Uint8Array, options: Lz10DecompressOptions = {}): Uint8Array {
  if (input.length < 4 || input[0] !== LZ10_TAG) {
    throw badData('Missing LZ10 header');
  }
  let size = input[1]! | (input[2]! << 8) | (input[3]! << 16);
  let pos = 4;
  if (size === 0) {
    if (input.length < 8) throw badData('Truncated LZ10 extended header');
    size = readUint32LE(input, 4);
    pos = 8;
  }
  if (options.maxOutputBytes !== undefined && size > options.maxOutputBytes) {
    throw badData(`LZ10 stream declares ${size} bytes, limit is ${options.maxOutputBytes}`);
  }

  const out = new Uint8Array(size);
  let written = 0;
  while (written < size) {
    if (pos >= input.length) throw badData('Truncated LZ10 stream');
    const flags = input[pos]!;
    pos += 1;
    for (let bit = 7; bit >= 0 && written < size; bit -= 1) {
      if ((flags & (1 << bit)) === 0) {
        if (pos >= input.length) throw badData('Truncated LZ10 stream');
        out[written] = input[pos]!;
        written += 1;
        pos += 1;
        continue;
      }
      if (pos + 1 >= input.length) throw badData('Truncated LZ10 back-reference');
      const b0 = input[pos]!;
      const b1 = input[pos + 1]!;
      pos += 2;
      const length = (b0 >>> 4) + MIN_MATCH;
      const distance = (((b0 & 0x0f) << 8) | b1) + 1;
      if (distance > written) {
        throw badData(`LZ10 back-reference reaches ${distance} bytes behind offset ${written}`);
      }
      if (written + length > size) {
        throw badData('LZ10 back-reference overruns the declared size');
      }
      for (let k = 0; k < length; k += 1) {
        out[written] = out[written - distance]!;
        written += 1;
      }
    }
  }
  return out;
}

function hashAt(input: Uint8Array, pos: number): number {
  const key = (input[pos]! << 16) | (input[pos + 1]! << 8) | input[pos + 2]!;
  return Math.imul(key, 0x9e3779b1) >>> (32 - HASH_BITS);
}

function findMatch(
  input: Uint8Array,
  pos: number,
  head: Int32Array,
  prev: Int32Array
): { length: number; distance: number } {
  let bestLength = 0;
  let bestDistance = 0;
  if (pos + MIN_MATCH > input.length) return { length: 0, distance: 0 };
  const maxLength = Math.min(MAX_MATCH, input.length - pos);
  let candidate = head[hashAt(input, pos)]!;
  let steps = 0;
  while (candidate >= 0 && pos - candidate <= WINDOW_SIZE && steps < MAX_CHAIN) {
    let length = 0;
    while (length < maxLength && input[candidate + length] === input[pos + length]) {
      length += 1;
    }
    if (length > bestLength) {
      bestLength = length;
      bestDistance = pos - candidate;
      if (length === maxLength) break;
    }
    candidate = prev[candidate]!;
    steps += 1;
  }
  return { length: bestLength, distance: bestDistance };
}

function badData(message: string): CompressionError {
  return new CompressionError('COMPRESSION_LZ10_BAD_DATA', message, { algorithm: 'lz10' });
}
