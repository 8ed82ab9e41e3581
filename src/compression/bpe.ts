import { ByteBuffer } from '../binary.js';
import { CompressionError } from '../compress/errors.js';

// Block-oriented byte pair encoding. Each block is a pair table (run-length
// coded over the 256 byte codes) followed by a big-endian u16 size and the
// packed bytes.

const BLOCK_SIZE = 0x2000;
const MAX_LITERALS = 200;
const MIN_PAIR_COUNT = 3;
const MAX_RUN = 127;

export const DEFAULT_BPE_STACK_SIZE = 4096;

export type BpeDecodeOptions = {
  /** Bound on pending pair expansions. */
  stackSize?: number;
  /** Refuse to produce more than this many bytes. */
  maxOutputBytes?: number;
};

export function encodeBpe(input: Uint8Array): Uint8Array {
  const out = new ByteBuffer(input.length + 64);
  let pos = 0;
  while (pos < input.length) {
    const end = blockEnd(input, pos);
    encodeBlock(input.subarray(pos, end), out);
    pos = end;
  }
  return out.toBytes();
}

export function decodeBpe(input: Uint8Array, options: BpeDecodeOptions = {}): Uint8Array {
  const stackSize = options.stackSize ?? DEFAULT_BPE_STACK_SIZE;
  const maxOutputBytes = options.maxOutputBytes ?? Number.POSITIVE_INFINITY;
  if (!Number.isInteger(stackSize) || stackSize < 2) {
    throw new CompressionError('COMPRESSION_BPE_BAD_DATA', `Invalid BPE stack size: ${stackSize}`, {
      algorithm: 'bpe'
    });
  }

  const out = new ByteBuffer(Math.min(maxOutputBytes, input.length * 4));
  const left = new Uint8Array(256);
  const right = new Uint8Array(256);
  const stack = new Uint8Array(stackSize);
  let pos = 0;

  const next = (): number => {
    if (pos >= input.length) {
      throw new CompressionError('COMPRESSION_BPE_BAD_DATA', 'Truncated BPE stream', {
        algorithm: 'bpe',
        context: { offset: String(pos) }
      });
    }
    const byte = input[pos]!;
    pos += 1;
    return byte;
  };

  while (pos < input.length) {
    for (let c = 0; c < 256; c += 1) left[c] = c;

    let count = next();
    let code = 0;
    while (true) {
      if (count > MAX_RUN) {
        code += count - MAX_RUN;
        count = 0;
      }
      if (code === 256) break;
      for (let i = 0; i <= count; i += 1, code += 1) {
        if (code >= 256) {
          throw new CompressionError('COMPRESSION_BPE_BAD_DATA', 'BPE pair table overruns the code space', {
            algorithm: 'bpe'
          });
        }
        const l = next();
        left[code] = l;
        if (l !== code) right[code] = next();
      }
      if (code === 256) break;
      count = next();
    }

    const high = next();
    let remaining = (high << 8) | next();
    let sp = 0;
    while (true) {
      let c: number;
      if (sp > 0) {
        sp -= 1;
        c = stack[sp]!;
      } else {
        if (remaining === 0) break;
        remaining -= 1;
        c = next();
      }
      const l = left[c]!;
      if (l === c) {
        if (out.length >= maxOutputBytes) {
          throw new CompressionError('COMPRESSION_BPE_BAD_DATA', 'BPE output exceeds the declared size', {
            algorithm: 'bpe',
            context: { maxOutputBytes: String(maxOutputBytes) }
          });
        }
        out.push(c);
      } else {
        if (sp + 2 > stackSize) {
          throw new CompressionError('COMPRESSION_BPE_BAD_DATA', 'BPE expansion exceeds the stack size', {
            algorithm: 'bpe',
            context: { stackSize: String(stackSize) }
          });
        }
        stack[sp] = right[c]!;
        stack[sp + 1] = l;
        sp += 2;
      }
    }
  }

  return out.toBytes();
}

/** End of the block starting at `start`, leaving unused byte values for pair codes. */
function blockEnd(input: Uint8Array, start: number): number {
  const seen = new Uint8Array(256);
  const limit = Math.min(input.length, start + BLOCK_SIZE);
  let distinct = 0;
  let pos = start;
  while (pos < limit) {
    const byte = input[pos]!;
    if (seen[byte] === 0) {
      if (distinct === MAX_LITERALS) break;
      seen[byte] = 1;
      distinct += 1;
    }
    pos += 1;
  }
  return pos;
}

function encodeBlock(block: Uint8Array, out: ByteBuffer): void {
  const left = new Uint8Array(256);
  const right = new Uint8Array(256);
  const used = new Uint8Array(256);
  for (let c = 0; c < 256; c += 1) left[c] = c;

  const buffer = Uint8Array.from(block);
  for (const byte of buffer) used[byte] = 1;
  let size = buffer.length;

  const counts = new Uint32Array(0x10000);
  let code = 255;
  while (true) {
    while (code >= 0 && used[code] === 1) code -= 1;
    if (code < 0) break;

    counts.fill(0);
    let bestPair = 0;
    let bestCount = 0;
    for (let i = 0; i + 1 < size; i += 1) {
      const pair = (buffer[i]! << 8) | buffer[i + 1]!;
      const count = counts[pair]! + 1;
      counts[pair] = count;
      if (count > bestCount) {
        bestCount = count;
        bestPair = pair;
      }
    }
    if (bestCount < MIN_PAIR_COUNT) break;

    const a = bestPair >>> 8;
    const b = bestPair & 0xff;
    let write = 0;
    let read = 0;
    while (read < size) {
      if (read + 1 < size && buffer[read] === a && buffer[read + 1] === b) {
        buffer[write] = code;
        read += 2;
      } else {
        buffer[write] = buffer[read]!;
        read += 1;
      }
      write += 1;
    }
    size = write;
    left[code] = a;
    right[code] = b;
    used[code] = 1;
  }

  writePairTable(left, right, out);
  out.push(size >>> 8);
  out.push(size & 0xff);
  out.pushBytes(buffer.subarray(0, size));
}

function writePairTable(left: Uint8Array, right: Uint8Array, out: ByteBuffer): void {
  let c = 0;
  while (c < 256) {
    let len: number;
    if (c === left[c]) {
      // Run of literal codes, skipped by the decoder.
      len = 1;
      c += 1;
      while (len < MAX_RUN && c < 256 && c === left[c]) {
        len += 1;
        c += 1;
      }
      out.push(len + MAX_RUN);
      len = 0;
      if (c === 256) break;
    } else {
      // Run of pair codes; a lone literal between two pairs rides along.
      len = 0;
      c += 1;
      while (
        (len < MAX_RUN && c < 256 && c !== left[c]) ||
        (len < MAX_RUN - 2 && c < 254 && c + 1 !== left[c + 1])
      ) {
        len += 1;
        c += 1;
      }
      out.push(len);
      c -= len + 1;
    }

    for (let i = 0; i <= len; i += 1) {
      const l = left[c]!;
      out.push(l);
      if (c !== l) out.push(right[c]!);
      c += 1;
    }
  }
}
