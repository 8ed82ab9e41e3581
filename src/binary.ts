export function readUint32LE(buf: Uint8Array, offset: number): number {
  return (
    buf[offset]! |
    (buf[offset + 1]! << 8) |
    (buf[offset + 2]! << 16) |
    (buf[offset + 3]! << 24)
  ) >>> 0;
}

export function writeUint32LE(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xff;
  buf[offset + 1] = (value >>> 8) & 0xff;
  buf[offset + 2] = (value >>> 16) & 0xff;
  buf[offset + 3] = (value >>> 24) & 0xff;
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Round `value` up to the next multiple of `alignment` (a power of two). */
export function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

/**
 * Map a string onto bytes, one byte per character. Returns `undefined` when a
 * character code does not fit in a byte.
 */
export function encodeByteString(value: string): Uint8Array | undefined {
  const out = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i);
    if (code > 0xff) return undefined;
    out[i] = code;
  }
  return out;
}

export function decodeByteString(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += String.fromCharCode(byte);
  }
  return out;
}

/** Index of the first NUL at or after `start`, or -1 when the buffer ends first. */
export function findNul(buf: Uint8Array, start: number): number {
  for (let i = start; i < buf.length; i += 1) {
    if (buf[i] === 0) return i;
  }
  return -1;
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

/** Growable byte sink for codec output of unknown length. */
export class ByteBuffer {
  private buf: Uint8Array;
  private used = 0;

  constructor(initialCapacity = 1024) {
    this.buf = new Uint8Array(Math.max(16, initialCapacity));
  }

  get length(): number {
    return this.used;
  }

  push(byte: number): void {
    if (this.used === this.buf.length) this.grow(this.used + 1);
    this.buf[this.used] = byte;
    this.used += 1;
  }

  pushBytes(bytes: Uint8Array): void {
    if (this.used + bytes.length > this.buf.length) this.grow(this.used + bytes.length);
    this.buf.set(bytes, this.used);
    this.used += bytes.length;
  }

  /** Overwrite a byte that was already pushed. */
  setByte(index: number, value: number): void {
    if (index >= this.used) throw new RangeError(`ByteBuffer index out of range: ${index}`);
    this.buf[index] = value;
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.used);
  }

  private grow(minCapacity: number): void {
    let capacity = this.buf.length * 2;
    while (capacity < minCapacity) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.used));
    this.buf = next;
  }
}
