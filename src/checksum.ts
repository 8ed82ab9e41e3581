const MULTIPLIER = 137;

/**
 * Name hash stored in each entry record. Every byte takes part, NUL included;
 * arithmetic wraps at 32 bits.
 */
export function checksum(name: string | Uint8Array): number {
  let result = 0;
  if (typeof name === 'string') {
    for (let i = 0; i < name.length; i += 1) {
      result = step(result, name.charCodeAt(i) & 0xff);
    }
    return result;
  }
  for (const byte of name) {
    result = step(result, byte);
  }
  return result;
}

function step(result: number, byte: number): number {
  return (byte + Math.imul(result, MULTIPLIER)) >>> 0;
}
