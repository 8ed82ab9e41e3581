import test from 'node:test';
import assert from 'node:assert/strict';
import { writeUint32LE } from '../src/binary.js';
import {
  CompressionError,
  GfArchError,
  GfArchReader,
  extractGfArch,
  packGfArch,
  readGfArchInfo
} from '../src/index.js';
import type { GfArchDecompressOptions, GfArchFile } from '../src/index.js';
import { bytesOf, decoder, encoder, storedCodec, u32 } from './helpers.js';

const SAMPLE: GfArchFile[] = [
  { name: 'a.bin', data: new Uint8Array([1, 2, 3]) },
  { name: 'bb', data: bytesOf(17) }
];

function stored(): Uint8Array {
  return packGfArch(SAMPLE, { codecs: [storedCodec()] });
}

function patched(source: Uint8Array, offset: number, value: number): Uint8Array {
  const copy = source.slice();
  writeUint32LE(copy, offset, value);
  return copy;
}

function hasCode(code: GfArchError['code']): (err: unknown) => boolean {
  return (err: unknown) => err instanceof GfArchError && err.code === code;
}

test('extractGfArch restores files packed with each scheme', () => {
  for (const compression of ['bpe', 'lz10'] as const) {
    const files = extractGfArch(packGfArch(SAMPLE, { compression }));
    assert.deepEqual(files, SAMPLE);
  }
});

test('extractGfArch handles an archive with no entries', () => {
  assert.deepEqual(extractGfArch(packGfArch([])), []);
  assert.deepEqual(extractGfArch(packGfArch([], { compression: 'lz10' })), []);
});

test('readGfArchInfo reports header, compression header and entries', () => {
  const info = readGfArchInfo(stored());
  assert.deepEqual(info.header, {
    versionCode: 0x0301,
    version: '3.1',
    compressedFlag: 1,
    fileInfoOffset: 0x2c,
    fileInfoSize: 45,
    gfcpOffset: 0x60,
    payloadSize: 0x14 + 48,
    fileCount: 2
  });
  assert.deepEqual(info.compression, {
    formatVersion: 1,
    typeCode: 1,
    scheme: 'bpe',
    decompressedSize: 48,
    compressedSize: 48
  });
  assert.deepEqual(info.entries, [
    {
      index: 0,
      name: 'a.bin',
      checksum: 0xfbe4c9a0,
      nameOffset: 0x50,
      flags: 0,
      isLast: false,
      decompressedSize: 3,
      decompressedOffset: 0x60
    },
    {
      index: 1,
      name: 'bb',
      checksum: 0x34d4,
      nameOffset: 0x56,
      flags: 0x80,
      isLast: true,
      decompressedSize: 17,
      decompressedOffset: 0x70
    }
  ]);
});

test('entries() returns copies', () => {
  const reader = GfArchReader.fromUint8Array(stored());
  const first = reader.entries();
  first[0]!.name = 'changed';
  assert.equal(reader.entries()[0]!.name, 'a.bin');
});

test('extractAll returns independent copies of entry data', () => {
  const reader = GfArchReader.fromUint8Array(stored(), { codecs: [storedCodec()] });
  const first = reader.extractAll();
  first[0]!.data[0] = 99;
  assert.deepEqual([...reader.extractAll()[0]!.data], [1, 2, 3]);
});

test('names decode one byte per character', () => {
  const name = 'café_ÿ.bin';
  const files = extractGfArch(packGfArch([{ name, data: encoder.encode('latin') }]));
  assert.equal(files[0]!.name, name);
  assert.equal(decoder.decode(files[0]!.data), 'latin');
});

test('unknown version codes are still readable', () => {
  const archive = patched(stored(), 0x04, 0x0400);
  const reader = GfArchReader.fromUint8Array(archive, { codecs: [storedCodec()] });
  assert.equal(reader.header.version, undefined);
  assert.equal(reader.header.versionCode, 0x0400);
  assert.deepEqual(reader.extractAll(), SAMPLE);
});

test('a missing GFAC magic is rejected', () => {
  const archive = stored();
  archive[3] = 0x58;
  assert.throws(() => GfArchReader.fromUint8Array(archive), hasCode('GFARCH_BAD_HEADER'));
  assert.throws(() => GfArchReader.fromUint8Array(new Uint8Array([0x47, 0x46])), hasCode('GFARCH_BAD_HEADER'));
});

test('an archive shorter than its header is truncated', () => {
  assert.throws(() => GfArchReader.fromUint8Array(stored().subarray(0, 0x20)), hasCode('GFARCH_TRUNCATED'));
});

test('an entry table running past the end is truncated', () => {
  const archive = patched(stored(), 0x2c, 100);
  assert.throws(() => GfArchReader.fromUint8Array(archive), hasCode('GFARCH_TRUNCATED'));
});

test('an unterminated name is truncated', () => {
  const archive = stored();
  const withFarName = patched(archive, 0x34, archive.length + 4);
  assert.throws(() => GfArchReader.fromUint8Array(withFarName), hasCode('GFARCH_TRUNCATED'));
});

test('a missing GFCP magic is rejected', () => {
  const archive = stored();
  archive[0x60] = 0;
  assert.throws(() => GfArchReader.fromUint8Array(archive), hasCode('GFARCH_BAD_COMPRESSION_HEADER'));
});

test('a compression header outside the archive is truncated', () => {
  const archive = patched(stored(), 0x14, 0x1000);
  assert.throws(() => GfArchReader.fromUint8Array(archive), hasCode('GFARCH_TRUNCATED'));
});

test('an unsupported compression type is reported with its code', () => {
  const archive = patched(stored(), 0x68, 2);
  assert.throws(
    () => GfArchReader.fromUint8Array(archive),
    (err: unknown) =>
      err instanceof GfArchError &&
      err.code === 'GFARCH_UNSUPPORTED_COMPRESSION' &&
      err.compressionType === 2 &&
      err.offset === 0x68
  );
});

test('a compressed size past the end is truncated', () => {
  const archive = patched(stored(), 0x70, 1000);
  assert.throws(() => GfArchReader.fromUint8Array(archive), hasCode('GFARCH_TRUNCATED'));
});

test('entry data outside the decompressed payload is truncated', () => {
  const archive = patched(stored(), 0x48, 100);
  const reader = GfArchReader.fromUint8Array(archive, { codecs: [storedCodec()] });
  assert.throws(
    () => reader.extractAll(),
    (err: unknown) => err instanceof GfArchError && err.code === 'GFARCH_TRUNCATED' && err.entryName === 'bb'
  );
});

test('corrupt LZ10 data surfaces as a compression error', () => {
  const archive = packGfArch(SAMPLE, { compression: 'lz10' });
  const gfcp = u32(archive, 0x14);
  // Every token of the first group becomes a back-reference before any output exists.
  archive[gfcp + 0x14] = 0xff;
  const reader = GfArchReader.fromUint8Array(archive);
  assert.throws(
    () => reader.extractAll(),
    (err: unknown) => err instanceof CompressionError && err.code === 'COMPRESSION_LZ10_BAD_DATA'
  );
});

test('limits bound input size, entry count and payload size', () => {
  const archive = stored();
  assert.throws(
    () => GfArchReader.fromUint8Array(archive, { limits: { maxInputBytes: archive.length - 1 } }),
    hasCode('GFARCH_LIMIT_EXCEEDED')
  );
  assert.throws(
    () => GfArchReader.fromUint8Array(archive, { limits: { maxEntries: 1 } }),
    hasCode('GFARCH_LIMIT_EXCEEDED')
  );
  const reader = GfArchReader.fromUint8Array(archive, {
    codecs: [storedCodec()],
    limits: { maxTotalDecompressedBytes: 47 }
  });
  assert.equal(reader.entries().length, 2);
  assert.throws(() => reader.extractAll(), hasCode('GFARCH_LIMIT_EXCEEDED'));
});

test('a declared size far beyond the compression ratio limit is refused before decoding', () => {
  for (const compression of ['bpe', 'lz10'] as const) {
    const archive = packGfArch([], { compression });
    assert.equal(archive.length, 0x54);
    const inflated = patched(archive, 0x40 + 12, 0x3f000000);
    const reader = GfArchReader.fromUint8Array(inflated);
    assert.throws(
      () => reader.extractAll(),
      (err: unknown) =>
        err instanceof GfArchError &&
        err.code === 'GFARCH_LIMIT_EXCEEDED' &&
        err.offset === 0x4c &&
        err.context?.['decompressedSize'] === String(0x3f000000)
    );
  }
});

test('maxCompressionRatio is configurable', () => {
  const archive = stored();
  assert.throws(
    () => extractGfArch(archive, { codecs: [storedCodec()], limits: { maxCompressionRatio: 0.5 } }),
    hasCode('GFARCH_LIMIT_EXCEEDED')
  );
  assert.deepEqual(extractGfArch(archive, { codecs: [storedCodec()], limits: { maxCompressionRatio: 1 } }), SAMPLE);
});

test('a payload shorter than its declared size is truncated', () => {
  const archive = packGfArch(SAMPLE, { compression: 'bpe' });
  const gfcp = u32(archive, 0x14);
  const reader = GfArchReader.fromUint8Array(patched(archive, gfcp + 12, 64));
  assert.throws(
    () => reader.extractAll(),
    (err: unknown) =>
      err instanceof GfArchError &&
      err.code === 'GFARCH_TRUNCATED' &&
      err.context?.['payloadSize'] === '48' &&
      err.context['decompressedSize'] === '64'
  );
});

test('codec overrides receive the declared size and stack bound', () => {
  const calls: GfArchDecompressOptions[] = [];
  const reader = GfArchReader.fromUint8Array(stored(), { codecs: [storedCodec(calls)], bpeStackSize: 64 });
  reader.extractAll();
  reader.extractAll();
  assert.deepEqual(calls, [{ decompressedSize: 48, bpeStackSize: 64 }]);
});

test('the BPE stack bound applies to built-in decoding', () => {
  const archive = packGfArch([{ name: 'ab', data: encoder.encode('abababab') }]);
  assert.deepEqual(extractGfArch(archive, { bpeStackSize: 8 })[0]!.data, encoder.encode('abababab'));
  assert.throws(
    () => extractGfArch(archive, { bpeStackSize: 2 }),
    (err: unknown) => err instanceof CompressionError && err.code === 'COMPRESSION_BPE_BAD_DATA'
  );
});
