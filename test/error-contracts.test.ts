import { test } from 'node:test';
import assert from 'node:assert/strict';
import { CompressionError, GfArchError, GfArchReader, packGfArch } from '../src/index.js';

test('GfArchError serializes stable fields', () => {
  const err = new GfArchError('GFARCH_UNSUPPORTED_COMPRESSION', 'Unsupported compression type 2', {
    offset: 0x68,
    compressionType: 2,
    context: { archiveSize: '164' }
  });
  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'GfArchError',
    code: 'GFARCH_UNSUPPORTED_COMPRESSION',
    message: 'Unsupported compression type 2',
    hint: 'Unsupported compression type 2',
    context: { archiveSize: '164' },
    offset: 0x68,
    compressionType: 2
  });
  assert.ok(err instanceof Error);
});

test('context keys that shadow top-level fields are dropped', () => {
  const err = new GfArchError('GFARCH_INVALID_NAME', 'Bad name', {
    entryName: 'a.bin',
    context: { code: 'X', entryName: 'other', schemaVersion: '9', detail: 'kept' }
  });
  assert.deepEqual(err.toJSON().context, { detail: 'kept' });
  assert.equal(err.toJSON().entryName, 'a.bin');
});

test('context keys are kept when the matching field is absent', () => {
  const err = new GfArchError('GFARCH_TRUNCATED', 'Short', { context: { offset: '12' } });
  const json = err.toJSON();
  assert.deepEqual(json.context, { offset: '12' });
  assert.equal('offset' in json, false);
});

test('CompressionError serializes its algorithm', () => {
  const err = new CompressionError('COMPRESSION_BPE_BAD_DATA', 'Truncated BPE stream', {
    algorithm: 'bpe',
    context: { offset: '3', algorithm: 'shadowed' }
  });
  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'CompressionError',
    code: 'COMPRESSION_BPE_BAD_DATA',
    message: 'Truncated BPE stream',
    hint: 'Truncated BPE stream',
    context: { offset: '3' },
    algorithm: 'bpe'
  });
});

test('errors keep their cause', () => {
  const cause = new RangeError('inner');
  const err = new GfArchError('GFARCH_BAD_LAYOUT', 'outer', { cause });
  assert.equal(err.cause, cause);
});

test('reader failures round-trip through JSON', () => {
  const archive = packGfArch([]);
  assert.throws(
    () => GfArchReader.fromUint8Array(archive.subarray(0, 0x10)),
    (err: unknown) => {
      if (!(err instanceof GfArchError)) return false;
      const json = JSON.parse(JSON.stringify(err)) as unknown;
      assert.deepEqual(json, {
        schemaVersion: '1',
        name: 'GfArchError',
        code: 'GFARCH_TRUNCATED',
        message: 'Archive header extends beyond the end of the archive',
        hint: 'Archive header extends beyond the end of the archive',
        context: { length: '48', archiveSize: '16' },
        offset: 0
      });
      return true;
    }
  );
});
