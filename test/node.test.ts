import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { GfArchError, extractGfArchToDirectory, openGfArch, packGfArch, writeGfArch } from '../src/node/index.js';
import { bytesOf, encoder } from './helpers.js';

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), 'gfarch-kit-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('writeGfArch and openGfArch round-trip through a file', async () => {
  await withTempDir(async (dir) => {
    const target = path.join(dir, 'sample.gfa');
    const files = [
      { name: 'model.bin', data: bytesOf(40) },
      { name: 'notes.txt', data: encoder.encode('hello') }
    ];
    await writeGfArch(target, files, { compression: 'lz10' });

    const fromPath = await openGfArch(target);
    assert.deepEqual(fromPath.extractAll(), files);

    const fromUrl = await openGfArch(pathToFileURL(target));
    assert.equal(fromUrl.compression.scheme, 'lz10');

    const raw = new Uint8Array(await readFile(target));
    assert.deepEqual(raw, packGfArch(files, { compression: 'lz10' }));
    const copy = new ArrayBuffer(raw.length);
    new Uint8Array(copy).set(raw);
    const fromBuffer = await openGfArch(copy);
    assert.equal(fromBuffer.entries().length, 2);
  });
});

test('extractGfArchToDirectory writes nested entries', async () => {
  await withTempDir(async (dir) => {
    const archive = packGfArch([
      { name: 'top.txt', data: encoder.encode('top') },
      { name: 'stage/a\\b.dat', data: bytesOf(5) }
    ]);
    const out = path.join(dir, 'out');
    const written = await extractGfArchToDirectory(archive, out);
    assert.deepEqual(written, [path.join(out, 'top.txt'), path.join(out, 'stage', 'a', 'b.dat')]);
    assert.equal(await readFile(path.join(out, 'top.txt'), 'utf8'), 'top');
    assert.deepEqual(new Uint8Array(await readFile(path.join(out, 'stage', 'a', 'b.dat'))), bytesOf(5));
  });
});

test('extractGfArchToDirectory refuses names that leave the target', async () => {
  await withTempDir(async (dir) => {
    for (const name of ['../escape.txt', '/abs.txt', 'C:evil', 'ok/../../x', '']) {
      const archive = packGfArch([{ name, data: bytesOf(1) }]);
      await assert.rejects(
        extractGfArchToDirectory(archive, path.join(dir, 'out')),
        (err: unknown) => err instanceof GfArchError && err.code === 'GFARCH_PATH_TRAVERSAL' && err.entryName === name
      );
    }
  });
});

test('extractGfArchToDirectory writes nothing when any name is unsafe', async () => {
  await withTempDir(async (dir) => {
    const archive = packGfArch([
      { name: 'fine.txt', data: bytesOf(2) },
      { name: '../bad.txt', data: bytesOf(2) }
    ]);
    const out = path.join(dir, 'out');
    await assert.rejects(extractGfArchToDirectory(archive, out));
    await assert.rejects(readFile(path.join(out, 'fine.txt')));
  });
});
