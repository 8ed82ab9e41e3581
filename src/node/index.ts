import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { GfArchError } from '../errors.js';
import { GfArchReader } from '../reader/GfArchReader.js';
import { packGfArch } from '../writer/GfArchWriter.js';
import type { GfArchFile, GfArchReaderOptions, GfArchWriterOptions } from '../types.js';

export * from '../index.js';

export type NodeGfArchInput = Uint8Array | ArrayBuffer | string | URL;

/** Open an archive from bytes or from a file path. */
export async function openGfArch(input: NodeGfArchInput, options?: GfArchReaderOptions): Promise<GfArchReader> {
  if (input instanceof Uint8Array) {
    return GfArchReader.fromUint8Array(input, options);
  }
  if (input instanceof ArrayBuffer) {
    return GfArchReader.fromUint8Array(new Uint8Array(input), options);
  }
  const data = new Uint8Array(await readFile(toFilePath(input)));
  return GfArchReader.fromUint8Array(data, options);
}

/**
 * Extract every entry below `outputDir` and return the written paths in
 * entry order. When names repeat, later entries overwrite earlier ones.
 */
export async function extractGfArchToDirectory(
  input: NodeGfArchInput,
  outputDir: string,
  options?: GfArchReaderOptions
): Promise<string[]> {
  const reader = await openGfArch(input, options);
  const root = path.resolve(outputDir);
  const files = reader.extractAll();
  const targets = files.map((file) => resolveEntryPath(root, file.name));
  const written: string[] = [];
  for (const [index, file] of files.entries()) {
    const target = targets[index]!;
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file.data);
    written.push(target);
  }
  return written;
}

/** Pack files and write the archive to `target`. */
export async function writeGfArch(
  target: string | URL,
  files: readonly GfArchFile[],
  options?: GfArchWriterOptions
): Promise<void> {
  const bytes = packGfArch(files, options);
  await writeFile(toFilePath(target), bytes);
}

function toFilePath(input: string | URL): string {
  return typeof input === 'string' ? input : fileURLToPath(input);
}

function resolveEntryPath(root: string, name: string): string {
  const segments = name.split(/[\\/]+/).filter((segment) => segment.length > 0);
  const unsafe =
    segments.length === 0 ||
    path.isAbsolute(name) ||
    /^[a-zA-Z]:/.test(name) ||
    segments.some((segment) => segment === '..' || segment === '.');
  if (unsafe) {
    throw new GfArchError('GFARCH_PATH_TRAVERSAL', `Refusing to extract entry name ${JSON.stringify(name)}`, {
      entryName: name
    });
  }
  return path.join(root, ...segments);
}
