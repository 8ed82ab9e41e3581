import { GfArchError } from './errors.js';
import type { GfArchCompression, GfArchScheme, GfArchVersion } from './types.js';

export const GFAC_MAGIC = 0x43414647; // "GFAC"
export const GFCP_MAGIC = 0x50434647; // "GFCP"

export const HEADER_SIZE = 0x30;
export const ENTRY_SIZE = 0x10;
export const COMPRESSION_HEADER_SIZE = 0x14;
export const DATA_ALIGNMENT = 0x10;

export const HEADER_VERSION_OFFSET = 0x04;
export const HEADER_COMPRESSED_FLAG_OFFSET = 0x08;
export const HEADER_FILE_INFO_OFFSET = 0x0c;
export const HEADER_FILE_INFO_SIZE_OFFSET = 0x10;
export const HEADER_GFCP_OFFSET = 0x14;
export const HEADER_PAYLOAD_SIZE_OFFSET = 0x18;
export const HEADER_FILE_COUNT_OFFSET = 0x2c;

/** Written at 0x0C: the file-info block starts at the file count. */
export const FILE_INFO_OFFSET = HEADER_FILE_COUNT_OFFSET;
export const COMPRESSED_FLAG = 1;
export const GFCP_FORMAT_VERSION = 1;

/** Compression header position used by titles with a fixed layout. */
export const GFCP_OFFSET_FIXED = 0x2000;

export const NAME_OFFSET_MASK = 0x00ffffff;
export const NAME_FLAGS_MASK = 0xff000000;
export const LAST_ENTRY_FLAG = 0x80000000;

const VERSION_CODES: Readonly<Record<GfArchVersion, number>> = {
  '2.0': 0x0200,
  '3.0': 0x0300,
  '3.1': 0x0301
};

const SCHEME_CODES: Readonly<Record<GfArchScheme, number>> = {
  bpe: 1,
  lz10: 3
};

export function versionToCode(version: GfArchVersion): number {
  const code = VERSION_CODES[version];
  if (code === undefined) {
    throw new GfArchError('GFARCH_UNSUPPORTED_VERSION', `Unsupported GfArch version: ${String(version)}`);
  }
  return code;
}

export function versionFromCode(code: number): GfArchVersion | undefined {
  for (const [version, value] of Object.entries(VERSION_CODES)) {
    if (value === code && isVersion(version)) return version;
  }
  return undefined;
}

export function isVersion(value: string): value is GfArchVersion {
  return Object.hasOwn(VERSION_CODES, value);
}

/** Fold the legacy `lz77` name onto `lz10`. */
export function normalizeScheme(compression: GfArchCompression): GfArchScheme {
  return compression === 'lz77' ? 'lz10' : compression;
}

export function schemeToCode(compression: GfArchCompression): number {
  return SCHEME_CODES[normalizeScheme(compression)];
}

export function schemeFromCode(code: number): GfArchScheme | undefined {
  if (code === SCHEME_CODES.bpe) return 'bpe';
  if (code === SCHEME_CODES.lz10) return 'lz10';
  return undefined;
}
