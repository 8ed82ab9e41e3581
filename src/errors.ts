import { sanitizeErrorContext } from './errorContext.js';
import { GFARCH_REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable GfArch error codes. */
export type GfArchErrorCode =
  | 'GFARCH_BAD_HEADER'
  | 'GFARCH_BAD_COMPRESSION_HEADER'
  | 'GFARCH_UNSUPPORTED_COMPRESSION'
  | 'GFARCH_UNSUPPORTED_VERSION'
  | 'GFARCH_TRUNCATED'
  | 'GFARCH_INVALID_NAME'
  | 'GFARCH_INVALID_ENTRY'
  | 'GFARCH_BAD_LAYOUT'
  | 'GFARCH_LIMIT_EXCEEDED'
  | 'GFARCH_WRITER_CLOSED'
  | 'GFARCH_AUDIT_FAILED'
  | 'GFARCH_PATH_TRAVERSAL';

/** Error thrown for GfArch parsing, validation, and write failures. */
export class GfArchError extends Error {
  /** Machine-readable error code. */
  readonly code: GfArchErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: number | undefined;
  /** Compression type code read from the archive, for `GFARCH_UNSUPPORTED_COMPRESSION`. */
  readonly compressionType?: number | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a GfArchError with a stable code. */
  constructor(
    code: GfArchErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      offset?: number | undefined;
      compressionType?: number | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'GfArchError';
    this.code = code;
    this.entryName = options?.entryName;
    this.offset = options?.offset;
    this.compressionType = options?.compressionType;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: GfArchErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    offset?: number;
    compressionType?: number;
  } {
    const topLevelKeys: string[] = [];
    if (this.entryName !== undefined) topLevelKeys.push('entryName');
    if (this.offset !== undefined) topLevelKeys.push('offset');
    if (this.compressionType !== undefined) topLevelKeys.push('compressionType');
    const context = sanitizeErrorContext(this.context, topLevelKeys);
    return {
      schemaVersion: GFARCH_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.offset !== undefined ? { offset: this.offset } : {}),
      ...(this.compressionType !== undefined ? { compressionType: this.compressionType } : {})
    };
  }
}

/** Throw `GFARCH_TRUNCATED` unless `[offset, offset + length)` lies inside a buffer of `size` bytes. */
export function assertInBounds(size: number, offset: number, length: number, what: string): void {
  if (offset < 0 || length < 0 || offset + length > size) {
    throw new GfArchError('GFARCH_TRUNCATED', `${what} extends beyond the end of the archive`, {
      offset,
      context: {
        length: String(length),
        archiveSize: String(size)
      }
    });
  }
}
