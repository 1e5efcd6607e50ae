/**
 * Error types for admin operations that take untrusted input.
 * The reconciliation pipeline itself degrades instead of throwing.
 */

export enum GalleryErrorCode {
  INVALID_NAME = 'INVALID_NAME',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  IO_FAILED = 'IO_FAILED',
  SOURCE_NOT_FOUND = 'SOURCE_NOT_FOUND',
}

export class GalleryError extends Error {
  constructor(
    public code: GalleryErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GalleryError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Node fs errors carry a string `code` (ENOENT, EEXIST, ...) */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}
