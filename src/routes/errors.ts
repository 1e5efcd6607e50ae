import type { Response } from 'express';
import { ZodError } from 'zod';
import { GalleryError, GalleryErrorCode, errorMessage } from '../lib/errors.js';

const STATUS_BY_CODE: Record<GalleryErrorCode, number> = {
  [GalleryErrorCode.INVALID_NAME]: 400,
  [GalleryErrorCode.INVALID_PAYLOAD]: 400,
  [GalleryErrorCode.NOT_FOUND]: 404,
  [GalleryErrorCode.SOURCE_NOT_FOUND]: 404,
  [GalleryErrorCode.IO_FAILED]: 500,
};

export function httpStatusFor(err: unknown): number {
  if (err instanceof GalleryError) return STATUS_BY_CODE[err.code];
  if (err instanceof ZodError) return 400;
  return 500;
}

export function sendError(res: Response, err: unknown): void {
  const status = httpStatusFor(err);
  if (status >= 500) console.error('[server] Request failed:', err);
  const message =
    err instanceof ZodError ? err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ') : errorMessage(err);
  res.status(status).json({ error: message });
}
