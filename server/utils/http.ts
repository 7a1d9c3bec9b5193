/**
 * JSON envelope helpers
 *
 * Success: { success: true, ...payload }
 * Failure: { success: false, error }
 */

import type { Response } from 'express';
import type { ApiFailure } from '@lumen/types';
import { GalleryError, ValidationError, errorMessage } from './errors';

export function sendOk<T extends object>(res: Response, payload: T, status: number = 200): void {
  res.status(status).json({ success: true, ...payload });
}

/**
 * Translate any thrown value into an envelope. GalleryErrors keep their
 * status; everything else is a 500.
 */
export function sendError(res: Response, scope: string, err: unknown): void {
  const status = err instanceof GalleryError ? err.status : 500;
  const body: ApiFailure = { success: false, error: errorMessage(err) };
  if (status >= 500) {
    console.error(`[${scope}] error`, err);
  } else {
    console.warn(`[${scope}] ${status} ${body.error}`);
  }
  res.status(status).json(body);
}

/**
 * Parse a positive integer route parameter
 */
export function parseIdParam(raw: string | undefined, label: string): number {
  if (raw === undefined || !/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new ValidationError(`Invalid ${label} ID`);
  }
  return Number(raw);
}
