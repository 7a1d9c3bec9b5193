/**
 * Error taxonomy shared by services and routes.
 * Each class carries the HTTP status its envelope is sent with.
 */

export class GalleryError extends Error {
  readonly status: number;

  constructor(message: string, status: number = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Missing required field or malformed ID */
export class ValidationError extends GalleryError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends GalleryError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401);
  }
}

export class NotFoundError extends GalleryError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends GalleryError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class PayloadTooLargeError extends GalleryError {
  constructor(message: string) {
    super(message, 413);
  }
}

/** Remote store required but not configured */
export class ConfigurationError extends GalleryError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A remote call threw during a write */
export class UpstreamError extends GalleryError {
  constructor(message: string) {
    super(message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
