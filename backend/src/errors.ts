import type { ErrorKind, Failure } from "./types";

export class PhotoSearchError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The file could not be read or decoded as an image. */
export class ImageReadError extends PhotoSearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("image_read", message, options);
  }
}

/** The model endpoint failed, timed out or answered with something unusable. */
export class ProviderError extends PhotoSearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider", message, options);
  }
}

export class StoreError extends PhotoSearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("store", message, options);
  }
}

export class ValidationError extends PhotoSearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("validation", message, options);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toFailure(error: unknown): Failure {
  if (error instanceof PhotoSearchError) {
    return { ok: false, kind: error.kind, message: error.message };
  }
  return { ok: false, kind: "internal", message: getErrorMessage(error) };
}
