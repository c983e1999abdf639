/** Failure categories reported by the store, codecs and importer */
export type ErrorKind =
  | 'not-found'
  | 'corrupt'
  | 'invalid-geometry'
  | 'partial-decode'
  | 'io-failure';

/**
 * A classified failure. Thrown only inside the core and caught at the
 * store/codec boundary, where it becomes a boolean result plus `lastError`.
 */
export class AnnotationError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnnotationError';
    this.kind = kind;
  }
}

export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

/**
 * Wrap any thrown value into an AnnotationError of the given kind,
 * keeping an existing classification.
 */
export function toAnnotationError(err: unknown, kind: ErrorKind, fallback: string): AnnotationError {
  if (err instanceof AnnotationError) return err;
  return new AnnotationError(kind, errorMessage(err, fallback), { cause: err });
}
