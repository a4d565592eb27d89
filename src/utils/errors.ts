export type EncodeErrorKind =
  | 'InputNotFound'
  | 'CoverNotFound'
  | 'SubprocessSpawnFailed'
  | 'SubprocessExecutionFailed'
  | 'OutputValidationFailed'
  | 'ConfigurationError';

/**
 * The single error type surfaced by the pipeline. `message` is meant to be
 * shown to the user as-is; `kind` lets callers and tests branch on the class
 * of failure without matching on text.
 */
export class EncodeError extends Error {
  constructor(public readonly kind: EncodeErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EncodeError';
  }
}

export const isEncodeError = (err: unknown): err is EncodeError => err instanceof EncodeError;

export const errorMessage = (err: unknown): string => err instanceof Error ? err.message : String(err);
