/**
 * Run-level failure: the batch could not be set up (temp directory, strategy
 * source). Task-level failures never surface as this error.
 */
export class MatrixRunError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MatrixRunError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
