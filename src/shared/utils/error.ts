/**
 * Error helpers
 */

/** Extract a human-readable message from an unknown thrown value */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
