/** Human-readable message from any caught value. */
export function getErrorMessage(err: unknown, fallback?: string): string {
  if (err instanceof Error) return err.message;
  return fallback !== undefined ? fallback : String(err);
}
