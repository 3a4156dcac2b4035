/**
 * Message of a caught value, for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
