/**
 * Flattens an unknown thrown value into log fields
 */
export function errorFields(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
