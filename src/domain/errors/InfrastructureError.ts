/**
 * InfrastructureError
 *
 * Thrown when infrastructure-level operations fail:
 * - SQLite reads and writes
 * - Loading configuration files
 * - Outbound HTTP calls that are not classified as delivery failures
 *
 * Lets the application layer handle infrastructure failures without knowing
 * the technology behind the port.
 */
export class InfrastructureError extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
