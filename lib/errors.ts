/**
 * Intake Error Types
 *
 * RecordFetchError        a read from the record store failed; halts a poller.
 * RecordPersistenceError  a write failed; callers keep local state moving.
 * IntakeConfigError       configuration did not validate.
 * PollerStateError        a poller was driven out of order (e.g. started twice).
 */

export class RecordFetchError extends Error {
  public recordId: string;

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load record ${recordId}: ${message}`, options);
    this.name = 'RecordFetchError';
    this.recordId = recordId;
  }
}

export class RecordPersistenceError extends Error {
  public recordId: string;

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to save record ${recordId}: ${message}`, options);
    this.name = 'RecordPersistenceError';
    this.recordId = recordId;
  }
}

export class IntakeConfigError extends Error {
  public issues: string[];

  constructor(issues: string[]) {
    super(`Invalid intake configuration: ${issues.join('; ')}`);
    this.name = 'IntakeConfigError';
    this.issues = issues;
  }
}

export class PollerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PollerStateError';
  }
}

const DEFAULT_ERROR_MESSAGE = 'An unexpected error occurred';

/**
 * Pull a human-readable message out of anything thrown.
 * Remote gateways wrap their message in `body.message`; that wins over `message`.
 */
export function getErrorMessage(error: unknown, fallback: string = DEFAULT_ERROR_MESSAGE): string {
  if (typeof error === 'string') return error || fallback;
  if (typeof error !== 'object' || error === null) return fallback;

  if ('body' in error && typeof error.body === 'object' && error.body !== null) {
    const body = error.body;
    if ('message' in body && typeof body.message === 'string' && body.message) {
      return body.message;
    }
  }

  if ('message' in error && typeof error.message === 'string' && error.message) {
    return error.message;
  }

  return fallback;
}
