export type VoterStoreErrorCode = 'not_found' | 'already_exists' | 'invalid_document' | 'store_failure';

/** Failure raised by the voter data-access layer. */
export class VoterStoreError extends Error {
  readonly code: VoterStoreErrorCode;

  constructor(code: VoterStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VoterStoreError';
    this.code = code;
  }

  static notFound(message: string): VoterStoreError {
    return new VoterStoreError('not_found', message);
  }

  static alreadyExists(message: string): VoterStoreError {
    return new VoterStoreError('already_exists', message);
  }
}

/** HTTP status for a data-access failure; anything unrecognised is a 500. */
export function statusForError(error: unknown): number {
  if (!(error instanceof VoterStoreError)) return 500;
  switch (error.code) {
    case 'not_found':
      return 404;
    case 'already_exists':
      return 409;
    default:
      return 500;
  }
}
