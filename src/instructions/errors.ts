import type { InstructionKey } from './types.js';

export type BuildstampErrorCode = 'LOCAL_TIME_UNAVAILABLE' | 'DUPLICATE_INSTRUCTION';

export class BuildstampError extends Error {
  constructor(
    public readonly code: BuildstampErrorCode,
    message: string,
    public readonly underlyingError?: unknown
  ) {
    super(message);
    this.name = 'BuildstampError';
  }
}

/**
 * Local time was requested but the system offset could not be resolved.
 * Aborts the whole run: no partial timestamp output is produced.
 */
export class LocalTimeUnavailableError extends BuildstampError {
  constructor(underlyingError?: unknown) {
    super('LOCAL_TIME_UNAVAILABLE', 'unable to retrieve local datetime: the local UTC offset could not be determined', underlyingError);
    this.name = 'LocalTimeUnavailableError';
  }
}

export class DuplicateInstructionError extends BuildstampError {
  constructor(public readonly key: InstructionKey) {
    super('DUPLICATE_INSTRUCTION', `instruction ${key} was already generated for this output map`);
    this.name = 'DuplicateInstructionError';
  }
}
