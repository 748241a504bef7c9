import type { SuggestionStatus } from './types.js';

export class SuggestionStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SuggestionStoreError';
  }
}

/** The caller-supplied payload is not a structured record. */
export class InvalidSuggestionError extends SuggestionStoreError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSuggestionError';
  }
}

/** A status update asked for `pending` or a value outside the status set. */
export class InvalidStatusError extends SuggestionStoreError {
  public readonly status: string;

  constructor(status: string) {
    super(`Cannot move a suggestion to status "${status}"`);
    this.name = 'InvalidStatusError';
    this.status = status;
  }
}

export class SuggestionNotFoundError extends SuggestionStoreError {
  public readonly suggestionId: string;

  constructor(suggestionId: string) {
    super(`Suggestion not found: ${suggestionId}`);
    this.name = 'SuggestionNotFoundError';
    this.suggestionId = suggestionId;
  }
}

/**
 * The backing file (or its state directory) could not be written.
 * When thrown from a mutating call the in-memory change has already been applied.
 */
export class StoreWriteError extends SuggestionStoreError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreWriteError';
    this.filePath = filePath;
  }
}

export class IdGenerationError extends SuggestionStoreError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Could not generate a unique suggestion id after ${attempts} attempts`);
    this.name = 'IdGenerationError';
    this.attempts = attempts;
  }
}

export class SuggestionStateError extends SuggestionStoreError {
  public readonly suggestionId: string;
  public readonly status: SuggestionStatus;

  constructor(suggestionId: string, status: SuggestionStatus) {
    super(`Suggestion ${suggestionId} has already been ${status}`);
    this.name = 'SuggestionStateError';
    this.suggestionId = suggestionId;
    this.status = status;
  }
}
