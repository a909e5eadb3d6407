// src/errors.ts
// Error taxonomy shared by the extraction, conversation and assembly modules.
//
// Validation rejections are NOT errors: validators return { ok: false, reason }
// and the conversation machine turns that into an assistant message.

export type DomainErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'INCOMPLETE_DOCUMENT'
  | 'CLASSIFIER_UNAVAILABLE';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
}

export type NotFoundResource = 'document' | 'session' | 'slot';

/** Unknown document, session or slot id */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly resource: NotFoundResource,
    readonly resourceId: string | number
  ) {
    super(`${resource} ${resourceId} not found`);
    this.name = 'NotFoundError';
  }
}

/** A state machine call that is not legal in the current state */
export class InvalidStateError extends DomainError {
  readonly code = 'INVALID_STATE' as const;

  constructor(
    readonly operation: string,
    readonly state: string
  ) {
    super(`Cannot ${operation} while session is ${state}`);
    this.name = 'InvalidStateError';
  }
}

/** Assembly attempted before every required slot was resolved */
export class IncompleteDocumentError extends DomainError {
  readonly code = 'INCOMPLETE_DOCUMENT' as const;

  constructor(
    readonly pendingSlotIds: number[],
    readonly skippedSlotIds: number[] = []
  ) {
    const parts: string[] = [];
    if (pendingSlotIds.length > 0) parts.push(`${pendingSlotIds.length} pending`);
    if (skippedSlotIds.length > 0) parts.push(`${skippedSlotIds.length} skipped`);
    super(`Document is not complete: ${parts.join(', ')} slot(s) unresolved`);
    this.name = 'IncompleteDocumentError';
  }
}

/** Re-extraction would discard values of conversations still running */
export class DocumentInUseError extends DomainError {
  readonly code = 'INVALID_STATE' as const;

  constructor(
    readonly documentId: string,
    readonly openSessions: number
  ) {
    super('document has an unfinished conversation session');
    this.name = 'DocumentInUseError';
  }
}

/**
 * The semantic-inference collaborator failed or timed out.
 * Always absorbed by the classifier; never reaches an API caller.
 */
export class ClassifierUnavailableError extends DomainError {
  readonly code = 'CLASSIFIER_UNAVAILABLE' as const;

  constructor(readonly reason: 'timeout' | 'error' | 'malformed', cause?: unknown) {
    super(`Semantic inference unavailable (${reason})`, { cause });
    this.name = 'ClassifierUnavailableError';
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
